import { HttpException, HttpStatus, UnauthorizedException } from '@nestjs/common';
import { TOKEN_FAILURE_MESSAGES, TokenFailure } from '../token';
import type { GateFailure, RefreshFailure } from '../token';

const STATUS_LABELS: Partial<Record<HttpStatus, string>> = {
  [HttpStatus.BAD_REQUEST]: 'Bad Request',
  [HttpStatus.UNAUTHORIZED]: 'Unauthorized',
  [HttpStatus.NOT_FOUND]: 'Not Found',
};

/** Status codes for the token refresh endpoint */
export const REFRESH_FAILURE_STATUS: Record<RefreshFailure, HttpStatus> = {
  [TokenFailure.MissingRefreshToken]: HttpStatus.BAD_REQUEST,
  [TokenFailure.WrongTokenType]: HttpStatus.BAD_REQUEST,
  [TokenFailure.MalformedToken]: HttpStatus.UNAUTHORIZED,
  [TokenFailure.SignatureInvalid]: HttpStatus.UNAUTHORIZED,
  [TokenFailure.TokenExpired]: HttpStatus.UNAUTHORIZED,
  [TokenFailure.SubjectNotFound]: HttpStatus.NOT_FOUND,
};

/**
 * Thrown by the HTTP adapters when the token core rejects a token.
 *
 * Carries the machine-readable `reason` so clients can tell
 * "expired, go refresh" apart from "invalid, start over".
 */
export class TokenRejectedException extends HttpException {
  readonly reason: TokenFailure;

  constructor(reason: TokenFailure, status: HttpStatus) {
    super(
      {
        statusCode: status,
        error: STATUS_LABELS[status] ?? 'Error',
        message: TOKEN_FAILURE_MESSAGES[reason],
        reason,
      },
      status,
    );
    this.reason = reason;
  }

  static forRefresh(reason: RefreshFailure): TokenRejectedException {
    return new TokenRejectedException(reason, REFRESH_FAILURE_STATUS[reason]);
  }

  /** Every gate failure on a protected route is a 401 */
  static forGate(reason: GateFailure): TokenRejectedException {
    return new TokenRejectedException(reason, HttpStatus.UNAUTHORIZED);
  }
}

/**
 * Thrown on protected routes when no bearer credential was presented.
 */
export class NotAuthenticatedException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      message: 'Authentication credentials were not provided.',
    });
  }
}

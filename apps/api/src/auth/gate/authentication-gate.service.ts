import { Inject, Injectable, Logger } from '@nestjs/common';
import { TokenType, USER_STORE } from '../interfaces';
import type { ClaimsSet, Principal, UserStore } from '../interfaces';
import { TokenCodec, TokenFailure } from '../token';
import type { GateFailure } from '../token';

export type AuthResult =
  | { readonly status: 'not_attempted' }
  | {
      readonly status: 'authenticated';
      readonly principal: Principal;
      readonly claims: ClaimsSet;
    }
  | { readonly status: 'rejected'; readonly reason: GateFailure };

/**
 * AuthenticationGate: turns an Authorization header value into a verified
 * principal.
 *
 * Flow:
 * 1. No header → not attempted
 * 2. Header must be exactly `<scheme> <token>`
 * 3. Scheme other than `Bearer` → not attempted (another scheme may apply)
 * 4. Decode and verify the token
 * 5. Only access tokens authenticate requests
 * 6. The subject must be present and still resolve to a user
 */
@Injectable()
export class AuthenticationGate {
  readonly keyword = 'Bearer';

  private readonly logger = new Logger(AuthenticationGate.name);

  constructor(
    private readonly codec: TokenCodec,
    @Inject(USER_STORE) private readonly users: UserStore,
  ) {}

  /** Value for the WWW-Authenticate header on 401 responses */
  challenge(): string {
    return `${this.keyword} realm="api"`;
  }

  async authenticate(headerValue: string | undefined): Promise<AuthResult> {
    if (!headerValue) {
      return { status: 'not_attempted' };
    }

    const parts = headerValue.trim().split(/\s+/);
    if (parts.length !== 2) {
      return this.reject(TokenFailure.MalformedHeader);
    }

    const [scheme, token] = parts;
    if (scheme !== this.keyword) {
      return { status: 'not_attempted' };
    }

    const decoded = this.codec.decode(token);
    if (decoded.status === 'rejected') {
      return this.reject(decoded.reason);
    }

    const { claims } = decoded;
    if (claims.tokenType !== TokenType.Access) {
      return this.reject(TokenFailure.WrongTokenType);
    }

    if (!claims.subjectId) {
      return this.reject(TokenFailure.MissingSubject);
    }

    const principal = await this.users.findById(claims.subjectId);
    if (!principal) {
      this.logger.warn(
        `Bearer authentication failed: user ${claims.subjectId} not found`,
      );
      return { status: 'rejected', reason: TokenFailure.SubjectNotFound };
    }

    return { status: 'authenticated', principal, claims };
  }

  private reject(reason: GateFailure): AuthResult {
    this.logger.debug(`Bearer authentication rejected: ${reason}`);
    return { status: 'rejected', reason };
  }
}

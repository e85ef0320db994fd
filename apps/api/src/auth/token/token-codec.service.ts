import { Inject, Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { TokenType } from '../interfaces';
import type { ClaimsSet, TokenPayload } from '../interfaces';
import { CLOCK, fromEpochSeconds, toEpochSeconds } from './clock';
import type { Clock } from './clock';
import { SIGNING_CONTEXT } from './signing-context';
import type { SigningContext } from './signing-context';
import { TokenFailure } from './token-failure.enum';
import type { DecodeFailure } from './token-failure.enum';

/**
 * Maximum accepted token length (8 KiB). A token with the claims we issue
 * is well under 300 bytes.
 */
export const MAX_TOKEN_SIZE = 8 * 1024;

const BASE64URL_SEGMENT = /^[A-Za-z0-9_-]+$/;

const TIME_CLAIMS = ['iat', 'nbf', 'exp'] as const;

export type DecodeResult =
  | { readonly status: 'decoded'; readonly claims: ClaimsSet }
  | { readonly status: 'rejected'; readonly reason: DecodeFailure };

/**
 * TokenCodec: converts between ClaimsSet and compact signed JWTs.
 *
 * Signing and verification are delegated to @nestjs/jwt (jsonwebtoken);
 * this class owns the wire payload layout and the classification of
 * decode failures into MalformedToken / SignatureInvalid / TokenExpired.
 *
 * Decode order:
 * 1. Structure: three segments, header and payload are base64url JSON objects,
 *    registered time claims (iat, nbf, exp) are numbers when present
 * 2. Signature and algorithm (via jsonwebtoken)
 * 3. Expiry against the injected clock (via jsonwebtoken)
 * 4. Claim shape
 */
@Injectable()
export class TokenCodec {
  constructor(
    private readonly jwtService: JwtService,
    @Inject(SIGNING_CONTEXT) private readonly signing: SigningContext,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  encode(claims: ClaimsSet): string {
    const payload: TokenPayload = {
      sub: claims.subjectId,
      type: claims.tokenType,
      iat: toEpochSeconds(claims.issuedAt),
      exp: toEpochSeconds(claims.expiresAt),
    };

    return this.jwtService.sign(payload, {
      secret: this.signing.secretKey,
      algorithm: this.signing.algorithm,
    });
  }

  decode(token: string): DecodeResult {
    const unverified = readCompactPayload(token);
    if (!unverified || !hasNumericTimeClaims(unverified)) {
      return rejected(TokenFailure.MalformedToken);
    }

    let payload: Record<string, unknown>;
    try {
      payload = this.jwtService.verify<Record<string, unknown>>(token, {
        secret: this.signing.secretKey,
        algorithms: [this.signing.algorithm],
        clockTimestamp: toEpochSeconds(this.clock.now()),
      });
    } catch (error) {
      return rejected(classifyVerifyError(error));
    }

    const claims = toClaimsSet(payload);
    return claims
      ? { status: 'decoded', claims }
      : rejected(TokenFailure.MalformedToken);
  }
}

function rejected(reason: DecodeFailure): DecodeResult {
  return { status: 'rejected', reason };
}

/**
 * Maps jsonwebtoken errors by name, the same way Passport's JWT strategy
 * reports them. Anything else is not a token problem and is rethrown.
 */
function classifyVerifyError(error: unknown): DecodeFailure {
  if (!(error instanceof Error)) {
    throw error;
  }

  switch (error.name) {
    case 'TokenExpiredError':
      return TokenFailure.TokenExpired;
    case 'JsonWebTokenError':
      // Structure and time claim types were checked up front, so what
      // remains is the signature segment or the algorithm in the header.
      return TokenFailure.SignatureInvalid;
    case 'NotBeforeError':
      return TokenFailure.MalformedToken;
    default:
      throw error;
  }
}

/** Unverified payload of a well-formed compact token, or null */
function readCompactPayload(token: string): Record<string, unknown> | null {
  if (token.length === 0 || token.length > MAX_TOKEN_SIZE) {
    return null;
  }

  const segments = token.split('.');
  if (segments.length !== 3) {
    return null;
  }

  const [header, payload] = segments;
  if (!parseJsonObjectSegment(header)) {
    return null;
  }
  return parseJsonObjectSegment(payload);
}

function parseJsonObjectSegment(
  segment: string | undefined,
): Record<string, unknown> | null {
  if (!segment || !BASE64URL_SEGMENT.test(segment)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(segment, 'base64url').toString('utf8'));
  } catch {
    return null;
  }
  return isRecord(parsed) ? parsed : null;
}

/**
 * jsonwebtoken reports a non-numeric exp or nbf as a JsonWebTokenError
 * after the signature has passed; those are claim problems, not signature ones.
 */
function hasNumericTimeClaims(payload: Record<string, unknown>): boolean {
  return TIME_CLAIMS.every(
    (claim) => payload[claim] === undefined || typeof payload[claim] === 'number',
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTokenType(value: unknown): value is TokenType {
  return value === TokenType.Access || value === TokenType.Refresh;
}

function toClaimsSet(payload: Record<string, unknown>): ClaimsSet | null {
  const { sub, type, iat, exp } = payload;

  if (!isTokenType(type)) {
    return null;
  }

  if (!Number.isInteger(iat) || !Number.isInteger(exp)) {
    return null;
  }

  const issuedAt = Number(iat);
  const expiresAt = Number(exp);
  if (expiresAt <= issuedAt) {
    return null;
  }

  return {
    subjectId: typeof sub === 'string' ? sub : '',
    issuedAt: fromEpochSeconds(issuedAt),
    expiresAt: fromEpochSeconds(expiresAt),
    tokenType: type,
  };
}

/**
 * Token type tag. Refresh tokens must never authenticate a request,
 * and access tokens must never be exchanged for new ones.
 */
export enum TokenType {
  Access = 'access',
  Refresh = 'refresh',
}

/**
 * Claims carried by every signed token, in domain form.
 *
 * `subjectId` may be empty on a decoded token whose `sub` claim was absent;
 * the authentication gate rejects such tokens.
 */
export interface ClaimsSet {
  subjectId: string;
  issuedAt: Date;
  /** Always strictly after `issuedAt` */
  expiresAt: Date;
  tokenType: TokenType;
}

/**
 * JWT payload as it appears on the wire.
 *
 * `iat` and `exp` are integer epoch seconds, so instants survive a round
 * trip at second precision.
 */
export interface TokenPayload {
  sub: string;
  type: TokenType;
  iat: number;
  exp: number;
}

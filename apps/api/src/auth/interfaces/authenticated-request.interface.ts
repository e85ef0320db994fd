import type { Request } from 'express';
import type { ClaimsSet } from './claims.interface';
import type { Principal } from './principal.interface';

/**
 * Fields JwtAuthGuard attaches to the request after a successful check.
 */
export interface AuthenticationFields {
  user: Principal;
  /** Verified claims, for handlers that need token metadata such as issuedAt */
  auth: ClaimsSet;
}

/**
 * Express Request extended with the authenticated principal and claims.
 * Use this type in controllers that require authentication.
 */
export interface AuthenticatedRequest extends Request, AuthenticationFields {}

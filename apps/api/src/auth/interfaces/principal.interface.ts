/**
 * The authenticated subject resolved from a token's `sub` claim.
 * Attached to `request.user` by JwtAuthGuard.
 */
export interface Principal {
  /** User ID (UUID), maps to User.id */
  id: string;
  username: string;
}

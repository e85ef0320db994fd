export { TokenType } from './claims.interface';
export type { ClaimsSet, TokenPayload } from './claims.interface';
export type { Principal } from './principal.interface';
export { USER_STORE } from './user-store.interface';
export type { UserStore } from './user-store.interface';
export { CREDENTIAL_VERIFIER } from './credential-verifier.interface';
export type { CredentialVerifier } from './credential-verifier.interface';
export type {
  AuthenticatedRequest,
  AuthenticationFields,
} from './authenticated-request.interface';

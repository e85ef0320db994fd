/** Injection token for the CredentialVerifier implementation */
export const CREDENTIAL_VERIFIER = Symbol('CREDENTIAL_VERIFIER');

/**
 * Checks a username/password pair. Used only by the token-obtain endpoint.
 */
export interface CredentialVerifier {
  /** Resolves to the subject id on success, null on invalid credentials */
  verify(username: string, password: string): Promise<string | null>;
}

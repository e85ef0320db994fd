/**
 * Classified token failures. The string values are the machine-readable
 * `reason` returned to clients in error bodies.
 */
export enum TokenFailure {
  MalformedHeader = 'malformed_header',
  MalformedToken = 'malformed_token',
  SignatureInvalid = 'signature_invalid',
  TokenExpired = 'token_expired',
  WrongTokenType = 'wrong_token_type',
  MissingSubject = 'missing_subject',
  SubjectNotFound = 'subject_not_found',
  MissingRefreshToken = 'missing_refresh_token',
}

/** Failures TokenCodec.decode can report */
export type DecodeFailure =
  | TokenFailure.MalformedToken
  | TokenFailure.SignatureInvalid
  | TokenFailure.TokenExpired;

/** Failures AuthenticationGate can report */
export type GateFailure =
  | DecodeFailure
  | TokenFailure.MalformedHeader
  | TokenFailure.WrongTokenType
  | TokenFailure.MissingSubject
  | TokenFailure.SubjectNotFound;

/** Failures RefreshFlow can report */
export type RefreshFailure =
  | DecodeFailure
  | TokenFailure.MissingRefreshToken
  | TokenFailure.WrongTokenType
  | TokenFailure.SubjectNotFound;

/** Short client-facing descriptions; never include token material */
export const TOKEN_FAILURE_MESSAGES: Record<TokenFailure, string> = {
  [TokenFailure.MalformedHeader]:
    "Invalid Authorization header format. Use 'Bearer <token>'.",
  [TokenFailure.MalformedToken]: 'Token is malformed',
  [TokenFailure.SignatureInvalid]: 'Token signature is invalid',
  [TokenFailure.TokenExpired]: 'Token has expired',
  [TokenFailure.WrongTokenType]: 'Wrong token type',
  [TokenFailure.MissingSubject]: 'Token has no subject',
  [TokenFailure.SubjectNotFound]: 'User not found',
  [TokenFailure.MissingRefreshToken]: 'Refresh token required',
};


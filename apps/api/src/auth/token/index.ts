export { TokenCodec, MAX_TOKEN_SIZE } from './token-codec.service';
export type { DecodeResult } from './token-codec.service';
export { TokenIssuer } from './token-issuer.service';
export type { TokenPair } from './token-issuer.service';
export {
  TokenFailure,
  TOKEN_FAILURE_MESSAGES,
} from './token-failure.enum';
export type {
  DecodeFailure,
  GateFailure,
  RefreshFailure,
} from './token-failure.enum';
export {
  SIGNING_CONTEXT,
  createSigningContext,
} from './signing-context';
export type { SigningContext, SigningSettings } from './signing-context';
export { CLOCK, systemClock, toEpochSeconds, fromEpochSeconds } from './clock';
export type { Clock } from './clock';

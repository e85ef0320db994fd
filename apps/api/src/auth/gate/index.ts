export { AuthenticationGate } from './authentication-gate.service';
export type { AuthResult } from './authentication-gate.service';

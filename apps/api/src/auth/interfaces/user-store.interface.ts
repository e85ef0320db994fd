import type { Principal } from './principal.interface';

/** Injection token for the UserStore implementation */
export const USER_STORE = Symbol('USER_STORE');

/**
 * Resolves a token subject to a principal. Supplied by the host application;
 * the token core only ever reads through it.
 */
export interface UserStore {
  /** Returns null when no usable user exists for the id */
  findById(subjectId: string): Promise<Principal | null>;
}

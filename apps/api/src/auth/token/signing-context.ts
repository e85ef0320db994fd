import type { SigningAlgorithm } from '../../config/env.validation';

/** Injection token for the process-wide SigningContext */
export const SIGNING_CONTEXT = Symbol('SIGNING_CONTEXT');

const SECONDS_PER_MINUTE = 60;
const SECONDS_PER_DAY = 24 * 60 * 60;

/**
 * Key material and lifetimes shared by TokenCodec and TokenIssuer.
 * Built once at startup and frozen; never mutated afterwards.
 */
export interface SigningContext {
  readonly secretKey: string;
  readonly algorithm: SigningAlgorithm;
  readonly accessTokenLifetimeSeconds: number;
  readonly refreshTokenLifetimeSeconds: number;
}

export interface SigningSettings {
  secretKey: string;
  algorithm: SigningAlgorithm;
  accessTokenLifetimeMinutes: number;
  refreshTokenLifetimeDays: number;
}

/**
 * @throws Error if the secret is empty or a lifetime is not a positive
 *   integer. This is a startup-time condition; the app must not serve
 *   requests without a usable key.
 */
export function createSigningContext(settings: SigningSettings): SigningContext {
  if (!settings.secretKey) {
    throw new Error(
      'JWT_SECRET_KEY is not defined. The application cannot sign tokens without it.',
    );
  }

  assertPositiveInteger(
    'accessTokenLifetimeMinutes',
    settings.accessTokenLifetimeMinutes,
  );
  assertPositiveInteger(
    'refreshTokenLifetimeDays',
    settings.refreshTokenLifetimeDays,
  );

  return Object.freeze({
    secretKey: settings.secretKey,
    algorithm: settings.algorithm,
    accessTokenLifetimeSeconds:
      settings.accessTokenLifetimeMinutes * SECONDS_PER_MINUTE,
    refreshTokenLifetimeSeconds:
      settings.refreshTokenLifetimeDays * SECONDS_PER_DAY,
  });
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive integer (got ${value})`);
  }
}

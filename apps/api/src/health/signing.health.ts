import { Injectable } from '@nestjs/common';
import { HealthCheckError, HealthIndicator } from '@nestjs/terminus';
import type { HealthIndicatorResult } from '@nestjs/terminus';
import { TokenCodec, TokenIssuer } from '../auth/token';

/** Subject of the throwaway token; never looked up */
const HEALTH_CHECK_SUBJECT = 'health-check';

/**
 * Issues an access token and decodes it again with the live signing
 * context. Fails when the configured key or algorithm cannot round-trip.
 */
@Injectable()
export class SigningHealthIndicator extends HealthIndicator {
  constructor(
    private readonly issuer: TokenIssuer,
    private readonly codec: TokenCodec,
  ) {
    super();
  }

  isHealthy(key: string): HealthIndicatorResult {
    const result = this.codec.decode(
      this.issuer.issueAccessToken(HEALTH_CHECK_SUBJECT),
    );

    if (result.status === 'decoded') {
      return this.getStatus(key, true);
    }

    throw new HealthCheckError(
      'Token signing check failed',
      this.getStatus(key, false, { reason: result.reason }),
    );
  }
}

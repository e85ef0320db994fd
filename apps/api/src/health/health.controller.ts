import { Controller, Get } from '@nestjs/common';
import {
  HealthCheck,
  HealthCheckService,
  TypeOrmHealthIndicator,
} from '@nestjs/terminus';
import type { HealthCheckResult } from '@nestjs/terminus';
import { SigningHealthIndicator } from './signing.health';

/** Database ping timeout in milliseconds */
const DATABASE_PING_TIMEOUT = 3000;

@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly db: TypeOrmHealthIndicator,
    private readonly signing: SigningHealthIndicator,
  ) {}

  /** Signing round trip plus a ping of the user store's database */
  @Get()
  @HealthCheck()
  check(): Promise<HealthCheckResult> {
    return this.health.check([
      () => this.signing.isHealthy('signing'),
      () => this.db.pingCheck('database', { timeout: DATABASE_PING_TIMEOUT }),
    ]);
  }
}

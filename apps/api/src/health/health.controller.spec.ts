import { Test } from '@nestjs/testing';
import { HealthCheckService, TypeOrmHealthIndicator } from '@nestjs/terminus';
import type { HealthCheckResult } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { SigningHealthIndicator } from './signing.health';

describe('HealthController', () => {
  let controller: HealthController;
  const pingCheck = jest.fn();
  const isHealthy = jest.fn();
  const check = jest.fn(
    async (indicators: Array<() => unknown>): Promise<HealthCheckResult> => {
      await Promise.all(indicators.map((indicator) => indicator()));
      return { status: 'ok', info: {}, error: {}, details: {} };
    },
  );

  beforeEach(async () => {
    jest.clearAllMocks();
    const moduleRef = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        { provide: HealthCheckService, useValue: { check } },
        { provide: TypeOrmHealthIndicator, useValue: { pingCheck } },
        { provide: SigningHealthIndicator, useValue: { isHealthy } },
      ],
    }).compile();
    controller = moduleRef.get(HealthController);
  });

  it('pings the database with a timeout', async () => {
    await expect(controller.check()).resolves.toMatchObject({ status: 'ok' });
    expect(pingCheck).toHaveBeenCalledWith('database', { timeout: 3000 });
  });

  it('checks the token signing round trip', async () => {
    await controller.check();
    expect(isHealthy).toHaveBeenCalledWith('signing');
  });
});

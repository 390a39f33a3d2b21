import { Test } from '@nestjs/testing';
import { HealthCheckService, TypeOrmHealthIndicator } from '@nestjs/terminus';
import type {
  HealthCheckResult,
  HealthIndicatorFunction,
} from '@nestjs/terminus';
import { HealthController } from './health.controller';

describe('HealthController', () => {
  it('should ping the database with a 3 second timeout', async () => {
    const result: HealthCheckResult = {
      status: 'ok',
      info: { database: { status: 'up' } },
      error: {},
      details: { database: { status: 'up' } },
    };
    const check = jest.fn(async (indicators: HealthIndicatorFunction[]) => {
      await Promise.all(indicators.map((indicator) => indicator()));
      return result;
    });
    const pingCheck = jest
      .fn()
      .mockResolvedValue({ database: { status: 'up' } });

    const moduleRef = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        { provide: HealthCheckService, useValue: { check } },
        { provide: TypeOrmHealthIndicator, useValue: { pingCheck } },
      ],
    }).compile();

    await expect(moduleRef.get(HealthController).check()).resolves.toBe(result);
    expect(pingCheck).toHaveBeenCalledWith('database', { timeout: 3000 });
  });
});

import { Test, TestingModule } from '@nestjs/testing';
import { SystemInfoService } from './system-info.service';
import { appConfig } from '../config/app.config';
import type { AppConfig } from '../config/app.config';
import { roundTo2 } from './utils/usage.util';

describe('SystemInfoService', () => {
  let service: SystemInfoService;

  const config: AppConfig = {
    name: 'CI/CD Backend API',
    version: '1.0.0',
    environment: 'test',
    hostname: 'ci-host',
    port: 5001,
    logLevel: 'info',
    corsOrigins: ['*'],
    cpuSampleIntervalMs: 20,
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SystemInfoService,
        { provide: appConfig.KEY, useValue: config },
      ],
    }).compile();

    service = module.get<SystemInfoService>(SystemInfoService);
  });

  it('should report hostname and environment from configuration', async () => {
    const info = await service.getSystemInfo();

    expect(info.hostname).toBe('ci-host');
    expect(info.environment).toBe('test');
  });

  it('should report percentages between 0 and 100 rounded to 2 decimals', async () => {
    const info = await service.getSystemInfo();

    for (const value of [
      info.cpu_percent,
      info.memory_percent,
      info.disk_percent,
    ]) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(100);
      expect(roundTo2(value)).toBe(value);
    }
  });
});

import { registerAs } from '@nestjs/config';
import type { ConfigType } from '@nestjs/config';

export const appConfig = registerAs('app', () => ({
  name: process.env.APP_NAME || 'CI/CD Backend API',
  version: process.env.APP_VERSION || '1.0.0',
  environment: process.env.APP_ENV || 'development',
  hostname: process.env.HOSTNAME || 'unknown',
  port: parseInt(process.env.PORT || '5001', 10),
  logLevel: process.env.LOG_LEVEL || 'info',
  corsOrigins: (process.env.CORS_ORIGIN || '*')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean),
  // /api/v1/info CPU 샘플링 구간 (ms)
  cpuSampleIntervalMs: parseInt(
    process.env.CPU_SAMPLE_INTERVAL_MS || '1000',
    10,
  ),
}));

export type AppConfig = ConfigType<typeof appConfig>;

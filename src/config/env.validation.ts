import { plainToInstance, Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export const LOG_LEVELS = ['debug', 'info', 'warning', 'warn', 'error'] as const;

class EnvironmentVariables {
  @IsOptional()
  @IsString()
  APP_ENV?: string;

  @IsOptional()
  @IsIn(LOG_LEVELS)
  LOG_LEVEL?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsString()
  DATABASE_URL?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  DB_POOL_SIZE?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  DB_POOL_OVERFLOW?: number;

  @IsOptional()
  @IsIn(['true', 'false'])
  DB_SYNCHRONIZE?: string;

  @IsOptional()
  @IsIn(['true', 'false'])
  DB_MIGRATIONS_RUN?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  CPU_SAMPLE_INTERVAL_MS?: number;
}

/**
 * ConfigModule.forRoot 의 validate 훅.
 * 잘못된 환경 변수가 있으면 부팅 단계에서 실패한다.
 */
export function validateEnv(
  config: Record<string, unknown>,
): Record<string, unknown> {
  const validated = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return config;
}

import { Inject, Injectable } from '@nestjs/common';
import { TypeOrmModuleOptions, TypeOrmOptionsFactory } from '@nestjs/typeorm';
import { SnakeNamingStrategy } from 'typeorm-naming-strategies';
import { databaseConfig } from '../config/database.config';
import type { DatabaseConfig } from '../config/database.config';
import { ENTITIES } from './entities';
import { MIGRATIONS } from './migrations';

@Injectable()
export class DatabaseConfigService implements TypeOrmOptionsFactory {
  constructor(
    @Inject(databaseConfig.KEY)
    private readonly config: DatabaseConfig,
  ) {}

  createTypeOrmOptions(): TypeOrmModuleOptions {
    return {
      type: 'postgres',
      url: this.config.url,
      entities: ENTITIES,
      migrations: MIGRATIONS,
      migrationsRun: this.config.migrationsRun,
      synchronize: this.config.synchronize,
      logging: this.config.logging,
      namingStrategy: new SnakeNamingStrategy(),
      // pool_size + max_overflow 에 해당하는 pg 커넥션 풀 상한
      extra: {
        max: this.config.poolSize + this.config.poolOverflow,
      },
    };
  }
}

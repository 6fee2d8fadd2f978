import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { config } from 'dotenv';
import { SnakeNamingStrategy } from 'typeorm-naming-strategies';
import { DEFAULT_DATABASE_URL } from '../config/database.config';
import { ENTITIES } from './entities';
import { MIGRATIONS } from './migrations';

config();

// 마이그레이션/시드 스크립트 전용 DataSource (Nest 컨테이너 밖에서 사용)
export const AppDataSource = new DataSource({
  type: 'postgres',
  url: process.env.DATABASE_URL || DEFAULT_DATABASE_URL,
  entities: ENTITIES,
  migrations: MIGRATIONS,
  namingStrategy: new SnakeNamingStrategy(),
  synchronize: false,
  logging: process.env.LOG_LEVEL === 'debug',
});

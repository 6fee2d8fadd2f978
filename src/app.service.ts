import { Inject, Injectable } from '@nestjs/common';
import { appConfig } from './config/app.config';
import type { AppConfig } from './config/app.config';
import { databaseConfig } from './config/database.config';
import type { DatabaseConfig } from './config/database.config';

export interface HealthResponse {
  status: 'healthy';
  timestamp: string;
  service: string;
}

export interface RootResponse {
  name: string;
  version: string;
  docs: string;
  health: string;
  /** DATABASE_URL 설정 여부 (연결 확인 아님) */
  database: 'configured' | 'not configured';
}

export interface HelloResponse {
  message: string;
  version: string;
  timestamp: string;
}

@Injectable()
export class AppService {
  constructor(
    @Inject(appConfig.KEY)
    private readonly app: AppConfig,
    @Inject(databaseConfig.KEY)
    private readonly database: DatabaseConfig,
  ) {}

  // 저장소에 접근하지 않는다
  getHealth(): HealthResponse {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: 'backend',
    };
  }

  getRoot(): RootResponse {
    return {
      name: this.app.name,
      version: this.app.version,
      docs: '/docs',
      health: '/health',
      database: this.database.configured ? 'configured' : 'not configured',
    };
  }

  getHello(): HelloResponse {
    return {
      message: 'Hello from the CI/CD Platform!',
      version: this.app.version,
      timestamp: new Date().toISOString(),
    };
  }
}

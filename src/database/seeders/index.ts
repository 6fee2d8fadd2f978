import { Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { AppDataSource } from '../data-source';
import { ApprovalSeeder } from './approval.seeder';
import { DeploymentSeeder } from './deployment.seeder';

const logger = new Logger('Seeder');

export async function runSeeders(
  dataSource: DataSource = AppDataSource,
): Promise<void> {
  await dataSource.initialize();
  logger.log('Database connection established');

  try {
    // 실패하면 전체 롤백
    await dataSource.transaction(async (manager) => {
      // 순서 중요: 배포가 승인 요청을 참조한다
      await new ApprovalSeeder(manager).run();
      await new DeploymentSeeder(manager).run();
    });
    logger.log('All seeders completed successfully');
  } finally {
    await dataSource.destroy();
    logger.log('Database connection closed');
  }
}

if (require.main === module) {
  runSeeders().catch((error: unknown) => {
    logger.error(
      'Error running seeders',
      error instanceof Error ? error.stack : String(error),
    );
    process.exit(1);
  });
}

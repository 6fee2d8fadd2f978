import { Logger } from '@nestjs/common';
import { AppDataSource } from '../src/database/data-source';

const logger = new Logger('Migration');

async function runMigrations(): Promise<void> {
  logger.log('Initializing database connection...');
  await AppDataSource.initialize();

  try {
    const applied = await AppDataSource.runMigrations({ transaction: 'each' });
    if (applied.length === 0) {
      logger.log('Schema is up to date');
    }
    for (const migration of applied) {
      logger.log(`Applied ${migration.name}`);
    }
  } finally {
    await AppDataSource.destroy();
  }
}

runMigrations().catch((error: unknown) => {
  logger.error(
    'Migration failed',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});

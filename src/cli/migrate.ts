import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { MigrationModule } from '../database/migration.module';

const logger = new Logger('Migrate');

async function migrate(): Promise<void> {
  const app = await NestFactory.createApplicationContext(MigrationModule, { logger: ['log', 'warn', 'error'] });
  try {
    const applied = await app.get(DataSource).runMigrations({ transaction: 'each' });
    if (applied.length === 0) {
      logger.log('적용할 마이그레이션이 없습니다.');
    }
    applied.forEach((migration) => logger.log(`적용: ${migration.name}`));
  } finally {
    await app.close();
  }
}

migrate().catch((error: unknown) => {
  logger.error('마이그레이션 실패', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});

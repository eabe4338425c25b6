import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { SeedModule } from '../database/seed/seed.module';
import { SeedService } from '../database/seed/seed.service';

const logger = new Logger('Seed');

async function seed(): Promise<void> {
  const app = await NestFactory.createApplicationContext(SeedModule, { logger: ['log', 'warn', 'error'] });
  try {
    await app.get(SeedService).run(process.argv[2]);
  } finally {
    await app.close();
  }
}

seed().catch((error: unknown) => {
  logger.error('시드 실패', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});

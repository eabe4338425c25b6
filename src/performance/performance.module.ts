import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Performance } from './domain/performance.entity';
import { Ticket } from '../reservation/domain/ticket.entity';
import { PerformanceService } from './performance.service';
import { PerformanceRepositoryImpl } from '../infrastructure/persistence/performance/performance.repository.impl';
import { CatalogModule } from '../catalog/catalog.module';
import { PerformanceController } from '../interfaces/controllers/performance.controller';
import { DI_TOKENS } from '../common/di-tokens';

@Module({
  imports: [TypeOrmModule.forFeature([Performance, Ticket]), CatalogModule],
  controllers: [PerformanceController],
  providers: [
    PerformanceService,
    {
      provide: DI_TOKENS.PERFORMANCE_REPOSITORY,
      useClass: PerformanceRepositoryImpl,
    },
  ],
  exports: [PerformanceService, DI_TOKENS.PERFORMANCE_REPOSITORY],
})
export class PerformanceModule {}

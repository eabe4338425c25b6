import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Reservation } from './domain/reservation.entity';
import { Ticket } from './domain/ticket.entity';
import { ReservationService } from './reservation.service';
import { ReservationEventHandler } from './events/reservation-event.handler';
import { ReservationRepositoryImpl } from '../infrastructure/persistence/reservation/reservation.repository.impl';
import { PerformanceModule } from '../performance/performance.module';
import { ReservationController } from '../interfaces/controllers/reservation.controller';
import { DI_TOKENS } from '../common/di-tokens';

@Module({
  imports: [TypeOrmModule.forFeature([Reservation, Ticket]), PerformanceModule],
  controllers: [ReservationController],
  providers: [
    ReservationService,
    ReservationEventHandler,
    {
      provide: DI_TOKENS.RESERVATION_REPOSITORY,
      useClass: ReservationRepositoryImpl,
    },
  ],
  exports: [ReservationService, DI_TOKENS.RESERVATION_REPOSITORY],
})
export class ReservationModule {}

import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { ReservationCreatedEvent } from './reservation-created.event';

@Injectable()
export class ReservationEventHandler {
  private readonly logger = new Logger(ReservationEventHandler.name);

  @OnEvent(ReservationCreatedEvent.EVENT_NAME)
  handleReservationCreated(event: ReservationCreatedEvent): void {
    this.logger.log(
      `예약 ${event.reservationId} 생성: user=${event.userId}, tickets=${event.ticketCount}`,
    );
  }
}

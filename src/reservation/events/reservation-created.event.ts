export class ReservationCreatedEvent {
  static readonly EVENT_NAME = 'reservation.created';

  constructor(
    public readonly reservationId: string,
    public readonly userId: string,
    public readonly ticketCount: number,
  ) {}
}

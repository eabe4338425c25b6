import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, In, Repository } from 'typeorm';
import { ReservationRepository, TicketFilter } from '../../../reservation/reservation.repository';
import { Reservation } from '../../../reservation/domain/reservation.entity';
import { Ticket } from '../../../reservation/domain/ticket.entity';
import { TicketSelection } from '../../../reservation/domain/ticket-selection';
import { DuplicateEntryError } from '../../../common/errors/duplicate-entry.error';
import { MissingReferenceError } from '../../../common/errors/missing-reference.error';
import { Page, PageRequest, toSkipTake } from '../../../common/pagination';
import { isForeignKeyViolation, isUniqueViolation } from '../query-errors';

const TICKET_PERFORMANCE_RELATIONS = {
  performance: { play: true, theatreHall: true },
} as const;

/**
 * 행·좌석 순으로 정렬된 티켓을 각 예약에 나눠 담습니다.
 */
export function attachTickets(reservations: Reservation[], tickets: Ticket[]): Reservation[] {
  const byReservation = new Map<string, Ticket[]>();
  for (const ticket of tickets) {
    const group = byReservation.get(ticket.reservationId) ?? [];
    group.push(ticket);
    byReservation.set(ticket.reservationId, group);
  }
  for (const reservation of reservations) {
    reservation.tickets = byReservation.get(reservation.id) ?? [];
  }
  return reservations;
}

@Injectable()
export class ReservationRepositoryImpl implements ReservationRepository {
  constructor(
    @InjectRepository(Reservation)
    private readonly reservationRepo: Repository<Reservation>,
    @InjectRepository(Ticket)
    private readonly ticketRepo: Repository<Ticket>,
    private readonly dataSource: DataSource,
  ) {}

  async findTakenSeats(selections: TicketSelection[]): Promise<TicketSelection[]> {
    if (selections.length === 0) return [];

    const tickets = await this.ticketRepo.find({
      select: { performanceId: true, row: true, seat: true },
      where: selections.map(({ performanceId, row, seat }) => ({ performanceId, row, seat })),
    });
    return tickets.map(({ performanceId, row, seat }) => ({ performanceId, row, seat }));
  }

  async createWithTickets(userId: string, selections: TicketSelection[]): Promise<Reservation> {
    try {
      return await this.dataSource.transaction(async (manager) => {
        const reservation = new Reservation();
        reservation.userId = userId;
        const saved = await manager.save(reservation);

        const tickets = selections.map(({ performanceId, row, seat }) => {
          const ticket = new Ticket();
          ticket.performanceId = performanceId;
          ticket.row = row;
          ticket.seat = seat;
          ticket.reservationId = saved.id;
          return ticket;
        });
        saved.tickets = await manager.save(tickets);

        return saved;
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateEntryError(Ticket.name, error);
      }
      if (isForeignKeyViolation(error)) {
        throw new MissingReferenceError(Ticket.name, error);
      }
      throw error;
    }
  }

  async findPageByUserId(userId: string, page: PageRequest): Promise<Page<Reservation>> {
    // 티켓을 조인한 채 skip/take 하면 페이지가 티켓 단위로 잘리므로 예약만 먼저 자릅니다.
    const [reservations, total] = await this.reservationRepo.findAndCount({
      where: { userId },
      order: { createdAt: 'DESC', id: 'DESC' },
      ...toSkipTake(page),
    });
    if (reservations.length === 0) {
      return { items: [], total, ...page };
    }

    const tickets = await this.ticketRepo.find({
      where: { reservationId: In(reservations.map((reservation) => reservation.id)) },
      relations: TICKET_PERFORMANCE_RELATIONS,
      order: { row: 'ASC', seat: 'ASC' },
    });
    return { items: attachTickets(reservations, tickets), total, ...page };
  }

  async findByIdAndUserId(id: string, userId: string): Promise<Reservation | null> {
    return this.reservationRepo.findOne({
      where: { id, userId },
      relations: { tickets: TICKET_PERFORMANCE_RELATIONS },
    });
  }

  async deleteById(id: string): Promise<void> {
    await this.reservationRepo.delete({ id });
  }

  async findTicketsByUserId(userId: string, filter: TicketFilter): Promise<Ticket[]> {
    return this.ticketRepo.find({
      where: {
        reservation: { userId },
        ...(filter.performanceId ? { performanceId: filter.performanceId } : {}),
      },
      relations: TICKET_PERFORMANCE_RELATIONS,
      order: { createdAt: 'DESC', row: 'ASC', seat: 'ASC' },
    });
  }
}

import {
  Injectable,
  Inject,
  BadRequestException,
  ConflictException,
  NotFoundException,
  Logger,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { ReservationRepository, TicketFilter } from './reservation.repository';
import { PerformanceRepository } from '../performance/performance.repository';
import { Reservation } from './domain/reservation.entity';
import { Ticket } from './domain/ticket.entity';
import { TheatreHall } from '../catalog/domain/theatre-hall.entity';
import {
  TicketProblem,
  TicketProblemReason,
  TicketSelection,
  findBookedProblems,
  findSelectionProblems,
} from './domain/ticket-selection';
import { ReservationCreatedEvent } from './events/reservation-created.event';
import { DuplicateEntryError } from '../common/errors/duplicate-entry.error';
import { MissingReferenceError } from '../common/errors/missing-reference.error';
import { Page, PageRequest } from '../common/pagination';
import { DI_TOKENS } from '../common/di-tokens';

@Injectable()
export class ReservationService {
  private readonly logger = new Logger(ReservationService.name);

  constructor(
    @Inject(DI_TOKENS.RESERVATION_REPOSITORY)
    private readonly reservationRepository: ReservationRepository,
    @Inject(DI_TOKENS.PERFORMANCE_REPOSITORY)
    private readonly performanceRepository: PerformanceRepository,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * 좌석 선택 전체를 하나의 예약으로 저장합니다. 하나라도 실패하면 아무것도 저장하지 않습니다.
   *
   * 판매 여부 사전 조회는 오류 메시지를 위한 것이고,
   * 동시 요청 간 최종 판정은 ticket 테이블의 (performanceId, row, seat) 유니크 인덱스가 합니다.
   */
  async createReservation(userId: string, selections: TicketSelection[]): Promise<Reservation> {
    if (selections.length === 0) {
      throw new BadRequestException('최소 한 장의 티켓을 선택해야 합니다.');
    }

    const halls = await this.loadHallsByPerformanceId(selections);

    const problems = findSelectionProblems(selections, halls);
    if (problems.some((p) => p.reason === TicketProblemReason.PERFORMANCE_NOT_FOUND)) {
      throw this.performanceNotFound(problems);
    }
    if (problems.length > 0) {
      throw new BadRequestException({
        errorCode: 'INVALID_TICKETS',
        message: '좌석 선택이 올바르지 않습니다.',
        details: { tickets: problems },
      });
    }

    const taken = await this.reservationRepository.findTakenSeats(selections);
    if (taken.length > 0) {
      throw this.seatConflict(findBookedProblems(selections, taken));
    }

    let reservation: Reservation;
    try {
      reservation = await this.reservationRepository.createWithTickets(userId, selections);
    } catch (error) {
      if (error instanceof MissingReferenceError) {
        // 사전 검증 이후 공연이 삭제된 경우
        const hallsNow = await this.loadHallsByPerformanceId(selections);
        const missing = findSelectionProblems(selections, hallsNow).filter(
          (p) => p.reason === TicketProblemReason.PERFORMANCE_NOT_FOUND,
        );
        if (missing.length > 0) {
          throw this.performanceNotFound(missing);
        }
        throw error;
      }
      if (!(error instanceof DuplicateEntryError)) {
        throw error;
      }
      // 사전 조회 이후 다른 요청이 먼저 커밋한 경우
      const takenNow = await this.reservationRepository.findTakenSeats(selections);
      this.logger.warn(`좌석 동시 예약 충돌: user=${userId}, seats=${takenNow.length}`);
      throw this.seatConflict(findBookedProblems(selections, takenNow));
    }

    this.eventEmitter.emit(
      ReservationCreatedEvent.EVENT_NAME,
      new ReservationCreatedEvent(reservation.id, userId, reservation.tickets.length),
    );

    return reservation;
  }

  async listReservations(userId: string, page: PageRequest): Promise<Page<Reservation>> {
    return this.reservationRepository.findPageByUserId(userId, page);
  }

  async getReservation(userId: string, reservationId: string): Promise<Reservation> {
    const reservation = await this.reservationRepository.findByIdAndUserId(reservationId, userId);
    if (!reservation) {
      throw new NotFoundException('예약을 찾을 수 없습니다.');
    }
    return reservation;
  }

  async cancelReservation(userId: string, reservationId: string): Promise<void> {
    const reservation = await this.getReservation(userId, reservationId);
    await this.reservationRepository.deleteById(reservation.id);
    this.logger.log(`예약 ${reservation.id} 취소 완료`);
  }

  async listTickets(userId: string, filter: TicketFilter): Promise<Ticket[]> {
    return this.reservationRepository.findTicketsByUserId(userId, filter);
  }

  private async loadHallsByPerformanceId(
    selections: TicketSelection[],
  ): Promise<Map<string, TheatreHall>> {
    const performanceIds = [...new Set(selections.map((s) => s.performanceId))];
    const performances = await this.performanceRepository.findByIdsWithHall(performanceIds);
    return new Map(performances.map((p) => [p.id, p.theatreHall]));
  }

  private performanceNotFound(problems: TicketProblem[]): NotFoundException {
    return new NotFoundException({
      errorCode: 'PERFORMANCE_NOT_FOUND',
      message: '공연을 찾을 수 없습니다.',
      details: { tickets: problems },
    });
  }

  private seatConflict(problems: TicketProblem[]): ConflictException {
    return new ConflictException({
      errorCode: 'SEAT_ALREADY_BOOKED',
      message: '이미 예약된 좌석이 포함되어 있습니다.',
      details: { tickets: problems },
    });
  }
}

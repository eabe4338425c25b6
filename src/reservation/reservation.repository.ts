import { Page, PageRequest } from '../common/pagination';
import { Reservation } from './domain/reservation.entity';
import { Ticket } from './domain/ticket.entity';
import { TicketSelection } from './domain/ticket-selection';

export interface TicketFilter {
  performanceId?: string;
}

export interface ReservationRepository {
  /** 선택한 좌석 중 이미 판매된 좌석을 반환합니다. */
  findTakenSeats(selections: TicketSelection[]): Promise<TicketSelection[]>;
  /**
   * 예약과 티켓을 하나의 트랜잭션으로 저장합니다.
   * 좌석 유니크 제약 위반 시 전체를 롤백하고 DuplicateEntryError를 던집니다.
   */
  createWithTickets(userId: string, selections: TicketSelection[]): Promise<Reservation>;
  /** 티켓과 각 티켓의 공연(작품, 상영관)을 함께 로드합니다. 최신순. */
  findPageByUserId(userId: string, page: PageRequest): Promise<Page<Reservation>>;
  findByIdAndUserId(id: string, userId: string): Promise<Reservation | null>;
  /** 예약에 속한 티켓은 FK ON DELETE CASCADE로 함께 삭제됩니다. */
  deleteById(id: string): Promise<void>;
  findTicketsByUserId(userId: string, filter: TicketFilter): Promise<Ticket[]>;
}

import { Page, PageRequest } from '../common/pagination';
import { SeatPosition } from '../catalog/domain/theatre-hall.entity';
import { Performance } from './domain/performance.entity';
import { ShowTimeRange } from './domain/show-time-range';

export interface PerformanceFilter {
  showTime?: ShowTimeRange;
  playId?: string;
  theatreHallId?: string;
}

export interface PerformanceSummary {
  performance: Performance;
  ticketsSold: number;
}

export interface PerformanceRepository {
  /** 공연별 판매 티켓 수와 함께 상영 시각 순으로 조회합니다. */
  findPage(filter: PerformanceFilter, page: PageRequest): Promise<Page<PerformanceSummary>>;
  /** 작품(장르, 배우 포함)과 상영관을 함께 로드합니다. */
  findById(id: string): Promise<Performance | null>;
  findByIdsWithHall(ids: string[]): Promise<Performance[]>;
  findTakenSeats(performanceId: string): Promise<SeatPosition[]>;
  save(performance: Performance): Promise<Performance>;
  deleteById(id: string): Promise<boolean>;
}

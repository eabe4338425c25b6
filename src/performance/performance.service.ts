import { Injectable, Inject, BadRequestException, NotFoundException } from '@nestjs/common';
import { PerformanceRepository, PerformanceSummary } from './performance.repository';
import { Performance } from './domain/performance.entity';
import { ShowTimeRange, intersectRanges, utcDayRange } from './domain/show-time-range';
import { PlayRepository, TheatreHallRepository } from '../catalog/catalog.repository';
import { SeatPosition } from '../catalog/domain/theatre-hall.entity';
import { Page, PageRequest } from '../common/pagination';
import { DI_TOKENS } from '../common/di-tokens';

export interface PerformanceQuery {
  /** YYYY-MM-DD, 상영 시각의 UTC 날짜 */
  date?: string;
  from?: Date;
  to?: Date;
  playId?: string;
  theatreHallId?: string;
}

export interface PerformanceInput {
  playId: string;
  theatreHallId: string;
  showTime: Date;
}

export interface PerformanceDetail {
  performance: Performance;
  takenPlaces: SeatPosition[];
}

@Injectable()
export class PerformanceService {
  constructor(
    @Inject(DI_TOKENS.PERFORMANCE_REPOSITORY)
    private readonly performanceRepository: PerformanceRepository,
    @Inject(DI_TOKENS.PLAY_REPOSITORY)
    private readonly playRepository: PlayRepository,
    @Inject(DI_TOKENS.THEATRE_HALL_REPOSITORY)
    private readonly theatreHallRepository: TheatreHallRepository,
  ) {}

  async list(query: PerformanceQuery, page: PageRequest): Promise<Page<PerformanceSummary>> {
    const ranges: ShowTimeRange[] = [{ from: query.from, to: query.to }];
    if (query.date !== undefined) {
      const day = utcDayRange(query.date);
      if (!day) {
        throw new BadRequestException('date는 YYYY-MM-DD 형식이어야 합니다.');
      }
      ranges.push(day);
    }

    return this.performanceRepository.findPage(
      {
        showTime: intersectRanges(...ranges),
        playId: query.playId,
        theatreHallId: query.theatreHallId,
      },
      page,
    );
  }

  async get(id: string): Promise<PerformanceDetail> {
    const performance = await this.findOrFail(id);
    const takenPlaces = await this.performanceRepository.findTakenSeats(id);
    return { performance, takenPlaces };
  }

  /**
   * 아직 판매되지 않은 좌석을 행 우선 순서로 반환합니다.
   */
  async listAvailableSeats(id: string): Promise<SeatPosition[]> {
    const performance = await this.findOrFail(id);
    const taken = await this.performanceRepository.findTakenSeats(id);
    const takenKeys = new Set(taken.map(({ row, seat }) => `${row}:${seat}`));
    return performance.theatreHall
      .allSeats()
      .filter(({ row, seat }) => !takenKeys.has(`${row}:${seat}`));
  }

  async create(input: PerformanceInput): Promise<Performance> {
    const performance = new Performance();
    await this.assign(performance, input);
    const saved = await this.performanceRepository.save(performance);
    return this.findOrFail(saved.id);
  }

  async update(id: string, input: Partial<PerformanceInput>): Promise<Performance> {
    const performance = await this.findOrFail(id);
    await this.assign(performance, input);
    await this.performanceRepository.save(performance);
    return this.findOrFail(id);
  }

  async remove(id: string): Promise<void> {
    const deleted = await this.performanceRepository.deleteById(id);
    if (!deleted) {
      throw new NotFoundException('공연을 찾을 수 없습니다.');
    }
  }

  private async findOrFail(id: string): Promise<Performance> {
    const performance = await this.performanceRepository.findById(id);
    if (!performance) {
      throw new NotFoundException('공연을 찾을 수 없습니다.');
    }
    return performance;
  }

  private async assign(performance: Performance, input: Partial<PerformanceInput>): Promise<void> {
    if (input.playId !== undefined) {
      const play = await this.playRepository.findById(input.playId);
      if (!play) {
        throw new NotFoundException('작품을 찾을 수 없습니다.');
      }
      performance.playId = play.id;
      performance.play = play;
    }
    if (input.theatreHallId !== undefined) {
      const hall = await this.theatreHallRepository.findById(input.theatreHallId);
      if (!hall) {
        throw new NotFoundException('상영관을 찾을 수 없습니다.');
      }
      performance.theatreHallId = hall.id;
      performance.theatreHall = hall;
    }
    if (input.showTime !== undefined) {
      performance.showTime = input.showTime;
    }
  }
}

import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import {
  PerformanceFilter,
  PerformanceRepository,
  PerformanceSummary,
} from '../../../performance/performance.repository';
import { Performance } from '../../../performance/domain/performance.entity';
import { Ticket } from '../../../reservation/domain/ticket.entity';
import { SeatPosition } from '../../../catalog/domain/theatre-hall.entity';
import { Page, PageRequest, toSkipTake } from '../../../common/pagination';

@Injectable()
export class PerformanceRepositoryImpl implements PerformanceRepository {
  constructor(
    @InjectRepository(Performance)
    private readonly performanceRepo: Repository<Performance>,
    @InjectRepository(Ticket)
    private readonly ticketRepo: Repository<Ticket>,
  ) {}

  async findPage(filter: PerformanceFilter, page: PageRequest): Promise<Page<PerformanceSummary>> {
    const { skip, take } = toSkipTake(page);
    const qb = this.performanceRepo
      .createQueryBuilder('performance')
      .innerJoinAndSelect('performance.play', 'play')
      .innerJoinAndSelect('performance.theatreHall', 'theatreHall')
      .orderBy('performance.showTime', 'ASC')
      .addOrderBy('performance.id', 'ASC')
      .skip(skip)
      .take(take);

    if (filter.playId) {
      qb.andWhere('performance.playId = :playId', { playId: filter.playId });
    }
    if (filter.theatreHallId) {
      qb.andWhere('performance.theatreHallId = :theatreHallId', {
        theatreHallId: filter.theatreHallId,
      });
    }
    if (filter.showTime?.from) {
      qb.andWhere('performance.showTime >= :from', { from: filter.showTime.from });
    }
    if (filter.showTime?.to) {
      qb.andWhere('performance.showTime <= :to', { to: filter.showTime.to });
    }

    const [performances, total] = await qb.getManyAndCount();
    const sold = await this.countSoldTickets(performances.map((p) => p.id));

    return {
      items: performances.map((performance) => ({
        performance,
        ticketsSold: sold.get(performance.id) ?? 0,
      })),
      total,
      ...page,
    };
  }

  async findById(id: string): Promise<Performance | null> {
    return this.performanceRepo.findOne({
      where: { id },
      relations: { play: { genres: true, actors: true }, theatreHall: true },
    });
  }

  async findByIdsWithHall(ids: string[]): Promise<Performance[]> {
    if (ids.length === 0) return [];
    return this.performanceRepo.find({
      where: { id: In(ids) },
      relations: { theatreHall: true },
    });
  }

  async findTakenSeats(performanceId: string): Promise<SeatPosition[]> {
    const tickets = await this.ticketRepo.find({
      select: { row: true, seat: true },
      where: { performanceId },
      order: { row: 'ASC', seat: 'ASC' },
    });
    return tickets.map(({ row, seat }) => ({ row, seat }));
  }

  async save(performance: Performance): Promise<Performance> {
    return this.performanceRepo.save(performance);
  }

  async deleteById(id: string): Promise<boolean> {
    const result = await this.performanceRepo.delete({ id });
    return (result.affected ?? 0) > 0;
  }

  private async countSoldTickets(performanceIds: string[]): Promise<Map<string, number>> {
    if (performanceIds.length === 0) return new Map();

    const rows = await this.ticketRepo
      .createQueryBuilder('ticket')
      .select('ticket.performanceId', 'performanceId')
      .addSelect('COUNT(*)', 'sold')
      .where('ticket.performanceId IN (:...performanceIds)', { performanceIds })
      .groupBy('ticket.performanceId')
      .getRawMany<{ performanceId: string; sold: string | number }>();

    return new Map(rows.map((row) => [row.performanceId, Number(row.sold)]));
  }
}

import { Injectable, Inject, BadRequestException, NotFoundException } from '@nestjs/common';
import { TheatreHallRepository } from './catalog.repository';
import { TheatreHall } from './domain/theatre-hall.entity';
import { Page, PageRequest } from '../common/pagination';
import { DI_TOKENS } from '../common/di-tokens';

export interface TheatreHallInput {
  name: string;
  rows: number;
  seatsInRow: number;
}

const isPositiveInteger = (value: number): boolean => Number.isInteger(value) && value > 0;

@Injectable()
export class TheatreHallService {
  constructor(
    @Inject(DI_TOKENS.THEATRE_HALL_REPOSITORY)
    private readonly theatreHallRepository: TheatreHallRepository,
  ) {}

  async list(page: PageRequest): Promise<Page<TheatreHall>> {
    return this.theatreHallRepository.findPage(page);
  }

  async get(id: string): Promise<TheatreHall> {
    const hall = await this.theatreHallRepository.findById(id);
    if (!hall) {
      throw new NotFoundException('상영관을 찾을 수 없습니다.');
    }
    return hall;
  }

  async create(input: TheatreHallInput): Promise<TheatreHall> {
    const hall = new TheatreHall();
    hall.name = input.name;
    hall.rows = input.rows;
    hall.seatsInRow = input.seatsInRow;
    return this.saveValid(hall);
  }

  async update(id: string, input: Partial<TheatreHallInput>): Promise<TheatreHall> {
    const hall = await this.get(id);
    if (input.name !== undefined) hall.name = input.name;
    if (input.rows !== undefined) hall.rows = input.rows;
    if (input.seatsInRow !== undefined) hall.seatsInRow = input.seatsInRow;
    return this.saveValid(hall);
  }

  async remove(id: string): Promise<void> {
    const deleted = await this.theatreHallRepository.deleteById(id);
    if (!deleted) {
      throw new NotFoundException('상영관을 찾을 수 없습니다.');
    }
  }

  private async saveValid(hall: TheatreHall): Promise<TheatreHall> {
    if (!isPositiveInteger(hall.rows) || !isPositiveInteger(hall.seatsInRow)) {
      throw new BadRequestException('행 수와 행당 좌석 수는 1 이상의 정수여야 합니다.');
    }
    return this.theatreHallRepository.save(hall);
  }
}

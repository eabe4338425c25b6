import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { TheatreHallRepository } from '../../../catalog/catalog.repository';
import { TheatreHall } from '../../../catalog/domain/theatre-hall.entity';
import { Page, PageRequest, toSkipTake } from '../../../common/pagination';

@Injectable()
export class TheatreHallRepositoryImpl implements TheatreHallRepository {
  constructor(
    @InjectRepository(TheatreHall)
    private readonly repo: Repository<TheatreHall>,
  ) {}

  async findPage(page: PageRequest): Promise<Page<TheatreHall>> {
    const [items, total] = await this.repo.findAndCount({
      order: { name: 'ASC' },
      ...toSkipTake(page),
    });
    return { items, total, ...page };
  }

  async findById(id: string): Promise<TheatreHall | null> {
    return this.repo.findOne({ where: { id } });
  }

  async save(hall: TheatreHall): Promise<TheatreHall> {
    return this.repo.save(hall);
  }

  async deleteById(id: string): Promise<boolean> {
    const result = await this.repo.delete({ id });
    return (result.affected ?? 0) > 0;
  }
}

import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Like, Repository } from 'typeorm';
import { ActorRepository, NameFilter } from '../../../catalog/catalog.repository';
import { Actor } from '../../../catalog/domain/actor.entity';
import { Page, PageRequest, toSkipTake } from '../../../common/pagination';
import { containsPattern } from '../like-pattern';

@Injectable()
export class ActorRepositoryImpl implements ActorRepository {
  constructor(
    @InjectRepository(Actor)
    private readonly repo: Repository<Actor>,
  ) {}

  async findPage(filter: NameFilter, page: PageRequest): Promise<Page<Actor>> {
    const pattern = filter.name ? Like(containsPattern(filter.name)) : undefined;
    const [items, total] = await this.repo.findAndCount({
      where: pattern ? [{ firstName: pattern }, { lastName: pattern }] : {},
      order: { lastName: 'ASC', firstName: 'ASC' },
      ...toSkipTake(page),
    });
    return { items, total, ...page };
  }

  async findById(id: string): Promise<Actor | null> {
    return this.repo.findOne({ where: { id } });
  }

  async findByIds(ids: string[]): Promise<Actor[]> {
    if (ids.length === 0) return [];
    return this.repo.find({ where: { id: In(ids) } });
  }

  async save(actor: Actor): Promise<Actor> {
    return this.repo.save(actor);
  }

  async deleteById(id: string): Promise<boolean> {
    const result = await this.repo.delete({ id });
    return (result.affected ?? 0) > 0;
  }
}

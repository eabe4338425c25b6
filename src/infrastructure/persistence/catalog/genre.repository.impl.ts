import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Like, Repository } from 'typeorm';
import { GenreRepository, NameFilter } from '../../../catalog/catalog.repository';
import { Genre } from '../../../catalog/domain/genre.entity';
import { DuplicateEntryError } from '../../../common/errors/duplicate-entry.error';
import { Page, PageRequest, toSkipTake } from '../../../common/pagination';
import { containsPattern } from '../like-pattern';
import { isUniqueViolation } from '../query-errors';

@Injectable()
export class GenreRepositoryImpl implements GenreRepository {
  constructor(
    @InjectRepository(Genre)
    private readonly repo: Repository<Genre>,
  ) {}

  async findPage(filter: NameFilter, page: PageRequest): Promise<Page<Genre>> {
    const [items, total] = await this.repo.findAndCount({
      where: filter.name ? { name: Like(containsPattern(filter.name)) } : {},
      order: { name: 'ASC' },
      ...toSkipTake(page),
    });
    return { items, total, ...page };
  }

  async findById(id: string): Promise<Genre | null> {
    return this.repo.findOne({ where: { id } });
  }

  async findByIds(ids: string[]): Promise<Genre[]> {
    if (ids.length === 0) return [];
    return this.repo.find({ where: { id: In(ids) } });
  }

  async save(genre: Genre): Promise<Genre> {
    try {
      return await this.repo.save(genre);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateEntryError(Genre.name, error);
      }
      throw error;
    }
  }

  async deleteById(id: string): Promise<boolean> {
    const result = await this.repo.delete({ id });
    return (result.affected ?? 0) > 0;
  }
}

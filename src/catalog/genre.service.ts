import { Injectable, Inject, ConflictException, NotFoundException } from '@nestjs/common';
import { GenreRepository, NameFilter } from './catalog.repository';
import { Genre } from './domain/genre.entity';
import { DuplicateEntryError } from '../common/errors/duplicate-entry.error';
import { Page, PageRequest } from '../common/pagination';
import { DI_TOKENS } from '../common/di-tokens';

export interface GenreInput {
  name: string;
}

@Injectable()
export class GenreService {
  constructor(
    @Inject(DI_TOKENS.GENRE_REPOSITORY)
    private readonly genreRepository: GenreRepository,
  ) {}

  async list(filter: NameFilter, page: PageRequest): Promise<Page<Genre>> {
    return this.genreRepository.findPage(filter, page);
  }

  async get(id: string): Promise<Genre> {
    const genre = await this.genreRepository.findById(id);
    if (!genre) {
      throw new NotFoundException('장르를 찾을 수 없습니다.');
    }
    return genre;
  }

  async create(input: GenreInput): Promise<Genre> {
    const genre = new Genre();
    genre.name = input.name;
    return this.saveUnique(genre);
  }

  async update(id: string, input: Partial<GenreInput>): Promise<Genre> {
    const genre = await this.get(id);
    if (input.name !== undefined) genre.name = input.name;
    return this.saveUnique(genre);
  }

  async remove(id: string): Promise<void> {
    const deleted = await this.genreRepository.deleteById(id);
    if (!deleted) {
      throw new NotFoundException('장르를 찾을 수 없습니다.');
    }
  }

  private async saveUnique(genre: Genre): Promise<Genre> {
    try {
      return await this.genreRepository.save(genre);
    } catch (error) {
      if (error instanceof DuplicateEntryError) {
        throw new ConflictException(`이미 존재하는 장르입니다: ${genre.name}`);
      }
      throw error;
    }
  }
}

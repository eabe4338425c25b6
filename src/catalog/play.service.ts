import { Injectable, Inject, NotFoundException } from '@nestjs/common';
import {
  ActorRepository,
  GenreRepository,
  PlayFilter,
  PlayRepository,
} from './catalog.repository';
import { Play } from './domain/play.entity';
import { Genre } from './domain/genre.entity';
import { Actor } from './domain/actor.entity';
import { Page, PageRequest } from '../common/pagination';
import { DI_TOKENS } from '../common/di-tokens';

export interface PlayInput {
  title: string;
  description: string;
  genreIds: string[];
  actorIds: string[];
}

@Injectable()
export class PlayService {
  constructor(
    @Inject(DI_TOKENS.PLAY_REPOSITORY)
    private readonly playRepository: PlayRepository,
    @Inject(DI_TOKENS.GENRE_REPOSITORY)
    private readonly genreRepository: GenreRepository,
    @Inject(DI_TOKENS.ACTOR_REPOSITORY)
    private readonly actorRepository: ActorRepository,
  ) {}

  async list(filter: PlayFilter, page: PageRequest): Promise<Page<Play>> {
    return this.playRepository.findPage(filter, page);
  }

  async get(id: string): Promise<Play> {
    const play = await this.playRepository.findById(id);
    if (!play) {
      throw new NotFoundException('작품을 찾을 수 없습니다.');
    }
    return play;
  }

  async create(input: PlayInput): Promise<Play> {
    const play = new Play();
    play.title = input.title;
    play.description = input.description;
    play.genres = await this.resolveGenres(input.genreIds);
    play.actors = await this.resolveActors(input.actorIds);
    return this.playRepository.save(play);
  }

  async update(id: string, input: Partial<PlayInput>): Promise<Play> {
    const play = await this.get(id);
    if (input.title !== undefined) play.title = input.title;
    if (input.description !== undefined) play.description = input.description;
    if (input.genreIds !== undefined) play.genres = await this.resolveGenres(input.genreIds);
    if (input.actorIds !== undefined) play.actors = await this.resolveActors(input.actorIds);
    return this.playRepository.save(play);
  }

  async remove(id: string): Promise<void> {
    const deleted = await this.playRepository.deleteById(id);
    if (!deleted) {
      throw new NotFoundException('작품을 찾을 수 없습니다.');
    }
  }

  private async resolveGenres(ids: string[]): Promise<Genre[]> {
    const unique = [...new Set(ids)];
    const genres = await this.genreRepository.findByIds(unique);
    this.assertAllFound('GENRE_NOT_FOUND', '장르', unique, genres);
    return genres;
  }

  private async resolveActors(ids: string[]): Promise<Actor[]> {
    const unique = [...new Set(ids)];
    const actors = await this.actorRepository.findByIds(unique);
    this.assertAllFound('ACTOR_NOT_FOUND', '배우', unique, actors);
    return actors;
  }

  private assertAllFound(
    errorCode: string,
    label: string,
    ids: string[],
    found: { id: string }[],
  ): void {
    const foundIds = new Set(found.map((entity) => entity.id));
    const missingIds = ids.filter((id) => !foundIds.has(id));
    if (missingIds.length > 0) {
      throw new NotFoundException({
        errorCode,
        message: `${label}를 찾을 수 없습니다.`,
        details: { missingIds },
      });
    }
  }
}

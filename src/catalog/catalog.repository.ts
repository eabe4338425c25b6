import { Page, PageRequest } from '../common/pagination';
import { Genre } from './domain/genre.entity';
import { Actor } from './domain/actor.entity';
import { Play } from './domain/play.entity';
import { TheatreHall } from './domain/theatre-hall.entity';

export interface NameFilter {
  name?: string;
}

export interface PlayFilter {
  title?: string;
  genreIds?: string[];
  genreName?: string;
  actorIds?: string[];
}

export interface GenreRepository {
  findPage(filter: NameFilter, page: PageRequest): Promise<Page<Genre>>;
  findById(id: string): Promise<Genre | null>;
  findByIds(ids: string[]): Promise<Genre[]>;
  /** 이름 중복 시 DuplicateEntryError */
  save(genre: Genre): Promise<Genre>;
  deleteById(id: string): Promise<boolean>;
}

export interface ActorRepository {
  findPage(filter: NameFilter, page: PageRequest): Promise<Page<Actor>>;
  findById(id: string): Promise<Actor | null>;
  findByIds(ids: string[]): Promise<Actor[]>;
  save(actor: Actor): Promise<Actor>;
  deleteById(id: string): Promise<boolean>;
}

export interface PlayRepository {
  /** 장르와 배우를 함께 로드합니다. */
  findPage(filter: PlayFilter, page: PageRequest): Promise<Page<Play>>;
  findById(id: string): Promise<Play | null>;
  save(play: Play): Promise<Play>;
  deleteById(id: string): Promise<boolean>;
}

export interface TheatreHallRepository {
  findPage(page: PageRequest): Promise<Page<TheatreHall>>;
  findById(id: string): Promise<TheatreHall | null>;
  save(hall: TheatreHall): Promise<TheatreHall>;
  deleteById(id: string): Promise<boolean>;
}

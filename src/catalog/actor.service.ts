import { Injectable, Inject, NotFoundException } from '@nestjs/common';
import { ActorRepository, NameFilter } from './catalog.repository';
import { Actor } from './domain/actor.entity';
import { Page, PageRequest } from '../common/pagination';
import { DI_TOKENS } from '../common/di-tokens';

export interface ActorInput {
  firstName: string;
  lastName: string;
}

@Injectable()
export class ActorService {
  constructor(
    @Inject(DI_TOKENS.ACTOR_REPOSITORY)
    private readonly actorRepository: ActorRepository,
  ) {}

  async list(filter: NameFilter, page: PageRequest): Promise<Page<Actor>> {
    return this.actorRepository.findPage(filter, page);
  }

  async get(id: string): Promise<Actor> {
    const actor = await this.actorRepository.findById(id);
    if (!actor) {
      throw new NotFoundException('배우를 찾을 수 없습니다.');
    }
    return actor;
  }

  async create(input: ActorInput): Promise<Actor> {
    const actor = new Actor();
    actor.firstName = input.firstName;
    actor.lastName = input.lastName;
    return this.actorRepository.save(actor);
  }

  async update(id: string, input: Partial<ActorInput>): Promise<Actor> {
    const actor = await this.get(id);
    if (input.firstName !== undefined) actor.firstName = input.firstName;
    if (input.lastName !== undefined) actor.lastName = input.lastName;
    return this.actorRepository.save(actor);
  }

  async remove(id: string): Promise<void> {
    const deleted = await this.actorRepository.deleteById(id);
    if (!deleted) {
      throw new NotFoundException('배우를 찾을 수 없습니다.');
    }
  }
}

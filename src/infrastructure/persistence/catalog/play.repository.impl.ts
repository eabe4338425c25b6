import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { PlayFilter, PlayRepository } from '../../../catalog/catalog.repository';
import { Play } from '../../../catalog/domain/play.entity';
import { Page, PageRequest, toSkipTake } from '../../../common/pagination';
import { containsPattern } from '../like-pattern';

@Injectable()
export class PlayRepositoryImpl implements PlayRepository {
  constructor(
    @InjectRepository(Play)
    private readonly repo: Repository<Play>,
  ) {}

  async findPage(filter: PlayFilter, page: PageRequest): Promise<Page<Play>> {
    const { skip, take } = toSkipTake(page);
    const qb = this.repo
      .createQueryBuilder('play')
      .leftJoinAndSelect('play.genres', 'genre')
      .leftJoinAndSelect('play.actors', 'actor')
      .orderBy('play.title', 'ASC')
      .addOrderBy('play.id', 'ASC')
      .skip(skip)
      .take(take);

    // 연관 조건은 서브쿼리로 걸어 목록에 작품의 전체 장르/배우가 유지되도록 함
    if (filter.title) {
      qb.andWhere('play.title LIKE :title', { title: containsPattern(filter.title) });
    }
    if (filter.genreIds && filter.genreIds.length > 0) {
      qb.andWhere(
        'play.id IN (SELECT pg.playId FROM play_genre pg WHERE pg.genreId IN (:...genreIds))',
        { genreIds: filter.genreIds },
      );
    }
    if (filter.genreName) {
      qb.andWhere(
        `play.id IN (SELECT pgn.playId FROM play_genre pgn
          INNER JOIN genre g ON g.id = pgn.genreId
          WHERE LOWER(g.name) = LOWER(:genreName))`,
        { genreName: filter.genreName },
      );
    }
    if (filter.actorIds && filter.actorIds.length > 0) {
      qb.andWhere(
        'play.id IN (SELECT pa.playId FROM play_actor pa WHERE pa.actorId IN (:...actorIds))',
        { actorIds: filter.actorIds },
      );
    }

    const [items, total] = await qb.getManyAndCount();
    return { items, total, ...page };
  }

  async findById(id: string): Promise<Play | null> {
    return this.repo.findOne({
      where: { id },
      relations: { genres: true, actors: true },
    });
  }

  async save(play: Play): Promise<Play> {
    return this.repo.save(play);
  }

  async deleteById(id: string): Promise<boolean> {
    const result = await this.repo.delete({ id });
    return (result.affected ?? 0) > 0;
  }
}

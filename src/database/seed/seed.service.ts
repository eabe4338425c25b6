import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { DataSource } from 'typeorm';
import * as fs from 'fs';
import * as path from 'path';
import { appConfig } from '../../config/app.config';
import { UserService } from '../../user/user.service';
import { Genre } from '../../catalog/domain/genre.entity';
import { Actor } from '../../catalog/domain/actor.entity';
import { Play } from '../../catalog/domain/play.entity';
import { TheatreHall } from '../../catalog/domain/theatre-hall.entity';
import { Performance } from '../../performance/domain/performance.entity';
import { SeedData } from './seed-data';

export const DEFAULT_SEED_FILE = path.resolve(__dirname, '../../../data/seed.json');

export function parseSeedData(raw: unknown): SeedData {
  const data = plainToInstance(SeedData, raw);
  const errors = validateSync(data);
  if (errors.length > 0) {
    throw new Error(`Invalid seed data: ${errors.map((error) => error.toString()).join('; ')}`);
  }

  const pick = <T>(items: T[], index: number, label: string): T => {
    const item = items[index];
    if (item === undefined) {
      throw new Error(`Invalid seed data: ${label} index ${index} out of range`);
    }
    return item;
  };
  const genreNames = new Set(data.genres);
  data.plays.forEach((play) => {
    play.genres.forEach((name) => {
      if (!genreNames.has(name)) {
        throw new Error(`Invalid seed data: play "${play.title}" has unknown genre "${name}"`);
      }
    });
    play.actors.forEach((i) => pick(data.actors, i, 'actor'));
  });
  data.performances.forEach((performance) => {
    pick(data.plays, performance.play, 'play');
    pick(data.theatreHalls, performance.theatreHall, 'theatreHall');
  });

  return data;
}

@Injectable()
export class SeedService {
  private readonly logger = new Logger(SeedService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly userService: UserService,
    @Inject(appConfig.KEY)
    private readonly config: ConfigType<typeof appConfig>,
  ) {}

  async run(file = DEFAULT_SEED_FILE): Promise<void> {
    await this.seedCatalog(file);

    if (this.config.superuser) {
      await this.userService.ensureSuperuser(
        this.config.superuser.email,
        this.config.superuser.password,
      );
    } else {
      this.logger.log('SUPERUSER_EMAIL이 없어 관리자 계정 생성을 건너뜁니다.');
    }
  }

  private async seedCatalog(file: string): Promise<void> {
    const existing = await this.dataSource.getRepository(Play).count();
    if (existing > 0) {
      this.logger.log(`작품 ${existing}건이 이미 있어 카탈로그 시드를 건너뜁니다.`);
      return;
    }

    const data = parseSeedData(JSON.parse(await fs.promises.readFile(file, 'utf-8')));

    await this.dataSource.transaction(async (manager) => {
      const genres = await manager.save(
        data.genres.map((name) => Object.assign(new Genre(), { name })),
      );
      const genreByName = (name: string): Genre => {
        const genre = genres.find((candidate) => candidate.name === name);
        if (!genre) {
          throw new Error(`Invalid seed data: unknown genre "${name}"`);
        }
        return genre;
      };

      const actors = await manager.save(
        data.actors.map((actor) => Object.assign(new Actor(), actor)),
      );
      const halls = await manager.save(
        data.theatreHalls.map((hall) => Object.assign(new TheatreHall(), hall)),
      );

      const plays = await manager.save(
        data.plays.map((play) =>
          Object.assign(new Play(), {
            title: play.title,
            description: play.description,
            genres: play.genres.map(genreByName),
            actors: play.actors.map((index) => actors[index]),
          }),
        ),
      );

      await manager.save(
        data.performances.map((performance) =>
          Object.assign(new Performance(), {
            playId: plays[performance.play].id,
            theatreHallId: halls[performance.theatreHall].id,
            showTime: new Date(performance.showTime),
          }),
        ),
      );

      this.logger.log(
        `시드 완료: 장르 ${genres.length}, 배우 ${actors.length}, 상영관 ${halls.length}, ` +
          `작품 ${plays.length}, 공연 ${data.performances.length}`,
      );
    });
  }
}

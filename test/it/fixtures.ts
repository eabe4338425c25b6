import { TestingModule } from '@nestjs/testing';
import { randomUUID } from 'crypto';
import { GenreService } from '../../src/catalog/genre.service';
import { PlayService } from '../../src/catalog/play.service';
import { TheatreHallService } from '../../src/catalog/theatre-hall.service';
import { PerformanceService } from '../../src/performance/performance.service';
import { UserService } from '../../src/user/user.service';
import { Performance } from '../../src/performance/domain/performance.entity';
import { User } from '../../src/user/domain/user.entity';

/**
 * 테스트마다 서로 겹치지 않는 상영관과 공연을 만듭니다.
 */
export const createPerformance = async (
  moduleRef: TestingModule,
  size: { rows: number; seatsInRow: number } = { rows: 5, seatsInRow: 10 },
): Promise<Performance> => {
  const suffix = randomUUID().slice(0, 8);
  const genre = await moduleRef.get(GenreService).create({ name: `장르-${suffix}` });
  const play = await moduleRef.get(PlayService).create({
    title: `작품-${suffix}`,
    description: '',
    genreIds: [genre.id],
    actorIds: [],
  });
  const hall = await moduleRef.get(TheatreHallService).create({ name: `Main-${suffix}`, ...size });
  return moduleRef.get(PerformanceService).create({
    playId: play.id,
    theatreHallId: hall.id,
    showTime: new Date('2026-11-20T10:00:00Z'),
  });
};

export const createUser = async (moduleRef: TestingModule): Promise<User> =>
  moduleRef.get(UserService).register({
    email: `viewer-${randomUUID()}@example.com`,
    password: 'test-password',
  });

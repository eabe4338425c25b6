import { Test, TestingModule } from '@nestjs/testing';
import { ConflictException, INestApplication } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { AppModule } from '../../src/app.module';
import { ReservationService } from '../../src/reservation/reservation.service';
import { Ticket } from '../../src/reservation/domain/ticket.entity';
import { Reservation } from '../../src/reservation/domain/reservation.entity';
import { createPerformance, createUser } from './fixtures';

describe('좌석 예약 동시성', () => {
  let app: INestApplication;
  let moduleRef: TestingModule;
  let reservationService: ReservationService;
  let dataSource: DataSource;

  beforeAll(async () => {
    moduleRef = await Test.createTestingModule({ imports: [AppModule] }).compile();
    app = moduleRef.createNestApplication();
    await app.init();

    reservationService = moduleRef.get(ReservationService);
    dataSource = moduleRef.get(DataSource);
  });

  afterAll(async () => {
    await app.close();
  });

  it('10명이 동시에 같은 좌석을 예약하면 1명만 성공한다', async () => {
    // given
    const performance = await createPerformance(moduleRef);
    const users = await Promise.all(Array.from({ length: 10 }, () => createUser(moduleRef)));

    // when
    const results = await Promise.allSettled(
      users.map((user) =>
        reservationService.createReservation(user.id, [
          { performanceId: performance.id, row: 3, seat: 4 },
        ]),
      ),
    );

    // then
    const rejected = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []));
    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
    expect(rejected).toHaveLength(9);
    rejected.forEach((reason) => expect(reason).toBeInstanceOf(ConflictException));

    const tickets = await dataSource
      .getRepository(Ticket)
      .count({ where: { performanceId: performance.id } });
    expect(tickets).toBe(1);
  });

  it('좌석이 겹치는 동시 요청에서 실패한 쪽은 예약도 티켓도 남기지 않는다', async () => {
    // given
    const performance = await createPerformance(moduleRef);
    const [userA, userB] = await Promise.all([createUser(moduleRef), createUser(moduleRef)]);

    // when
    const results = await Promise.allSettled([
      reservationService.createReservation(userA.id, [
        { performanceId: performance.id, row: 1, seat: 1 },
        { performanceId: performance.id, row: 1, seat: 2 },
      ]),
      reservationService.createReservation(userB.id, [
        { performanceId: performance.id, row: 1, seat: 2 },
        { performanceId: performance.id, row: 1, seat: 3 },
      ]),
    ]);

    // then
    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
    const loser = results[0].status === 'fulfilled' ? userB : userA;
    const loserReservations = await dataSource
      .getRepository(Reservation)
      .count({ where: { userId: loser.id } });
    expect(loserReservations).toBe(0);

    const tickets = await dataSource
      .getRepository(Ticket)
      .count({ where: { performanceId: performance.id } });
    expect(tickets).toBe(2);
  });
});

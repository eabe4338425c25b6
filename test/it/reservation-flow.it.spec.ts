import { Test, TestingModule } from '@nestjs/testing';
import { ConflictException, INestApplication } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { AppModule } from '../../src/app.module';
import { ReservationService } from '../../src/reservation/reservation.service';
import { PerformanceService } from '../../src/performance/performance.service';
import { PlayService } from '../../src/catalog/play.service';
import { GenreService } from '../../src/catalog/genre.service';
import { randomUUID } from 'crypto';
import { Ticket } from '../../src/reservation/domain/ticket.entity';
import { createPerformance, createUser } from './fixtures';

describe('예약 흐름', () => {
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

  it('먼저 예약한 사용자의 좌석은 다음 사용자에게 충돌이고 기존 예약은 변하지 않는다', async () => {
    // given
    const performance = await createPerformance(moduleRef);
    const [userA, userB] = await Promise.all([createUser(moduleRef), createUser(moduleRef)]);
    const r1 = await reservationService.createReservation(userA.id, [
      { performanceId: performance.id, row: 3, seat: 4 },
    ]);

    // when
    const error = await reservationService
      .createReservation(userB.id, [{ performanceId: performance.id, row: 3, seat: 4 }])
      .catch((e: unknown) => e);

    // then
    expect(error).toBeInstanceOf(ConflictException);
    const stored = await reservationService.getReservation(userA.id, r1.id);
    expect(stored.tickets.map(({ row, seat }) => ({ row, seat }))).toEqual([{ row: 3, seat: 4 }]);
    expect(stored.tickets[0].performance.theatreHall.rows).toBe(5);
  });

  it('예약을 취소하면 그 예약의 티켓만 삭제되고 좌석이 다시 열린다', async () => {
    // given
    const performance = await createPerformance(moduleRef, { rows: 1, seatsInRow: 3 });
    const user = await createUser(moduleRef);
    const mine = await reservationService.createReservation(user.id, [
      { performanceId: performance.id, row: 1, seat: 1 },
      { performanceId: performance.id, row: 1, seat: 2 },
    ]);
    const other = await reservationService.createReservation(user.id, [
      { performanceId: performance.id, row: 1, seat: 3 },
    ]);

    // when
    await reservationService.cancelReservation(user.id, mine.id);

    // then
    const remaining = await dataSource
      .getRepository(Ticket)
      .find({ where: { performanceId: performance.id } });
    expect(remaining.map((t) => t.reservationId)).toEqual([other.id]);
    await expect(
      moduleRef.get(PerformanceService).listAvailableSeats(performance.id),
    ).resolves.toEqual([
      { row: 1, seat: 1 },
      { row: 1, seat: 2 },
    ]);
  });

  it('공연 목록의 잔여 좌석 수는 수용 인원에서 판매 수를 뺀 값이다', async () => {
    // given
    const performance = await createPerformance(moduleRef, { rows: 2, seatsInRow: 2 });
    const user = await createUser(moduleRef);
    await reservationService.createReservation(user.id, [
      { performanceId: performance.id, row: 2, seat: 2 },
    ]);

    // when
    const page = await moduleRef
      .get(PerformanceService)
      .list({ playId: performance.playId }, { page: 1, limit: 20 });

    // then
    expect(page.items).toHaveLength(1);
    expect(page.items[0].ticketsSold).toBe(1);
    expect(page.items[0].performance.theatreHall.capacity).toBe(4);
  });

  it('여러 장의 티켓을 가진 예약도 페이지마다 예약 단위로 나뉜다', async () => {
    // given
    const performance = await createPerformance(moduleRef, { rows: 6, seatsInRow: 3 });
    const user = await createUser(moduleRef);
    const created: string[] = [];
    for (let row = 1; row <= 6; row++) {
      const reservation = await reservationService.createReservation(user.id, [
        { performanceId: performance.id, row, seat: 3 },
        { performanceId: performance.id, row, seat: 1 },
        { performanceId: performance.id, row, seat: 2 },
      ]);
      created.push(reservation.id);
    }

    // when
    const first = await reservationService.listReservations(user.id, { page: 1, limit: 5 });
    const second = await reservationService.listReservations(user.id, { page: 2, limit: 5 });

    // then
    expect(first.total).toBe(6);
    expect(second.total).toBe(6);
    expect(first.items).toHaveLength(5);
    expect(second.items).toHaveLength(1);
    const firstIds = first.items.map((r) => r.id);
    const secondIds = second.items.map((r) => r.id);
    expect(firstIds.filter((id) => secondIds.includes(id))).toEqual([]);
    expect([...firstIds, ...secondIds].sort()).toEqual([...created].sort());
    [...first.items, ...second.items].forEach((reservation) => {
      expect(reservation.tickets.map((t) => t.seat)).toEqual([1, 2, 3]);
      expect(reservation.tickets[0].performance.play.id).toBe(performance.playId);
    });
  });

  it('장르 이름으로 작품을 거르면 그 장르를 가진 작품만 정확히 나온다', async () => {
    // given
    const suffix = randomUUID().slice(0, 8);
    const genreService = moduleRef.get(GenreService);
    const playService = moduleRef.get(PlayService);
    const tragedy = await genreService.create({ name: `비극-${suffix}` });
    const comedy = await genreService.create({ name: `희극-${suffix}` });
    const createPlay = (title: string, genreIds: string[]) =>
      playService.create({ title: `${title}-${suffix}`, description: '', genreIds, actorIds: [] });
    const onlyTragedy = await createPlay('리어왕', [tragedy.id]);
    const both = await createPlay('희비극', [tragedy.id, comedy.id]);
    await createPlay('한여름 밤의 꿈', [comedy.id]);

    // when
    const page = await playService.list(
      { genreName: tragedy.name.toUpperCase() },
      { page: 1, limit: 20 },
    );

    // then
    expect(page.total).toBe(2);
    expect(page.items.map((p) => p.id).sort()).toEqual([onlyTragedy.id, both.id].sort());
  });
});

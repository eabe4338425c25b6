import { BadRequestException, NotFoundException } from '@nestjs/common';
import { PerformanceService } from './performance.service';
import { PerformanceRepository } from './performance.repository';
import { Performance } from './domain/performance.entity';
import { PlayRepository, TheatreHallRepository } from '../catalog/catalog.repository';
import { Play } from '../catalog/domain/play.entity';
import { TheatreHall } from '../catalog/domain/theatre-hall.entity';

describe('PerformanceService', () => {
  let service: PerformanceService;
  let mockPerformanceRepository: jest.Mocked<PerformanceRepository>;
  let mockPlayRepository: jest.Mocked<PlayRepository>;
  let mockTheatreHallRepository: jest.Mocked<TheatreHallRepository>;

  const hall = Object.assign(new TheatreHall(), { id: 'hall-1', name: 'Studio', rows: 2, seatsInRow: 2 });
  const play = Object.assign(new Play(), { id: 'play-1', title: '등대지기', genres: [], actors: [] });
  const performance = Object.assign(new Performance(), {
    id: 'performance-1',
    playId: play.id,
    play,
    theatreHallId: hall.id,
    theatreHall: hall,
    showTime: new Date('2026-11-20T10:00:00Z'),
  });

  beforeEach(() => {
    mockPerformanceRepository = {
      findPage: jest.fn().mockResolvedValue({ items: [], total: 0, page: 1, limit: 20 }),
      findById: jest.fn(),
      findByIdsWithHall: jest.fn(),
      findTakenSeats: jest.fn(),
      save: jest.fn(async (p: Performance) => Object.assign(p, { id: p.id ?? 'performance-new' })),
      deleteById: jest.fn(),
    };
    mockPlayRepository = {
      findPage: jest.fn(),
      findById: jest.fn(),
      save: jest.fn(),
      deleteById: jest.fn(),
    };
    mockTheatreHallRepository = {
      findPage: jest.fn(),
      findById: jest.fn(),
      save: jest.fn(),
      deleteById: jest.fn(),
    };
    service = new PerformanceService(
      mockPerformanceRepository,
      mockPlayRepository,
      mockTheatreHallRepository,
    );
  });

  describe('list', () => {
    it('date는 해당 UTC 하루로, from/to와 교집합으로 변환한다', async () => {
      // when
      await service.list(
        { date: '2026-11-20', from: new Date('2026-11-20T09:00:00Z'), playId: 'play-1' },
        { page: 1, limit: 20 },
      );

      // then
      expect(mockPerformanceRepository.findPage).toHaveBeenCalledWith(
        {
          showTime: {
            from: new Date('2026-11-20T09:00:00Z'),
            to: new Date('2026-11-20T23:59:59.999Z'),
          },
          playId: 'play-1',
          theatreHallId: undefined,
        },
        { page: 1, limit: 20 },
      );
    });

    it('시간 조건이 없으면 showTime을 넘기지 않는다', async () => {
      // when
      await service.list({}, { page: 2, limit: 5 });

      // then
      expect(mockPerformanceRepository.findPage).toHaveBeenCalledWith(
        { showTime: undefined, playId: undefined, theatreHallId: undefined },
        { page: 2, limit: 5 },
      );
    });

    it('형식이 잘못된 날짜는 BadRequestException을 던진다', async () => {
      await expect(service.list({ date: '2026/11/20' }, { page: 1, limit: 20 })).rejects.toThrow(
        BadRequestException,
      );
    });
  });

  describe('get', () => {
    it('판매된 좌석을 takenPlaces로 함께 반환한다', async () => {
      // given
      mockPerformanceRepository.findById.mockResolvedValue(performance);
      mockPerformanceRepository.findTakenSeats.mockResolvedValue([{ row: 1, seat: 2 }]);

      // when
      const detail = await service.get('performance-1');

      // then
      expect(detail).toEqual({ performance, takenPlaces: [{ row: 1, seat: 2 }] });
    });

    it('없는 공연은 NotFoundException을 던진다', async () => {
      // given
      mockPerformanceRepository.findById.mockResolvedValue(null);

      // when & then
      await expect(service.get('performance-x')).rejects.toThrow(NotFoundException);
    });
  });

  describe('listAvailableSeats', () => {
    it('판매되지 않은 좌석을 행 우선 순서로 반환한다', async () => {
      // given
      mockPerformanceRepository.findById.mockResolvedValue(performance);
      mockPerformanceRepository.findTakenSeats.mockResolvedValue([
        { row: 1, seat: 2 },
        { row: 2, seat: 1 },
      ]);

      // when
      const seats = await service.listAvailableSeats('performance-1');

      // then
      expect(seats).toEqual([
        { row: 1, seat: 1 },
        { row: 2, seat: 2 },
      ]);
    });
  });

  describe('create', () => {
    it('작품과 상영관이 있으면 공연을 저장하고 연관과 함께 다시 읽는다', async () => {
      // given
      mockPlayRepository.findById.mockResolvedValue(play);
      mockTheatreHallRepository.findById.mockResolvedValue(hall);
      mockPerformanceRepository.findById.mockResolvedValue(performance);

      // when
      const result = await service.create({
        playId: 'play-1',
        theatreHallId: 'hall-1',
        showTime: new Date('2026-11-20T10:00:00Z'),
      });

      // then
      expect(mockPerformanceRepository.save).toHaveBeenCalledWith(
        expect.objectContaining({ playId: 'play-1', theatreHallId: 'hall-1' }),
      );
      expect(mockPerformanceRepository.findById).toHaveBeenCalledWith('performance-new');
      expect(result).toBe(performance);
    });

    it('없는 상영관이면 저장하지 않고 404를 던진다', async () => {
      // given
      mockPlayRepository.findById.mockResolvedValue(play);
      mockTheatreHallRepository.findById.mockResolvedValue(null);

      // when & then
      await expect(
        service.create({ playId: 'play-1', theatreHallId: 'hall-x', showTime: new Date() }),
      ).rejects.toThrow(NotFoundException);
      expect(mockPerformanceRepository.save).not.toHaveBeenCalled();
    });
  });

  it('없는 공연 삭제는 NotFoundException을 던진다', async () => {
    // given
    mockPerformanceRepository.deleteById.mockResolvedValue(false);

    // when & then
    await expect(service.remove('performance-x')).rejects.toThrow(NotFoundException);
  });
});

import { ConflictException, NotFoundException } from '@nestjs/common';
import { GenreService } from './genre.service';
import { GenreRepository } from './catalog.repository';
import { Genre } from './domain/genre.entity';
import { DuplicateEntryError } from '../common/errors/duplicate-entry.error';

describe('GenreService', () => {
  let service: GenreService;
  let mockGenreRepository: jest.Mocked<GenreRepository>;

  beforeEach(() => {
    mockGenreRepository = {
      findPage: jest.fn(),
      findById: jest.fn(),
      findByIds: jest.fn(),
      save: jest.fn(async (genre: Genre) => Object.assign(genre, { id: genre.id ?? 'genre-1' })),
      deleteById: jest.fn(),
    };
    service = new GenreService(mockGenreRepository);
  });

  it('장르를 생성한다', async () => {
    // when
    const genre = await service.create({ name: '코미디' });

    // then
    expect(genre).toMatchObject({ id: 'genre-1', name: '코미디' });
  });

  it('이름이 중복되면 ConflictException을 던진다', async () => {
    // given
    mockGenreRepository.save.mockRejectedValue(new DuplicateEntryError('Genre'));

    // when & then
    await expect(service.create({ name: '코미디' })).rejects.toThrow(ConflictException);
  });

  it('저장소의 다른 오류는 그대로 전파한다', async () => {
    // given
    const failure = new Error('timeout');
    mockGenreRepository.save.mockRejectedValue(failure);

    // when & then
    await expect(service.create({ name: '코미디' })).rejects.toBe(failure);
  });

  it('부분 수정은 주어진 필드만 바꾼다', async () => {
    // given
    mockGenreRepository.findById.mockResolvedValue(
      Object.assign(new Genre(), { id: 'genre-1', name: '드라마' }),
    );

    // when
    const genre = await service.update('genre-1', {});

    // then
    expect(genre.name).toBe('드라마');
    expect(mockGenreRepository.save).toHaveBeenCalledTimes(1);
  });

  it('없는 장르는 NotFoundException을 던진다', async () => {
    // given
    mockGenreRepository.findById.mockResolvedValue(null);
    mockGenreRepository.deleteById.mockResolvedValue(false);

    // when & then
    await expect(service.get('genre-x')).rejects.toThrow(NotFoundException);
    await expect(service.remove('genre-x')).rejects.toThrow(NotFoundException);
  });
});

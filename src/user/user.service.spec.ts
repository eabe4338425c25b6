import { ConflictException, Logger, NotFoundException } from '@nestjs/common';
import * as bcrypt from 'bcryptjs';
import { UserService } from './user.service';
import { UserRepository } from './user.repository';
import { User } from './domain/user.entity';
import { DuplicateEntryError } from '../common/errors/duplicate-entry.error';

describe('UserService', () => {
  let service: UserService;
  let mockUserRepository: jest.Mocked<UserRepository>;

  beforeEach(() => {
    mockUserRepository = {
      findById: jest.fn(),
      findByEmail: jest.fn(),
      save: jest.fn(async (user: User) => Object.assign(user, { id: 'user-1' })),
    };
    service = new UserService(mockUserRepository);
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('register', () => {
    it('이메일을 정규화하고 비밀번호를 해시로 저장한다', async () => {
      // when
      const user = await service.register({ email: ' Viewer@Example.com ', password: 'test-password' });

      // then
      expect(user.email).toBe('viewer@example.com');
      expect(user.isStaff).toBe(false);
      expect(user.password).not.toBe('test-password');
      await expect(bcrypt.compare('test-password', user.password)).resolves.toBe(true);
    });

    it('이미 쓰는 이메일이면 ConflictException을 던진다', async () => {
      // given
      mockUserRepository.save.mockRejectedValue(new DuplicateEntryError('User'));

      // when & then
      await expect(
        service.register({ email: 'viewer@example.com', password: 'test-password' }),
      ).rejects.toThrow(ConflictException);
    });
  });

  describe('verifyCredentials', () => {
    it('비밀번호가 맞을 때만 사용자를 반환한다', async () => {
      // given
      const stored = Object.assign(new User(), {
        id: 'user-1',
        email: 'viewer@example.com',
        password: await bcrypt.hash('test-password', 4),
        isStaff: false,
      });
      mockUserRepository.findByEmail.mockResolvedValue(stored);

      // when & then
      await expect(service.verifyCredentials('VIEWER@example.com', 'test-password')).resolves.toBe(
        stored,
      );
      await expect(service.verifyCredentials('viewer@example.com', 'wrong')).resolves.toBeNull();
      expect(mockUserRepository.findByEmail).toHaveBeenCalledWith('viewer@example.com');
    });

    it('없는 이메일은 null을 반환한다', async () => {
      // given
      mockUserRepository.findByEmail.mockResolvedValue(null);

      // when & then
      await expect(service.verifyCredentials('nobody@example.com', 'x')).resolves.toBeNull();
    });
  });

  describe('updateProfile', () => {
    it('주어진 필드만 바꾼다', async () => {
      // given
      mockUserRepository.findById.mockResolvedValue(
        Object.assign(new User(), {
          id: 'user-1',
          email: 'viewer@example.com',
          password: 'hashed',
          isStaff: false,
        }),
      );

      // when
      const user = await service.updateProfile('user-1', { email: 'new@example.com' });

      // then
      expect(user.email).toBe('new@example.com');
      expect(user.password).toBe('hashed');
    });

    it('없는 사용자는 NotFoundException을 던진다', async () => {
      // given
      mockUserRepository.findById.mockResolvedValue(null);

      // when & then
      await expect(service.updateProfile('user-x', {})).rejects.toThrow(NotFoundException);
    });
  });

  describe('ensureSuperuser', () => {
    it('관리자 계정이 없으면 스태프로 생성한다', async () => {
      // given
      mockUserRepository.findByEmail.mockResolvedValue(null);

      // when
      const user = await service.ensureSuperuser('admin@example.com', 'test-password');

      // then
      expect(user.isStaff).toBe(true);
      expect(mockUserRepository.save).toHaveBeenCalledTimes(1);
    });

    it('이미 있으면 다시 만들지 않는다', async () => {
      // given
      const existing = Object.assign(new User(), { id: 'user-9', email: 'admin@example.com' });
      mockUserRepository.findByEmail.mockResolvedValue(existing);

      // when
      const user = await service.ensureSuperuser('admin@example.com', 'test-password');

      // then
      expect(user).toBe(existing);
      expect(mockUserRepository.save).not.toHaveBeenCalled();
    });
  });
});

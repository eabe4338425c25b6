import { Injectable, Inject, ConflictException, NotFoundException, Logger } from '@nestjs/common';
import * as bcrypt from 'bcryptjs';
import { UserRepository } from './user.repository';
import { User } from './domain/user.entity';
import { DuplicateEntryError } from '../common/errors/duplicate-entry.error';
import { DI_TOKENS } from '../common/di-tokens';

const SALT_ROUNDS = 10;

export interface RegisterInput {
  email: string;
  password: string;
}

export interface ProfileUpdate {
  email?: string;
  password?: string;
}

@Injectable()
export class UserService {
  private readonly logger = new Logger(UserService.name);

  constructor(
    @Inject(DI_TOKENS.USER_REPOSITORY)
    private readonly userRepository: UserRepository,
  ) {}

  async register(input: RegisterInput): Promise<User> {
    const user = new User();
    user.email = normalizeEmail(input.email);
    user.password = await bcrypt.hash(input.password, SALT_ROUNDS);
    user.isStaff = false;
    return this.saveUnique(user);
  }

  async findById(userId: string): Promise<User | null> {
    return this.userRepository.findById(userId);
  }

  async getProfile(userId: string): Promise<User> {
    const user = await this.userRepository.findById(userId);
    if (!user) {
      throw new NotFoundException('사용자를 찾을 수 없습니다.');
    }
    return user;
  }

  async updateProfile(userId: string, update: ProfileUpdate): Promise<User> {
    const user = await this.getProfile(userId);
    if (update.email !== undefined) user.email = normalizeEmail(update.email);
    if (update.password !== undefined) {
      user.password = await bcrypt.hash(update.password, SALT_ROUNDS);
    }
    return this.saveUnique(user);
  }

  /**
   * 이메일과 비밀번호가 일치하면 사용자를, 아니면 null을 반환합니다.
   */
  async verifyCredentials(email: string, password: string): Promise<User | null> {
    const user = await this.userRepository.findByEmail(normalizeEmail(email));
    if (!user) return null;
    return (await bcrypt.compare(password, user.password)) ? user : null;
  }

  /**
   * 관리자 계정이 없으면 생성합니다. 이미 있으면 그대로 둡니다.
   */
  async ensureSuperuser(email: string, password: string): Promise<User> {
    const existing = await this.userRepository.findByEmail(normalizeEmail(email));
    if (existing) {
      this.logger.log(`관리자 계정이 이미 존재합니다: ${existing.email}`);
      return existing;
    }

    const user = new User();
    user.email = normalizeEmail(email);
    user.password = await bcrypt.hash(password, SALT_ROUNDS);
    user.isStaff = true;
    const saved = await this.saveUnique(user);
    this.logger.log(`관리자 계정 생성: ${saved.email}`);
    return saved;
  }

  private async saveUnique(user: User): Promise<User> {
    try {
      return await this.userRepository.save(user);
    } catch (error) {
      if (error instanceof DuplicateEntryError) {
        throw new ConflictException('이미 사용 중인 이메일입니다.');
      }
      throw error;
    }
  }
}

const normalizeEmail = (email: string): string => email.trim().toLowerCase();

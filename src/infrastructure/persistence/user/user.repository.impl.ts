import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { UserRepository } from '../../../user/user.repository';
import { User } from '../../../user/domain/user.entity';
import { DuplicateEntryError } from '../../../common/errors/duplicate-entry.error';
import { isUniqueViolation } from '../query-errors';

@Injectable()
export class UserRepositoryImpl implements UserRepository {
  constructor(
    @InjectRepository(User)
    private readonly repo: Repository<User>,
  ) {}

  async findById(id: string): Promise<User | null> {
    return this.repo.findOne({ where: { id } });
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.repo.findOne({ where: { email } });
  }

  async save(user: User): Promise<User> {
    try {
      return await this.repo.save(user);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateEntryError(User.name, error);
      }
      throw error;
    }
  }
}

import { User } from './domain/user.entity';

export interface UserRepository {
  findById(id: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  /** 이메일 중복 시 DuplicateEntryError */
  save(user: User): Promise<User>;
}

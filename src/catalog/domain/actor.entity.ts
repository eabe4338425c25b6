import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn } from 'typeorm';

@Entity('actor')
export class Actor {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 255 })
  firstName!: string;

  @Column({ length: 255 })
  lastName!: string;

  @CreateDateColumn()
  createdAt!: Date;

  get fullName(): string {
    return `${this.firstName} ${this.lastName}`;
  }
}

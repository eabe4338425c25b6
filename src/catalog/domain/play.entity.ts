import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToMany,
  JoinTable,
} from 'typeorm';
import { Genre } from './genre.entity';
import { Actor } from './actor.entity';

@Entity('play')
export class Play {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 255 })
  title!: string;

  @Column({ type: 'text' })
  description!: string;

  @CreateDateColumn()
  createdAt!: Date;

  @ManyToMany(() => Genre)
  @JoinTable({
    name: 'play_genre',
    joinColumn: { name: 'playId', referencedColumnName: 'id' },
    inverseJoinColumn: { name: 'genreId', referencedColumnName: 'id' },
  })
  genres!: Genre[];

  @ManyToMany(() => Actor)
  @JoinTable({
    name: 'play_actor',
    joinColumn: { name: 'playId', referencedColumnName: 'id' },
    inverseJoinColumn: { name: 'actorId', referencedColumnName: 'id' },
  })
  actors!: Actor[];
}

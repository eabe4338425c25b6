import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { Play } from '../../catalog/domain/play.entity';
import { TheatreHall } from '../../catalog/domain/theatre-hall.entity';

@Entity('performance')
export class Performance {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 36 })
  playId!: string;

  @Column({ length: 36 })
  theatreHallId!: string;

  @Index('IDX_performance_show_time')
  @Column({ type: 'datetime' })
  showTime!: Date;

  @CreateDateColumn()
  createdAt!: Date;

  @ManyToOne(() => Play, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'playId' })
  play!: Play;

  @ManyToOne(() => TheatreHall, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'theatreHallId' })
  theatreHall!: TheatreHall;
}

import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Unique,
} from 'typeorm';
import { Performance } from '../../performance/domain/performance.entity';
import { Reservation } from './reservation.entity';

export const TICKET_SEAT_UNIQUE_CONSTRAINT = 'UQ_ticket_performance_row_seat';

/**
 * 한 공연의 한 좌석은 한 장의 티켓만 가질 수 있습니다.
 * (performanceId, row, seat) 유니크 인덱스가 동시 예약 시 최종 판정을 맡습니다.
 */
@Entity('ticket')
@Unique(TICKET_SEAT_UNIQUE_CONSTRAINT, ['performanceId', 'row', 'seat'])
export class Ticket {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'int' })
  row!: number;

  @Column({ type: 'int' })
  seat!: number;

  @Column({ length: 36 })
  performanceId!: string;

  @Column({ length: 36 })
  reservationId!: string;

  @CreateDateColumn()
  createdAt!: Date;

  @ManyToOne(() => Performance, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'performanceId' })
  performance!: Performance;

  @ManyToOne(() => Reservation, (reservation) => reservation.tickets, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'reservationId' })
  reservation!: Reservation;
}

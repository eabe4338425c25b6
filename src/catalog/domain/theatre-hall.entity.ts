import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn } from 'typeorm';

export interface SeatPosition {
  row: number;
  seat: number;
}

@Entity('theatre_hall')
export class TheatreHall {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 255 })
  name!: string;

  @Column({ type: 'int' })
  rows!: number;

  @Column({ type: 'int' })
  seatsInRow!: number;

  @CreateDateColumn()
  createdAt!: Date;

  get capacity(): number {
    return this.rows * this.seatsInRow;
  }

  isRowInRange(row: number): boolean {
    return Number.isInteger(row) && row >= 1 && row <= this.rows;
  }

  isSeatInRange(seat: number): boolean {
    return Number.isInteger(seat) && seat >= 1 && seat <= this.seatsInRow;
  }

  /**
   * 행 우선 순서로 모든 좌석을 나열합니다.
   */
  allSeats(): SeatPosition[] {
    const seats: SeatPosition[] = [];
    for (let row = 1; row <= this.rows; row++) {
      for (let seat = 1; seat <= this.seatsInRow; seat++) {
        seats.push({ row, seat });
      }
    }
    return seats;
  }
}

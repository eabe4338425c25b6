import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsInt,
  IsOptional,
  IsUUID,
  ValidateNested,
} from 'class-validator';
import { Reservation } from '../../reservation/domain/reservation.entity';
import { Ticket } from '../../reservation/domain/ticket.entity';

export class TicketSelectionRequest {
  @ApiProperty({ format: 'uuid' })
  @IsUUID()
  performanceId!: string;

  @ApiProperty({ example: 3, minimum: 1 })
  @IsInt()
  row!: number;

  @ApiProperty({ example: 4, minimum: 1 })
  @IsInt()
  seat!: number;
}

export class CreateReservationRequest {
  @ApiProperty({ type: [TicketSelectionRequest] })
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(100)
  @ValidateNested({ each: true })
  @Type(() => TicketSelectionRequest)
  tickets!: TicketSelectionRequest[];
}

export class TicketListQuery {
  @ApiPropertyOptional({ format: 'uuid' })
  @IsOptional()
  @IsUUID()
  performance?: string;
}

export interface TicketResponse {
  id: string;
  row: number;
  seat: number;
  performance: {
    id: string;
    showTime: Date;
    playTitle: string;
    theatreHallName: string;
  };
}

export interface ReservationResponse {
  id: string;
  createdAt: Date;
  tickets: TicketResponse[];
}

export const toTicketResponse = (ticket: Ticket): TicketResponse => ({
  id: ticket.id,
  row: ticket.row,
  seat: ticket.seat,
  performance: {
    id: ticket.performance.id,
    showTime: ticket.performance.showTime,
    playTitle: ticket.performance.play.title,
    theatreHallName: ticket.performance.theatreHall.name,
  },
});

export const toReservationResponse = (reservation: Reservation): ReservationResponse => ({
  id: reservation.id,
  createdAt: reservation.createdAt,
  tickets: reservation.tickets.map(toTicketResponse),
});

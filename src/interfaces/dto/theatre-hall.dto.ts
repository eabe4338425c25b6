import { ApiProperty, PartialType } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsInt, IsNotEmpty, IsString, Max, MaxLength, Min } from 'class-validator';
import { TheatreHall } from '../../catalog/domain/theatre-hall.entity';
import { trimString } from './transforms';

export class CreateTheatreHallRequest {
  @ApiProperty({ example: 'Main', maxLength: 255 })
  @Transform(trimString)
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name!: string;

  @ApiProperty({ example: 5, minimum: 1 })
  @IsInt()
  @Min(1)
  @Max(1000)
  rows!: number;

  @ApiProperty({ example: 10, minimum: 1 })
  @IsInt()
  @Min(1)
  @Max(1000)
  seatsInRow!: number;
}

export class UpdateTheatreHallRequest extends PartialType(CreateTheatreHallRequest) {}

export interface TheatreHallResponse {
  id: string;
  name: string;
  rows: number;
  seatsInRow: number;
  capacity: number;
}

export const toTheatreHallResponse = (hall: TheatreHall): TheatreHallResponse => ({
  id: hall.id,
  name: hall.name,
  rows: hall.rows,
  seatsInRow: hall.seatsInRow,
  capacity: hall.capacity,
});

import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsDate, IsOptional, IsString, IsUUID } from 'class-validator';
import { PaginationQuery } from '../../common/pagination';
import { Performance } from '../../performance/domain/performance.entity';
import { PerformanceSummary } from '../../performance/performance.repository';
import { PerformanceDetail } from '../../performance/performance.service';
import { SeatPosition } from '../../catalog/domain/theatre-hall.entity';
import { PlayDetailResponse, toPlayDetailResponse } from './play.dto';
import { TheatreHallResponse, toTheatreHallResponse } from './theatre-hall.dto';

export class CreatePerformanceRequest {
  @ApiProperty({ format: 'uuid' })
  @IsUUID()
  playId!: string;

  @ApiProperty({ format: 'uuid' })
  @IsUUID()
  theatreHallId!: string;

  @ApiProperty({ example: '2026-11-20T19:30:00Z' })
  @Type(() => Date)
  @IsDate()
  showTime!: Date;
}

export class UpdatePerformanceRequest extends PartialType(CreatePerformanceRequest) {}

export class PerformanceListQuery extends PaginationQuery {
  @ApiPropertyOptional({ example: '2026-11-20', description: '상영 시각의 UTC 날짜' })
  @IsOptional()
  @IsString()
  date?: string;

  @ApiPropertyOptional({ description: '이 시각 이후 (포함)' })
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  from?: Date;

  @ApiPropertyOptional({ description: '이 시각 이전 (포함)' })
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  to?: Date;

  @ApiPropertyOptional({ format: 'uuid' })
  @IsOptional()
  @IsUUID()
  play?: string;

  @ApiPropertyOptional({ format: 'uuid' })
  @IsOptional()
  @IsUUID()
  theatreHall?: string;
}

export interface PerformanceListItemResponse {
  id: string;
  showTime: Date;
  playId: string;
  playTitle: string;
  theatreHallId: string;
  theatreHallName: string;
  theatreHallCapacity: number;
  ticketsAvailable: number;
}

export interface PerformanceResponse {
  id: string;
  showTime: Date;
  play: PlayDetailResponse;
  theatreHall: TheatreHallResponse;
}

export interface PerformanceDetailResponse extends PerformanceResponse {
  takenPlaces: SeatPosition[];
}

export const toPerformanceListItemResponse = ({
  performance,
  ticketsSold,
}: PerformanceSummary): PerformanceListItemResponse => ({
  id: performance.id,
  showTime: performance.showTime,
  playId: performance.playId,
  playTitle: performance.play.title,
  theatreHallId: performance.theatreHallId,
  theatreHallName: performance.theatreHall.name,
  theatreHallCapacity: performance.theatreHall.capacity,
  ticketsAvailable: performance.theatreHall.capacity - ticketsSold,
});

export const toPerformanceResponse = (performance: Performance): PerformanceResponse => ({
  id: performance.id,
  showTime: performance.showTime,
  play: toPlayDetailResponse(performance.play),
  theatreHall: toTheatreHallResponse(performance.theatreHall),
});

export const toPerformanceDetailResponse = ({
  performance,
  takenPlaces,
}: PerformanceDetail): PerformanceDetailResponse => ({
  ...toPerformanceResponse(performance),
  takenPlaces,
});

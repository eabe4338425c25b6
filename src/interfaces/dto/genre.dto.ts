import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { PaginationQuery } from '../../common/pagination';
import { Genre } from '../../catalog/domain/genre.entity';
import { trimString } from './transforms';

export class CreateGenreRequest {
  @ApiProperty({ example: '뮤지컬', maxLength: 255 })
  @Transform(trimString)
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name!: string;
}

export class UpdateGenreRequest extends PartialType(CreateGenreRequest) {}

export class GenreListQuery extends PaginationQuery {
  @ApiPropertyOptional({ description: '이름 부분 일치' })
  @IsOptional()
  @IsString()
  name?: string;
}

export interface GenreResponse {
  id: string;
  name: string;
}

export const toGenreResponse = (genre: Genre): GenreResponse => ({
  id: genre.id,
  name: genre.name,
});

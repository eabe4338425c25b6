import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import {
  IsArray,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUUID,
  MaxLength,
} from 'class-validator';
import { PaginationQuery } from '../../common/pagination';
import { Play } from '../../catalog/domain/play.entity';
import { ActorResponse, toActorResponse } from './actor.dto';
import { GenreResponse, toGenreResponse } from './genre.dto';
import { toIdList, trimString } from './transforms';

export class CreatePlayRequest {
  @ApiProperty({ example: '한여름 밤의 꿈', maxLength: 255 })
  @Transform(trimString)
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  title!: string;

  @ApiProperty({ example: '숲속에서 벌어지는 네 연인의 하룻밤' })
  @IsString()
  description!: string;

  @ApiProperty({ type: [String], format: 'uuid' })
  @IsArray()
  @IsUUID('all', { each: true })
  genreIds!: string[];

  @ApiProperty({ type: [String], format: 'uuid' })
  @IsArray()
  @IsUUID('all', { each: true })
  actorIds!: string[];
}

export class UpdatePlayRequest extends PartialType(CreatePlayRequest) {}

export class PlayListQuery extends PaginationQuery {
  @ApiPropertyOptional({ description: '제목 부분 일치 (대소문자 무시)' })
  @IsOptional()
  @IsString()
  title?: string;

  @ApiPropertyOptional({ description: '쉼표로 구분한 장르 ID 목록' })
  @IsOptional()
  @Transform(toIdList)
  @IsUUID('all', { each: true })
  genres?: string[];

  @ApiPropertyOptional({ description: '장르 이름 (대소문자 무시, 완전 일치)' })
  @IsOptional()
  @IsString()
  genre?: string;

  @ApiPropertyOptional({ description: '쉼표로 구분한 배우 ID 목록' })
  @IsOptional()
  @Transform(toIdList)
  @IsUUID('all', { each: true })
  actors?: string[];
}

export interface PlayListItemResponse {
  id: string;
  title: string;
  description: string;
  genres: string[];
  actors: string[];
}

export interface PlayDetailResponse {
  id: string;
  title: string;
  description: string;
  genres: GenreResponse[];
  actors: ActorResponse[];
}

export const toPlayListItemResponse = (play: Play): PlayListItemResponse => ({
  id: play.id,
  title: play.title,
  description: play.description,
  genres: play.genres.map((genre) => genre.name),
  actors: play.actors.map((actor) => actor.fullName),
});

export const toPlayDetailResponse = (play: Play): PlayDetailResponse => ({
  id: play.id,
  title: play.title,
  description: play.description,
  genres: play.genres.map(toGenreResponse),
  actors: play.actors.map(toActorResponse),
});

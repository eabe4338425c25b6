import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { PaginationQuery } from '../../common/pagination';
import { Actor } from '../../catalog/domain/actor.entity';
import { trimString } from './transforms';

export class CreateActorRequest {
  @ApiProperty({ example: '민준', maxLength: 255 })
  @Transform(trimString)
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  firstName!: string;

  @ApiProperty({ example: '김', maxLength: 255 })
  @Transform(trimString)
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  lastName!: string;
}

export class UpdateActorRequest extends PartialType(CreateActorRequest) {}

export class ActorListQuery extends PaginationQuery {
  @ApiPropertyOptional({ description: '이름 또는 성 부분 일치' })
  @IsOptional()
  @IsString()
  name?: string;
}

export interface ActorResponse {
  id: string;
  firstName: string;
  lastName: string;
  fullName: string;
}

export const toActorResponse = (actor: Actor): ActorResponse => ({
  id: actor.id,
  firstName: actor.firstName,
  lastName: actor.lastName,
  fullName: actor.fullName,
});

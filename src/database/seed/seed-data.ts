import { Type } from 'class-transformer';
import {
  IsArray,
  IsDateString,
  IsInt,
  IsNotEmpty,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';

export class SeedActor {
  @IsString()
  @IsNotEmpty()
  firstName!: string;

  @IsString()
  @IsNotEmpty()
  lastName!: string;
}

export class SeedTheatreHall {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsInt()
  @Min(1)
  rows!: number;

  @IsInt()
  @Min(1)
  seatsInRow!: number;
}

export class SeedPlay {
  @IsString()
  @IsNotEmpty()
  title!: string;

  @IsString()
  description!: string;

  /** 장르 이름 */
  @IsArray()
  @IsString({ each: true })
  genres!: string[];

  /** actors 배열의 인덱스 */
  @IsArray()
  @IsInt({ each: true })
  actors!: number[];
}

export class SeedPerformance {
  /** plays 배열의 인덱스 */
  @IsInt()
  @Min(0)
  play!: number;

  /** theatreHalls 배열의 인덱스 */
  @IsInt()
  @Min(0)
  theatreHall!: number;

  @IsDateString()
  showTime!: string;
}

export class SeedData {
  @IsArray()
  @IsString({ each: true })
  genres!: string[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SeedActor)
  actors!: SeedActor[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SeedTheatreHall)
  theatreHalls!: SeedTheatreHall[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SeedPlay)
  plays!: SeedPlay[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SeedPerformance)
  performances!: SeedPerformance[];
}

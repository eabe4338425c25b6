import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { appConfig } from '../../config/app.config';
import { DatabaseModule } from '../database.module';
import { UserModule } from '../../user/user.module';
import { Genre } from '../../catalog/domain/genre.entity';
import { Actor } from '../../catalog/domain/actor.entity';
import { Play } from '../../catalog/domain/play.entity';
import { TheatreHall } from '../../catalog/domain/theatre-hall.entity';
import { Performance } from '../../performance/domain/performance.entity';
import { SeedService } from './seed.service';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [appConfig] }),
    DatabaseModule,
    TypeOrmModule.forFeature([Genre, Actor, Play, TheatreHall, Performance]),
    UserModule,
  ],
  providers: [SeedService],
})
export class SeedModule {}

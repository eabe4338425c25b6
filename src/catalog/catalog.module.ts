import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Genre } from './domain/genre.entity';
import { Actor } from './domain/actor.entity';
import { Play } from './domain/play.entity';
import { TheatreHall } from './domain/theatre-hall.entity';
import { GenreService } from './genre.service';
import { ActorService } from './actor.service';
import { PlayService } from './play.service';
import { TheatreHallService } from './theatre-hall.service';
import { GenreRepositoryImpl } from '../infrastructure/persistence/catalog/genre.repository.impl';
import { ActorRepositoryImpl } from '../infrastructure/persistence/catalog/actor.repository.impl';
import { PlayRepositoryImpl } from '../infrastructure/persistence/catalog/play.repository.impl';
import { TheatreHallRepositoryImpl } from '../infrastructure/persistence/catalog/theatre-hall.repository.impl';
import { GenreController } from '../interfaces/controllers/genre.controller';
import { ActorController } from '../interfaces/controllers/actor.controller';
import { PlayController } from '../interfaces/controllers/play.controller';
import { TheatreHallController } from '../interfaces/controllers/theatre-hall.controller';
import { DI_TOKENS } from '../common/di-tokens';

@Module({
  imports: [TypeOrmModule.forFeature([Genre, Actor, Play, TheatreHall])],
  controllers: [GenreController, ActorController, PlayController, TheatreHallController],
  providers: [
    GenreService,
    ActorService,
    PlayService,
    TheatreHallService,
    { provide: DI_TOKENS.GENRE_REPOSITORY, useClass: GenreRepositoryImpl },
    { provide: DI_TOKENS.ACTOR_REPOSITORY, useClass: ActorRepositoryImpl },
    { provide: DI_TOKENS.PLAY_REPOSITORY, useClass: PlayRepositoryImpl },
    { provide: DI_TOKENS.THEATRE_HALL_REPOSITORY, useClass: TheatreHallRepositoryImpl },
  ],
  exports: [
    GenreService,
    ActorService,
    PlayService,
    TheatreHallService,
    DI_TOKENS.GENRE_REPOSITORY,
    DI_TOKENS.ACTOR_REPOSITORY,
    DI_TOKENS.PLAY_REPOSITORY,
    DI_TOKENS.THEATRE_HALL_REPOSITORY,
  ],
})
export class CatalogModule {}

export const DI_TOKENS = {
  GENRE_REPOSITORY: Symbol('GENRE_REPOSITORY'),
  ACTOR_REPOSITORY: Symbol('ACTOR_REPOSITORY'),
  PLAY_REPOSITORY: Symbol('PLAY_REPOSITORY'),
  THEATRE_HALL_REPOSITORY: Symbol('THEATRE_HALL_REPOSITORY'),
  PERFORMANCE_REPOSITORY: Symbol('PERFORMANCE_REPOSITORY'),
  RESERVATION_REPOSITORY: Symbol('RESERVATION_REPOSITORY'),
  USER_REPOSITORY: Symbol('USER_REPOSITORY'),
} as const;

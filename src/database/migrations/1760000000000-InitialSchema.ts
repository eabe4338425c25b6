import { MigrationInterface, QueryRunner } from 'typeorm';

export class InitialSchema1760000000000 implements MigrationInterface {
  name = 'InitialSchema1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(
      `CREATE TABLE \`user\` (
        \`id\` varchar(36) NOT NULL,
        \`email\` varchar(255) NOT NULL,
        \`password\` varchar(255) NOT NULL,
        \`isStaff\` tinyint NOT NULL DEFAULT 0,
        \`createdAt\` datetime(6) NOT NULL DEFAULT CURRENT_TIMESTAMP(6),
        UNIQUE INDEX \`UQ_user_email\` (\`email\`),
        PRIMARY KEY (\`id\`)
      ) ENGINE=InnoDB`,
    );
    await queryRunner.query(
      `CREATE TABLE \`genre\` (
        \`id\` varchar(36) NOT NULL,
        \`name\` varchar(255) NOT NULL,
        \`createdAt\` datetime(6) NOT NULL DEFAULT CURRENT_TIMESTAMP(6),
        UNIQUE INDEX \`UQ_genre_name\` (\`name\`),
        PRIMARY KEY (\`id\`)
      ) ENGINE=InnoDB`,
    );
    await queryRunner.query(
      `CREATE TABLE \`actor\` (
        \`id\` varchar(36) NOT NULL,
        \`firstName\` varchar(255) NOT NULL,
        \`lastName\` varchar(255) NOT NULL,
        \`createdAt\` datetime(6) NOT NULL DEFAULT CURRENT_TIMESTAMP(6),
        PRIMARY KEY (\`id\`)
      ) ENGINE=InnoDB`,
    );
    await queryRunner.query(
      `CREATE TABLE \`play\` (
        \`id\` varchar(36) NOT NULL,
        \`title\` varchar(255) NOT NULL,
        \`description\` text NOT NULL,
        \`createdAt\` datetime(6) NOT NULL DEFAULT CURRENT_TIMESTAMP(6),
        PRIMARY KEY (\`id\`)
      ) ENGINE=InnoDB`,
    );
    await queryRunner.query(
      `CREATE TABLE \`play_genre\` (
        \`playId\` varchar(36) NOT NULL,
        \`genreId\` varchar(36) NOT NULL,
        INDEX \`IDX_play_genre_genre\` (\`genreId\`),
        PRIMARY KEY (\`playId\`, \`genreId\`),
        CONSTRAINT \`FK_play_genre_play\` FOREIGN KEY (\`playId\`) REFERENCES \`play\` (\`id\`) ON DELETE CASCADE,
        CONSTRAINT \`FK_play_genre_genre\` FOREIGN KEY (\`genreId\`) REFERENCES \`genre\` (\`id\`) ON DELETE CASCADE
      ) ENGINE=InnoDB`,
    );
    await queryRunner.query(
      `CREATE TABLE \`play_actor\` (
        \`playId\` varchar(36) NOT NULL,
        \`actorId\` varchar(36) NOT NULL,
        INDEX \`IDX_play_actor_actor\` (\`actorId\`),
        PRIMARY KEY (\`playId\`, \`actorId\`),
        CONSTRAINT \`FK_play_actor_play\` FOREIGN KEY (\`playId\`) REFERENCES \`play\` (\`id\`) ON DELETE CASCADE,
        CONSTRAINT \`FK_play_actor_actor\` FOREIGN KEY (\`actorId\`) REFERENCES \`actor\` (\`id\`) ON DELETE CASCADE
      ) ENGINE=InnoDB`,
    );
    await queryRunner.query(
      `CREATE TABLE \`theatre_hall\` (
        \`id\` varchar(36) NOT NULL,
        \`name\` varchar(255) NOT NULL,
        \`rows\` int NOT NULL,
        \`seatsInRow\` int NOT NULL,
        \`createdAt\` datetime(6) NOT NULL DEFAULT CURRENT_TIMESTAMP(6),
        PRIMARY KEY (\`id\`)
      ) ENGINE=InnoDB`,
    );
    await queryRunner.query(
      `CREATE TABLE \`performance\` (
        \`id\` varchar(36) NOT NULL,
        \`playId\` varchar(36) NOT NULL,
        \`theatreHallId\` varchar(36) NOT NULL,
        \`showTime\` datetime NOT NULL,
        \`createdAt\` datetime(6) NOT NULL DEFAULT CURRENT_TIMESTAMP(6),
        INDEX \`IDX_performance_show_time\` (\`showTime\`),
        PRIMARY KEY (\`id\`),
        CONSTRAINT \`FK_performance_play\` FOREIGN KEY (\`playId\`) REFERENCES \`play\` (\`id\`) ON DELETE CASCADE,
        CONSTRAINT \`FK_performance_theatre_hall\` FOREIGN KEY (\`theatreHallId\`) REFERENCES \`theatre_hall\` (\`id\`) ON DELETE CASCADE
      ) ENGINE=InnoDB`,
    );
    await queryRunner.query(
      `CREATE TABLE \`reservation\` (
        \`id\` varchar(36) NOT NULL,
        \`userId\` varchar(36) NOT NULL,
        \`createdAt\` datetime(6) NOT NULL DEFAULT CURRENT_TIMESTAMP(6),
        PRIMARY KEY (\`id\`),
        CONSTRAINT \`FK_reservation_user\` FOREIGN KEY (\`userId\`) REFERENCES \`user\` (\`id\`) ON DELETE CASCADE
      ) ENGINE=InnoDB`,
    );
    await queryRunner.query(
      `CREATE TABLE \`ticket\` (
        \`id\` varchar(36) NOT NULL,
        \`row\` int NOT NULL,
        \`seat\` int NOT NULL,
        \`performanceId\` varchar(36) NOT NULL,
        \`reservationId\` varchar(36) NOT NULL,
        \`createdAt\` datetime(6) NOT NULL DEFAULT CURRENT_TIMESTAMP(6),
        UNIQUE INDEX \`UQ_ticket_performance_row_seat\` (\`performanceId\`, \`row\`, \`seat\`),
        PRIMARY KEY (\`id\`),
        CONSTRAINT \`FK_ticket_performance\` FOREIGN KEY (\`performanceId\`) REFERENCES \`performance\` (\`id\`) ON DELETE CASCADE,
        CONSTRAINT \`FK_ticket_reservation\` FOREIGN KEY (\`reservationId\`) REFERENCES \`reservation\` (\`id\`) ON DELETE CASCADE
      ) ENGINE=InnoDB`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    for (const table of [
      'ticket',
      'reservation',
      'performance',
      'theatre_hall',
      'play_actor',
      'play_genre',
      'play',
      'actor',
      'genre',
      'user',
    ]) {
      await queryRunner.query(`DROP TABLE \`${table}\``);
    }
  }
}

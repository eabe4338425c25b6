import { DataSource } from 'typeorm';
import { MIGRATIONS } from '../../src/database/migrations';

let datasource: DataSource | undefined;

/**
 * 테스트 컨테이너 접속 정보(process.env)로 만든 공용 DataSource
 */
export const getDatasource = async (): Promise<DataSource> => {
  if (datasource?.isInitialized) {
    return datasource;
  }
  datasource = new DataSource({
    type: 'mysql',
    host: process.env.DB_HOST,
    port: Number(process.env.DB_PORT),
    username: process.env.DB_USERNAME,
    password: process.env.DB_PASSWORD,
    database: process.env.DB_DATABASE,
    migrations: MIGRATIONS,
    timezone: 'Z',
  });
  return datasource.initialize();
};

export const closeDatasource = async (): Promise<void> => {
  if (datasource?.isInitialized) {
    await datasource.destroy();
  }
  datasource = undefined;
};

import { MySqlContainer } from '@testcontainers/mysql';
import { getDatasource } from './util';

const init = async (): Promise<void> => {
  const mysql = await new MySqlContainer('mysql:8')
    .withDatabase('theatre')
    .withUser('root')
    .withRootPassword('test-password')
    .start();

  global.mysql = mysql;

  process.env.DB_HOST = mysql.getHost();
  process.env.DB_PORT = mysql.getPort().toString();
  process.env.DB_USERNAME = mysql.getUsername();
  process.env.DB_PASSWORD = mysql.getUserPassword();
  process.env.DB_DATABASE = mysql.getDatabase();
  process.env.DB_LOGGING_ENABLED = 'false';
  process.env.JWT_SECRET = 'test-secret';
  process.env.NODE_ENV = 'test';

  const datasource = await getDatasource();
  await datasource.runMigrations();
};

export default init;

import { registerAs } from '@nestjs/config';
import { plainToInstance, Transform } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export interface DatabaseConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  logging: boolean;
}

export interface JwtConfig {
  secret: string;
  accessExpiresIn: string;
  refreshExpiresIn: string;
}

export interface SuperuserConfig {
  email: string;
  password: string;
}

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  corsOrigins: string[];
  database: DatabaseConfig;
  jwt: JwtConfig;
  superuser: SuperuserConfig | null;
}

const toBoolean = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.toLowerCase() === 'true' : value;

class EnvironmentVariables {
  @IsIn(['development', 'production', 'test'])
  NODE_ENV: 'development' | 'production' | 'test' = 'development';

  @Transform(({ value }) => Number(value))
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT = 3000;

  @IsString()
  @IsNotEmpty()
  DB_HOST = 'localhost';

  @Transform(({ value }) => Number(value))
  @IsInt()
  DB_PORT = 3306;

  @IsString()
  DB_USERNAME = 'root';

  @IsString()
  DB_PASSWORD = '';

  @IsString()
  @IsNotEmpty()
  DB_DATABASE = 'theatre';

  @Transform(toBoolean)
  @IsBoolean()
  DB_LOGGING_ENABLED = false;

  @IsString()
  @IsNotEmpty()
  JWT_SECRET!: string;

  @IsString()
  @IsNotEmpty()
  JWT_ACCESS_EXPIRES_IN = '15m';

  @IsString()
  @IsNotEmpty()
  JWT_REFRESH_EXPIRES_IN = '1d';

  @IsOptional()
  @IsString()
  SUPERUSER_EMAIL?: string;

  @IsOptional()
  @IsString()
  SUPERUSER_PASSWORD?: string;

  @IsOptional()
  @IsString()
  CORS_ORIGINS?: string;
}

/**
 * 환경 변수를 검증하고 애플리케이션 설정 객체로 변환합니다.
 * 시작 시 한 번만 호출되며, 이후 컴포넌트는 주입받은 설정만 사용합니다.
 */
export function loadAppConfig(env: Record<string, string | undefined>): AppConfig {
  const defined = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const vars = plainToInstance(EnvironmentVariables, defined);
  const errors = validateSync(vars, { skipMissingProperties: false });

  if (errors.length > 0) {
    const problems = errors.flatMap((error) => Object.values(error.constraints ?? {}));
    throw new Error(`Invalid environment configuration: ${problems.join('; ')}`);
  }

  if (Boolean(vars.SUPERUSER_EMAIL) !== Boolean(vars.SUPERUSER_PASSWORD)) {
    throw new Error(
      'Invalid environment configuration: SUPERUSER_EMAIL and SUPERUSER_PASSWORD must be set together',
    );
  }

  return {
    nodeEnv: vars.NODE_ENV,
    port: vars.PORT,
    corsOrigins: (vars.CORS_ORIGINS ?? '')
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    database: {
      host: vars.DB_HOST,
      port: vars.DB_PORT,
      username: vars.DB_USERNAME,
      password: vars.DB_PASSWORD,
      database: vars.DB_DATABASE,
      logging: vars.DB_LOGGING_ENABLED,
    },
    jwt: {
      secret: vars.JWT_SECRET,
      accessExpiresIn: vars.JWT_ACCESS_EXPIRES_IN,
      refreshExpiresIn: vars.JWT_REFRESH_EXPIRES_IN,
    },
    superuser:
      vars.SUPERUSER_EMAIL && vars.SUPERUSER_PASSWORD
        ? { email: vars.SUPERUSER_EMAIL, password: vars.SUPERUSER_PASSWORD }
        : null,
  };
}

export const appConfig = registerAs('app', (): AppConfig => loadAppConfig(process.env));

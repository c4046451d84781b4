import { registerAs } from '@nestjs/config';
import type { PoolConfig } from 'pg';

export const APPLICATION_NAME = 'parking-booking-api';

export interface DatabaseSettings {
  /** Takes precedence over the discrete connection fields when set. */
  url: string | null;
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  ssl: boolean;
  poolMax: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
  statementTimeoutMillis: number;
}

function positiveInteger(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${key} must be a positive integer`);
  }
  return parsed;
}

export function readDatabaseSettings(env: NodeJS.ProcessEnv = process.env): DatabaseSettings {
  return {
    url: env.DATABASE_URL || null,
    host: env.POSTGRES_HOST ?? 'localhost',
    port: positiveInteger(env, 'POSTGRES_PORT', 5432),
    user: env.POSTGRES_USER ?? 'postgres',
    password: env.POSTGRES_PASSWORD ?? '',
    database: env.POSTGRES_DB ?? 'parking',
    ssl: env.POSTGRES_SSL === 'true',
    poolMax: positiveInteger(env, 'POSTGRES_POOL_MAX', 10),
    idleTimeoutMillis: positiveInteger(env, 'POSTGRES_IDLE_TIMEOUT', 30_000),
    connectionTimeoutMillis: positiveInteger(env, 'POSTGRES_CONNECTION_TIMEOUT', 5_000),
    // Bounds how long a booking may wait on a slot row lock
    statementTimeoutMillis: positiveInteger(env, 'POSTGRES_STATEMENT_TIMEOUT', 10_000),
  };
}

export function toPoolConfig(settings: DatabaseSettings): PoolConfig {
  const connection: PoolConfig = settings.url
    ? { connectionString: settings.url }
    : {
      host: settings.host,
      port: settings.port,
      user: settings.user,
      password: settings.password,
      database: settings.database,
    };

  return {
    ...connection,
    ssl: settings.ssl || undefined,
    max: settings.poolMax,
    idleTimeoutMillis: settings.idleTimeoutMillis,
    connectionTimeoutMillis: settings.connectionTimeoutMillis,
    statement_timeout: settings.statementTimeoutMillis,
    application_name: APPLICATION_NAME,
  };
}

export default registerAs('database', (): DatabaseSettings => readDatabaseSettings());

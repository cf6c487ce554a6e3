import * as dotenv from 'dotenv';
import * as path from 'path';
import { isLogLevel } from '../utils/logger';
import type { LogLevel } from '../utils/logger';

dotenv.config();

export interface DatabaseSettings {
  host: string;
  port: number;
  database: string;
  user: string;
  password?: string;
}

export interface AppConfig {
  database: DatabaseSettings;
  table: string;
  sourcesConfigPath: string;
  httpTimeoutMs: number;
  insertBatchSize: number;
  logLevel: LogLevel;
}

export const defaultConfig: AppConfig = {
  database: {
    host: 'localhost',
    port: 5432,
    database: 'crypto',
    user: 'postgres',
  },
  table: 'hist_prices',
  sourcesConfigPath: path.join('config', 'sources.yaml'),
  httpTimeoutMs: 30000,
  insertBatchSize: 100,
  logLevel: 'info',
};

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

function positiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const logLevel = (env.LOG_LEVEL ?? '').toLowerCase();
  const table = env.HIST_PRICES_TABLE && TABLE_NAME_PATTERN.test(env.HIST_PRICES_TABLE)
    ? env.HIST_PRICES_TABLE
    : defaultConfig.table;

  return {
    database: {
      host: env.DB_HOST || defaultConfig.database.host,
      port: positiveInt(env.DB_PORT, defaultConfig.database.port),
      database: env.DB_NAME || defaultConfig.database.database,
      user: env.DB_USER || defaultConfig.database.user,
      password: env.DB_PASSWORD,
    },
    table,
    sourcesConfigPath: path.resolve(env.SOURCES_CONFIG || defaultConfig.sourcesConfigPath),
    httpTimeoutMs: positiveInt(env.HTTP_TIMEOUT_MS, defaultConfig.httpTimeoutMs),
    insertBatchSize: positiveInt(env.INSERT_BATCH_SIZE, defaultConfig.insertBatchSize),
    logLevel: isLogLevel(logLevel) ? logLevel : defaultConfig.logLevel,
  };
}

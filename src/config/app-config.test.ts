import * as path from 'path';
import { describe, it, expect } from 'vitest';
import { defaultConfig, loadConfig } from './app-config';

describe('loadConfig', () => {
  it('falls back to defaults on an empty environment', () => {
    const config = loadConfig({});

    expect(config.database).toEqual({
      host: 'localhost',
      port: 5432,
      database: 'crypto',
      user: 'postgres',
      password: undefined,
    });
    expect(config.table).toBe('hist_prices');
    expect(config.sourcesConfigPath).toBe(path.resolve(defaultConfig.sourcesConfigPath));
    expect(config.httpTimeoutMs).toBe(30000);
    expect(config.insertBatchSize).toBe(100);
    expect(config.logLevel).toBe('info');
  });

  it('reads database and tuning settings', () => {
    const config = loadConfig({
      DB_HOST: 'db.internal',
      DB_PORT: '6543',
      DB_NAME: 'prices',
      DB_USER: 'loader',
      DB_PASSWORD: 'test-password',
      HIST_PRICES_TABLE: 'market.hist_prices',
      HTTP_TIMEOUT_MS: '5000',
      INSERT_BATCH_SIZE: '250',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config.database).toEqual({
      host: 'db.internal',
      port: 6543,
      database: 'prices',
      user: 'loader',
      password: 'test-password',
    });
    expect(config.table).toBe('market.hist_prices');
    expect(config.httpTimeoutMs).toBe(5000);
    expect(config.insertBatchSize).toBe(250);
    expect(config.logLevel).toBe('debug');
  });

  it('ignores unusable values', () => {
    const config = loadConfig({
      DB_PORT: 'abc',
      HIST_PRICES_TABLE: 'hist_prices; DROP TABLE x',
      INSERT_BATCH_SIZE: '-5',
      LOG_LEVEL: 'verbose',
    });

    expect(config.database.port).toBe(5432);
    expect(config.table).toBe('hist_prices');
    expect(config.insertBatchSize).toBe(100);
    expect(config.logLevel).toBe('info');
  });
});

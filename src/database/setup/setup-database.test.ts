import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createTableSql, setupDatabase } from './setup-database';
import type { SinkClient, SinkPool } from '../hist-price-operations';
import { PersistenceError } from '../../utils/errors';

describe('setupDatabase', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('declares the column widths of the ticker and source', () => {
    const sql = createTableSql('hist_prices');
    expect(sql.startsWith('CREATE TABLE IF NOT EXISTS hist_prices (')).toBe(true);
    expect(sql).toContain('ticker VARCHAR(10),');
    expect(sql).toContain('data_source VARCHAR(30),');
  });

  it('runs the DDL and releases the client', async () => {
    const client: SinkClient = { query: vi.fn(async () => ({ rowCount: null })), release: vi.fn() };
    const pool: SinkPool = { connect: vi.fn(async () => client) };

    await setupDatabase(pool, 'hist_prices');

    expect(client.query).toHaveBeenCalledWith(createTableSql('hist_prices'));
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('wraps DDL failures in PersistenceError', async () => {
    const client: SinkClient = {
      query: vi.fn().mockRejectedValue(new Error('permission denied for schema public')),
      release: vi.fn(),
    };
    const pool: SinkPool = { connect: vi.fn(async () => client) };

    await expect(setupDatabase(pool, 'hist_prices')).rejects.toThrow(
      'Unable to create hist_prices: permission denied for schema public'
    );
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('wraps connection failures in PersistenceError', async () => {
    const pool: SinkPool = { connect: vi.fn().mockRejectedValue(new Error('ECONNREFUSED')) };
    await expect(setupDatabase(pool, 'hist_prices')).rejects.toThrow(PersistenceError);
  });
});

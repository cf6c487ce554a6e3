import { describe, it, expect, vi } from 'vitest';
import { HistPriceOperations, buildInsertQuery } from './hist-price-operations';
import type { SinkClient, SinkPool } from './hist-price-operations';
import type { HistPriceRow } from './types';
import { checkEpoch } from '../cleaning/field-cleaners';
import { PersistenceError } from '../utils/errors';

function fakePool(failOn?: (text: string) => boolean) {
  const statements: string[] = [];
  const client: SinkClient = {
    query: vi.fn(async (text: string, values?: unknown[]) => {
      statements.push(text);
      if (failOn?.(text)) throw new Error('value too long for type character varying(10)');
      return { rowCount: text.startsWith('INSERT') ? (values?.length ?? 0) / 10 : null };
    }),
    release: vi.fn(),
  };
  const pool: SinkPool = { connect: vi.fn(async () => client) };
  return { pool, client, statements };
}

const snap = new Date('2017-07-01T00:00:00Z');

const row = (close: number): HistPriceRow => ({
  snap_time: snap,
  ticker: 'USD',
  data_source: 'coindesk',
  close,
});

describe('buildInsertQuery', () => {
  it('addresses every table column and sends NULL for unmapped ones', () => {
    const query = buildInsertQuery('hist_prices', [row(2500.5)]);

    expect(query.text).toBe(
      'INSERT INTO hist_prices (snap_time, ticker, data_source, high, low, open, close, weighted_avg, base_volume, quote_volume) ' +
        'VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)'
    );
    expect(query.values).toEqual(['2017-07-01T00:00:00.000Z', 'USD', 'coindesk', null, null, null, 2500.5, null, null, null]);
  });

  it('sends snap_time as a UTC timestamp whatever the host time zone', () => {
    const previous = process.env.TZ;
    process.env.TZ = 'America/New_York';
    try {
      const query = buildInsertQuery('hist_prices', [{ ...row(1), snap_time: checkEpoch(1498867200) }]);
      expect(query.values[0]).toBe('2017-07-01T00:00:00.000Z');
    } finally {
      if (previous === undefined) delete process.env.TZ;
      else process.env.TZ = previous;
    }
  });

  it('numbers placeholders across rows', () => {
    const query = buildInsertQuery('hist_prices', [row(1), row(2)]);
    expect(query.text.endsWith('($11, $12, $13, $14, $15, $16, $17, $18, $19, $20)')).toBe(true);
    expect(query.values).toHaveLength(20);
  });
});

describe('HistPriceOperations', () => {
  it('writes rows in batches inside one transaction', async () => {
    const { pool, client, statements } = fakePool();
    const ops = new HistPriceOperations(pool, 'hist_prices', 2);

    const inserted = await ops.insertRows([row(1), row(2), row(3)]);

    expect(inserted).toBe(3);
    expect(statements[0]).toBe('BEGIN');
    expect(statements.filter((s) => s.startsWith('INSERT'))).toHaveLength(2);
    expect(statements[statements.length - 1]).toBe('COMMIT');
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('does not touch the database for an empty batch', async () => {
    const { pool } = fakePool();
    const ops = new HistPriceOperations(pool);

    expect(await ops.insertRows([])).toBe(0);
    expect(pool.connect).not.toHaveBeenCalled();
  });

  it('rolls back and raises PersistenceError when an insert fails', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const { pool, client, statements } = fakePool((text) => text.startsWith('INSERT'));
    const ops = new HistPriceOperations(pool, 'hist_prices');

    await expect(ops.insertRows([row(1)])).rejects.toThrow(PersistenceError);
    expect(statements).toEqual(['BEGIN', expect.stringContaining('INSERT INTO hist_prices'), 'ROLLBACK']);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('raises PersistenceError when no connection can be made', async () => {
    const pool: SinkPool = { connect: vi.fn().mockRejectedValue(new Error('ECONNREFUSED')) };
    const ops = new HistPriceOperations(pool);

    await expect(ops.insertRows([row(1)])).rejects.toThrow('Unable to connect to database: ECONNREFUSED');
  });
});

import { HIST_PRICE_COLUMNS } from './types';
import type { HistPriceRow } from './types';
import { getDbPool } from './connection';
import { PersistenceError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('HistPriceOperations');

// The slice of pg.Pool / pg.PoolClient the sink relies on
export interface SinkClient {
  query(text: string, values?: unknown[]): Promise<{ rowCount: number | null }>;
  release(): void;
}

export interface SinkPool {
  connect(): Promise<SinkClient>;
}

export interface PriceSink {
  insertRows(rows: HistPriceRow[]): Promise<number>;
}

export interface InsertQuery {
  text: string;
  values: unknown[];
}

// snap_time is a zoneless timestamp column: send the UTC wall clock, not
// pg's local-time rendering of a Date
function toParam(value: HistPriceRow[keyof HistPriceRow]): unknown {
  if (value instanceof Date) return value.toISOString();
  return value ?? null;
}

/**
 * Multi-row INSERT covering every hist_prices column; columns a row does
 * not carry are sent as NULL.
 */
export function buildInsertQuery(table: string, rows: HistPriceRow[]): InsertQuery {
  const width = HIST_PRICE_COLUMNS.length;
  const placeholders = rows.map((_, rowIdx) => {
    const offset = rowIdx * width;
    return `(${HIST_PRICE_COLUMNS.map((_, colIdx) => `$${offset + colIdx + 1}`).join(', ')})`;
  });
  const values = rows.flatMap((row) => HIST_PRICE_COLUMNS.map((column) => toParam(row[column])));

  return {
    text: `INSERT INTO ${table} (${HIST_PRICE_COLUMNS.join(', ')}) VALUES ${placeholders.join(', ')}`,
    values,
  };
}

export class HistPriceOperations implements PriceSink {
  constructor(
    private readonly pool: SinkPool = getDbPool(),
    private readonly table: string = 'hist_prices',
    private readonly batchSize: number = 100
  ) {}

  /**
   * Inserts all rows in batches inside one transaction. Either every row is
   * written or none is.
   */
  async insertRows(rows: HistPriceRow[]): Promise<number> {
    if (rows.length === 0) return 0;

    let client: SinkClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw new PersistenceError(`Unable to connect to database: ${errorMessage(error)}`);
    }

    let inserted = 0;
    try {
      await client.query('BEGIN');
      for (let i = 0; i < rows.length; i += this.batchSize) {
        const batch = rows.slice(i, i + this.batchSize);
        const { text, values } = buildInsertQuery(this.table, batch);
        const result = await client.query(text, values);
        inserted += result.rowCount ?? batch.length;
        log.debug(`Inserted ${inserted}/${rows.length} rows into ${this.table}`);
      }
      await client.query('COMMIT');
      return inserted;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        log.error('Rollback failed:', rollbackError);
      }
      throw new PersistenceError(`Failed to insert into ${this.table}: ${errorMessage(error)}`, {
        table: this.table,
        attempted: rows.length,
      });
    } finally {
      client.release();
    }
  }
}

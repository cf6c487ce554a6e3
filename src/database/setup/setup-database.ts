import type { SinkPool } from '../hist-price-operations';
import { DATA_SOURCE_MAX_LENGTH, TICKER_MAX_LENGTH } from '../types';
import { PersistenceError, errorMessage } from '../../utils/errors';
import { createLogger } from '../../utils/logger';

const log = createLogger('Setup');

export function createTableSql(table: string): string {
  return `CREATE TABLE IF NOT EXISTS ${table} (
  snap_time timestamp,
  ticker VARCHAR(${TICKER_MAX_LENGTH}),
  data_source VARCHAR(${DATA_SOURCE_MAX_LENGTH}),
  high DECIMAL,
  low DECIMAL,
  open DECIMAL,
  close DECIMAL,
  weighted_avg DECIMAL,
  base_volume DECIMAL,
  quote_volume DECIMAL
)`;
}

export async function setupDatabase(pool: SinkPool, table: string): Promise<void> {
  log.info(`📝 Ensuring table ${table} exists...`);

  const client = await pool.connect().catch((error: unknown) => {
    throw new PersistenceError(`Unable to connect to database: ${errorMessage(error)}`);
  });
  try {
    await client.query(createTableSql(table));
    log.info(`✅ Table ${table} ready`);
  } catch (error) {
    throw new PersistenceError(`Unable to create ${table}: ${errorMessage(error)}`, { table });
  } finally {
    client.release();
  }
}

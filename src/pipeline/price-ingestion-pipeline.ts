import type { MappingConfig, SourceSpec } from '../config/mapping-config';
import { resolveWithSpec } from '../cleaning/mapping-resolver';
import type { PriceSink } from '../database/hist-price-operations';
import { DATA_SOURCE_MAX_LENGTH, TICKER_MAX_LENGTH } from '../database/types';
import type { HistPriceRow, RawRecord } from '../database/types';
import type { FetchRequest, SourceClient } from '../services/sources/types';
import {
  ConfigurationError,
  type IngestionError,
  InvalidRequestError,
  MissingFieldError,
  TypeCoercionError,
} from '../utils/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('Pipeline');

/**
 * What a record that fails cleaning does to the run:
 * `abort` stops before anything is written, `skip` drops the record.
 */
export type FailurePolicy = 'abort' | 'skip';

export const FAILURE_POLICIES: readonly FailurePolicy[] = ['abort', 'skip'];

export interface IngestionRequest extends FetchRequest {
  source: string;
}

export interface IngestionOptions {
  onError?: FailurePolicy;
  dryRun?: boolean;
}

export interface RecordFailure {
  index: number;
  error: IngestionError;
}

export interface IngestionSummary {
  source: string;
  ticker: string;
  start: string;
  end: string;
  fetched: number;
  normalized: number;
  skipped: number;
  inserted: number;
  dryRun: boolean;
  failures: RecordFailure[];
}

export interface NormalizeResult {
  rows: HistPriceRow[];
  failures: RecordFailure[];
}

export interface PipelineDeps {
  config: MappingConfig;
  sink: PriceSink;
  createClient: (source: string) => SourceClient;
}

function isRecordError(error: unknown): error is MissingFieldError | TypeCoercionError {
  return error instanceof MissingFieldError || error instanceof TypeCoercionError;
}

/**
 * Turn raw records into table rows in API order, stamping ticker and
 * data_source on each.
 */
export function normalizeRecords(
  spec: SourceSpec,
  records: RawRecord[],
  ticker: string,
  onError: FailurePolicy = 'abort'
): NormalizeResult {
  const rows: HistPriceRow[] = [];
  const failures: RecordFailure[] = [];
  const snapField = spec.fields.find((f) => f.column === 'snap_time')?.rawField ?? 'snap_time';

  records.forEach((record, index) => {
    try {
      const row = resolveWithSpec(spec, record);
      if (row.snap_time === undefined) {
        throw new MissingFieldError(snapField, spec.name);
      }
      rows.push({ ...row, snap_time: row.snap_time, ticker, data_source: spec.name });
    } catch (error) {
      if (!isRecordError(error)) throw error;
      if (onError === 'abort') {
        log.error(`Record ${index} rejected, aborting run`);
        throw error;
      }
      log.warn(`Skipping record ${index}: ${error.message}`);
      failures.push({ index, error });
    }
  });

  return { rows, failures };
}

export class PriceIngestionPipeline {
  constructor(private readonly deps: PipelineDeps) {}

  async run(request: IngestionRequest, options: IngestionOptions = {}): Promise<IngestionSummary> {
    const { onError = 'abort', dryRun = false } = options;

    const spec = this.deps.config.getSource(request.source);
    if (spec.name.length > DATA_SOURCE_MAX_LENGTH) {
      throw new ConfigurationError(`Source name '${spec.name}' exceeds ${DATA_SOURCE_MAX_LENGTH} characters`);
    }

    const client = this.deps.createClient(request.source);
    const prepared = client.prepare(request);
    if (prepared.ticker.length > TICKER_MAX_LENGTH) {
      throw new InvalidRequestError(`Ticker '${prepared.ticker}' exceeds ${TICKER_MAX_LENGTH} characters`, {
        ticker: prepared.ticker,
      });
    }

    log.info(`Ingesting ${prepared.ticker} from ${spec.name}: ${prepared.start} to ${prepared.end}`);
    const records = await client.fetch(prepared);
    if (records.length === 0) {
      log.warn('No data was parsed from response');
    }

    log.info(`Attempting to clean ${records.length} records`);
    const { rows, failures } = normalizeRecords(spec, records, prepared.ticker, onError);

    let inserted = 0;
    if (dryRun) {
      log.info(`DRY RUN MODE - ${rows.length} row(s) not saved`);
    } else {
      inserted = await this.deps.sink.insertRows(rows);
      log.info(`✓ Inserted ${inserted} row(s)`);
    }

    return {
      source: spec.name,
      ticker: prepared.ticker,
      start: prepared.start,
      end: prepared.end,
      fetched: records.length,
      normalized: rows.length,
      skipped: failures.length,
      inserted,
      dryRun,
      failures,
    };
  }
}

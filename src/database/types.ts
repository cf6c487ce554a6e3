/**
 * Types for the hist_prices table
 */
import type { CleanedValue } from '../cleaning/field-cleaners';

export const HIST_PRICE_COLUMNS = [
  'snap_time',
  'ticker',
  'data_source',
  'high',
  'low',
  'open',
  'close',
  'weighted_avg',
  'base_volume',
  'quote_volume',
] as const;

export type HistPriceColumn = (typeof HIST_PRICE_COLUMNS)[number];

// ticker and data_source are stamped by the pipeline, never mapped from a source field
export type MappedColumn = Exclude<HistPriceColumn, 'ticker' | 'data_source'>;

export const MAPPED_COLUMNS: readonly MappedColumn[] = HIST_PRICE_COLUMNS.filter(
  (column): column is MappedColumn => column !== 'ticker' && column !== 'data_source'
);

export const TICKER_MAX_LENGTH = 10;
export const DATA_SOURCE_MAX_LENGTH = 30;

export function isMappedColumn(name: string): name is MappedColumn {
  return MAPPED_COLUMNS.some((column) => column === name);
}

export type RawRecord = Record<string, unknown>;

export type NormalizedRow = Partial<Record<MappedColumn, CleanedValue>>;

export interface HistPriceRow extends NormalizedRow {
  snap_time: CleanedValue;
  ticker: string;
  data_source: string;
}

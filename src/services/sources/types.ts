import type { RawRecord } from '../../database/types';

export const SOURCE_NAMES = ['coindesk', 'poloniex'] as const;

export type SourceName = (typeof SOURCE_NAMES)[number];

export function isSourceName(name: string): name is SourceName {
  return SOURCE_NAMES.some((source) => source === name);
}

export interface FetchRequest {
  ticker: string;
  start?: string;
  end?: string;
  periodMinutes: number;
}

// A request after the source has applied its defaults and validation
export interface PreparedRequest {
  ticker: string;
  start: string;
  end: string;
  periodMinutes: number;
}

// The slice of an axios instance the sources use
export interface HttpClient {
  get(url: string): Promise<{ status: number; data: unknown }>;
}

export interface SourceClient {
  readonly name: SourceName;
  prepare(request: FetchRequest): PreparedRequest;
  buildUrl(request: PreparedRequest): string;
  fetch(request: PreparedRequest): Promise<RawRecord[]>;
}

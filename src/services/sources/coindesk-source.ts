import { z } from 'zod';
import { BasePriceSource } from './base-source';
import type { SourceOptions } from './base-source';
import type { PreparedRequest } from './types';
import type { RawRecord } from '../../database/types';
import { NetworkError, errorMessage } from '../../utils/errors';

const COINDESK_API = 'https://api.coindesk.com/charts/data';
const DEFAULT_TICKERS = ['USD', 'ETH'];
const DEFAULT_TICKER = 'USD';
const ONE_DAY_MS = 24 * 60 * 60 * 1000;

const scalar = z.union([z.number(), z.string(), z.null()]);

// bpi is a list of [epoch milliseconds, close price] pairs
const coindeskResponseSchema = z.object({
  bpi: z.array(z.tuple([scalar, scalar])),
});

export class CoindeskSource extends BasePriceSource {
  constructor(options: SourceOptions) {
    super('coindesk', options);
  }

  private allowedTickers(): string[] {
    const tickers = this.spec.tickers;
    return Array.isArray(tickers) ? tickers : DEFAULT_TICKERS;
  }

  protected resolveTicker(ticker: string): string {
    if (this.allowedTickers().includes(ticker)) return ticker;

    const fallback = this.spec.defaultTicker ?? DEFAULT_TICKER;
    this.log.warn(`Specified ticker ${ticker} not in Coindesk allowable tickers. Defaulting to ${fallback}.`);
    return fallback;
  }

  buildUrl(request: PreparedRequest): string {
    const params = new URLSearchParams({
      output: 'json',
      data: 'close',
      index: request.ticker,
      startdate: request.start,
      enddate: request.end,
      exchanges: 'bpi',
      dev: '1',
    });
    return `${COINDESK_API}?${params.toString()}`;
  }

  protected parseBody(body: unknown, request: PreparedRequest): RawRecord[] {
    const parsed = coindeskResponseSchema.safeParse(typeof body === 'string' ? parseJsonp(body) : body);
    if (!parsed.success) {
      throw new NetworkError('Unable to parse coindesk response: missing bpi series');
    }

    const records = parsed.data.bpi.map(([timestamp, price]) => ({ timestamp, price }));

    // The API sometimes returns points outside the requested range
    const from = Date.parse(`${request.start}T00:00:00Z`);
    const to = Date.parse(`${request.end}T00:00:00Z`) + ONE_DAY_MS;
    const inRange = records.filter((record) => {
      const ms = toMillis(record.timestamp);
      return ms === null || (ms >= from && ms < to);
    });

    if (inRange.length < records.length) {
      this.log.debug(`Dropped ${records.length - inRange.length} point(s) outside ${request.start}..${request.end}`);
    }
    return inRange;
  }
}

/** Strip the cb( ... ); wrapper Coindesk puts around its JSON */
export function parseJsonp(text: string): unknown {
  const json = text.trim().replace(/^cb\(/, '').replace(/\);?$/, '');
  try {
    return JSON.parse(json);
  } catch (error) {
    throw new NetworkError(`Unable to parse coindesk response: ${errorMessage(error)}`);
  }
}

// Epoch seconds or milliseconds to milliseconds; null when not numeric
function toMillis(timestamp: number | string | null): number | null {
  if (timestamp === null || timestamp === '') return null;
  const value = Number(timestamp);
  if (!Number.isFinite(value)) return null;
  return value < 1e12 ? value * 1000 : value;
}

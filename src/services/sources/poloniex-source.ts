import { z } from 'zod';
import { BasePriceSource } from './base-source';
import type { SourceOptions } from './base-source';
import type { PreparedRequest } from './types';
import type { RawRecord } from '../../database/types';
import { toEpochSeconds } from '../../cleaning/field-cleaners';
import { InvalidRequestError, NetworkError } from '../../utils/errors';

const POLONIEX_API = 'https://poloniex.com/public';
const ONE_DAY_SECONDS = 24 * 60 * 60;

// Candle widths returnChartData accepts, in minutes
export const POLONIEX_PERIODS = [5, 15, 30, 120, 240, 1440];

const errorResponseSchema = z.object({ error: z.string() });
const chartResponseSchema = z.array(z.record(z.unknown()));

export class PoloniexSource extends BasePriceSource {
  constructor(options: SourceOptions) {
    super('poloniex', options);
  }

  protected resolveTicker(ticker: string): string {
    const [base, quote, ...rest] = ticker.split('_');
    if (!base || !quote || rest.length > 0) {
      throw new InvalidRequestError(`Invalid ticker ${ticker}. Ticker must be in format ticker1_ticker2`, { ticker });
    }

    const tickers = this.spec.tickers;
    if (tickers === undefined) return ticker;

    if (Array.isArray(tickers)) {
      if (!tickers.includes(ticker)) {
        throw new InvalidRequestError(`Ticker ${ticker} not in Poloniex supported tickers: ${tickers.join(', ')}`, {
          ticker,
        });
      }
      return ticker;
    }

    const quotes = Object.prototype.hasOwnProperty.call(tickers, base) ? tickers[base] : undefined;
    if (!quotes) {
      throw new InvalidRequestError(
        `Base ticker ${base} not in Poloniex supported base tickers: ${Object.keys(tickers).join(', ')}`,
        { ticker }
      );
    }
    if (!quotes.includes(quote)) {
      throw new InvalidRequestError(
        `Quote ticker ${quote} not in Poloniex supported tickers for base ticker ${base}: ${quotes.join(', ')}`,
        { ticker }
      );
    }
    return ticker;
  }

  protected resolvePeriod(periodMinutes: number): number {
    if (!POLONIEX_PERIODS.includes(periodMinutes)) {
      throw new InvalidRequestError(
        `Poloniex period must be one of ${POLONIEX_PERIODS.join(', ')} minutes, got ${periodMinutes}`,
        { periodMinutes }
      );
    }
    return periodMinutes;
  }

  // The end date is inclusive: the window runs to its last second
  buildUrl(request: PreparedRequest): string {
    const params = new URLSearchParams({
      command: 'returnChartData',
      currencyPair: request.ticker,
      start: String(toEpochSeconds(request.start)),
      end: String(toEpochSeconds(request.end) + ONE_DAY_SECONDS - 1),
      period: String(request.periodMinutes * 60),
    });
    return `${POLONIEX_API}?${params.toString()}`;
  }

  protected parseBody(body: unknown): RawRecord[] {
    const failure = errorResponseSchema.safeParse(body);
    if (failure.success) {
      throw new NetworkError(`No data returned from poloniex. Error message: ${failure.data.error}`);
    }

    const chart = chartResponseSchema.safeParse(body);
    if (!chart.success) {
      throw new NetworkError('Unable to parse poloniex response: expected a list of candles');
    }

    // An empty window comes back as a single candle dated 0
    const candles = chart.data.filter((candle) => candle.date !== 0);
    if (candles.length < chart.data.length) {
      this.log.debug('Poloniex returned an empty placeholder candle');
    }
    return candles;
  }
}

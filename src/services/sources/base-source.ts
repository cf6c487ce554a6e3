import type { SourceSpec } from '../../config/mapping-config';
import type { RawRecord } from '../../database/types';
import { NetworkError, errorMessage } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import type { Logger } from '../../utils/logger';
import { resolveDateRange } from './date-range';
import type { FetchRequest, HttpClient, PreparedRequest, SourceClient, SourceName } from './types';

export interface SourceOptions {
  spec: SourceSpec;
  http: HttpClient;
  now?: () => Date;
}

export abstract class BasePriceSource implements SourceClient {
  protected readonly spec: SourceSpec;
  protected readonly http: HttpClient;
  protected readonly log: Logger;
  private readonly now: () => Date;

  constructor(public readonly name: SourceName, options: SourceOptions) {
    this.spec = options.spec;
    this.http = options.http;
    this.now = options.now ?? (() => new Date());
    this.log = createLogger(name);
  }

  abstract buildUrl(request: PreparedRequest): string;

  protected abstract resolveTicker(ticker: string): string;

  protected abstract parseBody(body: unknown, request: PreparedRequest): RawRecord[];

  protected resolvePeriod(periodMinutes: number): number {
    return periodMinutes;
  }

  prepare(request: FetchRequest): PreparedRequest {
    const { start, end } = resolveDateRange(request.start, request.end, this.now(), this.log);
    return {
      ticker: this.resolveTicker(request.ticker),
      start,
      end,
      periodMinutes: this.resolvePeriod(request.periodMinutes),
    };
  }

  async fetch(request: PreparedRequest): Promise<RawRecord[]> {
    const url = this.buildUrl(request);
    this.log.info(`Retrieving response from ${url}`);

    let response: { status: number; data: unknown };
    try {
      response = await this.http.get(url);
    } catch (error) {
      throw new NetworkError(`${this.name} request failed: ${errorMessage(error)}`, { url });
    }

    if (response.status < 200 || response.status >= 300) {
      throw new NetworkError(`${this.name} API error: ${response.status}`, { url, status: response.status });
    }

    this.log.debug('Attempting to parse response');
    const records = this.parseBody(response.data, request);
    this.log.info(`Parsed ${records.length} record(s)`);
    return records;
  }
}

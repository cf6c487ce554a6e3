#!/usr/bin/env node
import chalk from 'chalk';
import { loadConfig } from '../config/app-config';
import { loadMappingConfig } from '../config/mapping-config';
import { DatabaseConnection, closeDbPool } from '../database/connection';
import { HistPriceOperations } from '../database/hist-price-operations';
import type { PriceSink } from '../database/hist-price-operations';
import { setupDatabase } from '../database/setup/setup-database';
import { FAILURE_POLICIES, PriceIngestionPipeline } from '../pipeline/price-ingestion-pipeline';
import type { FailurePolicy, IngestionSummary } from '../pipeline/price-ingestion-pipeline';
import { createHttpClient, createSourceClient } from '../services/sources';
import { InvalidRequestError, errorMessage } from '../utils/errors';
import { setLogLevel } from '../utils/logger';

export const DEFAULT_PERIOD_MINUTES = 30;

export interface CliOptions {
  source: string;
  ticker: string;
  start?: string;
  end?: string;
  periodMinutes: number;
  onError: FailurePolicy;
  dryRun: boolean;
  setupDb: boolean;
  configPath?: string;
}

export type ParsedArgs = { help: true } | { help: false; options: CliOptions };

export const USAGE = `
Historical Price Ingestion

Usage: ingest-historical-prices --source <name> --ticker <symbol> [options]

Options:
  --source <name>       Data source: coindesk or poloniex
  --ticker <symbol>     Ticker (coindesk: USD, ETH) or pair (poloniex: BTC_ETH)
  --start <date>        Start date YYYY-MM-DD (default: yesterday)
  --end <date>          End date YYYY-MM-DD (default: today)
  --period <minutes>    Candle width in minutes (default: ${DEFAULT_PERIOD_MINUTES})
  --on-error <policy>   abort (default) or skip records that fail cleaning
  --config <path>       Field mapping file (default: config/sources.yaml)
  --setup-db            Create the destination table if it does not exist
  --dry-run             Fetch and clean without writing to the database
  --help                Show this help message

Examples:
  ingest-historical-prices --source coindesk --ticker USD --start 2017-09-01 --end 2017-09-02
  ingest-historical-prices --source poloniex --ticker BTC_ETH --period 5 --on-error skip
`;

function isFailurePolicy(value: string): value is FailurePolicy {
  return FAILURE_POLICIES.some((policy) => policy === value);
}

export function parseArgs(argv: string[]): ParsedArgs {
  let source: string | undefined;
  let ticker: string | undefined;
  let start: string | undefined;
  let end: string | undefined;
  let periodMinutes = DEFAULT_PERIOD_MINUTES;
  let onError: FailurePolicy = 'abort';
  let dryRun = false;
  let setupDb = false;
  let configPath: string | undefined;

  const valueOf = (flag: string, i: number): string => {
    const value = argv[i];
    if (value === undefined || value.startsWith('--')) {
      throw new InvalidRequestError(`${flag} needs a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    switch (flag) {
      case '--source':
        source = valueOf(flag, ++i);
        break;
      case '--ticker':
        ticker = valueOf(flag, ++i);
        break;
      case '--start':
        start = valueOf(flag, ++i);
        break;
      case '--end':
        end = valueOf(flag, ++i);
        break;
      case '--period': {
        const raw = valueOf(flag, ++i);
        if (!/^\d+$/.test(raw) || Number(raw) === 0) {
          throw new InvalidRequestError(`--period must be a positive number of minutes, got '${raw}'`);
        }
        periodMinutes = Number(raw);
        break;
      }
      case '--on-error': {
        const raw = valueOf(flag, ++i);
        if (!isFailurePolicy(raw)) {
          throw new InvalidRequestError(`--on-error must be one of ${FAILURE_POLICIES.join(', ')}, got '${raw}'`);
        }
        onError = raw;
        break;
      }
      case '--config':
        configPath = valueOf(flag, ++i);
        break;
      case '--dry-run':
        dryRun = true;
        break;
      case '--setup-db':
        setupDb = true;
        break;
      case '--help':
        return { help: true };
      default:
        throw new InvalidRequestError(`Unknown argument '${flag}'`);
    }
  }

  if (!source) throw new InvalidRequestError('--source is required');
  if (!ticker) throw new InvalidRequestError('--ticker is required');

  return {
    help: false,
    options: { source, ticker, start, end, periodMinutes, onError, dryRun, setupDb, configPath },
  };
}

export function formatSummary(summary: IngestionSummary): string {
  const lines = [
    `Source:     ${summary.source}`,
    `Ticker:     ${summary.ticker}`,
    `Range:      ${summary.start} to ${summary.end}`,
    `Fetched:    ${summary.fetched}`,
    `Normalized: ${summary.normalized}`,
    `Skipped:    ${summary.skipped}`,
    `Inserted:   ${summary.dryRun ? 'dry run' : summary.inserted}`,
  ];
  return lines.join('\n');
}

// A dry run never opens a database connection
const dryRunSink: PriceSink = {
  insertRows: async () => 0,
};

export async function runIngestion(options: CliOptions): Promise<IngestionSummary> {
  const appConfig = loadConfig();
  setLogLevel(appConfig.logLevel);

  const mapping = loadMappingConfig(options.configPath ?? appConfig.sourcesConfigPath);
  const http = createHttpClient(appConfig.httpTimeoutMs);

  let sink = dryRunSink;
  if (!options.dryRun) {
    const pool = DatabaseConnection.getPool(appConfig.database);
    if (options.setupDb) {
      await setupDatabase(pool, appConfig.table);
    }
    sink = new HistPriceOperations(pool, appConfig.table, appConfig.insertBatchSize);
  }

  const pipeline = new PriceIngestionPipeline({
    config: mapping,
    sink,
    createClient: (source) => createSourceClient(source, mapping, { http }),
  });

  return pipeline.run(
    {
      source: options.source,
      ticker: options.ticker,
      start: options.start,
      end: options.end,
      periodMinutes: options.periodMinutes,
    },
    { onError: options.onError, dryRun: options.dryRun }
  );
}

export async function main(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if (parsed.help) {
      console.log(USAGE);
      return 0;
    }

    const summary = await runIngestion(parsed.options);
    console.log(chalk.green('\n✅ Historical price ingestion completed'));
    console.log(formatSummary(summary));
    return 0;
  } catch (error) {
    const name = error instanceof Error ? error.name : 'Error';
    console.error(chalk.red(`❌ ${name}: ${errorMessage(error)}`));
    if (error instanceof InvalidRequestError) {
      console.error(chalk.gray('Run with --help for usage'));
    }
    return 1;
  } finally {
    await closeDbPool();
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('Ingestion failed:', error);
      process.exitCode = 1;
    });
}

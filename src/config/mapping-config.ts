import * as fs from 'fs';
import { load, YAMLException } from 'js-yaml';
import { z } from 'zod';
import { CLEANERS, DATE_FORMATS, isCleanerName } from '../cleaning/field-cleaners';
import type { Cleaner, CleanerArgs, CleanerName } from '../cleaning/field-cleaners';
import { isMappedColumn } from '../database/types';
import type { MappedColumn } from '../database/types';
import { ConfigurationError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('MappingConfig');

const fieldSchema = z.object({
  cleaning_func: z.string().min(1),
  mapped_name: z.string().min(1),
  required: z.boolean().default(false),
  args: z
    .object({
      length: z.number().int().positive().optional(),
      format: z.enum(DATE_FORMATS).optional(),
    })
    .strict()
    .optional(),
});

const sourceSchema = z.object({
  tickers: z.union([z.array(z.string().min(1)), z.record(z.array(z.string().min(1)))]).optional(),
  default_ticker: z.string().min(1).optional(),
  fields: z.record(fieldSchema).refine((fields) => Object.keys(fields).length > 0, {
    message: 'at least one field mapping is required',
  }),
});

const documentSchema = z.record(sourceSchema);

type RawSourceConfig = z.infer<typeof sourceSchema>;

export interface FieldSpec {
  rawField: string;
  cleanerName: CleanerName;
  clean: Cleaner;
  column: MappedColumn;
  required: boolean;
  args?: CleanerArgs;
}

// Flat list (Coindesk) or base ticker → quote tickers (Poloniex)
export type TickerUniverse = string[] | Record<string, string[]>;

export interface SourceSpec {
  name: string;
  fields: FieldSpec[];
  tickers?: TickerUniverse;
  defaultTicker?: string;
}

export class MappingConfig {
  private readonly sources: Map<string, SourceSpec>;

  constructor(sources: SourceSpec[]) {
    this.sources = new Map(sources.map((s) => [s.name, s]));
  }

  getSource(name: string): SourceSpec {
    const spec = this.sources.get(name);
    if (!spec) {
      throw new ConfigurationError(
        `Source '${name}' is not configured. Configured sources: ${this.sourceNames().join(', ') || 'none'}`,
        { source: name }
      );
    }
    return spec;
  }

  sourceNames(): string[] {
    return Array.from(this.sources.keys());
  }
}

/**
 * Validate a parsed mapping document and resolve every cleaner identifier
 * to its implementation.
 */
export function parseMappingConfig(document: unknown): MappingConfig {
  const parsed = documentSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigurationError(`Malformed mapping configuration: ${issues.join('; ')}`, { issues });
  }

  const sources = Object.entries(parsed.data).map(([name, raw]) => buildSourceSpec(name, raw));
  return new MappingConfig(sources);
}

export function loadMappingConfig(configPath: string): MappingConfig {
  let text: string;
  try {
    text = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Unable to read mapping configuration ${configPath}: ${errorMessage(error)}`, {
      path: configPath,
    });
  }

  let document: unknown;
  try {
    document = load(text);
  } catch (error) {
    const reason = error instanceof YAMLException ? error.reason : errorMessage(error);
    throw new ConfigurationError(`Invalid YAML in ${configPath}: ${reason}`, { path: configPath });
  }

  const config = parseMappingConfig(document);
  log.debug(`Loaded ${config.sourceNames().length} source mapping(s) from ${configPath}`);
  return config;
}

function buildSourceSpec(name: string, raw: RawSourceConfig): SourceSpec {
  const seenColumns = new Set<MappedColumn>();
  const fields: FieldSpec[] = [];

  for (const [rawField, field] of Object.entries(raw.fields)) {
    const where = `${name}.fields.${rawField}`;

    if (!isCleanerName(field.cleaning_func)) {
      throw new ConfigurationError(
        `${where}: unknown cleaning function '${field.cleaning_func}'. Known: ${Object.keys(CLEANERS).join(', ')}`,
        { source: name, field: rawField }
      );
    }
    if (!isMappedColumn(field.mapped_name)) {
      throw new ConfigurationError(`${where}: '${field.mapped_name}' is not a mappable hist_prices column`, {
        source: name,
        field: rawField,
      });
    }
    if (seenColumns.has(field.mapped_name)) {
      throw new ConfigurationError(`${where}: column '${field.mapped_name}' is mapped more than once`, {
        source: name,
        field: rawField,
      });
    }
    if (field.cleaning_func === 'check_varchar' && field.args?.length === undefined) {
      throw new ConfigurationError(`${where}: check_varchar needs args.length`, { source: name, field: rawField });
    }

    seenColumns.add(field.mapped_name);
    fields.push({
      rawField,
      cleanerName: field.cleaning_func,
      clean: CLEANERS[field.cleaning_func],
      column: field.mapped_name,
      // every row needs a snap_time, so its source field is never optional
      required: field.required || field.mapped_name === 'snap_time',
      args: field.args,
    });
  }

  if (!seenColumns.has('snap_time')) {
    throw new ConfigurationError(`${name}: no field is mapped to snap_time`, { source: name });
  }
  if (raw.default_ticker && raw.tickers && !tickerListed(raw.tickers, raw.default_ticker)) {
    throw new ConfigurationError(`${name}: default_ticker '${raw.default_ticker}' is not in tickers`, {
      source: name,
    });
  }

  return {
    name,
    fields,
    tickers: raw.tickers,
    defaultTicker: raw.default_ticker,
  };
}

function tickerListed(tickers: TickerUniverse, ticker: string): boolean {
  if (Array.isArray(tickers)) return tickers.includes(ticker);
  return Object.prototype.hasOwnProperty.call(tickers, ticker);
}

import { ConfigurationError, TypeCoercionError } from '../utils/errors';

export type CleanedValue = number | string | boolean | Date;

export const DATE_FORMATS = ['YYYY-MM-DD', 'YYYY/MM/DD', 'DD-MM-YYYY'] as const;

export type DateFormat = (typeof DATE_FORMATS)[number];

export interface CleanerArgs {
  length?: number;
  format?: DateFormat;
}

export type Cleaner = (value: unknown, args?: CleanerArgs) => CleanedValue;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const DIGITS_PATTERN = /^\d+$/;

interface DateParts {
  year: number;
  month: number;
  day: number;
}

const DATE_PARSERS: Record<DateFormat, (text: string) => DateParts | null> = {
  'YYYY-MM-DD': (text) => {
    const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(text);
    return m ? { year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) } : null;
  },
  'YYYY/MM/DD': (text) => {
    const m = /^(\d{4})\/(\d{2})\/(\d{2})$/.exec(text);
    return m ? { year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) } : null;
  },
  'DD-MM-YYYY': (text) => {
    const m = /^(\d{2})-(\d{2})-(\d{4})$/.exec(text);
    return m ? { year: Number(m[3]), month: Number(m[2]), day: Number(m[1]) } : null;
  },
};

export function checkInteger(value: unknown): number {
  if (typeof value === 'number') {
    if (Number.isInteger(value)) return value;
    throw new TypeCoercionError('check_integer', value, 'not a whole number');
  }
  if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) {
    const parsed = Number(value.trim());
    if (Number.isSafeInteger(parsed)) return parsed;
    throw new TypeCoercionError('check_integer', value, 'outside the safe integer range');
  }
  throw new TypeCoercionError('check_integer', value);
}

export function checkFloat(value: unknown): number {
  if (typeof value === 'number') {
    if (Number.isFinite(value)) return value;
    throw new TypeCoercionError('check_float', value, 'not a finite number');
  }
  if (typeof value === 'string' && FLOAT_PATTERN.test(value.trim())) {
    const parsed = Number(value.trim());
    if (Number.isFinite(parsed)) return parsed;
  }
  throw new TypeCoercionError('check_float', value);
}

/**
 * Parses a calendar date in a fixed format and returns it as YYYY-MM-DD.
 * Rejects dates that do not exist (2017-02-30).
 */
export function checkDate(value: unknown, args?: CleanerArgs): string {
  const format = args?.format ?? 'YYYY-MM-DD';
  if (typeof value !== 'string') {
    throw new TypeCoercionError('check_date', value, `expected a ${format} string`);
  }
  const parts = DATE_PARSERS[format](value.trim());
  if (!parts || !isRealDate(parts)) {
    throw new TypeCoercionError('check_date', value, `expected a valid ${format} date`);
  }
  return formatDateParts(parts);
}

/**
 * Converts a Unix epoch to a Date. Ten digits are seconds, thirteen are
 * milliseconds; anything else is out of range.
 */
export function checkEpoch(value: unknown): Date {
  let digits: string;
  if (typeof value === 'number') {
    if (!Number.isInteger(value) || value < 0) {
      throw new TypeCoercionError('check_epoch', value, 'not a non-negative integer');
    }
    digits = String(value);
  } else if (typeof value === 'string' && DIGITS_PATTERN.test(value.trim())) {
    digits = value.trim();
  } else {
    throw new TypeCoercionError('check_epoch', value);
  }

  if (digits.length === 10) return new Date(Number(digits) * 1000);
  if (digits.length === 13) return new Date(Number(digits));
  throw new TypeCoercionError('check_epoch', value, 'expected 10 (seconds) or 13 (milliseconds) digits');
}

export function checkVarchar(value: unknown, args?: CleanerArgs): string {
  const length = args?.length;
  if (length === undefined) {
    throw new ConfigurationError('check_varchar needs a length argument');
  }
  return stripBackslashes(toText('check_varchar', value)).slice(0, length);
}

export function checkText(value: unknown): string {
  return stripBackslashes(toText('check_text', value));
}

export function doNone(value: unknown): CleanedValue {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  throw new TypeCoercionError('do_none', value, 'only scalar values pass through');
}

// Identifier used in the mapping file → implementation
export const CLEANERS = {
  check_integer: checkInteger,
  check_float: checkFloat,
  check_date: checkDate,
  check_epoch: checkEpoch,
  check_varchar: checkVarchar,
  check_text: checkText,
  do_none: doNone,
} satisfies Record<string, Cleaner>;

export type CleanerName = keyof typeof CLEANERS;

export function isCleanerName(name: string): name is CleanerName {
  return Object.prototype.hasOwnProperty.call(CLEANERS, name);
}

export function isValidDate(text: string, format: DateFormat = 'YYYY-MM-DD'): boolean {
  const parts = DATE_PARSERS[format](text);
  return parts !== null && isRealDate(parts);
}

/** UTC midnight of a YYYY-MM-DD date as epoch seconds */
export function toEpochSeconds(date: string): number {
  return Math.floor(Date.parse(`${checkDate(date)}T00:00:00Z`) / 1000);
}

export function formatUtcDate(date: Date): string {
  return formatDateParts({
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
  });
}

function isRealDate({ year, month, day }: DateParts): boolean {
  const probe = new Date(Date.UTC(year, month - 1, day));
  return (
    probe.getUTCFullYear() === year &&
    probe.getUTCMonth() === month - 1 &&
    probe.getUTCDate() === day
  );
}

function formatDateParts({ year, month, day }: DateParts): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

function toText(cleaner: string, value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  throw new TypeCoercionError(cleaner, value, 'not a scalar value');
}

function stripBackslashes(text: string): string {
  return text.replace(/\\/g, '');
}

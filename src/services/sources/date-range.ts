import { formatUtcDate, isValidDate } from '../../cleaning/field-cleaners';
import { InvalidRequestError } from '../../utils/errors';
import type { Logger } from '../../utils/logger';

const ONE_DAY_MS = 24 * 60 * 60 * 1000;

export interface DateRange {
  start: string;
  end: string;
}

/**
 * Fill in and clamp a YYYY-MM-DD range against the current UTC day.
 * Missing, malformed or future starts fall back to yesterday; ends to today.
 */
export function resolveDateRange(
  start: string | undefined,
  end: string | undefined,
  now: Date,
  log: Logger
): DateRange {
  const today = formatUtcDate(now);
  const yesterday = formatUtcDate(new Date(now.getTime() - ONE_DAY_MS));

  let resolvedStart: string;
  if (start === undefined || !isValidDate(start)) {
    log.warn(`Incorrect start date supplied (${start ?? 'none'}), defaults to ${yesterday}`);
    resolvedStart = yesterday;
  } else if (start > today) {
    log.warn(`Start date ${start} is in the future, defaults to ${yesterday}`);
    resolvedStart = yesterday;
  } else {
    resolvedStart = start;
  }

  let resolvedEnd: string;
  if (end === undefined || !isValidDate(end)) {
    log.warn(`Incorrect end date supplied (${end ?? 'none'}), defaults to ${today}`);
    resolvedEnd = today;
  } else if (end > today) {
    log.warn(`End date ${end} is in the future, defaults to ${today}`);
    resolvedEnd = today;
  } else {
    resolvedEnd = end;
  }

  if (resolvedStart > resolvedEnd) {
    throw new InvalidRequestError(`Start date ${resolvedStart} is after end date ${resolvedEnd}`, {
      start: resolvedStart,
      end: resolvedEnd,
    });
  }

  return { start: resolvedStart, end: resolvedEnd };
}

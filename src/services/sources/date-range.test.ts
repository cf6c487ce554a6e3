import { describe, it, expect, vi } from 'vitest';
import { resolveDateRange } from './date-range';
import type { Logger } from '../../utils/logger';
import { InvalidRequestError } from '../../utils/errors';

const now = new Date('2017-09-10T12:00:00Z');

function quietLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('resolveDateRange', () => {
  it('keeps a valid past range', () => {
    const log = quietLogger();
    expect(resolveDateRange('2017-09-01', '2017-09-02', now, log)).toEqual({
      start: '2017-09-01',
      end: '2017-09-02',
    });
    expect(log.warn).not.toHaveBeenCalled();
  });

  it('defaults missing dates to yesterday and today', () => {
    const log = quietLogger();
    expect(resolveDateRange(undefined, undefined, now, log)).toEqual({ start: '2017-09-09', end: '2017-09-10' });
    expect(log.warn).toHaveBeenCalledTimes(2);
  });

  it('replaces malformed dates', () => {
    const log = quietLogger();
    expect(resolveDateRange('2017-02-30', 'soon', now, log)).toEqual({ start: '2017-09-09', end: '2017-09-10' });
  });

  it('clamps future dates', () => {
    const log = quietLogger();
    expect(resolveDateRange('2018-01-01', '2018-01-02', now, log)).toEqual({
      start: '2017-09-09',
      end: '2017-09-10',
    });
    expect(log.warn).toHaveBeenCalledWith('End date 2018-01-02 is in the future, defaults to 2017-09-10');
  });

  it('rejects a start after the end', () => {
    expect(() => resolveDateRange('2017-09-05', '2017-09-01', now, quietLogger())).toThrow(InvalidRequestError);
  });
});

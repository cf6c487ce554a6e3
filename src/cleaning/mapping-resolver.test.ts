import { describe, it, expect } from 'vitest';
import { parseMappingConfig } from '../config/mapping-config';
import { resolveRecord } from './mapping-resolver';
import { ConfigurationError, MissingFieldError, TypeCoercionError } from '../utils/errors';

const config = parseMappingConfig({
  coindesk: {
    fields: {
      timestamp: { cleaning_func: 'check_epoch', mapped_name: 'snap_time' },
      price: { cleaning_func: 'check_float', mapped_name: 'close' },
    },
  },
  poloniex: {
    fields: {
      date: { cleaning_func: 'check_epoch', mapped_name: 'snap_time' },
      high: { cleaning_func: 'check_float', mapped_name: 'high' },
      low: { cleaning_func: 'check_float', mapped_name: 'low' },
      quoteVolume: { cleaning_func: 'check_float', mapped_name: 'quote_volume', required: true },
    },
  },
});

describe('resolveRecord', () => {
  it('maps a coindesk record to snap_time and close', () => {
    const row = resolveRecord(config, 'coindesk', { timestamp: 1498867200, price: '2500.50' });

    expect(row).toEqual({
      snap_time: new Date('2017-07-01T00:00:00Z'),
      close: 2500.5,
    });
  });

  it('outputs exactly the declared columns and ignores undeclared raw fields', () => {
    const row = resolveRecord(config, 'poloniex', {
      date: 1498867200,
      high: 0.0791,
      low: '0.0788',
      quoteVolume: '120.5',
      volume: 9.5,
      weightedAverage: 0.079,
    });

    expect(Object.keys(row).sort()).toEqual(['high', 'low', 'quote_volume', 'snap_time']);
  });

  it('leaves absent optional fields out of the row', () => {
    const row = resolveRecord(config, 'poloniex', { date: '1498867200', high: null, low: '', quoteVolume: 3 });

    expect(row).toEqual({ snap_time: new Date('2017-07-01T00:00:00Z'), quote_volume: 3 });
  });

  it('fails with MissingFieldError naming an absent required field', () => {
    expect(() => resolveRecord(config, 'poloniex', { date: 1498867200, high: 1 })).toThrow(MissingFieldError);
    expect(() => resolveRecord(config, 'poloniex', { date: 1498867200, high: 1 })).toThrow(
      "Required field 'quoteVolume' missing from poloniex record"
    );
  });

  it('fails with MissingFieldError when the timestamp is absent', () => {
    expect(() => resolveRecord(config, 'coindesk', { price: '1.0' })).toThrow(MissingFieldError);
  });

  it('propagates coercion failures', () => {
    expect(() => resolveRecord(config, 'coindesk', { timestamp: 1498867200, price: 'n/a' })).toThrow(
      TypeCoercionError
    );
  });

  it('fails with ConfigurationError for an unknown source', () => {
    expect(() => resolveRecord(config, 'bitstamp', { timestamp: 1498867200 })).toThrow(ConfigurationError);
  });
});

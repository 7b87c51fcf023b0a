import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from '../../src/core/errors.js';
import {
  parseTimestamp,
  validateIndicatorDataArgs,
  validateSearchArgs,
} from '../../src/core/validator.js';

function captureError(fn: () => unknown): InvalidArgumentError {
  try {
    fn();
  } catch (err) {
    if (err instanceof InvalidArgumentError) return err;
    throw err;
  }
  throw new Error('expected an InvalidArgumentError');
}

describe('parseTimestamp', () => {
  it('reads a bare date as UTC midnight', () => {
    expect(parseTimestamp('2024-01-01')?.toISOString()).toBe('2024-01-01T00:00:00.000Z');
  });

  it('applies the offset of a zoned date-time', () => {
    expect(parseTimestamp('2024-01-01T01:00:00+01:00')?.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(parseTimestamp('2024-01-01T00:00:00-0230')?.toISOString()).toBe('2024-01-01T02:30:00.000Z');
  });

  it('accepts minutes-only times and fractional seconds', () => {
    expect(parseTimestamp('2024-06-15T10:30')?.toISOString()).toBe('2024-06-15T10:30:00.000Z');
    expect(parseTimestamp('2024-06-15T10:30:15.5Z')?.toISOString()).toBe('2024-06-15T10:30:15.500Z');
  });

  it('knows leap years', () => {
    expect(parseTimestamp('2024-02-29')?.toISOString()).toBe('2024-02-29T00:00:00.000Z');
    expect(parseTimestamp('2023-02-29')).toBeNull();
  });

  it('keeps two-digit years literal', () => {
    expect(parseTimestamp('0050-01-01')?.toISOString()).toBe('0050-01-01T00:00:00.000Z');
    expect(parseTimestamp('0099-12-31T23:30:00Z')?.toISOString()).toBe('0099-12-31T23:30:00.000Z');
    expect(parseTimestamp('0050-02-29')).toBeNull();
  });

  it('rejects impossible calendar values', () => {
    expect(parseTimestamp('2024-02-30')).toBeNull();
    expect(parseTimestamp('2024-13-01')).toBeNull();
    expect(parseTimestamp('2024-01-01T24:00')).toBeNull();
    expect(parseTimestamp('2024-01-01T10:60')).toBeNull();
    expect(parseTimestamp('2024-01-01T10:00+25:00')).toBeNull();
  });

  it('rejects text that is not ISO-8601', () => {
    expect(parseTimestamp('yesterday')).toBeNull();
    expect(parseTimestamp('01/02/2024')).toBeNull();
    expect(parseTimestamp('')).toBeNull();
  });
});

describe('validateSearchArgs', () => {
  it('returns the trimmed query', () => {
    expect(validateSearchArgs({ query: '  demanda ' })).toEqual({ query: 'demanda' });
  });

  it('rejects an empty query naming the field', () => {
    const err = captureError(() => validateSearchArgs({ query: '' }));
    expect(err.field).toBe('query');
    expect(err.message).toBe('query: must be a non-empty search term');
  });

  it('rejects a whitespace-only query', () => {
    expect(captureError(() => validateSearchArgs({ query: '   ' })).message).toBe(
      'query: must be a non-empty search term',
    );
  });

  it('reports a missing query as required', () => {
    expect(captureError(() => validateSearchArgs({})).message).toBe('query: is required');
    expect(captureError(() => validateSearchArgs(undefined)).message).toBe('query: is required');
  });

  it('rejects a non-string query', () => {
    expect(captureError(() => validateSearchArgs({ query: 42 })).message).toBe('query: must be a string');
  });
});

describe('validateIndicatorDataArgs', () => {
  const valid = { indicator_id: 600, start_date: '2024-01-01', end_date: '2024-01-02' };

  it('parses a valid request and fills defaults', () => {
    const args = validateIndicatorDataArgs(valid);
    expect(args.indicatorId).toBe(600);
    expect(args.range.start.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(args.range.end.toISOString()).toBe('2024-01-02T00:00:00.000Z');
    expect(args.timeTrunc).toBe('hour');
    expect(args.timeAgg).toBe('sum');
  });

  it('accepts the identifier as a digit string', () => {
    expect(validateIndicatorDataArgs({ ...valid, indicator_id: '1293' }).indicatorId).toBe(1293);
  });

  it('passes through truncation and aggregation', () => {
    const args = validateIndicatorDataArgs({ ...valid, time_trunc: 'day', time_agg: 'average' });
    expect(args.timeTrunc).toBe('day');
    expect(args.timeAgg).toBe('average');
  });

  it('allows start equal to end', () => {
    const args = validateIndicatorDataArgs({ ...valid, end_date: '2024-01-01T00:00:00Z' });
    expect(args.range.start.getTime()).toBe(args.range.end.getTime());
  });

  it('rejects start after end on start_date', () => {
    const err = captureError(() =>
      validateIndicatorDataArgs({ ...valid, start_date: '2024-01-03', end_date: '2024-01-02' }),
    );
    expect(err.field).toBe('start_date');
    expect(err.message).toBe('start_date: must not be after end_date');
  });

  it.each([
    0,
    -5,
    1.5,
    'abc',
    '12a',
    '0',
    1e21,
    2 ** 53 + 2,
    '1000000000000000000000',
    '9007199254740994',
  ])('rejects indicator_id %j', (indicatorId) => {
    const err = captureError(() => validateIndicatorDataArgs({ ...valid, indicator_id: indicatorId }));
    expect(err.field).toBe('indicator_id');
    expect(err.message).toBe('indicator_id: must be a positive integer');
  });

  it('reports a missing indicator_id as required', () => {
    const err = captureError(() =>
      validateIndicatorDataArgs({ start_date: '2024-01-01', end_date: '2024-01-02' }),
    );
    expect(err.message).toBe('indicator_id: is required');
  });

  it('names the malformed date field', () => {
    const err = captureError(() => validateIndicatorDataArgs({ ...valid, end_date: '2024-02-30' }));
    expect(err.field).toBe('end_date');
    expect(err.message).toBe("end_date: is not a valid ISO-8601 timestamp: '2024-02-30'");
  });

  it('rejects a non-string date', () => {
    const err = captureError(() => validateIndicatorDataArgs({ ...valid, start_date: 20240101 }));
    expect(err.message).toBe('start_date: must be an ISO-8601 timestamp string');
  });

  it('rejects an unknown truncation', () => {
    expect(captureError(() => validateIndicatorDataArgs({ ...valid, time_trunc: 'week' })).field).toBe(
      'time_trunc',
    );
  });
});

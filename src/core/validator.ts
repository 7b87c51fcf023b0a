import { z } from 'zod';
import { InvalidArgumentError } from './errors.js';
import {
  DEFAULT_TIME_AGG,
  DEFAULT_TIME_TRUNC,
  TIME_AGGS,
  TIME_TRUNCS,
  type DateRange,
  type TimeAgg,
  type TimeTrunc,
} from '../types/esios.js';

export interface SearchArgs {
  query: string;
}

export interface IndicatorDataArgs {
  indicatorId: number;
  range: DateRange;
  timeTrunc: TimeTrunc;
  timeAgg: TimeAgg;
}

// YYYY-MM-DD, optionally followed by THH:mm[:ss[.fraction]] and Z or a ±HH[:]MM offset
const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}:?\d{2})?)?$/i;

function parseOffsetMinutes(offset: string | undefined): number {
  if (!offset || offset.toUpperCase() === 'Z') return 0;
  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  if (hours > 23 || minutes > 59) return Number.NaN;
  return sign * (hours * 60 + minutes);
}

/**
 * Parses an ISO-8601 date or date-time into a Date.
 * Values without an offset are read as UTC. Returns null for anything that is
 * not a real calendar instant (2024-02-30, 25:00, ...).
 */
export function parseTimestamp(value: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, y, mo, d, h = '0', mi = '0', s = '0', fraction = '0', offset] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  const millis = Number(fraction.padEnd(3, '0').slice(0, 3));

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return null;

  // setUTCFullYear keeps years 0-99 literal; Date.UTC maps them onto 1900-1999.
  const instant = new Date(0);
  instant.setUTCFullYear(year, month - 1, day);
  if (instant.getUTCFullYear() !== year || instant.getUTCMonth() !== month - 1 || instant.getUTCDate() !== day) {
    return null;
  }
  instant.setUTCHours(hour, minute, second, millis);

  const offsetMinutes = parseOffsetMinutes(offset);
  if (Number.isNaN(offsetMinutes)) return null;

  return new Date(instant.getTime() - offsetMinutes * 60_000);
}

const SearchSchema = z.object({
  query: z
    .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
    .refine((q) => q.trim().length > 0, 'must be a non-empty search term'),
});

const IndicatorIdSchema = z.union(
  [
    z
      .number()
      .int('must be a positive integer')
      .positive('must be a positive integer')
      .safe('must be a positive integer'),
    z.string().trim().regex(/^\d+$/, 'must be a positive integer').transform(Number)
      .refine((id) => id > 0 && Number.isSafeInteger(id), 'must be a positive integer'),
  ],
  { errorMap: () => ({ message: 'must be a positive integer' }) },
);

const TimestampSchema = z
  .string({ required_error: 'is required', invalid_type_error: 'must be an ISO-8601 timestamp string' })
  .transform((value, ctx) => {
    const parsed = parseTimestamp(value);
    if (!parsed) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `is not a valid ISO-8601 timestamp: '${value}'` });
      return z.NEVER;
    }
    return parsed;
  });

const IndicatorDataSchema = z.object({
  indicator_id: IndicatorIdSchema,
  start_date: TimestampSchema,
  end_date: TimestampSchema,
  time_trunc: z.enum(TIME_TRUNCS).optional(),
  time_agg: z.enum(TIME_AGGS).optional(),
});

function asArgumentMap(args: unknown): Record<string, unknown> {
  return typeof args === 'object' && args !== null && !Array.isArray(args)
    ? Object.fromEntries(Object.entries(args))
    : {};
}

function toInvalidArgument(error: z.ZodError, args: Record<string, unknown>): InvalidArgumentError {
  const issue = error.issues[0];
  const field = issue.path.length > 0 ? String(issue.path[0]) : 'arguments';
  const message = field in args && args[field] !== undefined && args[field] !== null ? issue.message : 'is required';
  return new InvalidArgumentError(field, message);
}

export function validateSearchArgs(args: unknown): SearchArgs {
  const map = asArgumentMap(args);
  const parsed = SearchSchema.safeParse(map);
  if (!parsed.success) throw toInvalidArgument(parsed.error, map);
  return { query: parsed.data.query.trim() };
}

export function validateIndicatorDataArgs(args: unknown): IndicatorDataArgs {
  const map = asArgumentMap(args);
  const parsed = IndicatorDataSchema.safeParse(map);
  if (!parsed.success) throw toInvalidArgument(parsed.error, map);

  const { indicator_id, start_date, end_date, time_trunc, time_agg } = parsed.data;
  if (start_date.getTime() > end_date.getTime()) {
    throw new InvalidArgumentError('start_date', 'must not be after end_date');
  }
  return {
    indicatorId: indicator_id,
    range: { start: start_date, end: end_date },
    timeTrunc: time_trunc ?? DEFAULT_TIME_TRUNC,
    timeAgg: time_agg ?? DEFAULT_TIME_AGG,
  };
}

export const TIME_TRUNCS = [
  'five_minutes',
  'ten_minutes',
  'fifteen_minutes',
  'hour',
  'day',
  'month',
  'year',
] as const;

export type TimeTrunc = (typeof TIME_TRUNCS)[number];

/** Generation series should be summed, price series averaged. */
export const TIME_AGGS = ['sum', 'average'] as const;

export type TimeAgg = (typeof TIME_AGGS)[number];

export const DEFAULT_TIME_TRUNC: TimeTrunc = 'hour';
export const DEFAULT_TIME_AGG: TimeAgg = 'sum';

export interface Indicator {
  id: number;
  name: string;
  shortName?: string;
  description: string;
}

export interface DataPoint {
  timestamp: string;
  value: number | null;
  timestampUtc?: string;
  geoId?: number;
  geoName?: string;
}

export interface IndicatorHeader {
  id: number;
  name: string;
  shortName?: string;
}

export interface IndicatorData {
  indicator: IndicatorHeader;
  values: DataPoint[];
}

export interface DateRange {
  start: Date;
  end: Date;
}

export interface IndicatorDataOptions {
  timeTrunc?: TimeTrunc;
  timeAgg?: TimeAgg;
}

import { validateIndicatorDataArgs } from '../core/validator.js';
import type { DataPoint, IndicatorHeader } from '../types/esios.js';
import { TIME_AGGS, TIME_TRUNCS } from '../types/esios.js';
import { jsonResult } from '../types/mcp.js';
import type { ToolEntry } from './types.js';

export interface DataPointRecord {
  timestamp: string;
  value: number | null;
  timestamp_utc?: string;
  geo_id?: number;
  geo_name?: string;
}

export interface IndicatorHeaderRecord {
  id: number;
  name: string;
  short_name?: string;
}

export function toDataPointRecord(point: DataPoint): DataPointRecord {
  return {
    timestamp: point.timestamp,
    value: point.value,
    ...(point.timestampUtc !== undefined ? { timestamp_utc: point.timestampUtc } : {}),
    ...(point.geoId !== undefined ? { geo_id: point.geoId } : {}),
    ...(point.geoName !== undefined ? { geo_name: point.geoName } : {}),
  };
}

function toHeaderRecord(header: IndicatorHeader): IndicatorHeaderRecord {
  return {
    id: header.id,
    name: header.name,
    ...(header.shortName !== undefined ? { short_name: header.shortName } : {}),
  };
}

export const getIndicatorDataTool: ToolEntry = {
  definition: {
    name: 'get_indicator_data',
    description:
      'Retrieves the time series of one ESIOS indicator between two timestamps. ' +
      'Provide an indicator ID (see search_indicators), a start date and an end date in ISO-8601 ' +
      '(YYYY-MM-DD or YYYY-MM-DDTHH:mm:ss[Z|±HH:MM]; values without an offset are read as UTC). ' +
      'Values can be electricity prices, generation, demand or other energy metrics depending on ' +
      'the indicator. Points are returned chronologically, as published, with their geographic scope.',
    inputSchema: {
      type: 'object',
      properties: {
        indicator_id: {
          type: 'integer',
          minimum: 1,
          description: 'ID of the indicator to retrieve.',
        },
        start_date: {
          type: 'string',
          description: 'Start of the range, ISO-8601 (e.g. "2024-01-01" or "2024-01-01T00:00:00Z").',
        },
        end_date: {
          type: 'string',
          description: 'End of the range, ISO-8601. Must not be before start_date.',
        },
        time_trunc: {
          type: 'string',
          enum: [...TIME_TRUNCS],
          default: 'hour',
          description: 'Time truncation of the series.',
        },
        time_agg: {
          type: 'string',
          enum: [...TIME_AGGS],
          default: 'sum',
          description: 'Aggregation within each truncation step: sum for generation, average for prices.',
        },
      },
      required: ['indicator_id', 'start_date', 'end_date'],
    },
  },

  async handler(args, { source, logger }) {
    const { indicatorId, range, timeTrunc, timeAgg } = validateIndicatorDataArgs(args);
    const data = await source.getIndicatorData(indicatorId, range, { timeTrunc, timeAgg });
    logger.info(`get_indicator_data ${indicatorId}: ${data.values.length} point(s)`);

    return jsonResult({
      indicator: toHeaderRecord(data.indicator),
      values: data.values.map(toDataPointRecord),
    });
  },
};

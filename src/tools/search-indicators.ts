import { validateSearchArgs } from '../core/validator.js';
import type { Indicator } from '../types/esios.js';
import { jsonResult } from '../types/mcp.js';
import type { ToolEntry } from './types.js';

export interface IndicatorRecord {
  id: number;
  name: string;
  short_name?: string;
  description: string;
}

export function toIndicatorRecord(indicator: Indicator): IndicatorRecord {
  return {
    id: indicator.id,
    name: indicator.name,
    ...(indicator.shortName !== undefined ? { short_name: indicator.shortName } : {}),
    description: indicator.description,
  };
}

export const searchIndicatorsTool: ToolEntry = {
  definition: {
    name: 'search_indicators',
    description:
      'Searches the indicators published by ESIOS (the Spanish electricity system operator ' +
      'information system) by a text query matched against indicator names and descriptions. ' +
      'Use it to find indicator IDs before requesting their data with get_indicator_data. ' +
      'Returns the matching indicators with their IDs, names, short names and descriptions, ' +
      'in the order the provider returns them.',
    inputSchema: {
      type: 'object',
      properties: {
        query: {
          type: 'string',
          minLength: 1,
          description: 'Search term matched against indicator names and descriptions (e.g. "demanda", "precio").',
        },
      },
      required: ['query'],
    },
  },

  async handler(args, { source, logger }) {
    const { query } = validateSearchArgs(args);
    const indicators = await source.searchIndicators(query);
    logger.info(`search_indicators '${query}': ${indicators.length} match(es)`);

    const records = indicators.map(toIndicatorRecord);
    return jsonResult({ indicators: records }, records);
  },
};

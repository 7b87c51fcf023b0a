import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { DateRange, Indicator, IndicatorData, IndicatorDataOptions } from '../types/esios.js';
import type { ToolResult } from '../types/mcp.js';
import type { Logger } from '../utils/logger.js';

export const TOOL_NAMES = ['search_indicators', 'get_indicator_data'] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

/** What the tools need from the API client. EsiosClient implements it. */
export interface IndicatorSource {
  searchIndicators(query: string): Promise<Indicator[]>;
  getIndicatorData(id: number, range: DateRange, options?: IndicatorDataOptions): Promise<IndicatorData>;
}

export interface ToolContext {
  source: IndicatorSource;
  logger: Logger;
}

/**
 * Handlers validate their own arguments and throw EsiosError subclasses;
 * the dispatcher turns those into error results.
 */
export type ToolHandler = (args: unknown, ctx: ToolContext) => Promise<ToolResult>;

export interface ToolEntry {
  definition: Tool & { name: ToolName };
  handler: ToolHandler;
}

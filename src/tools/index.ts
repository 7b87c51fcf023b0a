import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { UnknownToolError, isEsiosError } from '../core/errors.js';
import { errorResult, esiosErrorResult, type ToolResult } from '../types/mcp.js';
import { getIndicatorDataTool } from './get-indicator-data.js';
import { searchIndicatorsTool } from './search-indicators.js';
import { TOOL_NAMES, type ToolContext, type ToolEntry, type ToolName } from './types.js';

export const TOOL_REGISTRY: Readonly<Record<ToolName, ToolEntry>> = Object.freeze({
  search_indicators: searchIndicatorsTool,
  get_indicator_data: getIndicatorDataTool,
});

export function isToolName(name: string): name is ToolName {
  return Object.hasOwn(TOOL_REGISTRY, name);
}

export function listToolDefinitions(): Tool[] {
  return TOOL_NAMES.map((name) => TOOL_REGISTRY[name].definition);
}

/**
 * Single entry point for tools/call.
 * Never throws: every failure comes back as an isError result.
 */
export async function dispatchTool(name: string, args: unknown, ctx: ToolContext): Promise<ToolResult> {
  const started = Date.now();
  try {
    if (!isToolName(name)) {
      throw new UnknownToolError(name, TOOL_NAMES);
    }
    ctx.logger.debug(`${name} called with ${JSON.stringify(args ?? {})}`);
    const result = await TOOL_REGISTRY[name].handler(args, ctx);
    ctx.logger.debug(`${name} completed in ${Date.now() - started} ms`);
    return result;
  } catch (err) {
    if (isEsiosError(err)) {
      ctx.logger.warn(`${name} failed [${err.kind}]: ${err.message}`);
      return esiosErrorResult(err);
    }
    const message = err instanceof Error ? err.message : String(err);
    ctx.logger.error(`${name} failed unexpectedly: ${err instanceof Error && err.stack ? err.stack : message}`);
    return errorResult(`Error calling tool ${name}: ${message}`);
  }
}

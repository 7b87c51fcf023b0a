import type { TextContent } from '@modelcontextprotocol/sdk/types.js';
import type { EsiosError } from '../core/errors.js';

export interface ToolResult {
  [key: string]: unknown;
  content: TextContent[];
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
}

export function textResult(text: string, isError = false): ToolResult {
  return {
    content: [{ type: 'text' as const, text }],
    isError,
  };
}

/** Records go out twice: pretty-printed in the text block and as structuredContent */
export function jsonResult(structured: Record<string, unknown>, records: unknown = structured): ToolResult {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(records, null, 2) }],
    structuredContent: structured,
    isError: false,
  };
}

export function errorResult(message: string): ToolResult {
  return textResult(`✗ ${message}`, true);
}

export function esiosErrorResult(err: EsiosError): ToolResult {
  return {
    ...errorResult(`[${err.kind}] ${err.message}`),
    structuredContent: { error: err.toPayload() },
  };
}

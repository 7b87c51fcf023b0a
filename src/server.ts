import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { EsiosConfig } from './core/config.js';
import { EsiosClient, type FetchFn } from './core/esios-client.js';
import { SERVER_INSTRUCTIONS } from './server-instructions.js';
import { dispatchTool, listToolDefinitions } from './tools/index.js';
import type { IndicatorSource } from './tools/types.js';
import { createLogger, type Logger } from './utils/logger.js';
import { getPackageVersion } from './utils/version.js';

export const SERVER_NAME = 'esios-mcp';

export interface ServerDeps {
  logger?: Logger;
  /** Used by the default EsiosClient */
  fetch?: FetchFn;
  /** Replaces the EsiosClient entirely */
  source?: IndicatorSource;
}

export function createServer(config: EsiosConfig, deps: ServerDeps = {}): Server {
  const logger = deps.logger ?? createLogger(config.verbosity);
  const source = deps.source ?? new EsiosClient({
    apiToken: config.apiToken,
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    fetch: deps.fetch,
    logger,
  });

  const server = new Server(
    { name: SERVER_NAME, version: getPackageVersion() },
    { capabilities: { tools: {} }, instructions: SERVER_INSTRUCTIONS },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: listToolDefinitions(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    dispatchTool(request.params.name, request.params.arguments, { source, logger }),
  );

  return server;
}

/**
 * Serves over stdio until SIGINT/SIGTERM or until the client closes the stream,
 * then exits 0.
 */
export async function startServer(config: EsiosConfig, deps: ServerDeps = {}): Promise<void> {
  const logger = deps.logger ?? createLogger(config.verbosity);
  const server = createServer(config, { ...deps, logger });
  const transport = new StdioServerTransport();

  let closing = false;
  const shutdown = (reason: string): void => {
    if (closing) return;
    closing = true;
    logger.info(`Shutting down (${reason})`);
    server
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error(`Error while closing the server: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.stdin.once('close', () => shutdown('stdin closed'));
  server.onclose = () => shutdown('transport closed');

  await server.connect(transport);
  logger.info(`${SERVER_NAME} ${getPackageVersion()} serving on stdio (base URL ${config.baseUrl})`);
}

#!/usr/bin/env node
import { Command } from 'commander';
import { clampVerbosity, loadConfig, TOKEN_ENV, type EsiosConfig } from './core/config.js';
import { ConfigurationError } from './core/errors.js';
import { startServer } from './server.js';
import { createLogger } from './utils/logger.js';
import { getPackageVersion } from './utils/version.js';

interface CliOptions {
  verbose: number;
}

const program = new Command();

program
  .name('esios-mcp')
  .description(`ESIOS MCP server - REE electricity indicators over stdio (requires ${TOKEN_ENV})`)
  .version(getPackageVersion())
  .option('-v, --verbose', 'increase verbosity (-v info, -vv debug)', (_value: string, previous: number) => previous + 1, 0)
  .action(async (options: CliOptions) => {
    const logger = createLogger(clampVerbosity(options.verbose));

    let config: EsiosConfig;
    try {
      config = loadConfig(process.env, { verbosity: options.verbose });
    } catch (err) {
      if (err instanceof ConfigurationError) {
        logger.error(err.message);
        process.exitCode = 1;
        return;
      }
      throw err;
    }

    await startServer(config, { logger: createLogger(config.verbosity) });
  });

await program.parseAsync();

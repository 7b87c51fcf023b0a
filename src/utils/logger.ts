import { Chalk, chalkStderr, type ChalkInstance } from 'chalk';

/**
 * Leveled logger for the MCP server.
 * stdout carries the JSON-RPC stream, so every line goes to stderr (or the injected sink).
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/** 0 = warnings and errors only, 1 = verbose, 2 = debug */
export type Verbosity = 0 | 1 | 2;

const LEVEL_RANK: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export function levelForVerbosity(verbosity: Verbosity): LogLevel {
  if (verbosity >= 2) return 'debug';
  if (verbosity === 1) return 'info';
  return 'warn';
}

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  sink?: (line: string) => void;
  colors?: boolean;
  now?: () => Date;
}

export class Logger {
  private readonly level: LogLevel;
  private readonly name: string;
  private readonly sink: (line: string) => void;
  private readonly paint: ChalkInstance;
  private readonly now: () => Date;

  constructor(private readonly options: LoggerOptions = {}) {
    this.level = options.level ?? 'warn';
    this.name = options.name ?? 'esios-mcp';
    this.sink = options.sink ?? ((line) => process.stderr.write(`${line}\n`));
    this.paint = options.colors === undefined ? chalkStderr : new Chalk({ level: options.colors ? 1 : 0 });
    this.now = options.now ?? (() => new Date());
  }

  /** Same level, sink and colors under another name */
  child(name: string): Logger {
    return new Logger({ ...this.options, level: this.level, name: `${this.name}:${name}` });
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] <= LEVEL_RANK[this.level];
  }

  error(msg: string): void {
    this.write('error', msg);
  }

  warn(msg: string): void {
    this.write('warn', msg);
  }

  info(msg: string): void {
    this.write('info', msg);
  }

  debug(msg: string): void {
    this.write('debug', msg);
  }

  private write(level: LogLevel, msg: string): void {
    if (!this.isEnabled(level)) return;
    const tag = this.tag(level);
    this.sink(`${this.paint.dim(this.now().toISOString())} ${tag} ${this.paint.bold(this.name)} - ${msg}`);
  }

  private tag(level: LogLevel): string {
    const label = `[${level.toUpperCase()}]`;
    switch (level) {
      case 'error':
        return this.paint.red(label);
      case 'warn':
        return this.paint.yellow(label);
      case 'info':
        return this.paint.cyan(label);
      case 'debug':
        return this.paint.gray(label);
    }
  }
}

export function createLogger(verbosity: Verbosity, options: Omit<LoggerOptions, 'level'> = {}): Logger {
  return new Logger({ ...options, level: levelForVerbosity(verbosity) });
}

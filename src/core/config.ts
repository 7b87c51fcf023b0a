import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { Verbosity } from '../utils/logger.js';

export const DEFAULT_BASE_URL = 'https://api.esios.ree.es';
export const DEFAULT_TIMEOUT_MS = 600_000;
export const TOKEN_ENV = 'ESIOS_API_TOKEN';

export interface EsiosConfig {
  readonly apiToken: string;
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly verbosity: Verbosity;
}

const VERBOSITY_NAMES: Record<string, Verbosity> = {
  '0': 0,
  none: 0,
  '1': 1,
  verbose: 1,
  '2': 2,
  debug: 2,
};

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const EnvSchema = z.object({
  [TOKEN_ENV]: z.preprocess(
    blankToUndefined,
    z.string({ required_error: `${TOKEN_ENV} environment variable is not set` }),
  ),
  ESIOS_BASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  ESIOS_TIMEOUT_MS: z.preprocess(
    blankToUndefined,
    z.string().regex(/^\d+$/, 'must be a positive integer (milliseconds)').transform(Number)
      .refine((ms) => ms > 0, 'must be a positive integer (milliseconds)')
      .optional(),
  ),
  ESIOS_VERBOSITY: z.preprocess(
    (value) => (typeof value === 'string' ? blankToUndefined(value.trim().toLowerCase()) : value),
    z.enum(['0', '1', '2', 'none', 'verbose', 'debug']).optional(),
  ),
});

export interface LoadConfigOptions {
  /** Count of -v flags. Takes precedence over ESIOS_VERBOSITY when given. */
  verbosity?: number;
}

export function clampVerbosity(count: number): Verbosity {
  if (count >= 2) return 2;
  if (count === 1) return 1;
  return 0;
}

/**
 * Reads the process configuration once. The token is mandatory: without it the
 * server must not start.
 */
export function loadConfig(
  env: Record<string, string | undefined>,
  options: LoadConfigOptions = {},
): EsiosConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join('.');
    const message = field === TOKEN_ENV && issue.code === 'invalid_type'
      ? issue.message
      : `${field}: ${issue.message}`;
    throw new ConfigurationError(message);
  }

  const data = parsed.data;
  const verbosity = options.verbosity !== undefined && options.verbosity > 0
    ? clampVerbosity(options.verbosity)
    : data.ESIOS_VERBOSITY !== undefined
      ? VERBOSITY_NAMES[data.ESIOS_VERBOSITY]
      : 0;

  return Object.freeze({
    apiToken: data[TOKEN_ENV].trim(),
    baseUrl: (data.ESIOS_BASE_URL ?? DEFAULT_BASE_URL).replace(/\/+$/, ''),
    timeoutMs: data.ESIOS_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
    verbosity,
  });
}

import { z } from 'zod';
import { InvalidRequestError, NotFoundError, TransportError } from './errors.js';
import { Logger } from '../utils/logger.js';
import type {
  DataPoint,
  DateRange,
  Indicator,
  IndicatorData,
  IndicatorDataOptions,
} from '../types/esios.js';
import { DEFAULT_TIME_AGG, DEFAULT_TIME_TRUNC } from '../types/esios.js';

export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface EsiosClientOptions {
  apiToken: string;
  baseUrl: string;
  timeoutMs: number;
  /** Replaces the global fetch; tests hand in a stub here */
  fetch?: FetchFn;
  logger?: Logger;
}

const ACCEPT_HEADER = 'application/json; application/vnd.esios-api-v1+json';

// --- upstream payloads ---------------------------------------------------

const RawIndicatorSchema = z.object({
  id: z.number(),
  name: z.string(),
  short_name: z.string().nullish(),
  description: z.string().nullish(),
});

const IndicatorListSchema = z.object({
  indicators: z.array(RawIndicatorSchema).nullish(),
});

const RawValueSchema = z.object({
  value: z.number().nullable(),
  datetime: z.string(),
  datetime_utc: z.string().nullish(),
  geo_id: z.number().nullish(),
  geo_name: z.string().nullish(),
});

const IndicatorDataSchema = z.object({
  indicator: z.object({
    id: z.number(),
    name: z.string(),
    short_name: z.string().nullish(),
    values: z.array(RawValueSchema).nullish(),
  }),
});

const ProviderErrorSchema = z.object({
  message: z.string().optional(),
  error: z.string().optional(),
  errors: z.array(z.union([z.string(), z.object({ message: z.string() })])).optional(),
});

// --- helpers ---------------------------------------------------------------

/** The provider wants second precision in UTC: 2024-01-01T00:00:00Z */
export function formatEsiosDate(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Pulls the provider's human-readable message out of an error body.
 * Falls back to the raw text, then to the HTTP status text.
 */
export function extractProviderMessage(body: string, statusText: string): string {
  const parsed = ProviderErrorSchema.safeParse(tryParseJson(body));
  if (parsed.success) {
    const { message, error, errors } = parsed.data;
    if (message) return message;
    if (error) return error;
    if (errors && errors.length > 0) {
      return errors.map((e) => (typeof e === 'string' ? e : e.message)).join('; ');
    }
  }
  const text = body.trim();
  return text.length > 0 ? text : statusText || 'request rejected';
}

function describeFailure(err: unknown, timeoutMs: number): string {
  if (err instanceof Error) {
    if (err.name === 'TimeoutError' || err.name === 'AbortError') {
      return `request timed out after ${timeoutMs} ms`;
    }
    const cause = err.cause instanceof Error ? `: ${err.cause.message}` : '';
    return `${err.message}${cause}`;
  }
  return String(err);
}

function toIndicator(raw: z.infer<typeof RawIndicatorSchema>): Indicator {
  return {
    id: raw.id,
    name: raw.name,
    ...(raw.short_name ? { shortName: raw.short_name } : {}),
    description: raw.description ?? '',
  };
}

function toDataPoint(raw: z.infer<typeof RawValueSchema>): DataPoint {
  return {
    timestamp: raw.datetime,
    value: raw.value,
    ...(raw.datetime_utc ? { timestampUtc: raw.datetime_utc } : {}),
    ...(raw.geo_id != null ? { geoId: raw.geo_id } : {}),
    ...(raw.geo_name ? { geoName: raw.geo_name } : {}),
  };
}

// --- client ------------------------------------------------------------------

/**
 * ESIOS REST client. One HTTP attempt per call, no retries, no caching.
 */
export class EsiosClient {
  private readonly apiToken: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(options: EsiosClientOptions) {
    this.apiToken = options.apiToken;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = (options.logger ?? new Logger()).child('client');
  }

  async searchIndicators(query: string): Promise<Indicator[]> {
    const url = new URL(`${this.baseUrl}/indicators`);
    url.searchParams.set('text', query);

    const body = await this.request(url);
    const parsed = IndicatorListSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError(undefined, `unexpected indicator list payload: ${parsed.error.issues[0].message}`);
    }
    return (parsed.data.indicators ?? []).map(toIndicator);
  }

  async getIndicatorData(
    id: number,
    range: DateRange,
    options: IndicatorDataOptions = {},
  ): Promise<IndicatorData> {
    const url = new URL(`${this.baseUrl}/indicators/${id}`);
    url.searchParams.set('start_date', formatEsiosDate(range.start));
    url.searchParams.set('end_date', formatEsiosDate(range.end));
    url.searchParams.set('time_trunc', options.timeTrunc ?? DEFAULT_TIME_TRUNC);
    url.searchParams.set('time_agg', options.timeAgg ?? DEFAULT_TIME_AGG);

    const body = await this.request(url, { notFound: `Indicator ${id} not found` });
    const parsed = IndicatorDataSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError(undefined, `unexpected indicator data payload: ${parsed.error.issues[0].message}`);
    }

    const { indicator } = parsed.data;
    return {
      indicator: {
        id: indicator.id,
        name: indicator.name,
        ...(indicator.short_name ? { shortName: indicator.short_name } : {}),
      },
      values: (indicator.values ?? []).map(toDataPoint),
    };
  }

  private headers(): Record<string, string> {
    return {
      Accept: ACCEPT_HEADER,
      Authorization: `Bearer ${this.apiToken}`,
      'x-api-key': this.apiToken,
    };
  }

  private async request(url: URL, messages: { notFound?: string } = {}): Promise<unknown> {
    const started = Date.now();
    this.logger.debug(`GET ${url.toString()}`);

    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(url, {
        method: 'GET',
        headers: this.headers(),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      text = await response.text();
    } catch (err) {
      const cause = describeFailure(err, this.timeoutMs);
      this.logger.error(`GET ${url.pathname} failed: ${cause}`);
      throw new TransportError(undefined, cause);
    }

    this.logger.debug(`GET ${url.pathname} -> ${response.status} (${Date.now() - started} ms, ${text.length} bytes)`);

    if (response.status === 404) {
      const detail = extractProviderMessage(text, response.statusText);
      throw new NotFoundError(messages.notFound ? `${messages.notFound}: ${detail}` : detail);
    }
    if (response.status === 400 || response.status === 422) {
      throw new InvalidRequestError(extractProviderMessage(text, response.statusText), response.status);
    }
    if (!response.ok) {
      const detail = extractProviderMessage(text, response.statusText);
      this.logger.warn(`GET ${url.pathname} returned HTTP ${response.status}: ${detail}`);
      throw new TransportError(response.status, detail);
    }

    const body = tryParseJson(text);
    if (body === undefined) {
      throw new TransportError(response.status, 'response body is not valid JSON');
    }
    return body;
  }
}

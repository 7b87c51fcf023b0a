export type EsiosErrorKind =
  | 'InvalidArgument'
  | 'UnknownTool'
  | 'NotFound'
  | 'InvalidRequest'
  | 'TransportError'
  | 'ConfigurationError';

export interface ErrorPayload {
  kind: EsiosErrorKind;
  message: string;
  field?: string;
  status?: number;
}

/**
 * Base of every error a tool call can produce.
 * Callers branch on `kind`; toPayload() is what ends up in structuredContent.error.
 */
export abstract class EsiosError extends Error {
  abstract readonly kind: EsiosErrorKind;

  toPayload(): ErrorPayload {
    return { kind: this.kind, message: this.message };
  }
}

export class InvalidArgumentError extends EsiosError {
  readonly kind = 'InvalidArgument' as const;

  constructor(readonly field: string, reason: string) {
    super(`${field}: ${reason}`);
    this.name = 'InvalidArgumentError';
  }

  override toPayload(): ErrorPayload {
    return { ...super.toPayload(), field: this.field };
  }
}

export class UnknownToolError extends EsiosError {
  readonly kind = 'UnknownTool' as const;

  constructor(readonly toolName: string, available: readonly string[]) {
    super(`Unknown tool: ${toolName}. Available tools: ${available.join(', ')}`);
    this.name = 'UnknownToolError';
  }
}

export class NotFoundError extends EsiosError {
  readonly kind = 'NotFound' as const;

  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }

  override toPayload(): ErrorPayload {
    return { ...super.toPayload(), status: 404 };
  }
}

/** Upstream rejected the request shape or range. `detail` is the provider's message verbatim. */
export class InvalidRequestError extends EsiosError {
  readonly kind = 'InvalidRequest' as const;

  constructor(readonly detail: string, readonly status = 400) {
    super(detail);
    this.name = 'InvalidRequestError';
  }

  override toPayload(): ErrorPayload {
    return { ...super.toPayload(), status: this.status };
  }
}

export class TransportError extends EsiosError {
  readonly kind = 'TransportError' as const;

  constructor(readonly status: number | undefined, cause: string) {
    super(status === undefined ? cause : `HTTP ${status}: ${cause}`);
    this.name = 'TransportError';
  }

  override toPayload(): ErrorPayload {
    const payload = super.toPayload();
    return this.status === undefined ? payload : { ...payload, status: this.status };
  }
}

export class ConfigurationError extends EsiosError {
  readonly kind = 'ConfigurationError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function isEsiosError(err: unknown): err is EsiosError {
  return err instanceof EsiosError;
}

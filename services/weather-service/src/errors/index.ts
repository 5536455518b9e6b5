export type ErrorCode =
  | 'TRANSPORT_ERROR'
  | 'RATE_LIMITED'
  | 'CLIENT_REJECTED'
  | 'SERVER_ERROR'
  | 'PARSE_ERROR'
  | 'BREAKER_OPEN'
  | 'NOT_FOUND'
  | 'CANCELLED'
  | 'ALL_SOURCES_FAILED'
  | 'NOT_AVAILABLE'
  | 'VALIDATION_ERROR'
  | 'CONFIG_ERROR';

export class AggregatorError extends Error {
  public readonly code: ErrorCode;
  public readonly retryable: boolean;

  constructor(message: string, code: ErrorCode, retryable = false, options?: ErrorOptions) {
    super(message, options);
    this.name = 'AggregatorError';
    this.code = code;
    this.retryable = retryable;
    Error.captureStackTrace(this, this.constructor);
  }
}

// -------------------------------------------------
// Outbound call failures (Resilient Fetcher)
// -------------------------------------------------
export class TransportError extends AggregatorError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'TRANSPORT_ERROR', true, options);
    this.name = 'TransportError';
  }
}

export class RateLimitedError extends AggregatorError {
  constructor(public readonly status: number = 429) {
    super(`HTTP ${status}: rate limited`, 'RATE_LIMITED', true);
    this.name = 'RateLimitedError';
  }
}

export class ClientRejectedError extends AggregatorError {
  constructor(public readonly status: number, public readonly body?: unknown) {
    super(`HTTP ${status}: request rejected`, 'CLIENT_REJECTED', false);
    this.name = 'ClientRejectedError';
  }
}

export class UpstreamServerError extends AggregatorError {
  constructor(public readonly status: number) {
    super(`HTTP ${status}: upstream server error`, 'SERVER_ERROR', true);
    this.name = 'UpstreamServerError';
  }
}

export class ParseError extends AggregatorError {
  constructor(message: string, public readonly issues: unknown[] = []) {
    super(message, 'PARSE_ERROR', false);
    this.name = 'ParseError';
  }
}

export class BreakerOpenError extends AggregatorError {
  constructor(public readonly breaker: string, public readonly openUntil: number) {
    super(`Circuit breaker "${breaker}" is open`, 'BREAKER_OPEN', false);
    this.name = 'BreakerOpenError';
  }
}

export class CancelledError extends AggregatorError {
  constructor(message = 'Operation cancelled', options?: ErrorOptions) {
    super(message, 'CANCELLED', false, options);
    this.name = 'CancelledError';
  }
}

// -------------------------------------------------
// Source / cycle level failures
// -------------------------------------------------
export class NotFoundError extends AggregatorError {
  constructor(public readonly source: string, public readonly city: string) {
    super(`City "${city}" not found by source ${source}`, 'NOT_FOUND', false);
    this.name = 'NotFoundError';
  }
}

export interface SourceFailure {
  source: string;
  error: Error;
}

export class AllSourcesFailedError extends AggregatorError {
  constructor(public readonly city: string, public readonly failures: SourceFailure[]) {
    super(`All sources failed for city ${city}`, 'ALL_SOURCES_FAILED', false);
    this.name = 'AllSourcesFailedError';
  }
}

export class NotAvailableError extends AggregatorError {
  constructor(public readonly city: string, message?: string, options?: ErrorOptions) {
    super(message ?? `Weather data not available for ${city}`, 'NOT_AVAILABLE', false, options);
    this.name = 'NotAvailableError';
  }
}

export class ValidationError extends AggregatorError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', false);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends AggregatorError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', false, options);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

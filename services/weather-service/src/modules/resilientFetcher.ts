import axios, { AxiosInstance, AxiosResponse } from 'axios';
import https from 'https';

import { BreakerConfig, RetryConfig } from '../config';
import {
  AggregatorError,
  CancelledError,
  ClientRejectedError,
  RateLimitedError,
  TransportError,
  UpstreamServerError,
  errorMessage,
} from '../errors';
import { Logger, logger } from '../logger';
import { sleep } from '../utils/time';
import { BreakerTransition, CircuitBreaker, CircuitState, OutcomeKind } from './circuitBreaker';

export interface FetchRequest {
  url: string;
  params?: Record<string, string | number>;
}

/** Anything a source adapter can pull a JSON payload through. */
export interface Fetcher {
  readonly name: string;
  fetch(request: FetchRequest, signal?: AbortSignal): Promise<unknown>;
  breakerState(): CircuitState;
}

export function createHttpClient(timeoutMs: number): AxiosInstance {
  const httpsAgent = new https.Agent({
    keepAlive: true,
    maxSockets: 10,
  });

  return axios.create({
    timeout: timeoutMs,
    httpsAgent,
  });
}

/**
 * Maps an HTTP status onto the failure taxonomy; `null` for 2xx.
 */
export function classifyStatus(status: number, body?: unknown): AggregatorError | null {
  if (status >= 200 && status < 300) return null;
  if (status === 429) return new RateLimitedError(status);
  if (status >= 400 && status < 500) return new ClientRejectedError(status, body);
  if (status >= 500) return new UpstreamServerError(status);
  // 1xx / 3xx that axios did not follow
  return new TransportError(`Unexpected HTTP status ${status}`);
}

export function backoffDelay(attempt: number, retry: Pick<RetryConfig, 'delayMs' | 'multiplier'>): number {
  return retry.delayMs * Math.pow(retry.multiplier, attempt - 1);
}

// A provider answering "no such city" is healthy; a cancelled caller says
// nothing about the provider at all.
function classifyOutcome(err: unknown): OutcomeKind {
  if (err instanceof CancelledError) return 'ignore';
  if (err instanceof ClientRejectedError && err.status === 404) return 'success';
  return 'failure';
}

export class ResilientFetcher implements Fetcher {
  private readonly breaker: CircuitBreaker;
  private readonly log: Logger;

  constructor(
    readonly name: string,
    private readonly retry: RetryConfig,
    breakerConfig: BreakerConfig,
    private readonly http: AxiosInstance = createHttpClient(retry.requestTimeoutMs),
    onStateChange?: (transition: BreakerTransition) => void
  ) {
    this.log = logger.child({ component: 'fetcher', source: name });
    this.breaker = new CircuitBreaker({
      name,
      ...breakerConfig,
      classify: classifyOutcome,
      onStateChange,
    });
  }

  async fetch(request: FetchRequest, signal?: AbortSignal): Promise<unknown> {
    return this.breaker.execute(() => this.fetchWithRetry(request, signal));
  }

  breakerState(): CircuitState {
    return this.breaker.snapshot();
  }

  private async fetchWithRetry(request: FetchRequest, signal?: AbortSignal): Promise<unknown> {
    let lastError: AggregatorError | undefined;

    for (let attempt = 0; attempt <= this.retry.maxRetries; attempt++) {
      if (attempt > 0) {
        const delay = backoffDelay(attempt, this.retry);
        this.log.debug({ url: request.url, attempt, delayMs: delay }, 'Retrying request');
        await sleep(delay, signal);
      }

      try {
        return await this.attempt(request, signal);
      } catch (err) {
        if (!(err instanceof AggregatorError) || !err.retryable) {
          throw err;
        }
        lastError = err;
        this.log.warn(
          { url: request.url, attempt, code: err.code, message: err.message },
          'HTTP request failed'
        );
      }
    }

    this.log.error(
      { url: request.url, retries: this.retry.maxRetries, code: lastError?.code },
      'Retry budget exhausted'
    );
    throw lastError ?? new TransportError(`No attempt made for ${request.url}`);
  }

  private async attempt(request: FetchRequest, signal?: AbortSignal): Promise<unknown> {
    if (signal?.aborted) {
      throw new CancelledError('Cancelled before request');
    }

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(request.url, {
        params: request.params,
        signal,
        validateStatus: () => true,
      });
    } catch (err) {
      if (signal?.aborted || axios.isCancel(err)) {
        throw new CancelledError('Request cancelled', { cause: err });
      }
      throw new TransportError(`Request to ${request.url} failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const failure = classifyStatus(response.status, response.data);
    if (failure) throw failure;

    this.log.debug({ url: request.url, status: response.status }, 'Request successful');
    return response.data;
  }
}

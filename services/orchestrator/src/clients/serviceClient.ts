import { fetch, Headers } from 'undici';
import type { z } from 'zod';
import { retryWithBackoff, type BackoffOptions } from '@orchestra/shared';

export type ServiceClientErrorCode = 'HTTP_ERROR' | 'TIMEOUT' | 'ABORTED' | 'NETWORK_ERROR' | 'INVALID_RESPONSE';

export class ServiceClientError extends Error {
  readonly service: string;
  readonly statusCode: number;
  readonly code: ServiceClientErrorCode;
  readonly details: unknown;

  constructor(
    message: string,
    options: { service: string; statusCode: number; code: ServiceClientErrorCode; details?: unknown }
  ) {
    super(message);
    this.name = 'ServiceClientError';
    this.service = options.service;
    this.statusCode = options.statusCode;
    this.code = options.code;
    this.details = options.details;
  }
}

export type CallOutcome =
  | 'success'
  | 'client_error'
  | 'server_error'
  | 'timeout'
  | 'network_error'
  | 'cancelled'
  | 'invalid_response';

export type FetchLike = typeof fetch;

export interface ServiceClientOptions {
  service: string;
  baseUrl: string;
  timeoutMs: number;
  retries: number;
  backoff?: BackoffOptions;
  fetchImpl?: FetchLike;
  onCall?: (service: string, outcome: CallOutcome) => void;
}

export interface RequestOptions<T> {
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  body?: unknown;
  signal?: AbortSignal;
}

// Exponential backoff of 2^attempt seconds between attempts.
const DEFAULT_BACKOFF: BackoffOptions = { baseMs: 2_000, factor: 2, maxMs: 16_000, jitterRatio: 0 };

function combineSignals(primary: AbortController, external?: AbortSignal): () => void {
  if (!external) {
    return () => undefined;
  }
  if (external.aborted) {
    primary.abort(external.reason);
    return () => undefined;
  }
  const onAbort = () => {
    primary.abort(external.reason);
  };
  external.addEventListener('abort', onAbort, { once: true });
  return () => external.removeEventListener('abort', onAbort);
}

function outcomeFor(error: ServiceClientError): CallOutcome {
  switch (error.code) {
    case 'TIMEOUT':
      return 'timeout';
    case 'ABORTED':
      return 'cancelled';
    case 'NETWORK_ERROR':
      return 'network_error';
    case 'INVALID_RESPONSE':
      return 'invalid_response';
    case 'HTTP_ERROR':
      return error.statusCode >= 500 ? 'server_error' : 'client_error';
  }
}

function isRetryable(error: unknown): boolean {
  if (!(error instanceof ServiceClientError)) {
    return false;
  }
  if (error.code === 'TIMEOUT' || error.code === 'NETWORK_ERROR') {
    return true;
  }
  return error.code === 'HTTP_ERROR' && error.statusCode >= 500;
}

function extractErrorMessage(payload: unknown): string | null {
  if (typeof payload === 'string' && payload.trim().length > 0) {
    return payload.trim();
  }
  if (typeof payload !== 'object' || payload === null) {
    return null;
  }
  for (const key of ['message', 'error'] as const) {
    if (key in payload) {
      const value: unknown = Reflect.get(payload, key);
      if (typeof value === 'string' && value.trim().length > 0) {
        return value.trim();
      }
    }
  }
  return null;
}

/**
 * JSON-over-HTTP client for one downstream collaborator. Every attempt gets its own
 * timeout; the caller's signal cancels the whole call including pending backoff.
 */
export class ServiceClient {
  readonly service: string;
  private readonly baseUrl: URL;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly backoff: BackoffOptions;
  private readonly fetchImpl: FetchLike;
  private readonly onCall?: (service: string, outcome: CallOutcome) => void;

  constructor(options: ServiceClientOptions) {
    if (!options.baseUrl) {
      throw new Error(`ServiceClient for ${options.service} requires a baseUrl`);
    }
    this.service = options.service;
    this.baseUrl = new URL(options.baseUrl);
    this.timeoutMs = options.timeoutMs;
    this.retries = options.retries;
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.onCall = options.onCall;
  }

  get<T>(path: string, options: RequestOptions<T>): Promise<T> {
    return this.request('GET', path, options);
  }

  post<T>(path: string, options: RequestOptions<T>): Promise<T> {
    return this.request('POST', path, options);
  }

  put<T>(path: string, options: RequestOptions<T>): Promise<T> {
    return this.request('PUT', path, options);
  }

  async checkHealth(signal?: AbortSignal): Promise<boolean> {
    const controller = new AbortController();
    const detach = combineSignals(controller, signal);
    const timer = setTimeout(() => controller.abort(new Error('Request timed out')), this.timeoutMs);
    try {
      const response = await this.fetchImpl(this.buildUrl('/health'), {
        method: 'GET',
        signal: controller.signal
      });
      await response.body?.cancel();
      return response.ok;
    } catch {
      return false;
    } finally {
      clearTimeout(timer);
      detach();
    }
  }

  async request<T>(method: string, path: string, options: RequestOptions<T>): Promise<T> {
    return retryWithBackoff(() => this.attempt(method, path, options), {
      retries: this.retries,
      backoff: this.backoff,
      signal: options.signal,
      shouldRetry: isRetryable
    });
  }

  private async attempt<T>(method: string, path: string, options: RequestOptions<T>): Promise<T> {
    try {
      const value = await this.send(method, path, options);
      this.onCall?.(this.service, 'success');
      return value;
    } catch (error) {
      if (error instanceof ServiceClientError) {
        this.onCall?.(this.service, outcomeFor(error));
      }
      throw error;
    }
  }

  private async send<T>(method: string, path: string, options: RequestOptions<T>): Promise<T> {
    const headers = new Headers({ Accept: 'application/json' });
    let body: string | undefined;
    if (options.body !== undefined) {
      body = JSON.stringify(options.body);
      headers.set('Content-Type', 'application/json');
    }

    const controller = new AbortController();
    const detach = combineSignals(controller, options.signal);
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new Error('Request timed out'));
    }, this.timeoutMs);

    try {
      let response: Awaited<ReturnType<FetchLike>>;
      try {
        response = await this.fetchImpl(this.buildUrl(path), {
          method,
          headers,
          body,
          signal: controller.signal
        });
      } catch (error) {
        throw this.transportError(error, timedOut, options.signal);
      }

      let raw: string;
      try {
        raw = await response.text();
      } catch (error) {
        throw this.transportError(error, timedOut, options.signal);
      }

      let payload: unknown = null;
      let decoded = raw.length === 0;
      if (raw.length > 0) {
        try {
          payload = JSON.parse(raw);
          decoded = true;
        } catch {
          payload = raw;
        }
      }

      if (!response.ok) {
        throw new ServiceClientError(extractErrorMessage(payload) ?? `${this.service} responded with ${response.status}`, {
          service: this.service,
          statusCode: response.status,
          code: 'HTTP_ERROR',
          details: payload
        });
      }

      const parsed = decoded ? options.schema.safeParse(payload) : null;
      if (!parsed || !parsed.success) {
        throw new ServiceClientError(`${this.service} returned an unreadable response`, {
          service: this.service,
          statusCode: response.status,
          code: 'INVALID_RESPONSE',
          details: parsed ? parsed.error.issues : raw
        });
      }
      return parsed.data;
    } finally {
      clearTimeout(timer);
      detach();
    }
  }

  private transportError(error: unknown, timedOut: boolean, signal?: AbortSignal): ServiceClientError {
    const details = error instanceof Error ? error.message : String(error);
    if (signal?.aborted) {
      return new ServiceClientError('Request aborted', {
        service: this.service,
        statusCode: 0,
        code: 'ABORTED',
        details
      });
    }
    if (timedOut) {
      return new ServiceClientError(`Request timed out after ${this.timeoutMs}ms`, {
        service: this.service,
        statusCode: 0,
        code: 'TIMEOUT',
        details
      });
    }
    return new ServiceClientError(`Request failed: ${details}`, {
      service: this.service,
      statusCode: 0,
      code: 'NETWORK_ERROR',
      details
    });
  }

  private buildUrl(path: string): URL {
    const base = this.baseUrl.toString().replace(/\/+$/, '');
    return new URL(`${base}${path}`);
  }
}

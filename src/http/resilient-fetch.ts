/**
 * Resilient JSON Fetcher
 *
 * Issues rate-limited GET requests against the platform APIs:
 * - Per-request timeout to prevent infinite hangs
 * - Bounded retries for transport errors, timeouts and non-2xx responses,
 *   spaced by the endpoint's rate limit
 * - 401/403 and unparseable bodies are reported at once, never retried
 * - Cancellation token support for user interrupts
 *
 * Expected failures are returned as values, never thrown. Only cancellation
 * throws (CancellationError), so the runner can flush partial results.
 */

import { CancellationToken } from '../core/cancellation.js';
import type { NetworkConfig } from '../config/schema.js';
import {
  AuthError,
  CancellationError,
  DecodeFailure,
  NetworkFailure,
  type FetchFailure,
} from '../errors/index.js';
import { createSilentLogger, type StructuredLogger } from '../observability/logger.js';
import { RateLimiter, type Endpoint } from './rate-limiter.js';

// =============================================================================
// TYPES
// =============================================================================

/** The part of a fetch Response the fetcher reads. */
export interface FetchResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<FetchResponseLike>;

export type QueryParams = Record<string, string | number | undefined>;

export type FetchResult<T> = { ok: true; value: T; attempts: number } | { ok: false; error: FetchFailure };

export interface ResilientFetcherOptions {
  limiter: RateLimiter;
  /** Headers sent with every request (authorization, accept) */
  headers?: Record<string, string>;
  network?: Partial<NetworkConfig>;
  fetchImpl?: FetchLike;
  cancellationToken?: CancellationToken;
  logger?: StructuredLogger;
}

type AttemptOutcome =
  | { kind: 'response'; status: number; statusText: string; ok: boolean; body: string }
  | { kind: 'error'; error: Error; timedOut: boolean };

// =============================================================================
// DEFAULT CONFIG
// =============================================================================

const DEFAULT_NETWORK: NetworkConfig = {
  maxRetries: 3,
  timeoutMs: 30000,
  retryDelayMs: 200,
};

const AUTH_STATUS_CODES = new Set([401, 403]);

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Append query parameters to a URL. Undefined values are omitted.
 */
export function buildUrl(url: string, params: QueryParams = {}): string {
  const pairs: [string, string][] = [];
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) pairs.push([key, String(value)]);
  }
  if (pairs.length === 0) return url;
  return `${url}${url.includes('?') ? '&' : '?'}${new URLSearchParams(pairs).toString()}`;
}

/**
 * Build the headers every platform request carries.
 */
export function bearerHeaders(token: string, userAgent: string): Record<string, string> {
  return {
    Accept: 'application/json',
    Authorization: `Bearer ${token}`,
    'User-Agent': userAgent,
  };
}

// =============================================================================
// RESILIENT FETCHER
// =============================================================================

export class ResilientFetcher {
  private readonly limiter: RateLimiter;
  private readonly headers: Record<string, string>;
  private readonly network: NetworkConfig;
  private readonly fetchImpl: FetchLike;
  private readonly token: CancellationToken;
  private readonly log: StructuredLogger;

  constructor(options: ResilientFetcherOptions) {
    this.limiter = options.limiter;
    this.headers = options.headers ?? {};
    this.network = { ...DEFAULT_NETWORK, ...options.network };
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.token = options.cancellationToken ?? CancellationToken.None;
    this.log = options.logger ?? createSilentLogger();
  }

  /**
   * GET `url` with `params` and parse the body as JSON.
   *
   * @example
   * ```typescript
   * const result = await fetcher.getJson('traces', 'https://nexus.weni.ai/api/agents/traces/', {
   *   project_uuid: projectUuid,
   *   log_id: messageId,
   * });
   * if (!result.ok) log.warn(result.error.message);
   * ```
   */
  async getJson(
    endpoint: Endpoint,
    url: string,
    params: QueryParams = {},
    headers: Record<string, string> = {}
  ): Promise<FetchResult<unknown>> {
    const fullUrl = buildUrl(url, params);
    const requestHeaders = { ...this.headers, ...headers };
    const context = { endpoint, url: fullUrl };
    let last: AttemptOutcome | undefined;

    for (let attempt = 1; attempt <= this.network.maxRetries; attempt++) {
      const outcome = await this.limiter.run(endpoint, () => this.attempt(fullUrl, requestHeaders), {
        token: this.token,
        minSpacingMs: attempt > 1 ? this.network.retryDelayMs : 0,
      });
      last = outcome;

      if (outcome.kind === 'response') {
        if (AUTH_STATUS_CODES.has(outcome.status)) {
          return { ok: false, error: new AuthError(outcome.status, context) };
        }
        if (outcome.ok) {
          return this.parseBody(outcome.body, attempt, context);
        }
      }

      if (attempt < this.network.maxRetries) {
        this.log.warn('Request failed, retrying', {
          ...context,
          attempt,
          reason: describeOutcome(outcome),
        });
      }
    }

    return { ok: false, error: this.exhausted(endpoint, last, context) };
  }

  private async attempt(url: string, headers: Record<string, string>): Promise<AttemptOutcome> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.network.timeoutMs);
    const registration = this.token.register(() => controller.abort());

    try {
      const response = await this.fetchImpl(url, { method: 'GET', headers, signal: controller.signal });
      const body = await response.text();
      return { kind: 'response', status: response.status, statusText: response.statusText, ok: response.ok, body };
    } catch (error) {
      if (this.token.isCancellationRequested) {
        throw new CancellationError(this.token.cancellationReason);
      }
      const err = error instanceof Error ? error : new Error(String(error));
      return { kind: 'error', error: err, timedOut };
    } finally {
      clearTimeout(timeoutId);
      registration.dispose();
    }
  }

  private parseBody(body: string, attempts: number, context: Record<string, unknown>): FetchResult<unknown> {
    try {
      return { ok: true, value: JSON.parse(body), attempts };
    } catch (err) {
      return {
        ok: false,
        error: new DecodeFailure(
          'Response body is not valid JSON',
          { ...context, bodyPreview: body.slice(0, 200) },
          [],
          err instanceof Error ? err : undefined
        ),
      };
    }
  }

  private exhausted(
    endpoint: Endpoint,
    last: AttemptOutcome | undefined,
    context: Record<string, unknown>
  ): NetworkFailure {
    const attempts = this.network.maxRetries;
    if (last?.kind === 'response') {
      return new NetworkFailure(
        `${endpoint} request failed after ${attempts} attempts: HTTP ${last.status} ${last.statusText}`.trim(),
        attempts,
        { statusCode: last.status, context }
      );
    }
    if (last?.kind === 'error' && last.timedOut) {
      return new NetworkFailure(
        `${endpoint} request timed out after ${attempts} attempts (${this.network.timeoutMs}ms each)`,
        attempts,
        { isTimeout: true, context, cause: last.error }
      );
    }
    return new NetworkFailure(
      `${endpoint} network error after ${attempts} attempts: ${last?.error.message ?? 'no attempt made'}`,
      attempts,
      { context, cause: last?.error }
    );
  }
}

function describeOutcome(outcome: AttemptOutcome): string {
  if (outcome.kind === 'response') return `HTTP ${outcome.status}`;
  return outcome.timedOut ? 'timeout' : outcome.error.message;
}

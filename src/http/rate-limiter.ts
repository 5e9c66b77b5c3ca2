/**
 * Per-endpoint rate limiting.
 *
 * Each endpoint has its own minimum spacing between the end of one call and
 * the start of the next: the conversation listing is expensive and gets a
 * longer delay than the trace lookup. The first call to an endpoint never
 * waits. Time is read through an injected Timer so tests can assert spacing
 * without real waits.
 */

import type { RateLimitConfig } from '../config/schema.js';
import { CancellationToken, sleep } from '../core/cancellation.js';

export type Endpoint = 'conversations' | 'messages' | 'traces';

/** Minimum spacing in ms per endpoint. */
export type RateLimitPolicy = Readonly<Record<Endpoint, number>>;

export const DEFAULT_RATE_LIMIT_POLICY: RateLimitPolicy = {
  conversations: 500,
  messages: 0,
  traces: 200,
};

export function rateLimitPolicyFrom(config: RateLimitConfig): RateLimitPolicy {
  return {
    conversations: config.conversationsMs,
    messages: config.messagesMs,
    traces: config.tracesMs,
  };
}

export interface Timer {
  now(): number;
  sleep(ms: number, token?: CancellationToken): Promise<void>;
}

export const systemTimer: Timer = {
  now: () => Date.now(),
  sleep: (ms, token) => sleep(ms, token),
};

export interface RateLimitedCallOptions {
  token?: CancellationToken;
  /** Spacing floor for this call, e.g. the retry delay */
  minSpacingMs?: number;
}

export class RateLimiter {
  private readonly lastCompleted = new Map<Endpoint, number>();

  constructor(
    private readonly policy: RateLimitPolicy = DEFAULT_RATE_LIMIT_POLICY,
    private readonly timer: Timer = systemTimer
  ) {}

  delayFor(endpoint: Endpoint): number {
    return this.policy[endpoint];
  }

  /**
   * Wait until `endpoint` may be called again. Resolves with the time waited.
   * Rejects with CancellationError if the token is cancelled while waiting.
   */
  async acquire(endpoint: Endpoint, options: RateLimitedCallOptions = {}): Promise<number> {
    const token = options.token ?? CancellationToken.None;
    token.throwIfCancellationRequested();

    const last = this.lastCompleted.get(endpoint);
    if (last === undefined) return 0;

    const spacing = Math.max(this.policy[endpoint], options.minSpacingMs ?? 0);
    const remaining = last + spacing - this.timer.now();
    if (remaining <= 0) return 0;

    await this.timer.sleep(remaining, token);
    return remaining;
  }

  /**
   * Run one call against `endpoint`, spaced from the previous one.
   * The spacing clock restarts when the call settles, successful or not.
   */
  async run<T>(endpoint: Endpoint, call: () => Promise<T>, options: RateLimitedCallOptions = {}): Promise<T> {
    await this.acquire(endpoint, options);
    try {
      return await call();
    } finally {
      this.lastCompleted.set(endpoint, this.timer.now());
    }
  }
}

/**
 * Run cancellation
 *
 * One source per run. main.ts cancels it on the first SIGINT/SIGTERM with
 * "Interrupted by <signal>" as reason. From then on:
 *   - the runner stops at the next conversation or message boundary and keeps
 *     what it has folded so far;
 *   - the fetcher aborts the request in flight;
 *   - the rate limiter and retry waits reject instead of sleeping out.
 *
 * Usage:
 *   const cts = createCancellationTokenSource();
 *   process.once('SIGINT', () => cts.cancel('Interrupted by SIGINT'));
 *   await runAnalysis(request, { api, cancellationToken: cts.token });
 */

import { CancellationError } from '../errors/index.js';

type CancelListener = (reason?: string) => void;

/** What the pipeline sees: it may observe cancellation, never trigger it. */
export interface CancellationToken {
  readonly isCancellationRequested: boolean;
  /** The signal or message passed to `cancel` */
  readonly cancellationReason?: string;
  /** Listeners registered after cancellation run immediately. */
  register(listener: CancelListener): { dispose: () => void };
  /** Throws CancellationError carrying the reason. */
  throwIfCancellationRequested(): void;
}

/** Held by the entry point only. */
export interface CancellationTokenSource {
  readonly token: CancellationToken;
  readonly isCancellationRequested: boolean;
  /** Later calls are ignored; the first reason sticks. */
  cancel(reason?: string): void;
}

const noop = (): void => {};

class RunCancellationToken implements CancellationToken {
  private requested = false;
  private reason: string | undefined;
  private readonly listeners = new Set<CancelListener>();

  get isCancellationRequested(): boolean {
    return this.requested;
  }

  get cancellationReason(): string | undefined {
    return this.reason;
  }

  register(listener: CancelListener): { dispose: () => void } {
    if (this.requested) {
      listener(this.reason);
      return { dispose: noop };
    }
    this.listeners.add(listener);
    return { dispose: () => this.listeners.delete(listener) };
  }

  throwIfCancellationRequested(): void {
    if (this.requested) throw new CancellationError(this.reason);
  }

  trip(reason?: string): void {
    if (this.requested) return;
    this.requested = true;
    this.reason = reason;

    // listeners may dispose themselves while we notify
    const pending = [...this.listeners];
    this.listeners.clear();
    pending.forEach((listener) => listener(reason));
  }
}

export function createCancellationTokenSource(): CancellationTokenSource {
  const token = new RunCancellationToken();
  return {
    token,
    get isCancellationRequested() {
      return token.isCancellationRequested;
    },
    cancel: (reason?: string) => token.trip(reason),
  };
}

/** Never cancelled; used when a component is built without a token. */
export const CancellationToken: { None: CancellationToken } = {
  None: {
    isCancellationRequested: false,
    cancellationReason: undefined,
    register: () => ({ dispose: noop }),
    throwIfCancellationRequested: noop,
  },
};

/**
 * Wait `ms` milliseconds. Used for rate-limit spacing and retry delays;
 * rejects with CancellationError as soon as the token trips.
 */
export function sleep(ms: number, token: CancellationToken = CancellationToken.None): Promise<void> {
  return new Promise((resolve, reject) => {
    if (token.isCancellationRequested) {
      reject(new CancellationError(token.cancellationReason));
      return;
    }

    const registration = token.register((reason) => {
      clearTimeout(timer);
      reject(new CancellationError(reason));
    });
    const timer = setTimeout(() => {
      registration.dispose();
      resolve();
    }, ms);
  });
}

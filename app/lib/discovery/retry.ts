/**
 * retry.ts
 *
 * Rate-limit aware retry around every upstream catalog call.
 * One instance is shared by all workers of a run: call counts are global, and
 * a rate limit seen by one worker pauses every worker until it lifts.
 */

import {
  CatalogError,
  DeadlineExceededError,
  errorMessage,
  isCatalogError,
} from "../errors";

export interface RetryPolicyOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  jitterMs?: number;
  callDeadlineMs?: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
  random?: () => number;
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}

/**
 * Per-operation invocation counts, including retried attempts.
 */
export class CallCounter {
  private counts = new Map<string, number>();

  increment(operation: string): void {
    this.counts.set(operation, (this.counts.get(operation) ?? 0) + 1);
  }

  get(operation: string): number {
    return this.counts.get(operation) ?? 0;
  }

  total(): number {
    let sum = 0;
    for (const value of this.counts.values()) sum += value;
    return sum;
  }

  snapshot(): Record<string, number> {
    return Object.fromEntries(
      [...this.counts.entries()].sort(([a], [b]) => a.localeCompare(b)),
    );
  }

  reset(): void {
    this.counts.clear();
  }
}

export class RetryPolicy {
  readonly calls = new CallCounter();

  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly jitterMs: number;
  private readonly callDeadlineMs: number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => number;
  private readonly random: () => number;
  // Shared across workers: no call starts before this time
  private blockedUntil = 0;

  constructor(options: RetryPolicyOptions = {}) {
    this.maxRetries = options.maxRetries ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 2000;
    this.jitterMs = options.jitterMs ?? 250;
    this.callDeadlineMs = options.callDeadlineMs ?? 120_000;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
  }

  /**
   * Run `call`, retrying rate limits (uncapped, until the per-call deadline)
   * and transient errors (exponential backoff, at most `maxRetries` times).
   * Permanent errors are rethrown immediately.
   */
  async execute<T>(
    operation: string,
    call: () => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const deadline = this.now() + this.callDeadlineMs;
    let transientRetries = 0;
    let waitedUntil = 0;

    for (;;) {
      if (this.blockedUntil > waitedUntil) {
        waitedUntil = this.blockedUntil;
        const waitMs = waitedUntil - this.now();
        if (waitMs > 0) {
          console.warn(`[RETRY] ${operation} paused ${waitMs}ms for a shared rate limit`);
          await this.pause(operation, waitMs, signal);
        }
      }

      this.calls.increment(operation);

      let failure: CatalogError;
      try {
        return await call();
      } catch (error) {
        failure = classify(operation, error);
      }

      if (failure.kind === "permanent") throw failure;

      let delayMs: number;
      if (failure.kind === "rate_limited") {
        delayMs =
          failure.retryAfterSeconds !== null
            ? failure.retryAfterSeconds * 1000
            : this.baseDelayMs;
        console.warn(
          `[RETRY] ${operation} rate limited, waiting ${delayMs / 1000}s`,
        );
      } else {
        if (transientRetries >= this.maxRetries) {
          throw new CatalogError(
            "transient",
            `${operation} failed after ${this.maxRetries} retries: ${failure.message}`,
            { status: failure.status, cause: failure },
          );
        }
        transientRetries++;
        delayMs =
          this.baseDelayMs * 2 ** (transientRetries - 1) +
          Math.floor(this.random() * this.jitterMs);
        console.warn(
          `[RETRY] ${operation} transient error (${failure.message}), retry ${transientRetries}/${this.maxRetries} in ${delayMs}ms`,
        );
      }

      if (this.now() + delayMs > deadline) {
        throw new CatalogError(
          failure.kind,
          `${operation} exceeded its ${this.callDeadlineMs}ms deadline: ${failure.message}`,
          {
            retryAfterSeconds: failure.retryAfterSeconds,
            status: failure.status,
            cause: failure,
          },
        );
      }

      if (failure.kind === "rate_limited") {
        waitedUntil = this.now() + delayMs;
        this.blockedUntil = Math.max(this.blockedUntil, waitedUntil);
      }
      await this.pause(operation, delayMs, signal);
    }
  }

  private async pause(operation: string, ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new DeadlineExceededError(`${operation} abandoned: run aborted`);
    }
    await this.sleep(ms, signal);
    if (signal?.aborted) {
      throw new DeadlineExceededError(`${operation} abandoned: run aborted`);
    }
  }
}

function classify(operation: string, error: unknown): CatalogError {
  if (isCatalogError(error)) return error;
  return new CatalogError(
    "permanent",
    `${operation} failed unexpectedly: ${errorMessage(error)}`,
    { cause: error },
  );
}

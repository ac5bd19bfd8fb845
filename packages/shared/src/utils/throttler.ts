import { logger } from './logger.js';
import { LlmTimeoutError, RateLimitedError } from '../types/errors.js';

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));

export interface ThrottlerOptions {
  requestsPerMinute: number;
  burstLimit: number;
  windowMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Client-side throttle shared by every remote call site.
 *
 * Two limits apply: at most `burstLimit` calls in flight, and at most
 * `requestsPerMinute` calls started inside any rolling window. Callers bracket
 * a call with `acquire()` / `release()`, or use `run()` which does both.
 */
export class ApiThrottler {
  private requestTimes: number[] = [];
  private active = 0;
  private waiters: Array<() => void> = [];
  private gate: Promise<void> = Promise.resolve();
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: ThrottlerOptions) {
    this.windowMs = options.windowMs ?? 60_000;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
  }

  /** Resolves once a slot is available. Acquisitions are granted in call order. */
  acquire(): Promise<void> {
    const turn = this.gate.then(() => this.waitForSlot());
    this.gate = turn.catch(() => undefined);
    return turn;
  }

  release(): void {
    this.active = Math.max(0, this.active - 1);
    const next = this.waiters.shift();
    if (next) next();
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  get inFlight(): number {
    return this.active;
  }

  private async waitForSlot(): Promise<void> {
    while (this.active >= this.options.burstLimit) {
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }

    for (;;) {
      const now = this.now();
      this.requestTimes = this.requestTimes.filter((t) => now - t < this.windowMs);
      if (this.requestTimes.length < this.options.requestsPerMinute) break;

      const waitMs = this.requestTimes[0] + this.windowMs - now + 1;
      logger.debug(`Throttler window full, waiting ${waitMs}ms`);
      await this.sleep(waitMs);
    }

    this.requestTimes.push(this.now());
    this.active++;
  }
}

export interface BackoffOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  label?: string;
}

/** Capped exponential delay for the n-th retry (1-based). */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
}

/**
 * Retry `fn` on rate-limit errors with capped exponential backoff. Other
 * errors, and the last rate-limit error, are rethrown unchanged.
 */
export async function withBackoff<T>(fn: () => Promise<T>, options: BackoffOptions): Promise<T> {
  const shouldRetry = options.shouldRetry ?? ((e: unknown) => e instanceof RateLimitedError);
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= options.maxAttempts || !shouldRetry(error)) throw error;

      let delay = backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs);
      if (error instanceof RateLimitedError && error.retryAfterMs > delay) {
        delay = Math.min(options.maxDelayMs, error.retryAfterMs);
      }

      logger.warn(`${options.label ?? 'remote call'} rate limited, retrying`, {
        attempt,
        duration: delay,
      });
      await wait(delay);
    }
  }
}

/**
 * Run `fn` with an abort signal that fires after `timeoutMs`. The returned
 * promise rejects with `LlmTimeoutError` at the deadline even if `fn`
 * ignores the signal.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new LlmTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

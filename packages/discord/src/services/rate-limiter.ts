import {
  DEFAULT_RATE_LIMITS,
  RateLimitedError,
  logger,
  type RateLimitAction,
  type RateLimitRule,
} from '@banterbot/shared';

export interface RateLimiterOptions {
  enabled: boolean;
  rules?: Readonly<Record<RateLimitAction, RateLimitRule>>;
  now?: () => number;
}

const CLEANUP_INTERVAL_MS = 60 * 60 * 1000;

/**
 * Sliding-window limiter, one window per user per action. A blocked call
 * throws `RateLimitedError` whose message is meant for the user.
 */
export class RateLimiter {
  private readonly history = new Map<string, number[]>();
  private readonly rules: Readonly<Record<RateLimitAction, RateLimitRule>>;
  private readonly now: () => number;
  private lastCleanup: number;

  constructor(private readonly options: RateLimiterOptions) {
    this.rules = options.rules ?? DEFAULT_RATE_LIMITS;
    this.now = options.now ?? Date.now;
    this.lastCleanup = this.now();
  }

  check(userId: string, action: RateLimitAction = 'default'): void {
    if (!this.options.enabled) return;

    const now = this.now();
    if (now - this.lastCleanup > CLEANUP_INTERVAL_MS) this.cleanup(now);

    const [max, windowSeconds] = this.rules[action];
    const windowMs = windowSeconds * 1000;
    const key = `${userId}:${action}`;
    const recent = (this.history.get(key) ?? []).filter((t) => now - t < windowMs);

    if (recent.length >= max) {
      const retryAfterMs = recent[0] + windowMs - now;
      this.history.set(key, recent);
      logger.warn(`⏳ Rate limited ${userId} on ${action}`, { userId, retryAfterMs });
      throw new RateLimitedError(
        `Rate limited, try again in ${(retryAfterMs / 1000).toFixed(1)} seconds`,
        retryAfterMs,
        { userId, action }
      );
    }

    recent.push(now);
    this.history.set(key, recent);
  }

  /** Drop timestamps older than the longest window. */
  cleanup(now: number = this.now()): void {
    const longest = Math.max(...Object.values(this.rules).map(([, seconds]) => seconds)) * 1000;
    for (const [key, stamps] of this.history) {
      const kept = stamps.filter((t) => now - t < longest);
      if (kept.length > 0) this.history.set(key, kept);
      else this.history.delete(key);
    }
    this.lastCleanup = now;
  }

  get trackedKeys(): number {
    return this.history.size;
  }
}

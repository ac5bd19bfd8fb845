// Error taxonomy shared by every package. None of these should cross a
// per-message boundary: handlers catch them and degrade to an in-character reply.

export class BotError extends Error {
  constructor(
    message: string,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'BotError';
  }
}

export class ConfigError extends BotError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.name = 'ConfigError';
  }
}

/**
 * A remote classification or extraction call failed, or returned output that
 * could not be decoded. Always recovered locally as a `none` intent or a no-op.
 */
export class ClassificationFailure extends BotError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.name = 'ClassificationFailure';
  }
}

/**
 * Raised by a throttled remote call (HTTP 429 / quota) or by the per-user
 * action limiter. The message is safe to show to the user.
 */
export class RateLimitedError extends BotError {
  constructor(
    message: string,
    public retryAfterMs: number,
    context?: Record<string, unknown>
  ) {
    super(message, context);
    this.name = 'RateLimitedError';
  }
}

export class LlmTimeoutError extends BotError {
  constructor(
    public timeoutMs: number,
    context?: Record<string, unknown>
  ) {
    super(`LLM call timed out after ${timeoutMs}ms`, context);
    this.name = 'LlmTimeoutError';
  }
}

/** A correction or removal referenced a fact index that no longer exists. */
export class BoundsError extends BotError {
  constructor(
    public index: number,
    public length: number
  ) {
    super(`Fact index ${index} out of range (0..${length - 1})`, { index, length });
    this.name = 'BoundsError';
  }
}

export class PersistenceFailure extends BotError {
  constructor(
    message: string,
    public userId: string,
    context?: Record<string, unknown>
  ) {
    super(message, context);
    this.name = 'PersistenceFailure';
  }
}

export function isRateLimitedError(error: unknown): error is RateLimitedError {
  return error instanceof RateLimitedError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

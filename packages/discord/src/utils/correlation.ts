import { randomUUID } from 'crypto';
import { BoundedCache } from '@banterbot/shared';

/**
 * Generate a correlation ID for tracking one message through routing,
 * generation and delivery
 */
export function generateCorrelationId(): string {
  return randomUUID();
}

/** Last 8 chars, for log lines */
export function getShortCorrelationId(correlationId: string): string {
  return correlationId.slice(-8);
}

/** Remembers the correlation ID handed out for each Discord message or interaction. */
export class CorrelationRegistry {
  private readonly ids: BoundedCache<string, string>;

  constructor(maxEntries: number = 1000) {
    this.ids = new BoundedCache(maxEntries);
  }

  forMessage(messageId: string): string {
    const key = `message:${messageId}`;
    const existing = this.ids.get(key);
    if (existing) return existing;

    const correlationId = generateCorrelationId();
    this.ids.set(key, correlationId);
    return correlationId;
  }

  get size(): number {
    return this.ids.size;
  }
}

import { describe, it, expect, beforeEach } from 'vitest';
import { DEFAULT_RATE_LIMITS, RateLimitedError } from '@banterbot/shared';
import { RateLimiter } from '../src/services/rate-limiter.js';

describe('RateLimiter', () => {
  let now: number;
  let limiter: RateLimiter;

  beforeEach(() => {
    now = 0;
    limiter = new RateLimiter({
      enabled: true,
      rules: { ...DEFAULT_RATE_LIMITS, info: [2, 60] },
      now: () => now,
    });
  });

  it('should allow actions up to the limit and block the next one', () => {
    limiter.check('1001', 'info');
    now = 1000;
    limiter.check('1001', 'info');
    now = 2000;

    expect(() => limiter.check('1001', 'info')).toThrow('Rate limited, try again in 58.0 seconds');
  });

  it('should report how long until the oldest action leaves the window', () => {
    limiter.check('1001', 'info');
    limiter.check('1001', 'info');
    now = 15_000;

    let caught: unknown;
    try {
      limiter.check('1001', 'info');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(RateLimitedError);
    expect(caught instanceof RateLimitedError && caught.retryAfterMs).toBe(45_000);
  });

  it('should slide the window', () => {
    limiter.check('1001', 'info');
    now = 1000;
    limiter.check('1001', 'info');

    now = 60_000;
    expect(() => limiter.check('1001', 'info')).not.toThrow();
    expect(() => limiter.check('1001', 'info')).toThrow(RateLimitedError);
  });

  it('should not count blocked attempts', () => {
    limiter.check('1001', 'info');
    limiter.check('1001', 'info');
    for (let i = 0; i < 5; i++) {
      expect(() => limiter.check('1001', 'info')).toThrow(RateLimitedError);
    }

    now = 60_000;
    expect(() => limiter.check('1001', 'info')).not.toThrow();
  });

  it('should keep users and actions apart', () => {
    limiter.check('1001', 'info');
    limiter.check('1001', 'info');

    expect(() => limiter.check('1002', 'info')).not.toThrow();
    expect(() => limiter.check('1001', 'chat')).not.toThrow();
    expect(limiter.trackedKeys).toBe(3);
  });

  it('should never block when disabled', () => {
    const open = new RateLimiter({ enabled: false, rules: { ...DEFAULT_RATE_LIMITS, info: [1, 60] } });
    for (let i = 0; i < 10; i++) {
      expect(() => open.check('1001', 'info')).not.toThrow();
    }
    expect(open.trackedKeys).toBe(0);
  });

  it('should drop history older than the longest window on cleanup', () => {
    limiter.check('1001', 'info');
    limiter.check('1002', 'forget');

    limiter.cleanup(3_600_001);

    expect(limiter.trackedKeys).toBe(0);
  });
});

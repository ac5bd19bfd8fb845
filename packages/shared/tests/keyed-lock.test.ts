import { describe, it, expect } from 'vitest';
import { PerKeyLock } from '../src/utils/keyed-lock.js';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe('PerKeyLock', () => {
  it('should run callers for the same key one at a time, in call order', async () => {
    const lock = new PerKeyLock<string>();
    const events: string[] = [];

    let releaseFirst: () => void = () => {};
    const firstGate = new Promise<void>((r) => {
      releaseFirst = r;
    });

    const first = lock.runExclusive('u1', async () => {
      events.push('first:start');
      await firstGate;
      events.push('first:end');
    });
    const second = lock.runExclusive('u1', async () => {
      events.push('second:start');
    });

    await tick();
    expect(events).toEqual(['first:start']);

    releaseFirst();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('should not block different keys', async () => {
    const lock = new PerKeyLock<string>();
    const events: string[] = [];

    let releaseA: () => void = () => {};
    const gateA = new Promise<void>((r) => {
      releaseA = r;
    });

    const a = lock.runExclusive('a', async () => {
      await gateA;
      events.push('a');
    });
    const b = lock.runExclusive('b', async () => {
      events.push('b');
    });

    await b;
    expect(events).toEqual(['b']);
    releaseA();
    await a;
    expect(events).toEqual(['b', 'a']);
  });

  it('should release the key when the callback throws', async () => {
    const lock = new PerKeyLock<string>();
    await expect(
      lock.runExclusive('k', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(lock.runExclusive('k', async () => 'next')).resolves.toBe('next');
    await tick();
    expect(lock.activeCount).toBe(0);
  });
});

import { describe, it, expect } from 'vitest';
import { ChannelMemory } from '../src/services/context/channel-memory.js';

function memory(overrides: Partial<ConstructorParameters<typeof ChannelMemory>[0]> = {}): ChannelMemory {
  return new ChannelMemory({
    channelHistorySize: 3,
    memorySize: 2,
    maxTrackedChannels: 10,
    commandPrefix: '/',
    ...overrides,
  });
}

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('ChannelMemory', () => {
  it('should store commands without their prefix', () => {
    const channels = memory();
    channels.recordInbound('c1', { authorId: '1', authorName: 'alice', content: '/game 10' });
    channels.recordInbound('c1', { authorId: '1', authorName: 'alice', content: '//not a command' });

    expect(channels.snapshot('c1').recentMessages.map((m) => m.content)).toEqual(['game 10', '//not a command']);
  });

  it('should cap recent messages and the memory log', () => {
    const channels = memory();
    for (let i = 0; i < 5; i++) {
      channels.recordInbound('c1', { authorId: '1', authorName: 'alice', content: `m${i}` });
      channels.recordExchange('c1', 'alice', `q${i}`, 'Banter', `a${i}`);
    }

    const view = channels.snapshot('c1');
    expect(view.recentMessages.map((m) => m.content)).toEqual(['m2', 'm3', 'm4']);
    expect(view.memoryLog).toEqual(['USER (alice): q3', 'BOT (Banter): a3', 'USER (alice): q4', 'BOT (Banter): a4']);
  });

  it('should return an empty snapshot for an unknown channel', () => {
    expect(memory().snapshot('nope')).toEqual({ channelId: 'nope', recentMessages: [], memoryLog: [] });
  });

  it('should drop the least recently used channel', () => {
    const channels = memory({ maxTrackedChannels: 2 });
    channels.recordInbound('c1', { authorId: '1', authorName: 'alice', content: 'a' });
    channels.recordInbound('c2', { authorId: '1', authorName: 'alice', content: 'b' });
    channels.recordInbound('c1', { authorId: '1', authorName: 'alice', content: 'c' });
    channels.recordInbound('c3', { authorId: '1', authorName: 'alice', content: 'd' });

    const contents = (channelId: string) => channels.snapshot(channelId).recentMessages.map((m) => m.content);
    expect(contents('c1')).toEqual(['a', 'c']);
    expect(contents('c2')).toEqual([]);
    expect(contents('c3')).toEqual(['d']);
    expect(channels.trackedChannels).toBe(2);
  });

  it('should find the last bot message and recent human authors', () => {
    const channels = memory({ channelHistorySize: 10 });
    channels.recordInbound('c1', { authorId: '1', authorName: 'alice', content: 'hi' });
    channels.recordBotMessage('c1', '900', 'Banter', 'yo');
    channels.recordInbound('c1', { authorId: '2', authorName: 'bob', content: 'sup' });

    expect(channels.lastBotMessage('c1')?.content).toBe('yo');
    expect([...channels.recentHumanAuthors('c1', 5)]).toEqual(['1', '2']);
    expect([...channels.recentHumanAuthors('c1', 1)]).toEqual(['2']);
  });

  describe('commitInOrder', () => {
    it('should commit in arrival order even when a later reply is ready first', async () => {
      const channels = memory();
      const first = deferred<string>();
      const second = deferred<string>();
      const committed: string[] = [];

      const a = channels.commitInOrder('c1', first.promise, (v) => {
        committed.push(v);
      });
      const b = channels.commitInOrder('c1', second.promise, (v) => {
        committed.push(v);
      });

      second.resolve('second');
      await Promise.resolve();
      expect(committed).toEqual([]);

      first.resolve('first');
      await Promise.all([a, b]);
      expect(committed).toEqual(['first', 'second']);
    });

    it('should keep going after a failed reply', async () => {
      const channels = memory();
      const failing = deferred<string>();
      const committed: string[] = [];

      const a = channels.commitInOrder('c1', failing.promise, (v) => {
        committed.push(v);
      });
      const b = channels.commitInOrder('c1', Promise.resolve('later'), (v) => {
        committed.push(v);
      });
      failing.reject(new Error('boom'));

      await expect(a).rejects.toThrow('boom');
      await expect(b).resolves.toBe('later');
      expect(committed).toEqual(['later']);
    });

    it('should not order different channels against each other', async () => {
      const channels = memory();
      const slow = deferred<string>();
      const committed: string[] = [];

      const a = channels.commitInOrder('c1', slow.promise, (v) => {
        committed.push(v);
      });
      await channels.commitInOrder('c2', Promise.resolve('other'), (v) => {
        committed.push(v);
      });
      expect(committed).toEqual(['other']);

      slow.resolve('slow');
      await a;
      expect(committed).toEqual(['other', 'slow']);
    });
  });
});

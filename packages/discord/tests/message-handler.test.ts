import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { describe, it, expect } from 'vitest';
import { toInboundMessage, type MessageSource } from '../src/handlers/message-handler.js';

function source(overrides: Partial<MessageSource> = {}): MessageSource {
  return {
    author: { id: '1001', displayName: 'alice' },
    member: null,
    channelId: 'c1',
    content: 'hey',
    guildId: 'g1',
    mentions: { repliedUser: null },
    ...overrides,
  };
}

describe('toInboundMessage', () => {
  it('should take the replied-to author from the message mentions', () => {
    const inbound = toInboundMessage(source({ mentions: { repliedUser: { id: '900' } } }), '900', 'corr-1');

    expect(inbound).toEqual({
      authorId: '1001',
      authorName: 'alice',
      channelId: 'c1',
      text: 'hey',
      isDirectMessage: false,
      replyToAuthorId: '900',
      isFromSelf: false,
      correlationId: 'corr-1',
    });
  });

  it('should prefer the server nickname and mark direct messages', () => {
    const inbound = toInboundMessage(source({ member: { displayName: 'Ali' }, guildId: null }), '900', 'corr-2');

    expect(inbound.authorName).toBe('Ali');
    expect(inbound.isDirectMessage).toBe(true);
    expect(inbound.replyToAuthorId).toBeNull();
  });
});

describe('entry points', () => {
  it('should load the environment before any other module', async () => {
    for (const entry of ['../src/index.ts', '../register-commands.ts']) {
      const text = await readFile(fileURLToPath(new URL(entry, import.meta.url)), 'utf-8');
      const firstImport = text.split('\n').find((line) => line.startsWith('import '));
      expect(firstImport).toMatch(/^import '\.\/(src\/)?env\.js';$/);
    }
  });
});

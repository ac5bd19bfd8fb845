import { describe, it, expect } from 'vitest';
import { createEmptyProfile, type ChannelMessage, type ChannelSnapshot } from '@banterbot/shared';
import { ContextBuilder } from '../src/services/context/context-builder.js';

const options = { displayContextSize: 40, memorySize: 30, factLimit: 15, maxChars: 2000 };

function message(content: string, isBot = false): ChannelMessage {
  return {
    authorId: isBot ? '900' : '100',
    authorName: isBot ? 'Banter' : 'alice',
    isBot,
    content,
    timestamp: '2024-05-01T12:00:00.000Z',
  };
}

function snapshot(recentMessages: ChannelMessage[], memoryLog: string[] = []): ChannelSnapshot {
  return { channelId: 'c1', recentMessages, memoryLog };
}

describe('ContextBuilder', () => {
  it('should render every section in order', () => {
    const profile = createEmptyProfile('100', 'alice');
    profile.facts = [{ content: 'You like pizza', extractedFrom: '', timestamp: '' }];
    profile.topicsOfInterest = ['chess'];

    const built = new ContextBuilder(options).build(
      snapshot([message('hey'), message('yo', true)], ['USER (alice): hey', 'BOT (Banter): yo']),
      profile
    );

    expect(built).toBe(
      [
        'RECENT CHANNEL MESSAGES (IN ORDER):',
        'USER (alice): "hey"',
        'BOT (Banter): "yo"',
        '',
        'CONVERSATION HISTORY:',
        'USER (alice): hey',
        'BOT (Banter): yo',
        '',
        'FACTS ABOUT THIS USER:',
        '- You like pizza',
        '',
        'USER INTERESTS: chess',
      ].join('\n')
    );
  });

  it('should add a follow-up note for a short reply to the bot', () => {
    const built = new ContextBuilder(options).build(
      snapshot([message('wanna play a game?', true), message('sure')]),
      null
    );

    expect(built.split('\n')).toContain(
      'FOLLOW-UP NOTE: The user\'s message "sure" is a short reply to your last message "wanna play a game?". Answer it in that context.'
    );
  });

  it('should not add a follow-up note for a long message', () => {
    const built = new ContextBuilder(options).build(
      snapshot([message('hi', true), message('so i was thinking about what you said yesterday')]),
      null
    );

    expect(built).not.toContain('FOLLOW-UP NOTE');
  });

  it('should add the correction note when asked', () => {
    const built = new ContextBuilder(options).build(snapshot([message('no thats wrong')]), null, {
      isCorrection: true,
    });

    expect(built.endsWith(
      'CORRECTION NOTE: The user is correcting something said earlier. Acknowledge the corrected information and use it from now on.'
    )).toBe(true);
  });

  it('should keep only the most recent facts up to the limit', () => {
    const profile = createEmptyProfile('100');
    profile.facts = Array.from({ length: 20 }, (_, i) => ({ content: `fact ${i}`, extractedFrom: '', timestamp: '' }));

    const lines = new ContextBuilder(options).build(snapshot([]), profile).split('\n');

    expect(lines).toContain('- fact 5');
    expect(lines).toContain('- fact 19');
    expect(lines).not.toContain('- fact 4');
  });

  it('should stay under the limit and keep the latest user and bot lines', () => {
    const filler = 'x'.repeat(80);
    const recent = Array.from({ length: 40 }, (_, i) => message(`message ${i} ${filler}`, i % 2 === 1));
    const log = Array.from({ length: 60 }, (_, i) => `USER (alice): line ${i} ${filler}`);
    const builder = new ContextBuilder(options);

    const built = builder.build(snapshot(recent, log), null);
    const lines = built.split('\n');

    expect(built.length).toBeLessThanOrEqual(2000);
    expect(lines).toContain(`USER (alice): "message 38 ${filler}"`);
    expect(lines).toContain(`BOT (Banter): "message 39 ${filler}"`);
    expect(lines).toContain(`USER (alice): line 59 ${filler}`);
    expect(lines).not.toContain(`USER (alice): "message 0 ${filler}"`);
    expect(builder.build(snapshot(recent, log), null)).toBe(built);
  });

  it('should shorten pinned lines when nothing else is left to drop', () => {
    const huge = 'y'.repeat(1000);
    const builder = new ContextBuilder({ ...options, maxChars: 600 });

    const built = builder.build(snapshot([message(huge), message(huge, true)]), null);

    expect(built.length).toBeLessThanOrEqual(600);
    expect(built).toContain(`USER (alice): "${'y'.repeat(185)}…`);
  });

  it('should keep a short reply and the start of a long bot message under a tight limit', () => {
    const long = `Octopuses have three hearts. ${'a'.repeat(671)}`;
    const channel = snapshot([message('tell me about octopuses'), message(long, true), message('why tho')]);

    for (const maxChars of [600, 300]) {
      const built = new ContextBuilder({ ...options, maxChars }).build(channel, null);
      const lines = built.split('\n');

      expect(built.length).toBeLessThanOrEqual(maxChars);
      expect(lines[0]).toBe('RECENT CHANNEL MESSAGES (IN ORDER):');
      expect(lines[1].startsWith('BOT (Banter): "Octopuses have three hearts.')).toBe(true);
      expect(lines[2]).toBe('USER (alice): "why tho"');
      expect(built).toContain('FOLLOW-UP NOTE: The user\'s message "why tho" is a short reply to your last message "Octopuses');
      expect(lines).not.toContain('USER (alice): "tell me about octopuses"');
    }
  });
});

import { createEmptyProfile, type UserProfile } from '@banterbot/shared';
import type { GenerateOptions, ProfileRepository, ResponseGenerator } from '@banterbot/capabilities';
import type { InboundMessage, ReplySink, SendOptions } from '../../src/services/message-router.js';

type Reply = string | Error | ((prompt: string) => string);

/** Replays canned model output in order and records every prompt it was given. */
export class ScriptedGenerator implements ResponseGenerator {
  readonly prompts: string[] = [];

  constructor(
    private readonly replies: Reply[] = [],
    private readonly fallback: string = '[]'
  ) {}

  push(...replies: Reply[]): void {
    this.replies.push(...replies);
  }

  async generate(prompt: string, _options?: GenerateOptions): Promise<string> {
    this.prompts.push(prompt);
    const next = this.replies.shift();
    if (next === undefined) return this.fallback;
    if (next instanceof Error) throw next;
    return typeof next === 'function' ? next(prompt) : next;
  }
}

/** Holds every call open until the test answers it. */
export class DeferredGenerator implements ResponseGenerator {
  readonly pending: Array<{ prompt: string; resolve: (text: string) => void }> = [];

  generate(prompt: string): Promise<string> {
    return new Promise((resolve) => {
      this.pending.push({ prompt, resolve });
    });
  }

  answer(fragment: string, reply: string): void {
    const at = this.pending.findIndex((p) => p.prompt.includes(fragment));
    if (at < 0) throw new Error(`No pending prompt contains ${fragment}`);
    const [entry] = this.pending.splice(at, 1);
    entry.resolve(reply);
  }
}

export class MemoryProfileRepository implements ProfileRepository {
  private readonly profiles = new Map<string, UserProfile>();

  async load(userId: string, displayName: string | null = null): Promise<UserProfile> {
    const stored = this.profiles.get(userId);
    return stored ? structuredClone(stored) : createEmptyProfile(userId, displayName);
  }

  async save(profile: UserProfile): Promise<void> {
    this.profiles.set(profile.userId, structuredClone(profile));
  }

  seed(userId: string, facts: string[]): void {
    const profile = createEmptyProfile(userId, null, new Date('2024-05-01T12:00:00.000Z'));
    profile.facts = facts.map((content) => ({ content, extractedFrom: '', timestamp: '2024-05-01T12:00:00.000Z' }));
    this.profiles.set(userId, profile);
  }
}

export class CollectingSink implements ReplySink {
  readonly sent: Array<{ text: string; mention: boolean }> = [];
  typingCount = 0;

  async send(text: string, { mention }: SendOptions): Promise<void> {
    this.sent.push({ text, mention });
  }

  async typing(): Promise<void> {
    this.typingCount += 1;
  }

  get texts(): string[] {
    return this.sent.map((s) => s.text);
  }
}

export function inbound(text: string, overrides: Partial<InboundMessage> = {}): InboundMessage {
  return {
    authorId: '1001',
    authorName: 'alice',
    channelId: 'c1',
    text,
    isDirectMessage: false,
    isFromSelf: false,
    ...overrides,
  };
}

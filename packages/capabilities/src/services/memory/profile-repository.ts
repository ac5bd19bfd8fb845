import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { join } from 'path';
import {
  PersistenceFailure,
  createEmptyProfile,
  errorMessage,
  isRecord,
  logger,
  sanitizeUserId,
  type ConversationEntry,
  type Fact,
  type UserProfile,
} from '@banterbot/shared';

export interface ProfileRepository {
  load(userId: string, displayName?: string | null): Promise<UserProfile>;
  save(profile: UserProfile): Promise<void>;
}

// Every key the normalizer understands, in both spellings. Anything else is
// carried through `extra` untouched.
const KNOWN_KEYS = new Set([
  'userId',
  'user_id',
  'displayName',
  'username',
  'facts',
  'topicsOfInterest',
  'topics_of_interest',
  'conversationHistory',
  'conversation_history',
  'totalConversations',
  'total_conversations',
  'createdAt',
  'created_at',
  'lastInteractionAt',
  'last_interaction',
]);

function pick(record: Record<string, unknown>, ...keys: string[]): unknown {
  for (const key of keys) {
    if (record[key] !== undefined && record[key] !== null) return record[key];
  }
  return undefined;
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function normalizeFact(value: unknown, fallbackTimestamp: string): Fact | null {
  // Old files stored bare strings
  if (typeof value === 'string') {
    return value.trim() ? { content: value, extractedFrom: '', timestamp: fallbackTimestamp } : null;
  }
  if (!isRecord(value)) return null;

  const content = asString(value.content);
  if (!content?.trim()) return null;

  const fact: Fact = {
    content,
    extractedFrom: asString(pick(value, 'extractedFrom', 'extracted_from')) ?? '',
    timestamp: asString(pick(value, 'timestamp')) ?? asString(pick(value, 'updatedAt', 'updated_at')) ?? fallbackTimestamp,
  };
  const updatedAt = asString(pick(value, 'updatedAt', 'updated_at'));
  if (updatedAt) fact.updatedAt = updatedAt;
  return fact;
}

function normalizeEntry(value: unknown): ConversationEntry | null {
  if (!isRecord(value)) return null;
  const userMessage = asString(pick(value, 'userMessage', 'user_message'));
  const botResponse = asString(pick(value, 'botResponse', 'bot_response'));
  if (userMessage === undefined || botResponse === undefined) return null;
  return { userMessage, botResponse, timestamp: asString(value.timestamp) ?? '' };
}

/**
 * Read a list field. Entries `read` rejects, or the whole value when it is
 * not a list, are kept in `extra` under `unreadable_<key>` so a save never
 * drops them.
 */
function readList<T>(
  raw: Record<string, unknown>,
  keys: string[],
  read: (item: unknown) => T | null,
  extra: Record<string, unknown>
): T[] {
  const key = keys.find((k) => raw[k] !== undefined && raw[k] !== null);
  if (key === undefined) return [];

  const value = raw[key];
  const items: T[] = [];
  const rejected: unknown[] = [];
  if (Array.isArray(value)) {
    for (const item of value) {
      const parsed = read(item);
      if (parsed === null) rejected.push(item);
      else items.push(parsed);
    }
  } else {
    rejected.push(value);
  }

  if (rejected.length > 0) {
    const slot = `unreadable_${key}`;
    const previous = extra[slot];
    extra[slot] = Array.isArray(previous) ? [...previous, ...rejected] : rejected;
  }
  return items;
}

/**
 * Turn whatever is on disk into a `UserProfile`. Missing fields get
 * defaults, legacy snake_case keys and string facts are migrated, and
 * unknown fields land in `extra`.
 */
export function normalizeProfile(
  raw: unknown,
  userId: string,
  displayName: string | null = null,
  now: Date = new Date()
): UserProfile {
  const base = createEmptyProfile(userId, displayName, now);
  if (!isRecord(raw)) return base;

  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!KNOWN_KEYS.has(key)) extra[key] = value;
  }

  const createdAt = asString(pick(raw, 'createdAt', 'created_at')) ?? base.createdAt;
  const facts = readList(raw, ['facts'], (f) => normalizeFact(f, createdAt), extra);
  const topicsOfInterest = readList(raw, ['topicsOfInterest', 'topics_of_interest'], (t) => asString(t) ?? null, extra);
  const conversationHistory = readList(raw, ['conversationHistory', 'conversation_history'], normalizeEntry, extra);

  const total = pick(raw, 'totalConversations', 'total_conversations');

  return {
    userId,
    displayName: displayName ?? asString(pick(raw, 'displayName', 'username')) ?? null,
    facts,
    topicsOfInterest,
    conversationHistory,
    totalConversations: typeof total === 'number' ? total : conversationHistory.length,
    createdAt,
    lastInteractionAt: asString(pick(raw, 'lastInteractionAt', 'last_interaction')) ?? createdAt,
    extra,
  };
}

function serializeProfile(profile: UserProfile): Record<string, unknown> {
  return {
    ...profile.extra,
    userId: profile.userId,
    displayName: profile.displayName,
    createdAt: profile.createdAt,
    lastInteractionAt: profile.lastInteractionAt,
    totalConversations: profile.totalConversations,
    facts: profile.facts,
    topicsOfInterest: profile.topicsOfInterest,
    conversationHistory: profile.conversationHistory,
  };
}

function isMissingFile(error: unknown): boolean {
  return isRecord(error) && error.code === 'ENOENT';
}

/** One pretty-printed JSON file per user under `dataDir`. */
export class FileProfileRepository implements ProfileRepository {
  constructor(private readonly dataDir: string) {}

  pathFor(userId: string): string {
    const id = sanitizeUserId(userId);
    if (!id) throw new PersistenceFailure('User id has no digits', userId);
    return join(this.dataDir, `${id}.json`);
  }

  async load(userId: string, displayName: string | null = null): Promise<UserProfile> {
    const id = sanitizeUserId(userId);
    const path = this.pathFor(userId);

    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return createEmptyProfile(id, displayName);
      throw new PersistenceFailure(`Could not read profile: ${errorMessage(error)}`, id, { path });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      const aside = await this.moveAside(path, id);
      logger.error(`Corrupt profile for ${id} moved to ${aside}, starting over: ${errorMessage(error)}`, { userId: id });
      return createEmptyProfile(id, displayName);
    }

    return normalizeProfile(raw, id, displayName);
  }

  /** Rename an unreadable file out of the way so the next save cannot overwrite it. */
  private async moveAside(path: string, id: string): Promise<string> {
    const aside = `${path}.corrupt-${Date.now()}`;
    try {
      await rename(path, aside);
    } catch (error) {
      throw new PersistenceFailure(`Could not move corrupt profile aside: ${errorMessage(error)}`, id, { path });
    }
    return aside;
  }

  async save(profile: UserProfile): Promise<void> {
    const path = this.pathFor(profile.userId);
    const tmp = `${path}.tmp`;

    try {
      await mkdir(this.dataDir, { recursive: true });
      await writeFile(tmp, JSON.stringify(serializeProfile(profile), null, 2), 'utf-8');
      await rename(tmp, path);
    } catch (error) {
      throw new PersistenceFailure(`Could not write profile: ${errorMessage(error)}`, profile.userId, { path });
    }

    logger.debug(`Saved profile for ${profile.userId}`);
  }
}

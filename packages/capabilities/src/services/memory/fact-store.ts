import {
  BoundsError,
  PerKeyLock,
  asStringArray,
  errorMessage,
  extractStructured,
  isRecord,
  logger,
  sanitizeUserId,
  type ConversationStats,
  type Fact,
  type UserProfile,
} from '@banterbot/shared';
import type { ResponseGenerator } from '../llm/response-generator.js';
import { EXCLUSIVE_BUCKETS, classifyFactBucket } from './fact-buckets.js';
import { correctionPrompt, factExtractionPrompt, topicExtractionPrompt } from './fact-prompts.js';
import type { ProfileRepository } from './profile-repository.js';

export interface FactStoreOptions {
  maxConversationHistory: number;
  commandPrefix?: string;
  /** Model used for extraction and correction calls */
  model?: string;
  maxTopics?: number;
  now?: () => Date;
}

export interface CorrectionDecision {
  action: 'delete' | 'update' | 'none';
  /** 1-based, as numbered in the prompt */
  factIndex: number;
  newFact: string | null;
}

// Leading words that mark a bot command rather than something about the user
const COMMAND_TOKENS = new Set(['chat', 'code', 'help', 'summary', 'profile', 'stats']);

const EMPTY_SUMMARY = "I don't have any information about you yet.";

export interface MergeResult {
  facts: Fact[];
  changed: boolean;
}

/**
 * Fold candidate facts into an existing list. Duplicates (equal, or one
 * contained in the other, ignoring case) are dropped. A candidate in an
 * exclusive bucket replaces the fact already in that bucket in place.
 */
export function mergeFacts(existing: readonly Fact[], candidates: readonly string[], source: string, now: string): MergeResult {
  const facts = existing.map((f) => ({ ...f }));
  let changed = false;

  for (const raw of candidates) {
    const content = raw.trim();
    if (!content) continue;
    const lower = content.toLowerCase();

    const duplicate = facts.some((f) => {
      const other = f.content.toLowerCase();
      return other === lower || other.includes(lower) || lower.includes(other);
    });
    if (duplicate) continue;

    const bucket = classifyFactBucket(content);
    const clash = EXCLUSIVE_BUCKETS.has(bucket)
      ? facts.findIndex((f) => classifyFactBucket(f.content) === bucket)
      : -1;

    if (clash >= 0) {
      facts[clash] = { ...facts[clash], content, extractedFrom: source, updatedAt: now };
    } else {
      facts.push({ content, extractedFrom: source, timestamp: now });
    }
    changed = true;
  }

  return { facts, changed };
}

/** Lowercase, strip everything but letters, digits and spaces, keep 2-30 chars, dedupe. */
export function cleanTopics(topics: readonly string[]): string[] {
  const cleaned: string[] = [];
  for (const topic of topics) {
    const normalized = topic
      .toLowerCase()
      .replace(/[^a-z0-9\s]/g, '')
      .replace(/\s+/g, ' ')
      .trim();
    if (normalized.length >= 2 && normalized.length <= 30 && !cleaned.includes(normalized)) {
      cleaned.push(normalized);
    }
  }
  return cleaned;
}

function parseCorrection(value: unknown): CorrectionDecision | null {
  if (!isRecord(value)) return null;
  const action = value.action;
  if (action !== 'delete' && action !== 'update' && action !== 'none') return null;

  const index = typeof value.fact_index === 'number' ? value.fact_index : Number(value.fact_index);
  return {
    action,
    factIndex: Number.isInteger(index) ? index : -1,
    newFact: typeof value.new_fact === 'string' && value.new_fact.trim() ? value.new_fact.trim() : null,
  };
}

/**
 * Durable per-user memory. Every load → mutate → save runs under a per-user
 * lock so concurrent messages from one user never overwrite each other.
 * Remote calls happen before the lock is taken.
 */
export class FactStore {
  private readonly lock = new PerKeyLock<string>();
  private readonly prefix: string;
  private readonly maxTopics: number;
  private readonly now: () => Date;

  constructor(
    private readonly repository: ProfileRepository,
    private readonly generator: ResponseGenerator,
    private readonly options: FactStoreOptions
  ) {
    this.prefix = options.commandPrefix ?? '/';
    this.maxTopics = options.maxTopics ?? 50;
    this.now = options.now ?? (() => new Date());
  }

  getProfile(userId: string, displayName: string | null = null): Promise<UserProfile> {
    return this.repository.load(userId, displayName);
  }

  /**
   * Pull definite facts out of a message and merge them. Returns whether the
   * stored list changed. Never throws.
   */
  async extractAndMerge(userId: string, rawMessage: string, displayName: string | null = null): Promise<boolean> {
    let message = rawMessage.trim();
    if (message.startsWith(this.prefix)) message = message.slice(this.prefix.length).trim();

    const words = message.split(/\s+/).filter(Boolean);
    if (words.length < 2 || COMMAND_TOKENS.has(words[0].toLowerCase())) return false;

    try {
      const raw = await this.generator.generate(factExtractionPrompt(message), {
        model: this.options.model,
        temperature: 0.2,
      });
      const extracted = extractStructured(raw, asStringArray);
      if (extracted.isErr()) {
        logger.debug(`No facts decoded for ${sanitizeUserId(userId)}: ${extracted.error.kind}`);
        return false;
      }
      if (extracted.value.length === 0) return false;

      const candidates = extracted.value;
      return await this.mutate(userId, displayName, (profile) => {
        const merged = mergeFacts(profile.facts, candidates, message, this.timestamp());
        profile.facts = merged.facts;
        return merged.changed;
      });
    } catch (error) {
      logger.warn(`Fact extraction failed for ${sanitizeUserId(userId)}: ${errorMessage(error)}`);
      return false;
    }
  }

  /** Extract interests from a message into `topicsOfInterest`. Never throws. */
  async extractTopics(userId: string, message: string, displayName: string | null = null): Promise<boolean> {
    if (message.trim().split(/\s+/).length < 3) return false;

    try {
      const raw = await this.generator.generate(topicExtractionPrompt(message), {
        model: this.options.model,
        temperature: 0.2,
      });
      const extracted = extractStructured(raw, asStringArray);
      if (extracted.isErr()) return false;

      const topics = cleanTopics(extracted.value);
      if (topics.length === 0) return false;

      return await this.mutate(userId, displayName, (profile) => {
        const fresh = topics.filter((t) => !profile.topicsOfInterest.includes(t));
        if (fresh.length === 0) return false;
        profile.topicsOfInterest = [...profile.topicsOfInterest, ...fresh].slice(-this.maxTopics);
        return true;
      });
    } catch (error) {
      logger.warn(`Topic extraction failed for ${sanitizeUserId(userId)}: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Ask the model which stored fact the user is correcting and apply the
   * decision. The index is checked against the list as it is when the
   * decision is applied, not when the prompt was built.
   */
  async handleCorrection(userId: string, text: string, displayName: string | null = null): Promise<boolean> {
    const snapshot = await this.repository.load(userId, displayName);
    if (snapshot.facts.length === 0) return false;

    const shown = snapshot.facts.map((f) => f.content);
    let raw: string;
    try {
      raw = await this.generator.generate(correctionPrompt(shown, text), {
        model: this.options.model,
        temperature: 0,
      });
    } catch (error) {
      logger.warn(`Correction call failed for ${snapshot.userId}: ${errorMessage(error)}`);
      return false;
    }

    const decision = extractStructured(raw, parseCorrection);
    if (decision.isErr() || decision.value.action === 'none') return false;
    const { action, factIndex, newFact } = decision.value;
    if (action === 'update' && !newFact) return false;

    return this.mutate(userId, displayName, (profile) => {
      const index = factIndex - 1;
      if (index < 0 || index >= profile.facts.length) {
        const bounds = new BoundsError(index, profile.facts.length);
        logger.warn(`Ignoring correction for ${profile.userId}: ${bounds.message}`);
        return false;
      }
      // The list moved under us since the prompt was built
      if (profile.facts[index].content !== shown[index]) return false;

      if (action === 'delete') {
        const [removed] = profile.facts.splice(index, 1);
        logger.info(`Removed fact for ${profile.userId}: ${removed.content}`);
      } else if (newFact) {
        logger.info(`Updated fact for ${profile.userId}: '${profile.facts[index].content}' → '${newFact}'`);
        profile.facts[index] = { ...profile.facts[index], content: newFact, updatedAt: this.timestamp() };
      }
      return true;
    });
  }

  /** Remove every fact containing `substring`, ignoring case. */
  async removeFact(userId: string, substring: string, displayName: string | null = null): Promise<boolean> {
    const needle = substring.trim().toLowerCase();
    if (!needle) return false;

    return this.mutate(userId, displayName, (profile) => {
      const kept = profile.facts.filter((f) => !f.content.toLowerCase().includes(needle));
      if (kept.length === profile.facts.length) return false;
      profile.facts = kept;
      return true;
    });
  }

  /** Wipe facts and interests; the conversation log stays. */
  async clearFacts(userId: string, displayName: string | null = null): Promise<boolean> {
    return this.mutate(userId, displayName, (profile) => {
      const hadData = profile.facts.length > 0 || profile.topicsOfInterest.length > 0;
      profile.facts = [];
      profile.topicsOfInterest = [];
      return hadData;
    });
  }

  /** Append one exchange to the bounded log. Never throws. */
  async addConversation(
    userId: string,
    userMessage: string,
    botResponse: string,
    displayName: string | null = null
  ): Promise<void> {
    try {
      await this.mutate(userId, displayName, (profile) => {
        profile.conversationHistory.push({ userMessage, botResponse, timestamp: this.timestamp() });
        if (profile.conversationHistory.length > this.options.maxConversationHistory) {
          profile.conversationHistory = profile.conversationHistory.slice(-this.options.maxConversationHistory);
        }
        profile.totalConversations += 1;
        return true;
      });
    } catch (error) {
      logger.error(`Could not record conversation for ${sanitizeUserId(userId)}: ${errorMessage(error)}`);
    }
  }

  async getSummary(userId: string, displayName: string | null = null): Promise<string> {
    const profile = await this.repository.load(userId, displayName);
    const parts: string[] = [];

    if (profile.facts.length > 0) {
      parts.push('Things I know about you:');
      parts.push(...profile.facts.map((f) => `- ${f.content}`));
    }
    if (profile.topicsOfInterest.length > 0) {
      parts.push("\nTopics you're interested in:");
      parts.push(profile.topicsOfInterest.join(', '));
    }

    return parts.length > 0 ? parts.join('\n') : EMPTY_SUMMARY;
  }

  async getConversationStats(userId: string): Promise<ConversationStats> {
    const profile = await this.repository.load(userId);
    const first = profile.conversationHistory[0]?.timestamp;
    return {
      totalMessages: profile.totalConversations,
      firstInteraction: first ? first.split('T')[0] : null,
    };
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  /**
   * Load, apply `change`, and save only if it reported a change. The display
   * name is refreshed on every write.
   */
  private mutate(
    userId: string,
    displayName: string | null,
    change: (profile: UserProfile) => boolean
  ): Promise<boolean> {
    const key = sanitizeUserId(userId);
    return this.lock.runExclusive(key, async () => {
      const profile = await this.repository.load(userId, displayName);
      if (!change(profile)) return false;

      profile.lastInteractionAt = this.timestamp();
      await this.repository.save(profile);
      return true;
    });
  }
}

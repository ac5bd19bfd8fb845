/**
 * Durable per-user record. One JSON file per user, addressed by the
 * digits-only platform id.
 */

export interface Fact {
  /** Second-person sentence, e.g. "You are from New York" */
  content: string;
  /** Source message text (audit trail) */
  extractedFrom: string;
  timestamp: string;
  updatedAt?: string;
}

export interface ConversationEntry {
  userMessage: string;
  botResponse: string;
  timestamp: string;
}

export interface UserProfile {
  userId: string;
  /** Last observed display name; never used as a key */
  displayName: string | null;
  facts: Fact[];
  topicsOfInterest: string[];
  conversationHistory: ConversationEntry[];
  totalConversations: number;
  createdAt: string;
  lastInteractionAt: string;
  /** Fields written by other versions; carried through untouched */
  extra: Record<string, unknown>;
}

export interface ConversationStats {
  totalMessages: number;
  firstInteraction: string | null;
}

export function createEmptyProfile(
  userId: string,
  displayName: string | null = null,
  now: Date = new Date()
): UserProfile {
  const iso = now.toISOString();
  return {
    userId,
    displayName,
    facts: [],
    topicsOfInterest: [],
    conversationHistory: [],
    totalConversations: 0,
    createdAt: iso,
    lastInteractionAt: iso,
    extra: {},
  };
}

/** Platform ids are numeric; anything else is stripped before it touches storage. */
export function sanitizeUserId(userId: string): string {
  return userId.replace(/[^0-9]/g, '');
}

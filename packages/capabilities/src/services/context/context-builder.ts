import type { ChannelMessage, ChannelSnapshot, UserProfile } from '@banterbot/shared';

export interface ContextBuilderOptions {
  displayContextSize: number;
  memorySize: number;
  factLimit: number;
  maxChars: number;
}

export interface ContextBuildOptions {
  isCorrection?: boolean;
}

interface Line {
  text: string;
  pinned: boolean;
}

interface FollowUp {
  current: string;
  previous: string;
}

interface Sections {
  recent: Line[];
  history: Line[];
  facts: string[];
  interests: string[];
  followUp: FollowUp | null;
  correction: boolean;
  /** Longest quote the follow-up note may carry */
  quoteLimit: number;
}

const FOLLOW_UP_MAX_TOKENS = 5;
const PINNED_EXCHANGES = 3;
// Each pass shortens pinned lines and quotes further until the block fits
const SHRINK_STEPS = [200, 120, 60, 30];

const CORRECTION_NOTE =
  'CORRECTION NOTE: The user is correcting something said earlier. Acknowledge the corrected information and use it from now on.';

function quoteLine(message: ChannelMessage): string {
  return `${message.isBot ? 'BOT' : 'USER'} (${message.authorName}): "${message.content}"`;
}

function render(sections: Sections): string {
  const parts: string[] = [];

  if (sections.recent.length > 0) {
    parts.push('RECENT CHANNEL MESSAGES (IN ORDER):', ...sections.recent.map((l) => l.text));
  }
  if (sections.history.length > 0) {
    parts.push('\nCONVERSATION HISTORY:', ...sections.history.map((l) => l.text));
  }
  if (sections.facts.length > 0) {
    parts.push('\nFACTS ABOUT THIS USER:', ...sections.facts.map((f) => `- ${f}`));
  }
  if (sections.interests.length > 0) {
    parts.push(`\nUSER INTERESTS: ${sections.interests.join(', ')}`);
  }
  if (sections.followUp) {
    const current = shrink(sections.followUp.current, sections.quoteLimit);
    const previous = shrink(sections.followUp.previous, sections.quoteLimit);
    parts.push(
      `\nFOLLOW-UP NOTE: The user's message "${current}" is a short reply to your last message "${previous}". Answer it in that context.`
    );
  }
  if (sections.correction) {
    parts.push(`\n${CORRECTION_NOTE}`);
  }

  return parts.join('\n');
}

function dropOldestUnpinned(lines: Line[]): boolean {
  const at = lines.findIndex((l) => !l.pinned);
  if (at < 0) return false;
  lines.splice(at, 1);
  return true;
}

function shrink(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}…` : text;
}

/**
 * Merges channel memory and the user's profile into the context block handed
 * to the model. Output is deterministic for the same inputs and never longer
 * than `maxChars`.
 */
export class ContextBuilder {
  constructor(private readonly options: ContextBuilderOptions) {}

  build(channel: ChannelSnapshot, profile: UserProfile | null, buildOptions: ContextBuildOptions = {}): string {
    const sections = this.collect(channel, profile, buildOptions);
    return this.fit(sections);
  }

  private collect(channel: ChannelSnapshot, profile: UserProfile | null, buildOptions: ContextBuildOptions): Sections {
    const shown = channel.recentMessages.slice(-this.options.displayContextSize).filter((m) => m.content);

    let lastUserAt = -1;
    let lastBotAt = -1;
    shown.forEach((m, i) => {
      if (m.isBot) lastBotAt = i;
      else lastUserAt = i;
    });

    const recent = shown.map((m, i) => ({
      text: quoteLine(m),
      pinned: i === lastUserAt || i === lastBotAt,
    }));

    const log = channel.memoryLog.slice(-this.options.memorySize * 2);
    const pinnedFrom = log.length - PINNED_EXCHANGES * 2;
    const history = log.map((text, i) => ({ text, pinned: i >= pinnedFrom }));

    return {
      recent,
      history,
      facts: profile ? profile.facts.slice(-this.options.factLimit).map((f) => f.content) : [],
      interests: profile ? [...profile.topicsOfInterest] : [],
      followUp: this.followUp(shown, lastUserAt),
      correction: buildOptions.isCorrection ?? false,
      quoteLimit: Number.POSITIVE_INFINITY,
    };
  }

  /** Short message after a bot message: quote both so the model reads it as a reply. */
  private followUp(shown: ChannelMessage[], lastUserAt: number): FollowUp | null {
    if (lastUserAt < 0) return null;
    const current = shown[lastUserAt];
    if (current.content.trim().split(/\s+/).length > FOLLOW_UP_MAX_TOKENS) return null;

    const previousBot = shown.slice(0, lastUserAt).reverse().find((m) => m.isBot);
    if (!previousBot) return null;

    return { current: current.content, previous: previousBot.content };
  }

  private fit(sections: Sections): string {
    const max = this.options.maxChars;
    let text = render(sections);

    // Oldest-first trimming, least valuable section first
    while (text.length > max) {
      const dropped =
        dropOldestUnpinned(sections.recent) ||
        dropOldestUnpinned(sections.history) ||
        sections.facts.shift() !== undefined ||
        sections.interests.shift() !== undefined;
      if (!dropped) break;
      text = render(sections);
    }

    // Only pinned lines left: shorten the note's quotes, the older pinned
    // exchanges, then any pinned line
    const older = sections.history.slice(0, -2);
    for (const limit of SHRINK_STEPS) {
      if (text.length <= max) break;
      sections.quoteLimit = limit;
      text = render(sections);
      for (const line of [...older, ...sections.history, ...sections.recent]) {
        if (text.length <= max) break;
        line.text = shrink(line.text, limit);
        text = render(sections);
      }
    }

    return text.length > max ? text.slice(text.length - max) : text;
  }
}

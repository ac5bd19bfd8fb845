import {
  PerKeyLock,
  RingBuffer,
  logger,
  type ChannelMessage,
  type ChannelSnapshot,
} from '@banterbot/shared';

export interface ChannelMemoryOptions {
  channelHistorySize: number;
  /** The memory log keeps twice this many lines (user + bot per exchange) */
  memorySize: number;
  maxTrackedChannels: number;
  commandPrefix: string;
}

export interface InboundRecord {
  authorId: string;
  authorName: string;
  content: string;
  isBot?: boolean;
  timestamp?: Date;
}

interface ChannelState {
  recentMessages: RingBuffer<ChannelMessage>;
  memoryLog: RingBuffer<string>;
}

type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Short-lived per-channel conversation window. Two ring buffers per channel,
 * created on first use; the least recently touched channel is dropped once
 * more than `maxTrackedChannels` are live.
 */
export class ChannelMemory {
  private readonly channels = new Map<string, ChannelState>();
  private readonly commits = new PerKeyLock<string>();

  constructor(private readonly options: ChannelMemoryOptions) {}

  /** Commands are stored without their prefix so the model reads them as plain speech. */
  stripCommandPrefix(content: string): string {
    const { commandPrefix: prefix } = this.options;
    if (content.startsWith(prefix) && !content.startsWith(prefix + prefix) && content.length > prefix.length) {
      return content.slice(prefix.length);
    }
    return content;
  }

  recordInbound(channelId: string, record: InboundRecord): void {
    this.state(channelId).recentMessages.push({
      authorId: record.authorId,
      authorName: record.authorName,
      isBot: record.isBot ?? false,
      content: this.stripCommandPrefix(record.content),
      timestamp: (record.timestamp ?? new Date()).toISOString(),
    });
  }

  recordBotMessage(channelId: string, botId: string, botName: string, content: string): void {
    this.recordInbound(channelId, { authorId: botId, authorName: botName, content, isBot: true });
  }

  recordExchange(channelId: string, username: string, userMessage: string, botName: string, botResponse: string): void {
    this.state(channelId).memoryLog.push(
      `USER (${username}): ${this.stripCommandPrefix(userMessage)}`,
      `BOT (${botName}): ${botResponse}`
    );
  }

  /**
   * Take a place in the channel's commit order now, run `commit` once
   * `pending` settles and every earlier commit for the channel has finished.
   * Replies therefore land in arrival order however long each one took.
   */
  commitInOrder<T>(
    channelId: string,
    pending: Promise<T>,
    commit: (value: T) => void | Promise<void>
  ): Promise<T> {
    // Observe the outcome immediately so a fast rejection is never "unhandled"
    const settled: Promise<Settled<T>> = pending.then(
      (value): Settled<T> => ({ ok: true, value }),
      (error: unknown): Settled<T> => ({ ok: false, error })
    );

    return this.commits.runExclusive(channelId, async () => {
      const outcome = await settled;
      if (!outcome.ok) throw outcome.error;
      await commit(outcome.value);
      return outcome.value;
    });
  }

  snapshot(channelId: string): ChannelSnapshot {
    const state = this.channels.get(channelId);
    return {
      channelId,
      recentMessages: state ? state.recentMessages.toArray() : [],
      memoryLog: state ? state.memoryLog.toArray() : [],
    };
  }

  lastBotMessage(channelId: string): ChannelMessage | undefined {
    return this.channels.get(channelId)?.recentMessages.findLast((m) => m.isBot);
  }

  /** Distinct human authors among the last `count` messages. */
  recentHumanAuthors(channelId: string, count: number): Set<string> {
    const state = this.channels.get(channelId);
    if (!state) return new Set();
    return new Set(
      state.recentMessages
        .latest(count)
        .filter((m) => !m.isBot)
        .map((m) => m.authorId)
    );
  }

  get trackedChannels(): number {
    return this.channels.size;
  }

  drain(): Promise<void> {
    return this.commits.drain();
  }

  private state(channelId: string): ChannelState {
    let state = this.channels.get(channelId);
    if (state) {
      // Re-insert to mark as most recently used
      this.channels.delete(channelId);
    } else {
      state = {
        recentMessages: new RingBuffer<ChannelMessage>(this.options.channelHistorySize),
        memoryLog: new RingBuffer<string>(this.options.memorySize * 2),
      };
    }
    this.channels.set(channelId, state);

    if (this.channels.size > this.options.maxTrackedChannels) {
      const oldest = this.channels.keys().next();
      if (!oldest.done) {
        this.channels.delete(oldest.value);
        logger.debug(`Dropped channel memory for ${oldest.value}`);
      }
    }
    return state;
  }
}

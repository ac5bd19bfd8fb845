export interface ChannelMessage {
  authorId: string;
  authorName: string;
  isBot: boolean;
  content: string;
  timestamp: string;
}

/** Read-only view of one channel's memory, as handed to the context builder. */
export interface ChannelSnapshot {
  channelId: string;
  recentMessages: readonly ChannelMessage[];
  memoryLog: readonly string[];
}

/**
 * Discord message adapter: turns a discord.js `Message` into the router's
 * platform-neutral `InboundMessage` and hands back a sink that chunks and
 * sends replies into the same channel.
 */

import { Events, type Client, type Message } from 'discord.js';
import { errorMessage, logger, type BotConfig } from '@banterbot/shared';
import type { InboundMessage, ReplySink, Router } from '../services/message-router.js';
import { chunkMessage } from '../utils/message-chunker.js';
import { getShortCorrelationId, type CorrelationRegistry } from '../utils/correlation.js';

/** The parts of a discord.js `Message` the router needs. */
export interface MessageSource {
  author: { id: string; displayName: string };
  member: { displayName: string } | null;
  channelId: string;
  content: string;
  guildId: string | null;
  mentions: { repliedUser: { id: string } | null };
}

export function toInboundMessage(
  message: MessageSource,
  botUserId: string | undefined,
  correlationId: string
): InboundMessage {
  return {
    authorId: message.author.id,
    authorName: message.member?.displayName ?? message.author.displayName,
    channelId: message.channelId,
    text: message.content,
    isDirectMessage: !message.guildId,
    // Set from the gateway payload
    replyToAuthorId: message.mentions.repliedUser?.id ?? null,
    isFromSelf: message.author.id === botUserId,
    correlationId,
  };
}

export function channelSink(message: Message, chunkLimit: number): ReplySink {
  const channel = message.channel;

  return {
    async send(text, { mention }) {
      if (!channel.isSendable()) {
        logger.warn(`Channel ${message.channelId} is not sendable, dropping reply`);
        return;
      }
      const body = mention ? `${message.author.toString()} ${text}` : text;
      for (const chunk of chunkMessage(body, chunkLimit)) {
        await channel.send(chunk);
      }
    },

    async typing() {
      if (channel.isSendable()) await channel.sendTyping();
    },
  };
}

export function setupMessageHandler(
  client: Client,
  router: Router,
  config: BotConfig,
  correlation: CorrelationRegistry
): void {
  client.on(Events.MessageCreate, async (message) => {
    if (message.author.bot) return;

    const correlationId = correlation.forMessage(message.id);
    const shortId = getShortCorrelationId(correlationId);

    try {
      logger.info(`📨 Message received [${shortId}]`, {
        correlationId,
        userId: message.author.id,
        channelId: message.channelId,
        isDM: !message.guildId,
        length: message.content.length,
      });

      const inbound = toInboundMessage(message, client.user?.id, correlationId);
      await router.route(inbound, channelSink(message, config.messageChunkLimit));
    } catch (error) {
      logger.error(`Message handling failed [${shortId}]: ${errorMessage(error)}`, { correlationId });
    }
  });
}

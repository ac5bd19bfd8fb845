import { Events, type ChatInputCommandInteraction, type Client } from 'discord.js';
import { errorMessage, logger, type BotConfig } from '@banterbot/shared';
import { slashCommands } from '../commands/index.js';
import type { InboundMessage, ReplySink, Router } from '../services/message-router.js';
import { chunkMessage } from '../utils/message-chunker.js';
import { generateCorrelationId, getShortCorrelationId } from '../utils/correlation.js';

/** Rebuild the prefix command the router would have seen had it been typed. */
export function interactionText(prefix: string, name: string, args: readonly string[]): string {
  return [`${prefix}${name}`, ...args].join(' ');
}

/**
 * Interactions must be answered once: the first chunk edits the deferred
 * reply, the rest follow up.
 */
function interactionSink(interaction: ChatInputCommandInteraction, chunkLimit: number): ReplySink & { sent(): boolean } {
  let replied = false;

  return {
    async send(text) {
      for (const chunk of chunkMessage(text, chunkLimit)) {
        if (replied) {
          await interaction.followUp(chunk);
        } else {
          await interaction.editReply(chunk);
          replied = true;
        }
      }
    },
    sent: () => replied,
  };
}

export function setupInteractionHandler(client: Client, router: Router, config: BotConfig): void {
  client.on(Events.InteractionCreate, async (interaction) => {
    if (!interaction.isChatInputCommand()) return;

    const command = slashCommands.get(interaction.commandName);
    if (!command) {
      logger.warn(`Unknown slash command: ${interaction.commandName}`);
      return;
    }

    const correlationId = generateCorrelationId();
    const shortId = getShortCorrelationId(correlationId);
    logger.info(`🎯 Slash command /${interaction.commandName} [${shortId}]`, {
      correlationId,
      userId: interaction.user.id,
      guildId: interaction.guildId,
    });

    try {
      await interaction.deferReply();

      const message: InboundMessage = {
        authorId: interaction.user.id,
        authorName: interaction.user.displayName,
        channelId: interaction.channelId,
        text: interactionText(config.commandPrefix, interaction.commandName, command.toArgs(interaction)),
        isDirectMessage: !interaction.guildId,
        isFromSelf: false,
        correlationId,
      };
      const sink = interactionSink(interaction, config.messageChunkLimit);
      await router.route(message, sink);

      if (!sink.sent()) await interaction.deleteReply();
    } catch (error) {
      logger.error(`Slash command failed [${shortId}]: ${errorMessage(error)}`, { correlationId });
      try {
        if (interaction.deferred || interaction.replied) {
          await interaction.editReply(`❌ something broke on my end [${shortId}]`);
        } else {
          await interaction.reply({ content: `❌ something broke on my end [${shortId}]`, ephemeral: true });
        }
      } catch (replyError) {
        logger.error(`Failed to send error reply: ${errorMessage(replyError)}`);
      }
    }
  });
}

import type { ChatInputCommandInteraction, SlashCommandOptionsOnlyBuilder } from 'discord.js';

/**
 * A slash command is a typed front door to a prefix command: it only turns
 * the interaction's options back into the words the router expects.
 */
export interface SlashCommand {
  data: SlashCommandOptionsOnlyBuilder;
  toArgs(interaction: ChatInputCommandInteraction): string[];
}

import { SlashCommandBuilder, type ChatInputCommandInteraction } from 'discord.js';
import type { SlashCommand } from './types.js';

export const chatCommand: SlashCommand = {
  data: new SlashCommandBuilder()
    .setName('chat')
    .setDescription('Talk to the bot')
    .addStringOption((option) =>
      option.setName('message').setDescription('What you want to say').setRequired(true).setMaxLength(1500)
    ),

  toArgs(interaction: ChatInputCommandInteraction): string[] {
    return interaction.options.getString('message', true).trim().split(/\s+/);
  },
};

export const codeCommand: SlashCommand = {
  data: new SlashCommandBuilder().setName('code').setDescription("Get a link to the bot's source code"),

  toArgs(): string[] {
    return [];
  },
};

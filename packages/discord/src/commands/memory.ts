import { SlashCommandBuilder, type ChatInputCommandInteraction } from 'discord.js';
import type { SlashCommand } from './types.js';

export const forgetCommand: SlashCommand = {
  data: new SlashCommandBuilder()
    .setName('forget')
    .setDescription('Forget specific information about you')
    .addStringOption((option) =>
      option.setName('fact').setDescription('The fact to forget (leave empty to forget everything)')
    ),

  toArgs(interaction: ChatInputCommandInteraction): string[] {
    const fact = interaction.options.getString('fact')?.trim();
    return fact ? fact.split(/\s+/) : [];
  },
};

export const infoCommand: SlashCommand = {
  data: new SlashCommandBuilder().setName('info').setDescription('See what information the bot has about you'),

  toArgs(): string[] {
    return [];
  },
};

export const myDataCommand: SlashCommand = {
  data: new SlashCommandBuilder()
    .setName('mydata')
    .setDescription('See what information the bot has about you (alias for /info)'),

  toArgs(): string[] {
    return [];
  },
};

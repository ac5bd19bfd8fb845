import { SlashCommandBuilder, type ChatInputCommandInteraction } from 'discord.js';
import type { SlashCommand } from './types.js';

export const gameCommand: SlashCommand = {
  data: new SlashCommandBuilder()
    .setName('game')
    .setDescription('Start a number guessing game')
    .addIntegerOption((option) =>
      option.setName('max_range').setDescription('Maximum number for the guessing game (default: 100)').setMinValue(1)
    ),

  toArgs(interaction: ChatInputCommandInteraction): string[] {
    const maxRange = interaction.options.getInteger('max_range');
    return maxRange === null ? [] : [String(maxRange)];
  },
};

export const guessCommand: SlashCommand = {
  data: new SlashCommandBuilder()
    .setName('guess')
    .setDescription('Make a guess in the current game')
    .addIntegerOption((option) => option.setName('number').setDescription('Your guess').setRequired(true)),

  toArgs(interaction: ChatInputCommandInteraction): string[] {
    return [String(interaction.options.getInteger('number', true))];
  },
};

export const endCommand: SlashCommand = {
  data: new SlashCommandBuilder().setName('end').setDescription('End the current game'),

  toArgs(): string[] {
    return [];
  },
};

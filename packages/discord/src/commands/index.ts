import { chatCommand, codeCommand } from './chat.js';
import { endCommand, gameCommand, guessCommand } from './game.js';
import { forgetCommand, infoCommand, myDataCommand } from './memory.js';
import type { SlashCommand } from './types.js';

export type { SlashCommand } from './types.js';

export const slashCommands: ReadonlyMap<string, SlashCommand> = new Map(
  [gameCommand, guessCommand, endCommand, forgetCommand, infoCommand, myDataCommand, chatCommand, codeCommand].map(
    (command) => [command.data.name, command] as const
  )
);

import { describe, it, expect } from 'vitest';
import { loadConfig } from '@banterbot/shared';
import { slashCommands } from '../src/commands/index.js';
import { createBotServices } from '../src/bot.js';
import { interactionText } from '../src/handlers/interaction-handler.js';
import { CorrelationRegistry, getShortCorrelationId } from '../src/utils/correlation.js';
import { MemoryProfileRepository, ScriptedGenerator } from './helpers/fakes.js';

describe('slash commands', () => {
  it('should register one slash command per router command', () => {
    const { router } = createBotServices(loadConfig({}), {
      generator: new ScriptedGenerator(),
      repository: new MemoryProfileRepository(),
    });

    expect([...slashCommands.keys()].sort()).toEqual([...router.commandNames].sort());
  });

  it('should describe every command', () => {
    for (const command of slashCommands.values()) {
      expect(command.data.description.length).toBeGreaterThan(0);
    }
  });

  it('should rebuild the typed command text', () => {
    expect(interactionText('/', 'guess', ['40'])).toBe('/guess 40');
    expect(interactionText('!', 'forget', ['my', 'birthday'])).toBe('!forget my birthday');
    expect(interactionText('/', 'end', [])).toBe('/end');
  });
});

describe('CorrelationRegistry', () => {
  it('should hand out one id per message', () => {
    const registry = new CorrelationRegistry(10);
    const first = registry.forMessage('m1');

    expect(registry.forMessage('m1')).toBe(first);
    expect(registry.forMessage('m2')).not.toBe(first);
    expect(registry.size).toBe(2);
  });

  it('should shorten ids to their last 8 characters', () => {
    expect(getShortCorrelationId('123e4567-e89b-12d3-a456-426614174000')).toBe('14174000');
  });
});

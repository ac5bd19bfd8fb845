import './src/env.js';
import { REST, Routes } from 'discord.js';
import { ConfigError, errorMessage, loadConfig, logger } from '@banterbot/shared';
import { slashCommands } from './src/commands/index.js';

async function registerCommands(): Promise<void> {
  const settings = loadConfig();
  if (!settings.discordToken || !settings.discordClientId) {
    throw new ConfigError('DISCORD_TOKEN and DISCORD_CLIENT_ID are required to register commands');
  }

  const body = [...slashCommands.values()].map((command) => command.data.toJSON());
  const rest = new REST().setToken(settings.discordToken);

  logger.info('🚀 Started refreshing Discord application (/) commands...');
  await rest.put(Routes.applicationCommands(settings.discordClientId), { body });

  logger.info(`✅ Registered ${body.length} commands: ${[...slashCommands.keys()].map((n) => `/${n}`).join(', ')}`);
}

registerCommands().catch((error: unknown) => {
  logger.error(`❌ Error registering commands: ${errorMessage(error)}`);
  process.exitCode = 1;
});

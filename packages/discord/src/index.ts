import './env.js';
import { Client, Events, GatewayIntentBits, Partials } from 'discord.js';
import { assertRuntimeSecrets, errorMessage, loadConfig, logger } from '@banterbot/shared';
import { createBotServices } from './bot.js';
import { setupMessageHandler } from './handlers/message-handler.js';
import { setupInteractionHandler } from './handlers/interaction-handler.js';
import { HealthServer } from './services/health-server.js';
import { CorrelationRegistry } from './utils/correlation.js';

const settings = loadConfig();
const services = createBotServices(settings);

const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.MessageContent,
    GatewayIntentBits.DirectMessages,
  ],
  // DMs arrive on uncached channels
  partials: [Partials.Channel, Partials.Message],
});

const healthServer = new HealthServer(settings.healthPort, () => ({
  connected: client.isReady(),
  guilds: client.guilds.cache.size,
  latency: client.ws.ping >= 0 ? client.ws.ping : undefined,
  activeGames: services.games.activeGames,
  trackedChannels: services.channels.trackedChannels,
}));

async function start(): Promise<void> {
  assertRuntimeSecrets(settings);
  logger.info(`🚀 Starting ${settings.botName} (${settings.nodeEnv})`);

  client.once(Events.ClientReady, (readyClient) => {
    services.router.setBotUser(readyClient.user.id);
    logger.info(`✅ Discord bot ready! Logged in as ${readyClient.user.tag}`, {
      guilds: readyClient.guilds.cache.size,
      commands: services.router.commandNames,
    });
  });

  client.on(Events.Error, (error) => {
    logger.error(`Discord client error: ${error.message}`);
  });

  setupMessageHandler(client, services.router, settings, new CorrelationRegistry());
  setupInteractionHandler(client, services.router, settings);

  const port = await healthServer.start();
  logger.info(`🩺 Health server listening on ${port}`);

  await client.login(settings.discordToken);
}

async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  try {
    await services.router.idle();
    await healthServer.stop();
    await client.destroy();
  } catch (error) {
    logger.error(`Error during shutdown: ${errorMessage(error)}`);
  }
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

start().catch((error: unknown) => {
  logger.error(`Failed to start Discord bot: ${errorMessage(error)}`);
  process.exit(1);
});

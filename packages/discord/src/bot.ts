import type { BotConfig } from '@banterbot/shared';
import {
  ChannelMemory,
  ContextBuilder,
  FactStore,
  FallbackReplies,
  FileProfileRepository,
  GameManager,
  IntentClassifier,
  OpenAIResponseGenerator,
  PersonaPromptBuilder,
  type ProfileRepository,
  type ResponseGenerator,
} from '@banterbot/capabilities';
import { RateLimiter } from './services/rate-limiter.js';
import { Router } from './services/message-router.js';

export interface BotServices {
  router: Router;
  channels: ChannelMemory;
  games: GameManager;
  facts: FactStore;
  rateLimiter: RateLimiter;
}

export interface BotOverrides {
  generator?: ResponseGenerator;
  /** Used for extraction and classification; defaults to `generator` */
  factGenerator?: ResponseGenerator;
  repository?: ProfileRepository;
  prompts?: PersonaPromptBuilder;
  fallbacks?: FallbackReplies;
  games?: GameManager;
}

/** Composition root: every stateful component is created here, once. */
export function createBotServices(config: BotConfig, overrides: BotOverrides = {}): BotServices {
  const generator = overrides.generator ?? new OpenAIResponseGenerator(config.llm);
  const factGenerator = overrides.factGenerator ?? generator;

  const channels = new ChannelMemory({
    channelHistorySize: config.channelHistorySize,
    memorySize: config.memorySize,
    maxTrackedChannels: config.maxTrackedChannels,
    commandPrefix: config.commandPrefix,
  });
  const facts = new FactStore(overrides.repository ?? new FileProfileRepository(config.userDataDir), factGenerator, {
    maxConversationHistory: config.maxConversationHistory,
    commandPrefix: config.commandPrefix,
    model: config.llm.factModel,
  });
  const games = overrides.games ?? new GameManager({ maxAttempts: config.maxGameAttempts });
  const rateLimiter = new RateLimiter({ enabled: config.rateLimitEnabled, rules: config.rateLimits });

  const router = new Router({
    config,
    generator,
    classifier: new IntentClassifier(factGenerator, { cacheSize: config.intentCacheSize, model: config.llm.factModel }),
    facts,
    channels,
    contextBuilder: new ContextBuilder({
      displayContextSize: config.displayContextSize,
      memorySize: config.memorySize,
      factLimit: config.contextFactLimit,
      maxChars: config.maxContextChars,
    }),
    games,
    prompts: overrides.prompts ?? new PersonaPromptBuilder(config.botName),
    fallbacks: overrides.fallbacks ?? new FallbackReplies(),
    rateLimiter,
  });

  return { router, channels, games, facts, rateLimiter };
}

import { z } from 'zod';
import { resolve } from 'path';
import { ConfigError } from '../types/errors.js';

/** [max actions, window in seconds] */
export type RateLimitRule = readonly [number, number];

export const DEFAULT_RATE_LIMITS = {
  chat: [50, 1800],
  game: [30, 1800],
  info: [5, 60],
  forget: [20, 3600],
  mydata: [10, 1800],
  default: [30, 1800],
} as const satisfies Record<string, RateLimitRule>;

export type RateLimitAction = keyof typeof DEFAULT_RATE_LIMITS;

const intFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const booleanFromEnv = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback ? 'true' : 'false')
    .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),

  DISCORD_TOKEN: z.string().optional(),
  DISCORD_CLIENT_ID: z.string().optional(),
  BOT_NAME: z.string().default('Banter'),
  COMMAND_PREFIX: z.string().min(1).default('/'),

  LLM_API_KEY: z.string().optional(),
  LLM_BASE_URL: z.string().url().default('https://generativelanguage.googleapis.com/v1beta/openai/'),
  LLM_MODEL: z.string().default('gemini-2.0-flash-lite'),
  FACT_MODEL: z.string().default('gemini-2.0-flash-lite'),
  LLM_TIMEOUT_MS: intFromEnv(20000),
  LLM_MAX_RETRIES: intFromEnv(3),
  LLM_BACKOFF_BASE_MS: intFromEnv(500),
  LLM_BACKOFF_MAX_MS: intFromEnv(8000),
  LLM_REQUESTS_PER_MINUTE: intFromEnv(50),
  LLM_BURST_LIMIT: intFromEnv(5),

  MEMORY_SIZE: intFromEnv(30),
  MAX_CONVERSATION_HISTORY: intFromEnv(20),
  CHANNEL_HISTORY_SIZE: intFromEnv(40),
  DISPLAY_CONTEXT_SIZE: intFromEnv(20),
  MAX_TRACKED_CHANNELS: intFromEnv(500),
  CONTEXT_FACT_LIMIT: intFromEnv(15),
  MAX_CONTEXT_CHARS: intFromEnv(12000),
  INTENT_CACHE_SIZE: intFromEnv(100),

  MAX_GAME_ATTEMPTS: intFromEnv(10),
  DEFAULT_GAME_RANGE: intFromEnv(100),

  MESSAGE_CHUNK_LIMIT: intFromEnv(1900),
  RATE_LIMIT_ENABLED: booleanFromEnv(true),

  USER_DATA_DIR: z.string().default(resolve(process.cwd(), 'user_data')),
  HEALTH_PORT: intFromEnv(10000),
  PROJECT_URL: z.string().default('https://github.com/banterbot/banterbot'),
});

export type BotConfig = Readonly<{
  nodeEnv: string;
  discordToken: string | undefined;
  discordClientId: string | undefined;
  botName: string;
  commandPrefix: string;
  llm: Readonly<{
    apiKey: string | undefined;
    baseUrl: string;
    model: string;
    factModel: string;
    timeoutMs: number;
    maxRetries: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
    requestsPerMinute: number;
    burstLimit: number;
  }>;
  memorySize: number;
  maxConversationHistory: number;
  channelHistorySize: number;
  displayContextSize: number;
  maxTrackedChannels: number;
  contextFactLimit: number;
  maxContextChars: number;
  intentCacheSize: number;
  maxGameAttempts: number;
  defaultGameRange: number;
  messageChunkLimit: number;
  rateLimitEnabled: boolean;
  rateLimits: Readonly<Record<RateLimitAction, RateLimitRule>>;
  userDataDir: string;
  healthPort: number;
  projectUrl: string;
}>;

/**
 * Validate the environment into a frozen config. Unknown variables are ignored;
 * every tunable has a default so tests can call this with an empty object.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  const e = parsed.data;

  return Object.freeze({
    nodeEnv: e.NODE_ENV,
    discordToken: e.DISCORD_TOKEN,
    discordClientId: e.DISCORD_CLIENT_ID,
    botName: e.BOT_NAME,
    commandPrefix: e.COMMAND_PREFIX,
    llm: Object.freeze({
      apiKey: e.LLM_API_KEY,
      baseUrl: e.LLM_BASE_URL,
      model: e.LLM_MODEL,
      factModel: e.FACT_MODEL,
      timeoutMs: e.LLM_TIMEOUT_MS,
      maxRetries: e.LLM_MAX_RETRIES,
      backoffBaseMs: e.LLM_BACKOFF_BASE_MS,
      backoffMaxMs: e.LLM_BACKOFF_MAX_MS,
      requestsPerMinute: e.LLM_REQUESTS_PER_MINUTE,
      burstLimit: e.LLM_BURST_LIMIT,
    }),
    memorySize: e.MEMORY_SIZE,
    maxConversationHistory: e.MAX_CONVERSATION_HISTORY,
    channelHistorySize: e.CHANNEL_HISTORY_SIZE,
    displayContextSize: e.DISPLAY_CONTEXT_SIZE,
    maxTrackedChannels: e.MAX_TRACKED_CHANNELS,
    contextFactLimit: e.CONTEXT_FACT_LIMIT,
    maxContextChars: e.MAX_CONTEXT_CHARS,
    intentCacheSize: e.INTENT_CACHE_SIZE,
    maxGameAttempts: e.MAX_GAME_ATTEMPTS,
    defaultGameRange: e.DEFAULT_GAME_RANGE,
    messageChunkLimit: e.MESSAGE_CHUNK_LIMIT,
    rateLimitEnabled: e.RATE_LIMIT_ENABLED,
    rateLimits: DEFAULT_RATE_LIMITS,
    userDataDir: e.USER_DATA_DIR,
    healthPort: e.HEALTH_PORT,
    projectUrl: e.PROJECT_URL,
  });
}

/** Fail fast on what the running bot cannot do without. */
export function assertRuntimeSecrets(config: BotConfig): void {
  const missing: string[] = [];
  if (!config.discordToken) missing.push('DISCORD_TOKEN');
  if (!config.llm.apiKey) missing.push('LLM_API_KEY');
  if (missing.length > 0) {
    throw new ConfigError(`Missing required env vars: ${missing.join(', ')}`, { missing });
  }
}

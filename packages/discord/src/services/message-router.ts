import {
  RateLimitedError,
  errorMessage,
  logger,
  performanceLogger,
  structuredLogger,
  type BotConfig,
  type RateLimitAction,
} from '@banterbot/shared';
import {
  formatReply,
  parseCommand,
  type ArgumentType,
  type ChannelMemory,
  type ContextBuilder,
  type FactStore,
  type FallbackReplies,
  type GameManager,
  type Intent,
  type IntentClassifier,
  type PersonaPromptBuilder,
  type ResponseGenerator,
} from '@banterbot/capabilities';
import type { RateLimiter } from './rate-limiter.js';

/** Platform-neutral view of one inbound message. */
export interface InboundMessage {
  authorId: string;
  authorName: string;
  channelId: string;
  text: string;
  isDirectMessage: boolean;
  /** Author of the message this one replies to */
  replyToAuthorId?: string | null;
  isFromSelf: boolean;
  correlationId?: string;
}

export interface SendOptions {
  /** Prefix the reply with a mention of the author */
  mention: boolean;
}

/** Where replies go. The Discord adapter chunks and sends; tests collect. */
export interface ReplySink {
  send(text: string, options: SendOptions): Promise<void>;
  typing?(): Promise<void>;
}

export interface RouterDeps {
  config: BotConfig;
  generator: ResponseGenerator;
  classifier: IntentClassifier;
  facts: FactStore;
  channels: ChannelMemory;
  contextBuilder: ContextBuilder;
  games: GameManager;
  prompts: PersonaPromptBuilder;
  fallbacks: FallbackReplies;
  rateLimiter: RateLimiter;
}

interface ChatRequest {
  query: string;
  failedCommand?: boolean;
  argumentType?: ArgumentType | null;
  isCorrection?: boolean;
}

/** What one message produced. Model replies carry the exchange so it can be learned from. */
interface Outcome {
  text: string;
  exchange?: { query: string };
}

interface CommandContext {
  args: string[];
  message: InboundMessage;
  text: string;
}

/** A reply, or `null` to hand the message to passthrough chat. */
type CommandHandler = (ctx: CommandContext) => Promise<string | null>;

const MENTION_LOOKBACK = 5;

const REPLIES = {
  wiped: 'bet, wiped all your data. fresh start 💀',
  wipeFailed: "damn, couldn't clear your data rn",
  forgot: 'bet, forgot that shit 👍',
  nothingToForget: "couldn't find anything about that to forget, try different words?",
  forgetHint: 'if u want me to forget everything, just send /forget on its own. or tell me what to forget',
  fixed: 'aight, fixed that shit for you',
  noData: "damn, i don't know much about you yet. hit me up with some convos so i can learn more about you!",
  dataFailed: "shit, couldn't get your data right now",
  notANumber: "bro that's not a number 💀 try again",
} as const;

/**
 * Per-message dispatcher: exact command table first, then the intent
 * classifier, then passthrough chat. Every message gets at most one reply,
 * and replies in a channel are committed in arrival order.
 */
export class Router {
  private readonly commands: ReadonlyMap<string, CommandHandler>;
  private readonly background = new Set<Promise<void>>();
  private botId = 'self';

  constructor(private readonly deps: RouterDeps) {
    this.commands = new Map<string, CommandHandler>([
      ['game', (ctx) => this.startGame(ctx)],
      ['guess', (ctx) => this.guess(ctx)],
      ['end', (ctx) => this.endGame(ctx)],
      ['forget', (ctx) => this.forget(ctx)],
      ['info', (ctx) => this.myData(ctx.message, 'info')],
      ['mydata', (ctx) => this.myData(ctx.message, 'mydata')],
      ['chat', async () => null],
      ['code', async () => `check out my code here: ${this.deps.config.projectUrl}`],
    ]);
  }

  /** Called once the client knows who it is. */
  setBotUser(id: string): void {
    this.botId = id;
  }

  get commandNames(): string[] {
    return [...this.commands.keys()];
  }

  async route(message: InboundMessage, sink: ReplySink): Promise<void> {
    if (message.isFromSelf || message.authorId === this.botId) return;

    const text = message.text.trim();
    if (!text) return;

    const { channels } = this.deps;
    channels.recordInbound(message.channelId, {
      authorId: message.authorId,
      authorName: message.authorName,
      content: text,
    });

    const outcome = this.dispatch(message, text, sink).catch((error: unknown) => this.recover(error, message));

    await channels.commitInOrder(message.channelId, outcome, async (result) => {
      if (!result) return;
      this.remember(message, result);
      await this.deliver(message, sink, result.text);
      if (result.exchange) this.learn(message, result.exchange.query, result.text);
    });
  }

  /** Resolves once every queued reply and background memory update has finished. */
  async idle(): Promise<void> {
    await this.deps.channels.drain();
    await Promise.all([...this.background]);
  }

  private async dispatch(message: InboundMessage, text: string, sink: ReplySink): Promise<Outcome | null> {
    const { config, channels, classifier, games } = this.deps;
    const command = parseCommand(text, config.commandPrefix);

    if (!command && message.replyToAuthorId === this.botId) {
      return this.chat(message, sink, { query: text });
    }

    if (command) {
      const handler = this.commands.get(command.name);
      if (handler) {
        logger.info(`⚡ Command ${command.name} from ${message.authorId}`, { correlationId: message.correlationId });
        const reply = await handler({ args: command.args, message, text });
        if (reply !== null) return { text: reply };

        const query = command.args.join(' ');
        return this.chat(message, sink, query ? { query } : { query: text, failedCommand: true });
      }
    }

    const stripped = command ? channels.stripCommandPrefix(text) : text;
    const intent = await classifier.classify(stripped, {
      hasActiveGame: games.hasActiveGame(message.authorId),
      deep: command !== null || message.isDirectMessage,
    });
    logger.debug(`Intent for ${message.authorId}: ${intent.kind}`, { correlationId: message.correlationId });

    const reply = await this.handleIntent(intent, { args: command?.args ?? [], message, text });
    if (reply !== null) return { text: reply };

    if (message.isDirectMessage && !command) return null;

    return this.chat(message, sink, {
      query: text,
      failedCommand: command !== null,
      argumentType: intent.kind === 'argumentative' ? intent.argumentType : null,
      isCorrection: intent.kind === 'correction',
    });
  }

  private async handleIntent(intent: Intent, ctx: CommandContext): Promise<string | null> {
    const { games, config } = this.deps;
    const { message } = ctx;

    switch (intent.kind) {
      case 'gameStart':
        return (
          this.limited(message, 'game') ??
          games.startGame(message.authorId, intent.maxRange ?? config.defaultGameRange).message
        );
      case 'gameGuess':
        return this.limited(message, 'game') ?? games.makeGuess(message.authorId, intent.value).message;
      case 'gameEnd':
        if (!games.hasActiveGame(message.authorId)) return null;
        return this.limited(message, 'game') ?? games.endGame(message.authorId).message;
      case 'forget':
        if (!intent.target) return REPLIES.forgetHint;
        return this.limited(message, 'forget') ?? this.forgetTarget(message, intent.target);
      case 'userInfoRequest':
        return this.myData(message, 'info');
      case 'correction':
        return this.correct(ctx);
      case 'command':
      case 'argumentative':
      case 'none':
        return null;
    }
  }

  // --- command handlers ---

  private async startGame({ args, message }: CommandContext): Promise<string> {
    const limited = this.limited(message, 'game');
    if (limited) return limited;

    let maxRange = this.deps.config.defaultGameRange;
    if (args.length > 0) {
      const parsed = Number(args[0]);
      if (!Number.isInteger(parsed)) return REPLIES.notANumber;
      maxRange = parsed;
    }
    return this.deps.games.startGame(message.authorId, maxRange).message;
  }

  private async guess({ args, message }: CommandContext): Promise<string> {
    const limited = this.limited(message, 'game');
    if (limited) return limited;

    const value =
      args.length > 0 ? await this.deps.classifier.extractGuessValue(args.join(' '), { deep: true }) : null;
    if (value === null) {
      const p = this.deps.config.commandPrefix;
      return `yo, i need a number to guess! try something like '${p}guess 40' or just '${p}40'`;
    }
    return this.deps.games.makeGuess(message.authorId, value).message;
  }

  private async endGame({ message }: CommandContext): Promise<string> {
    return this.limited(message, 'game') ?? this.deps.games.endGame(message.authorId).message;
  }

  private async forget({ args, message }: CommandContext): Promise<string> {
    const limited = this.limited(message, 'forget');
    if (limited) return limited;

    if (args.length > 0) return this.forgetTarget(message, args.join(' '));

    try {
      await this.deps.facts.clearFacts(message.authorId, message.authorName);
      return REPLIES.wiped;
    } catch (error) {
      structuredLogger.error('Failed to clear user data', error, { userId: message.authorId });
      return REPLIES.wipeFailed;
    }
  }

  private async forgetTarget(message: InboundMessage, target: string): Promise<string> {
    const removed = await this.deps.facts.removeFact(message.authorId, target, message.authorName);
    return removed ? REPLIES.forgot : REPLIES.nothingToForget;
  }

  private async myData(message: InboundMessage, action: RateLimitAction): Promise<string> {
    const limited = this.limited(message, action);
    if (limited) return limited;

    const { facts } = this.deps;
    try {
      const profile = await facts.getProfile(message.authorId, message.authorName);
      if (profile.facts.length === 0 && profile.topicsOfInterest.length === 0) return REPLIES.noData;
      return await facts.getSummary(message.authorId, message.authorName);
    } catch (error) {
      structuredLogger.error('Failed to read user data', error, { userId: message.authorId });
      return REPLIES.dataFailed;
    }
  }

  /** A fixed fact gets a short confirmation; anything else is answered in chat with the correction note. */
  private async correct({ message, text }: CommandContext): Promise<string | null> {
    const limited = this.limited(message, 'default');
    if (limited) return limited;

    const fixed = await this.deps.facts.handleCorrection(message.authorId, text, message.authorName);
    return fixed ? REPLIES.fixed : null;
  }

  // --- passthrough chat ---

  private async chat(message: InboundMessage, sink: ReplySink, request: ChatRequest): Promise<Outcome> {
    const limited = this.limited(message, 'chat');
    if (limited) return { text: limited };

    const { config, facts, channels, contextBuilder, prompts, generator } = this.deps;

    const profile = await facts.getProfile(message.authorId, message.authorName).catch((error: unknown) => {
      logger.warn(`Chatting without a profile for ${message.authorId}: ${errorMessage(error)}`);
      return null;
    });
    const context = contextBuilder.build(channels.snapshot(message.channelId), profile, {
      isCorrection: request.isCorrection,
    });
    const prompt = prompts.build({
      query: request.query,
      username: message.authorName,
      context,
      argumentType: request.argumentType,
      failedCommand: request.failedCommand,
      commandPrefix: config.commandPrefix,
    });

    await this.showTyping(sink);
    const raw = await performanceLogger.measureAsync('chat reply', () => generator.generate(prompt), {
      userId: message.authorId,
      channelId: message.channelId,
      correlationId: message.correlationId,
    });

    return { text: formatReply(raw, config.botName), exchange: { query: request.query } };
  }

  // --- helpers ---

  /** The limiter's message when the user is over their budget for `action`, else null. */
  private limited(message: InboundMessage, action: RateLimitAction): string | null {
    try {
      this.deps.rateLimiter.check(message.authorId, action);
      return null;
    } catch (error) {
      if (error instanceof RateLimitedError) return error.message;
      throw error;
    }
  }

  private recover(error: unknown, message: InboundMessage): Outcome {
    structuredLogger.error('Failed to handle message', error, {
      userId: message.authorId,
      channelId: message.channelId,
      correlationId: message.correlationId,
    });
    const { fallbacks } = this.deps;
    return { text: error instanceof RateLimitedError ? fallbacks.rateLimited() : fallbacks.generic() };
  }

  private remember(message: InboundMessage, result: Outcome): void {
    const { channels, config } = this.deps;
    channels.recordBotMessage(message.channelId, this.botId, config.botName, result.text);
    if (result.exchange) {
      channels.recordExchange(message.channelId, message.authorName, result.exchange.query, config.botName, result.text);
    }
  }

  private async deliver(message: InboundMessage, sink: ReplySink, text: string): Promise<void> {
    const mention =
      !message.isDirectMessage &&
      this.deps.channels.recentHumanAuthors(message.channelId, MENTION_LOOKBACK).size > 1;

    try {
      await sink.send(text, { mention });
    } catch (error) {
      structuredLogger.error('Failed to send reply', error, {
        channelId: message.channelId,
        correlationId: message.correlationId,
      });
    }
  }

  private async showTyping(sink: ReplySink): Promise<void> {
    if (!sink.typing) return;
    try {
      await sink.typing();
    } catch (error) {
      logger.debug(`Typing indicator failed: ${errorMessage(error)}`);
    }
  }

  /** Fire-and-forget memory updates; never blocks or fails the reply. */
  private learn(message: InboundMessage, query: string, reply: string): void {
    const { facts } = this.deps;
    const { authorId, authorName } = message;

    this.track(facts.addConversation(authorId, query, reply, authorName));
    this.track(facts.extractAndMerge(authorId, query, authorName));
    this.track(facts.extractTopics(authorId, query, authorName));
  }

  private track(task: Promise<unknown>): void {
    const tracked: Promise<void> = task
      .then(
        () => undefined,
        (error: unknown) => {
          logger.warn(`Background memory update failed: ${errorMessage(error)}`);
        }
      )
      .finally(() => {
        this.background.delete(tracked);
      });
    this.background.add(tracked);
  }
}

import { ResultAsync, errAsync } from 'neverthrow';
import {
  BoundedCache,
  ClassificationFailure,
  errorMessage,
  extractStructured,
  isRecord,
  logger,
} from '@banterbot/shared';
import type { ResponseGenerator } from '../llm/response-generator.js';
import {
  isArgumentType,
  type ArgumentDetection,
  type ForgetDetection,
  type Intent,
} from './intent-types.js';
import {
  argumentSubtype,
  extractForgetTarget,
  isSelfDirected,
  matchesCategory,
} from './intent-patterns.js';
import { parseBareNumber, parseLocalNumber } from './number-words.js';
import {
  argumentativePrompt,
  forgetPrompt,
  guessPrompt,
  yesNoPrompt,
  type YesNoCategory,
} from './intent-prompts.js';

export interface DetectOptions {
  /** Allow one remote call when the local patterns find nothing */
  deep?: boolean;
}

export interface ClassifyOptions extends DetectOptions {
  hasActiveGame?: boolean;
}

export interface IntentClassifierOptions {
  cacheSize?: number;
  model?: string;
}

const NONE: Intent = { kind: 'none' };
const MAX_GUESS_WORDS = 6;

// Words that make a miss worth a second opinion from the model
const AMBIGUITY_HINTS: ReadonlyArray<[YesNoCategory | 'forget', RegExp]> = [
  ['endGame', /\b(game|playing|quit|stop)\b/],
  ['game', /\b(game|play|guess)\b/],
  ['forget', /\b(forget|delete|remove|erase|remember)\b/],
  ['userInfo', /\b(know|remember|stored|saved)\b.*\bme\b/],
  ['correction', /\b(wrong|not right|meant|mistake|incorrect)\b/],
];

const normalize = (text: string) => text.trim().toLowerCase();

/**
 * Decides what a message is asking for. Local patterns run first; the model
 * is consulted only when the caller allows it and the text hints at a
 * category the patterns missed. Remote failures degrade to a negative result.
 */
export class IntentClassifier {
  private readonly flagCache: BoundedCache<string, boolean>;
  private readonly forgetCache: BoundedCache<string, ForgetDetection>;
  private readonly argumentCache: BoundedCache<string, ArgumentDetection>;
  private readonly guessCache: BoundedCache<string, number | null>;
  private readonly model: string | undefined;

  constructor(
    private readonly generator: ResponseGenerator | null,
    options: IntentClassifierOptions = {}
  ) {
    const size = options.cacheSize ?? 100;
    this.flagCache = new BoundedCache(size);
    this.forgetCache = new BoundedCache(size);
    this.argumentCache = new BoundedCache(size);
    this.guessCache = new BoundedCache(size);
    this.model = options.model;
  }

  async classify(text: string, options: ClassifyOptions = {}): Promise<Intent> {
    const lower = normalize(text);
    if (!lower) return NONE;

    if (await this.detectEndGame(text)) return { kind: 'gameEnd' };

    if (options.hasActiveGame && lower.split(/\s+/).length <= MAX_GUESS_WORDS) {
      const value = parseBareNumber(lower);
      if (value !== null) return { kind: 'gameGuess', value };
    }

    if (await this.detectGameStart(text)) {
      const range = lower.match(/\b\d+\b/);
      return range ? { kind: 'gameStart', maxRange: Number.parseInt(range[0], 10) } : { kind: 'gameStart' };
    }

    const forget = await this.detectForget(text);
    if (forget.intent) {
      return forget.target ? { kind: 'forget', target: forget.target } : { kind: 'forget' };
    }

    if (await this.detectUserInfo(text)) return { kind: 'userInfoRequest' };
    if (await this.detectCorrection(text)) return { kind: 'correction' };

    const argument = await this.detectArgumentative(text);
    if (argument.argumentative) return { kind: 'argumentative', argumentType: argument.argumentType };

    if (options.deep) return this.classifyAmbiguous(text, lower);
    return NONE;
  }

  detectCorrection(text: string, options: DetectOptions = {}): Promise<boolean> {
    return this.detectFlag('correction', text, options);
  }

  detectGameStart(text: string, options: DetectOptions = {}): Promise<boolean> {
    return this.detectFlag('game', text, options);
  }

  detectEndGame(text: string, options: DetectOptions = {}): Promise<boolean> {
    return this.detectFlag('endGame', text, options);
  }

  detectUserInfo(text: string, options: DetectOptions = {}): Promise<boolean> {
    return this.detectFlag('userInfo', text, options);
  }

  async detectForget(text: string, options: DetectOptions = {}): Promise<ForgetDetection> {
    const lower = normalize(text);
    const key = cacheKey('forget', lower, options);
    const cached = this.forgetCache.get(key);
    if (cached) return cached;

    let result: ForgetDetection = { intent: false, target: null };
    if (matchesCategory(lower, 'forget')) {
      result = { intent: true, target: extractForgetTarget(lower) };
    } else if (options.deep && lower) {
      const answer = await this.remote('forget', forgetPrompt(text), parseForget);
      // Failures answer negatively but are asked again next time
      if (answer.isErr()) return result;
      result = answer.value;
    }

    this.forgetCache.set(key, result);
    return result;
  }

  async detectArgumentative(text: string, options: DetectOptions = {}): Promise<ArgumentDetection> {
    const lower = normalize(text);
    const key = cacheKey('argumentative', lower, options);
    const cached = this.argumentCache.get(key);
    if (cached) return cached;

    let result: ArgumentDetection = { argumentative: false, argumentType: 'general' };
    // self-deprecation is never an argument, whatever the vocabulary
    if (!isSelfDirected(lower)) {
      if (matchesCategory(lower, 'argumentative')) {
        result = { argumentative: true, argumentType: argumentSubtype(lower) };
      } else if (options.deep && lower) {
        const answer = await this.remote('argumentative', argumentativePrompt(text), parseArgument);
        if (answer.isErr()) return result;
        result = answer.value;
      }
    }

    this.argumentCache.set(key, result);
    return result;
  }

  /** Integer literal, then spelled-out number, then (deep only) the model. Never 0 for "nothing". */
  async extractGuessValue(text: string, options: DetectOptions = {}): Promise<number | null> {
    const lower = normalize(text);
    const key = cacheKey('guess', lower, options);
    const cached = this.guessCache.get(key);
    if (cached !== undefined) return cached;

    let result = parseLocalNumber(lower);
    if (result === null && options.deep && lower) {
      const answer = await this.remote('guess', guessPrompt(text), parseGuess);
      if (answer.isErr()) return null;
      result = answer.value;
    }

    this.guessCache.set(key, result);
    return result;
  }

  private async detectFlag(category: YesNoCategory, text: string, options: DetectOptions): Promise<boolean> {
    const lower = normalize(text);
    const key = cacheKey(category, lower, options);
    const cached = this.flagCache.get(key);
    if (cached !== undefined) return cached;

    let result = matchesCategory(lower, category);
    if (!result && options.deep && lower) {
      const answer = await this.remote(category, yesNoPrompt(category, text), parseYesNo);
      if (answer.isErr()) return false;
      result = answer.value;
    }

    this.flagCache.set(key, result);
    return result;
  }

  /** At most one remote call, for the first category the text hints at. */
  private async classifyAmbiguous(text: string, lower: string): Promise<Intent> {
    const hint = AMBIGUITY_HINTS.find(([, pattern]) => pattern.test(lower));
    if (!hint) return NONE;

    const [category] = hint;
    switch (category) {
      case 'forget': {
        const forget = await this.detectForget(text, { deep: true });
        if (!forget.intent) return NONE;
        return forget.target ? { kind: 'forget', target: forget.target } : { kind: 'forget' };
      }
      case 'endGame':
        return (await this.detectEndGame(text, { deep: true })) ? { kind: 'gameEnd' } : NONE;
      case 'game':
        return (await this.detectGameStart(text, { deep: true })) ? { kind: 'gameStart' } : NONE;
      case 'userInfo':
        return (await this.detectUserInfo(text, { deep: true })) ? { kind: 'userInfoRequest' } : NONE;
      case 'correction':
        return (await this.detectCorrection(text, { deep: true })) ? { kind: 'correction' } : NONE;
    }
  }

  private remote<T>(
    category: string,
    prompt: string,
    parse: (value: unknown) => T | null
  ): ResultAsync<T, ClassificationFailure> {
    const generator = this.generator;
    if (!generator) return errAsync(new ClassificationFailure('No model configured', { category }));

    return ResultAsync.fromPromise(
      generator.generate(prompt, { model: this.model, temperature: 0, maxTokens: 100 }),
      (error) => new ClassificationFailure(errorMessage(error), { category })
    )
      .andThen((raw) =>
        extractStructured(raw, parse).mapErr(
          (error) => new ClassificationFailure(error.message, { category, kind: error.kind })
        )
      )
      .mapErr((failure) => {
        logger.warn(`Intent fallback failed for ${category}: ${failure.message}`, failure.context);
        return failure;
      });
  }
}

function cacheKey(category: string, lower: string, options: DetectOptions): string {
  return `${category}:${options.deep ? 'deep' : 'local'}:${lower}`;
}

function parseYesNo(value: unknown): boolean | null {
  if (typeof value === 'boolean') return value;
  if (isRecord(value) && typeof value.result === 'boolean') return value.result;
  return null;
}

function parseForget(value: unknown): ForgetDetection | null {
  if (!isRecord(value) || typeof value.intent !== 'boolean') return null;
  const target = typeof value.target === 'string' && value.target !== 'null' ? value.target.trim() : null;
  return { intent: value.intent, target: target || null };
}

function parseArgument(value: unknown): ArgumentDetection | null {
  if (!isRecord(value) || typeof value.argumentative !== 'boolean') return null;
  return {
    argumentative: value.argumentative,
    argumentType: isArgumentType(value.type) ? value.type : 'general',
  };
}

function parseGuess(value: unknown): number | null {
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (isRecord(value) && typeof value.guess === 'number' && Number.isInteger(value.guess)) return value.guess;
  return null;
}

/** `/name arg1 arg2` → command intent, or `null` when the prefix is missing. */
export function parseCommand(text: string, prefix: string): Extract<Intent, { kind: 'command' }> | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith(prefix) || trimmed.startsWith(prefix + prefix)) return null;

  const [name = '', ...args] = trimmed.slice(prefix.length).split(/\s+/);
  if (!name) return null;
  return { kind: 'command', name: name.toLowerCase(), args };
}

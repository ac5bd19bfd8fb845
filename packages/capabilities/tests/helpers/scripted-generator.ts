import type { GenerateOptions, ResponseGenerator } from '../../src/services/llm/response-generator.js';

type Reply = string | Error | ((prompt: string) => string);

/** Replays canned model output in order and records every prompt it was given. */
export class ScriptedGenerator implements ResponseGenerator {
  readonly prompts: string[] = [];
  readonly calls: Array<GenerateOptions | undefined> = [];

  constructor(private readonly replies: Reply[] = [], private readonly fallback: string = '[]') {}

  async generate(prompt: string, options?: GenerateOptions): Promise<string> {
    this.prompts.push(prompt);
    this.calls.push(options);

    const next = this.replies.shift();
    if (next === undefined) return this.fallback;
    if (next instanceof Error) throw next;
    return typeof next === 'function' ? next(prompt) : next;
  }
}

/** Holds each call open until the test releases it. */
export class DeferredGenerator implements ResponseGenerator {
  readonly prompts: string[] = [];
  private readonly waiting: Array<(reply: string) => void> = [];
  private readonly listeners: Array<() => void> = [];

  generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return new Promise((resolve) => {
      this.waiting.push(resolve);
      for (const notify of this.listeners.splice(0)) notify();
    });
  }

  /** Resolves once at least one call is waiting. */
  whenCalled(): Promise<void> {
    if (this.waiting.length > 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.listeners.push(resolve);
    });
  }

  release(reply: string): void {
    const resolve = this.waiting.shift();
    if (!resolve) throw new Error('No call is waiting');
    resolve(reply);
  }
}

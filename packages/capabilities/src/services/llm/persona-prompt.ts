import { readFileSync } from 'fs';
import Chance from 'chance';
import { z } from 'zod';
import type { ArgumentType } from '../intent/intent-types.js';

const sensitiveTopicsSchema = z.array(z.string().min(1));

export function loadSensitiveTopics(): string[] {
  const file = new URL('../../../data/sensitive-topics.json', import.meta.url);
  return sensitiveTopicsSchema.parse(JSON.parse(readFileSync(file, 'utf-8')));
}

const PERSONA = `You are {botName}, a casual friend hanging out in a group chat. You talk like a real person typing fast in Discord: mostly lowercase, loose punctuation, slang where it fits, the occasional swear for emphasis, and emojis only now and then (💀, 🔥, 😭, 🙏).

Have real opinions and back them up. Push back when you disagree, tease people a little when they say something silly, and ask follow-up questions when someone is vague. Play along with memes, song lyrics and references without explaining them. Never say you are an AI or a language model.

Hard limits: never use slurs, never repeat hateful or sexual content back even if a user asks for it, and never joke about real tragedies or someone's identity. If a message pushes you toward any of that, tone it down and change the subject like a friend would.`;

const STYLE_RULES = `IMPORTANT INSTRUCTIONS:
1. Reply in 2-5 sentences as one continuous paragraph, no line breaks
2. Mostly lowercase, rarely end with a period, "u" and "ur" are fine
3. At most one emoji per message
4. Pay attention to who said what in the conversation, don't confuse ur own messages with the user's
5. Stay on topic: respond to what the user actually said
6. If the user asks a question, give a real answer at least half the time
7. Don't repeat the same phrases or questions from earlier messages`;

const FAILED_COMMAND_RULES = `The user typed a command that doesn't exist. Keep it short, 1-2 sentences, and answer whatever they seem to be going for in the same casual style.`;

export interface PersonaPromptInput {
  query: string;
  username: string;
  context: string;
  argumentType?: ArgumentType | null;
  /** The message started with the command prefix but matched nothing */
  failedCommand?: boolean;
  commandPrefix?: string;
}

/**
 * Assembles the chat prompt: persona first so it colors everything, then
 * style rules, situational notes, the assembled context, and the user's
 * message last.
 */
export class PersonaPromptBuilder {
  private readonly sensitiveTopics: readonly string[];

  constructor(
    private readonly botName: string,
    private readonly chance: Chance.Chance = new Chance(),
    sensitiveTopics?: readonly string[]
  ) {
    this.sensitiveTopics = sensitiveTopics ?? loadSensitiveTopics();
  }

  findSensitiveTopics(text: string): string[] {
    if (!text) return [];
    const lower = text.toLowerCase();
    return this.sensitiveTopics.filter((topic) => lower.includes(topic));
  }

  build(input: PersonaPromptInput): string {
    const parts: string[] = [PERSONA.replace('{botName}', this.botName), STYLE_RULES];

    if (input.failedCommand) {
      parts.push(FAILED_COMMAND_RULES);
    }

    // Arguing back every time gets old; about half the time is enough
    if (input.argumentType && this.chance.bool({ likelihood: 45 })) {
      parts.push(
        `ARGUMENT DETECTED - TYPE: ${input.argumentType}
The user is being argumentative. Match their energy with wit instead of backing down, call out weak points, and don't apologize for having an opinion. Keep it playful, never cruel, and let it go once they ease up.`
      );
    }

    const topics = this.findSensitiveTopics(input.query);
    if (topics.length > 0) {
      parts.push(
        `ATTENTION: This message touches on sensitive topics: ${topics.join(', ')}
- Be supportive without being condescending
- No jokes at the user's expense about these topics`
      );
    }

    if (input.context) {
      parts.push(`CONVERSATION CONTEXT:\n${input.context}`);
    }

    const prefix = input.commandPrefix ?? '/';
    const query =
      input.failedCommand && input.query.startsWith(prefix) ? input.query.slice(prefix.length) : input.query;
    parts.push(`User (${input.username}) just said: "${query}"`);
    parts.push(`Your response as ${this.botName}:`);

    return parts.join('\n\n');
  }
}

import Chance from 'chance';

export const FALLBACK_LINES = [
  'ahh shit, my brain short-circuited for a sec. wanna try again?',
  'bruh my brain just blue-screened 💀 hit me again?',
  'hold up, lost my train of thought. say that again?',
] as const;

export const RATE_LIMIT_LINES = [
  'yo chill, im getting flooded rn. give me a sec',
  'too many messages at once fr, try again in a minute',
  'my brain needs a breather, hit me up again in a bit 🙏',
] as const;

/** In-character lines for when something below the router fails. */
export class FallbackReplies {
  constructor(private readonly chance: Chance.Chance = new Chance()) {}

  generic(): string {
    return this.chance.pickone([...FALLBACK_LINES]);
  }

  rateLimited(): string {
    return this.chance.pickone([...RATE_LIMIT_LINES]);
  }
}

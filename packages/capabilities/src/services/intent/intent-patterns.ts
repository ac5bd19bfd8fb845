import type { ArgumentType, IntentCategory } from './intent-types.js';

type PatternCategory = Exclude<IntentCategory, 'guess'>;

// Evaluated against lower-cased text
const SOURCES: Record<PatternCategory, string[]> = {
  correction: [
    "(that'?s|thats|is) (not|wrong|incorrect)",
    "\\bi (meant|mean|didn'?t mean)\\b",
    '\\bactually\\b,?',
    '\\bcorrection\\b',
    '\\bfix (that|this)\\b',
    '\\bthat (should|needs to) be\\b',
  ],
  forget: [
    '\\b(forget|delete|remove|erase) (about|that|this|my|the)\\b',
    "\\bdon'?t (remember|keep) (that|this|my)\\b",
    '\\bclear my\\b',
    '\\bwipe (my|the) data\\b',
  ],
  game: [
    '\\b(start|play|begin) (a |the )?game\\b',
    "\\blet'?s play\\b",
    '\\bwanna play\\b',
    '^play$',
    '\\bnew game\\b',
  ],
  endGame: [
    '\\b(end|stop|quit|exit|finish) (the |this )?game\\b',
    "\\bi('?m| am) done\\b",
    '\\bstop playing\\b',
    '^end$',
    '\\bgive up\\b',
  ],
  userInfo: [
    '\\bwhat (do you|you) know about me\\b',
    '\\b(show|tell|give) me my (info|data|facts)\\b',
    '\\bmy (info|data|profile)\\b',
    "\\bwhat('?s| is) stored\\b",
    '\\bwhat have (you|we) talked about\\b',
  ],
  argumentative: [
    '\\b(fuck|shit|damn|bitch|stfu|shut up|bullshit)',
    "\\b(you'?re|your|ur|you|u) (wrong|stupid|dumb|idiot|trash)\\b",
    "\\b(you'?re|your|ur|you|u) (bad|terrible|awful|useless)\\b",
    '\\bi hate (you|this|that|the bot)\\b',
    '\\b(no way|nah+|not true|cap)\\b',
    "\\b(you|u) (don'?t|dont) know (what|anything)\\b",
    "\\bthat'?s (stupid|dumb|idiotic|moronic)\\b",
  ],
};

export const INTENT_PATTERNS: Readonly<Record<PatternCategory, readonly RegExp[]>> = {
  correction: SOURCES.correction.map((s) => new RegExp(s)),
  forget: SOURCES.forget.map((s) => new RegExp(s)),
  game: SOURCES.game.map((s) => new RegExp(s)),
  endGame: SOURCES.endGame.map((s) => new RegExp(s)),
  userInfo: SOURCES.userInfo.map((s) => new RegExp(s)),
  argumentative: SOURCES.argumentative.map((s) => new RegExp(s)),
};

export function matchesCategory(lowerText: string, category: PatternCategory): boolean {
  return INTENT_PATTERNS[category].some((pattern) => pattern.test(lowerText));
}

const ARGUMENT_SUBTYPES: ReadonlyArray<[ArgumentType, RegExp]> = [
  ['insult', /\b(fuck|shit|damn|bitch|stfu|shut up)/],
  ['disagreement', /\b(wrong|incorrect|not true|cap)\b/],
  ['criticism', /\b(stupid|dumb|idiot|trash)\b/],
];

export function argumentSubtype(lowerText: string): ArgumentType {
  for (const [type, pattern] of ARGUMENT_SUBTYPES) {
    if (pattern.test(lowerText)) return type;
  }
  return 'general';
}

/** "i suck at this", "im so dumb lol" */
const FIRST_PERSON_LEAD = /^\s*(i|i'?m|im|i am|me|my|myself)\b/;
const ADDRESSES_BOT = /\b(you|u|ur|your|you'?re|youre|the bot)\b/;

export function isSelfDirected(lowerText: string): boolean {
  return FIRST_PERSON_LEAD.test(lowerText) && !ADDRESSES_BOT.test(lowerText);
}

export const FORGET_VERBS = new Set(['forget', 'delete', 'remove', 'erase', 'clear', 'wipe']);

const FORGET_FILLER = new Set([
  'about',
  'that',
  'this',
  'my',
  'the',
  'what',
  'i',
  'said',
  'of',
  'everything',
  'all',
  'data',
  'info',
  'information',
  'facts',
  'stuff',
]);

const WIPE_WORDS = new Set(['everything', 'all', 'data', 'info', 'information', 'facts', 'stuff']);

/**
 * Words after the first forget verb, minus leading filler ("about my", "the").
 * `null` means the user asked to forget everything.
 */
export function extractForgetTarget(lowerText: string): string | null {
  const words = lowerText
    .replace(/[.!?,]+/g, ' ')
    .split(/\s+/)
    .filter(Boolean);
  const verbAt = words.findIndex((w) => FORGET_VERBS.has(w));
  if (verbAt < 0) return null;

  const rest = words.slice(verbAt + 1);
  let start = 0;
  while (start < rest.length && FORGET_FILLER.has(rest[start])) start++;

  const stripped = rest.slice(start).join(' ');
  if (!stripped) {
    return rest.some((w) => WIPE_WORDS.has(w)) || rest.length === 0 ? null : rest.join(' ');
  }
  // "forget about it": too short to be a useful match on its own
  return stripped.length >= 3 ? stripped : rest.join(' ');
}

const UNITS = new Map<string, number>([
  ['zero', 0],
  ['one', 1],
  ['two', 2],
  ['three', 3],
  ['four', 4],
  ['five', 5],
  ['six', 6],
  ['seven', 7],
  ['eight', 8],
  ['nine', 9],
]);

const TEENS = new Map<string, number>([
  ['ten', 10],
  ['eleven', 11],
  ['twelve', 12],
  ['thirteen', 13],
  ['fourteen', 14],
  ['fifteen', 15],
  ['sixteen', 16],
  ['seventeen', 17],
  ['eighteen', 18],
  ['nineteen', 19],
]);

const TENS = new Map<string, number>([
  ['twenty', 20],
  ['thirty', 30],
  ['forty', 40],
  ['fourty', 40],
  ['fifty', 50],
  ['sixty', 60],
  ['seventy', 70],
  ['eighty', 80],
  ['ninety', 90],
]);

interface Reading {
  value: number;
  /** Index of the first token after the number */
  next: number;
}

function readBelowHundred(tokens: string[], at: number): Reading | null {
  const token = tokens[at];
  if (token === undefined) return null;

  const teen = TEENS.get(token);
  if (teen !== undefined) return { value: teen, next: at + 1 };

  const tens = TENS.get(token);
  if (tens !== undefined) {
    const unit = UNITS.get(tokens[at + 1] ?? '');
    return unit !== undefined && unit > 0 ? { value: tens + unit, next: at + 2 } : { value: tens, next: at + 1 };
  }

  const unit = UNITS.get(token);
  return unit === undefined ? null : { value: unit, next: at + 1 };
}

function readNumberAt(tokens: string[], at: number): Reading | null {
  let i = at;
  let hundreds = 0;

  if (tokens[i + 1] === 'hundred') {
    const multiplier = tokens[i] === 'a' ? 1 : UNITS.get(tokens[i]);
    if (multiplier !== undefined && multiplier > 0) {
      hundreds = multiplier * 100;
      i += 2;
      if (tokens[i] === 'and') i++;
    }
  }

  const rest = readBelowHundred(tokens, i);
  if (rest) return { value: hundreds + rest.value, next: rest.next };
  return hundreds > 0 ? { value: hundreds, next: i } : null;
}

function wordTokens(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z]+/)
    .filter(Boolean);
}

/**
 * First number written out in words, 0 to 999: "seventeen", "forty-two",
 * "a hundred", "one hundred and five". `null` when there is none.
 */
export function parseSpelledNumber(text: string): number | null {
  const tokens = wordTokens(text);

  for (let i = 0; i < tokens.length; i++) {
    const reading = readNumberAt(tokens, i);
    if (reading) return reading.value;
  }
  return null;
}

const DIGITS = /\b\d+\b/;

/** Integer literal first, then a spelled-out number. */
export function parseLocalNumber(text: string): number | null {
  const literal = text.match(DIGITS);
  if (literal) {
    const value = Number.parseInt(literal[0], 10);
    if (Number.isSafeInteger(value)) return value;
  }
  return parseSpelledNumber(text);
}

const GUESS_LEAD = /^(?:i guess|i think it[’']?s|i say|is it|maybe|how about|my guess is)\s+/;
const BARE_DIGITS = /^\d+$/;

/**
 * A message that is nothing but a number: "42", "forty-two", "is it 7?",
 * "i think it's seventeen". Unlike `parseLocalNumber`, number words inside
 * other text ("which one", "those two are cool") do not count.
 */
export function parseBareNumber(text: string): number | null {
  const body = text
    .trim()
    .toLowerCase()
    .replace(/[.!?]+$/, '')
    .replace(GUESS_LEAD, '')
    .trim();

  if (BARE_DIGITS.test(body)) {
    const value = Number.parseInt(body, 10);
    return Number.isSafeInteger(value) ? value : null;
  }

  if (!/^[a-z\s-]+$/.test(body)) return null;
  const tokens = wordTokens(body);
  const reading = readNumberAt(tokens, 0);
  return reading && reading.next === tokens.length ? reading.value : null;
}

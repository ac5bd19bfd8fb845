export const DISCORD_MESSAGE_LIMIT = 1900;

function splitOversizedWord(word: string, maxLength: number): string[] {
  const pieces: string[] = [];
  for (let i = 0; i < word.length; i += maxLength) {
    pieces.push(word.slice(i, i + maxLength));
  }
  return pieces;
}

/**
 * Greedily pack `units` into chunks no longer than `maxLength`, joined by
 * `separator`. Units that are too long on their own are handed to `split`.
 */
function pack(
  units: string[],
  separator: string,
  maxLength: number,
  split: (unit: string) => string[]
): string[] {
  const chunks: string[] = [];
  let current = '';

  for (const unit of units) {
    if (!unit) continue;

    if (unit.length > maxLength) {
      if (current) {
        chunks.push(current);
        current = '';
      }
      chunks.push(...split(unit));
      continue;
    }

    const candidate = current ? current + separator + unit : unit;
    if (candidate.length > maxLength) {
      chunks.push(current);
      current = unit;
    } else {
      current = candidate;
    }
  }

  if (current) chunks.push(current);
  return chunks;
}

function byWords(text: string, maxLength: number): string[] {
  return pack(text.split(/\s+/), ' ', maxLength, (word) => splitOversizedWord(word, maxLength));
}

function bySentences(text: string, maxLength: number): string[] {
  return pack(text.split(/(?<=[.!?])\s+/), ' ', maxLength, (sentence) => byWords(sentence, maxLength));
}

/**
 * Split a reply for Discord: paragraphs first, then sentences, then words.
 * A word is only cut when it alone is longer than the limit.
 */
export function chunkMessage(text: string, maxLength: number = DISCORD_MESSAGE_LIMIT): string[] {
  const trimmed = text.trim();
  if (!trimmed) return [];
  if (trimmed.length <= maxLength) return [trimmed];

  const paragraphs = trimmed.split(/\n\s*\n/).map((p) => p.trim());
  return pack(paragraphs, '\n\n', maxLength, (paragraph) => bySentences(paragraph, maxLength));
}

export type FactBucket = 'age' | 'location' | 'relationship' | 'preference' | 'possession' | 'other';

/** Buckets that hold at most one fact; a newer fact replaces the older one. Only `other` accumulates. */
export const EXCLUSIVE_BUCKETS: ReadonlySet<FactBucket> = new Set([
  'age',
  'location',
  'relationship',
  'preference',
  'possession',
]);

// First match wins, so the narrow buckets go before the broad verb-based ones
const BUCKET_KEYWORDS: ReadonlyArray<[FactBucket, RegExp]> = [
  ['age', /\byears? old\b|\byour age\b|\byou are (aged )?\d{1,3}\b|\byou turned \d{1,3}\b/],
  ['location', /\byou (live|lived|are living) in\b|\byou are (from|based in)\b|\byou moved to\b|\byour hometown\b/],
  [
    'relationship',
    /\byour (girlfriend|boyfriend|wife|husband|partner|fianc[eé]e?)\b|\byou are (single|married|engaged|divorced|dating)\b/,
  ],
  [
    'preference',
    /\byou (like|love|hate|enjoy|prefer|dislike|adore)\b|\byou (do not|don'?t) like\b|\byou are a fan of\b|\byour favou?rite\b/,
  ],
  ['possession', /\byou (have|own|got|bought)\b/],
];

export function classifyFactBucket(content: string): FactBucket {
  const lower = content.toLowerCase();
  for (const [bucket, pattern] of BUCKET_KEYWORDS) {
    if (pattern.test(lower)) return bucket;
  }
  return 'other';
}

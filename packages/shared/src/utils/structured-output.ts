import { type Result, ok, err } from 'neverthrow';

/**
 * Structured output extraction for LLM replies.
 *
 * Models asked for "strict JSON" still wrap it in markdown fences, prepend
 * prose, or append an explanation. Every remote-classification call site goes
 * through `extractStructuredJson`, which:
 *
 * 1. strips triple-backtick fences (with or without a `json` tag),
 * 2. tries the whole remaining text,
 * 3. otherwise takes the first balanced `{...}` or `[...]` block,
 *
 * and returns `ok(value)` or `err(StructuredOutputError)`. It never throws.
 */

export type StructuredOutputErrorKind = 'empty' | 'no_json' | 'invalid_json' | 'shape_mismatch';

export class StructuredOutputError extends Error {
  constructor(
    public kind: StructuredOutputErrorKind,
    message: string,
    public raw: string
  ) {
    super(message);
    this.name = 'StructuredOutputError';
  }
}

const FENCE_PATTERN = /```(?:json|JSON)?\s*\n?([\s\S]*?)```/;

export function stripCodeFences(text: string): string {
  const match = text.match(FENCE_PATTERN);
  if (match) return match[1].trim();
  // Unterminated fence: drop the opener and keep the rest
  return text.replace(/^```(?:json|JSON)?\s*/, '').trim();
}

/**
 * Find the first balanced JSON object or array in `text`, skipping braces
 * that appear inside string literals.
 */
export function findFirstJsonBlock(text: string): string | null {
  let start = -1;
  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"' && stack.length > 0) {
      inString = true;
      continue;
    }

    if (ch === '{' || ch === '[') {
      if (stack.length === 0) start = i;
      stack.push(ch === '{' ? '}' : ']');
      continue;
    }

    if ((ch === '}' || ch === ']') && stack.length > 0) {
      if (stack[stack.length - 1] !== ch) {
        // Mismatched closer: abandon this candidate and keep scanning
        stack.length = 0;
        start = -1;
        continue;
      }
      stack.pop();
      if (stack.length === 0 && start >= 0) {
        return text.slice(start, i + 1);
      }
    }
  }

  return null;
}

export function extractStructuredJson(raw: string): Result<unknown, StructuredOutputError> {
  const trimmed = raw.trim();
  if (!trimmed) {
    return err(new StructuredOutputError('empty', 'Model returned empty output', raw));
  }

  const unfenced = stripCodeFences(trimmed);

  try {
    const parsed: unknown = JSON.parse(unfenced);
    return ok(parsed);
  } catch {
    // fall through to block extraction
  }

  const block = findFirstJsonBlock(unfenced);
  if (!block) {
    return err(new StructuredOutputError('no_json', 'No JSON object or array found in model output', raw));
  }

  try {
    const parsed: unknown = JSON.parse(block);
    return ok(parsed);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return err(new StructuredOutputError('invalid_json', `Could not decode model JSON: ${detail}`, raw));
  }
}

/**
 * Extract and then narrow with a type guard or parser. Parsers return `null`
 * when the shape does not match.
 */
export function extractStructured<T>(
  raw: string,
  parse: (value: unknown) => T | null
): Result<T, StructuredOutputError> {
  return extractStructuredJson(raw).andThen((value) => {
    const parsed = parse(value);
    return parsed === null
      ? err(new StructuredOutputError('shape_mismatch', 'Model JSON did not match the expected shape', raw))
      : ok(parsed);
  });
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asStringArray(value: unknown): string[] | null {
  if (!Array.isArray(value)) return null;
  return value.filter((v): v is string => typeof v === 'string');
}

import { describe, it, expect } from 'vitest';
import {
  extractStructuredJson,
  extractStructured,
  findFirstJsonBlock,
  stripCodeFences,
  asStringArray,
} from '../src/utils/structured-output.js';

describe('structured output extraction', () => {
  it('should parse plain JSON', () => {
    const result = extractStructuredJson('{"intent": true, "target": "school"}');
    expect(result.isOk()).toBe(true);
    expect(result._unsafeUnwrap()).toEqual({ intent: true, target: 'school' });
  });

  it('should unwrap a json-tagged markdown fence', () => {
    const raw = 'Sure!\n```json\n["You are 21 years old", "You hate math"]\n```';
    expect(extractStructuredJson(raw)._unsafeUnwrap()).toEqual([
      'You are 21 years old',
      'You hate math',
    ]);
  });

  it('should unwrap an untagged fence', () => {
    expect(stripCodeFences('```\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it('should take the first JSON block out of surrounding prose', () => {
    const raw = 'Here is my answer: {"action": "delete", "fact_index": 2} hope that helps {"x": 1}';
    expect(extractStructuredJson(raw)._unsafeUnwrap()).toEqual({ action: 'delete', fact_index: 2 });
  });

  it('should ignore braces inside string literals', () => {
    expect(findFirstJsonBlock('x {"note": "a } inside"} y')).toBe('{"note": "a } inside"}');
  });

  it('should return an empty error for blank output', () => {
    const result = extractStructuredJson('   ');
    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr().kind).toBe('empty');
  });

  it('should return no_json when nothing looks like JSON', () => {
    expect(extractStructuredJson('true')._unsafeUnwrap()).toBe(true);
    expect(extractStructuredJson('nah fam')._unsafeUnwrapErr().kind).toBe('no_json');
  });

  it('should return invalid_json for a broken block', () => {
    expect(extractStructuredJson('result: {"a": 1,}')._unsafeUnwrapErr().kind).toBe('invalid_json');
  });

  it('should report a shape mismatch from the parser', () => {
    const result = extractStructured('{"a": 1}', asStringArray);
    expect(result._unsafeUnwrapErr().kind).toBe('shape_mismatch');
  });

  it('should keep only string entries of an array', () => {
    expect(asStringArray(['a', 1, 'b', null])).toEqual(['a', 'b']);
  });
});

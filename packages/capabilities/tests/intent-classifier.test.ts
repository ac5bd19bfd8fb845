import { describe, it, expect } from 'vitest';
import { IntentClassifier, parseCommand } from '../src/services/intent/intent-classifier.js';
import { parseBareNumber, parseSpelledNumber } from '../src/services/intent/number-words.js';
import { extractForgetTarget } from '../src/services/intent/intent-patterns.js';
import { ScriptedGenerator } from './helpers/scripted-generator.js';

describe('IntentClassifier', () => {
  describe('guess extraction', () => {
    const classifier = new IntentClassifier(null);

    it('should read an integer literal', async () => {
      expect(await classifier.extractGuessValue('I guess 42')).toBe(42);
    });

    it('should read spelled-out numbers locally', async () => {
      expect(await classifier.extractGuessValue("maybe it's seventeen?")).toBe(17);
      expect(await classifier.extractGuessValue('let me try ninety-nine')).toBe(99);
      expect(await classifier.extractGuessValue('is it forty two')).toBe(42);
    });

    it('should return null, not 0, when there is no number', async () => {
      expect(await classifier.extractGuessValue("what's up")).toBeNull();
    });

    it('should ask the model only in deep mode and only when nothing local matched', async () => {
      const generator = new ScriptedGenerator(['{"guess": 12}']);
      const deep = new IntentClassifier(generator);

      expect(await deep.extractGuessValue('twelvish maybe', { deep: true })).toBe(12);
      expect(await deep.extractGuessValue('I guess 30', { deep: true })).toBe(30);
      expect(generator.prompts).toHaveLength(1);
    });

    it('should degrade to null when the model call fails', async () => {
      const generator = new ScriptedGenerator([new Error('socket hang up')]);
      const deep = new IntentClassifier(generator);

      await expect(deep.extractGuessValue('somewhere around there', { deep: true })).resolves.toBeNull();
    });
  });

  describe('spelled numbers', () => {
    it('should handle hundreds', () => {
      expect(parseSpelledNumber('a hundred')).toBe(100);
      expect(parseSpelledNumber('one hundred and five')).toBe(105);
      expect(parseSpelledNumber('two hundred forty-one')).toBe(241);
    });

    it('should ignore words that only look like numbers', () => {
      expect(parseSpelledNumber('i have a dog')).toBeNull();
      expect(parseSpelledNumber('often')).toBeNull();
    });

    it('should read a bare number with an optional lead-in', () => {
      expect(parseBareNumber('one hundred and five')).toBe(105);
      expect(parseBareNumber('I guess twenty')).toBe(20);
      expect(parseBareNumber("i think it's 64.")).toBe(64);
      expect(parseBareNumber('one more')).toBeNull();
      expect(parseBareNumber('2 cool')).toBeNull();
    });
  });

  describe('classify', () => {
    const classifier = new IntentClassifier(null);

    it('should detect ending a game before anything else', async () => {
      expect(await classifier.classify('ok i give up')).toEqual({ kind: 'gameEnd' });
    });

    it('should detect starting a game with and without a range', async () => {
      expect(await classifier.classify("let's play")).toEqual({ kind: 'gameStart' });
      expect(await classifier.classify('start a game up to 50')).toEqual({ kind: 'gameStart', maxRange: 50 });
    });

    it('should treat a short number as a guess only while a game is active', async () => {
      expect(await classifier.classify('42', { hasActiveGame: true })).toEqual({ kind: 'gameGuess', value: 42 });
      expect(await classifier.classify("i think it's seventeen", { hasActiveGame: true })).toEqual({
        kind: 'gameGuess',
        value: 17,
      });
      expect(await classifier.classify('42')).toEqual({ kind: 'none' });
    });

    it('should accept spelled numbers only when they are the whole message', async () => {
      expect(await classifier.classify('forty two', { hasActiveGame: true })).toEqual({ kind: 'gameGuess', value: 42 });
      expect(await classifier.classify('ninety-nine!', { hasActiveGame: true })).toEqual({
        kind: 'gameGuess',
        value: 99,
      });
      expect(await classifier.classify('is it 7?', { hasActiveGame: true })).toEqual({ kind: 'gameGuess', value: 7 });
    });

    it('should not read number words inside ordinary chat as a guess', async () => {
      for (const text of ['which one', 'no one asked', 'those two are cool', 'top 5 movies']) {
        expect(await classifier.classify(text, { hasActiveGame: true })).toEqual({ kind: 'none' });
      }
    });

    it('should extract a forget target', async () => {
      expect(await classifier.classify('forget my birthday')).toEqual({ kind: 'forget', target: 'birthday' });
      expect(await classifier.classify('delete my info about school')).toEqual({ kind: 'forget', target: 'school' });
    });

    it('should report a forget with no target when the user asks to wipe everything', async () => {
      expect(await classifier.classify('clear my data')).toEqual({ kind: 'forget' });
    });

    it('should detect user info requests', async () => {
      expect(await classifier.classify('what do you know about me')).toEqual({ kind: 'userInfoRequest' });
    });

    it('should detect corrections', async () => {
      expect(await classifier.classify("that's wrong, i'm 25")).toEqual({ kind: 'correction' });
    });

    it('should classify argument sub-types', async () => {
      expect(await classifier.classify("you're dumb")).toEqual({ kind: 'argumentative', argumentType: 'criticism' });
      expect(await classifier.classify("that's cap")).toEqual({
        kind: 'argumentative',
        argumentType: 'disagreement',
      });
      expect(await classifier.classify('i hate you')).toEqual({ kind: 'argumentative', argumentType: 'general' });
    });

    it('should never call self-deprecation argumentative', async () => {
      expect(await classifier.classify('im so dumb lol')).toEqual({ kind: 'none' });
      expect(await classifier.classify('I suck at this, damn')).toEqual({ kind: 'none' });
    });

    it('should make one remote call for an ambiguous message in deep mode', async () => {
      const generator = new ScriptedGenerator(['```json\n{"intent": true, "target": "yesterday"}\n```']);
      const deep = new IntentClassifier(generator);

      expect(await deep.classify('can you erase what i told you yesterday', { deep: true })).toEqual({
        kind: 'forget',
        target: 'yesterday',
      });
      expect(generator.prompts).toHaveLength(1);
    });

    it('should make no remote call for plain chat in deep mode', async () => {
      const generator = new ScriptedGenerator();
      const deep = new IntentClassifier(generator);

      expect(await deep.classify('the weather is nice today', { deep: true })).toEqual({ kind: 'none' });
      expect(generator.prompts).toHaveLength(0);
    });
  });

  describe('cache', () => {
    it('should answer a repeated deep question from the cache', async () => {
      const generator = new ScriptedGenerator(['{"result": true}']);
      const classifier = new IntentClassifier(generator);

      expect(await classifier.detectCorrection('hmm not sure about that', { deep: true })).toBe(true);
      expect(await classifier.detectCorrection('hmm not sure about that', { deep: true })).toBe(true);
      expect(generator.prompts).toHaveLength(1);
    });

    it('should ask again after a failed remote call instead of caching the fallback', async () => {
      const generator = new ScriptedGenerator([
        new Error('socket hang up'),
        '{"result": true}',
        new Error('socket hang up'),
        '{"intent": true, "target": "yesterday"}',
      ]);
      const classifier = new IntentClassifier(generator);

      expect(await classifier.detectCorrection('hmm not sure about that', { deep: true })).toBe(false);
      expect(await classifier.detectCorrection('hmm not sure about that', { deep: true })).toBe(true);

      const text = 'can you erase what i told you yesterday';
      expect(await classifier.detectForget(text, { deep: true })).toEqual({ intent: false, target: null });
      expect(await classifier.detectForget(text, { deep: true })).toEqual({ intent: true, target: 'yesterday' });
      expect(generator.prompts).toHaveLength(4);
    });

    it('should evict the oldest entry when full', async () => {
      const generator = new ScriptedGenerator(['{"result": false}', '{"result": false}', '{"result": false}']);
      const classifier = new IntentClassifier(generator, { cacheSize: 1 });

      await classifier.detectUserInfo('first question', { deep: true });
      await classifier.detectUserInfo('second question', { deep: true });
      await classifier.detectUserInfo('first question', { deep: true });
      expect(generator.prompts).toHaveLength(3);
    });
  });
});

describe('parseCommand', () => {
  it('should split name and args', () => {
    expect(parseCommand('/game 10', '/')).toEqual({ kind: 'command', name: 'game', args: ['10'] });
    expect(parseCommand('/GUESS  7 ', '/')).toEqual({ kind: 'command', name: 'guess', args: ['7'] });
  });

  it('should reject text without the prefix or with a doubled prefix', () => {
    expect(parseCommand('hello', '/')).toBeNull();
    expect(parseCommand('//comment', '/')).toBeNull();
    expect(parseCommand('/', '/')).toBeNull();
  });
});

describe('extractForgetTarget', () => {
  it('should keep short targets in their original wording', () => {
    expect(extractForgetTarget('delete that')).toBe('that');
    expect(extractForgetTarget('forget about it')).toBe('about it');
  });
});

import { describe, it, expect } from 'vitest';
import {
  SecureRandom,
  capitalizeWord,
  estimatePassphraseEntropy,
  generatePassphrase,
  planPassphrase,
  type PassphraseConfig,
} from '../../../src/domain/generation/index.js';
import { FakeRandomEntropy } from '../../fakes/index.js';

const FRUIT = ['apple', 'banana', 'cherry'];

function config(overrides: Partial<PassphraseConfig> = {}): PassphraseConfig {
  return { words: FRUIT, wordCount: 3, separator: '-', capitalizeWords: false, count: 1, ...overrides };
}

describe('generatePassphrase', () => {
  it('joins capitalized picks with the separator', () => {
    const random = new SecureRandom(new FakeRandomEntropy([0, 1, 2]));
    const result = generatePassphrase(config({ capitalizeWords: true }), random);

    expect(result._unsafeUnwrap()).toBe('Apple-Banana-Cherry');
  });

  it('accepts an empty separator', () => {
    const random = new SecureRandom(new FakeRandomEntropy([2, 2, 0]));
    expect(generatePassphrase(config({ separator: '' }), random)._unsafeUnwrap()).toBe('cherrycherryapple');
  });

  it('picks with replacement from a one-word vocabulary', () => {
    const random = new SecureRandom(new FakeRandomEntropy());
    expect(generatePassphrase(config({ words: ['solo'], wordCount: 4, separator: ' ' }), random)._unsafeUnwrap()).toBe(
      'solo solo solo solo'
    );
  });

  it('estimates 3 × log2(3) bits for three words from three', () => {
    expect(estimatePassphraseEntropy(config()).bits).toBeCloseTo(4.755, 3);
  });
});

describe('planPassphrase', () => {
  it('rejects an empty vocabulary', () => {
    expect(planPassphrase(config({ words: [] }))._unsafeUnwrapErr()).toEqual({
      _tag: 'EmptyVocabulary',
      message: 'The vocabulary has no words',
    });
  });

  it('checks the word count before the vocabulary', () => {
    expect(planPassphrase(config({ words: [], wordCount: 0 }))._unsafeUnwrapErr()).toMatchObject({
      _tag: 'InvalidParameter',
      field: 'wordCount',
    });
  });
});

describe('capitalizeWord', () => {
  it('uppercases only the first character', () => {
    expect(capitalizeWord("o'neil")).toBe("O'neil");
    expect(capitalizeWord('eBay')).toBe('EBay');
    expect(capitalizeWord('well-known')).toBe('Well-known');
  });

  it('leaves an empty string alone', () => {
    expect(capitalizeWord('')).toBe('');
  });
});

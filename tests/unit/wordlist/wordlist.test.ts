import { describe, it, expect } from 'vitest';
import {
  RECOMMENDED_MIN_WORDS,
  analyzeWordlist,
  parseWordlist,
  wordlistWarnings,
} from '../../../src/domain/wordlist/index.js';

describe('parseWordlist', () => {
  it('keeps trimmed lines of letters, apostrophes and hyphens', () => {
    const text = "apple\r\n  Banana \nfoo1\n\nit's\nwell-known\nhello world\nnaïve\n";
    expect(parseWordlist(text)).toEqual(['apple', 'Banana', "it's", 'well-known']);
  });

  it('keeps duplicates and case as loaded', () => {
    expect(parseWordlist('Echo\necho\nEcho')).toEqual(['Echo', 'echo', 'Echo']);
  });

  it('returns nothing for a file without usable lines', () => {
    expect(parseWordlist('123\n\n  \n')).toEqual([]);
  });
});

describe('analyzeWordlist', () => {
  it('counts duplicates beyond the first occurrence', () => {
    expect(analyzeWordlist(['a', 'b', 'a', 'a'])).toEqual({
      size: 4,
      distinct: 2,
      duplicates: 2,
      belowRecommendedSize: true,
    });
  });

  it('treats the recommended size as the lower bound', () => {
    const words = Array.from({ length: RECOMMENDED_MIN_WORDS }, (_, i) => `w${i}`);
    expect(analyzeWordlist(words).belowRecommendedSize).toBe(false);
    expect(analyzeWordlist(words.slice(1)).belowRecommendedSize).toBe(true);
  });
});

describe('wordlistWarnings', () => {
  it('warns about small lists and duplicates', () => {
    expect(wordlistWarnings(analyzeWordlist(['a', 'b', 'a']))).toEqual([
      'Wordlist has 3 words, fewer than 256; consider a larger list',
      'Wordlist has 1 duplicate entry; the entropy estimate counts them',
    ]);
  });

  it('pluralises the duplicate count', () => {
    const words = [...Array.from({ length: 300 }, (_, i) => `w${i}`), 'w1', 'w2'];
    expect(wordlistWarnings(analyzeWordlist(words))).toEqual([
      'Wordlist has 2 duplicate entries; the entropy estimate counts them',
    ]);
  });

  it('is silent for a large list without duplicates', () => {
    const words = Array.from({ length: 300 }, (_, i) => `w${i}`);
    expect(wordlistWarnings(analyzeWordlist(words))).toEqual([]);
  });
});

import type { GenerationConfig, PassphraseConfig } from './types.js';
import { resolveAlphabets } from './character-classes.js';

export type StrengthLabel = 'very_weak' | 'weak' | 'fair' | 'strong' | 'excellent';

export interface Strength {
  readonly score: 0 | 1 | 2 | 3 | 4;
  readonly label: StrengthLabel;
}

export interface CharacterEntropy {
  /** Distinct characters in the union alphabet after exclusions and overrides. */
  readonly charsetSize: number;
  readonly bits: number;
  /** A charset of at most one character (or no length) gives zero entropy. */
  readonly degenerate: boolean;
  readonly strength: Strength;
}

export interface PassphraseEntropy {
  /** Entries in the vocabulary, duplicates included. */
  readonly vocabSize: number;
  readonly bits: number;
  readonly degenerate: boolean;
  readonly strength: Strength;
}

/**
 * Rough bands for display. Lower bound inclusive.
 */
export function strengthFromEntropy(bits: number): Strength {
  if (bits < 30) return { score: 0, label: 'very_weak' };
  if (bits < 45) return { score: 1, label: 'weak' };
  if (bits < 60) return { score: 2, label: 'fair' };
  if (bits < 80) return { score: 3, label: 'strong' };
  return { score: 4, label: 'excellent' };
}

function uniformBits(draws: number, alphabetSize: number): number {
  if (draws <= 0 || alphabetSize <= 1) return 0;
  return draws * Math.log2(alphabetSize);
}

/**
 * `length × log2(charsetSize)`.
 *
 * This treats every position as a free draw from the union and so overstates
 * the entropy of configs with per-class minimums.
 */
export function estimateCharacterEntropy(
  config: Pick<GenerationConfig, 'classes' | 'customSymbols' | 'excludeAmbiguous' | 'length'>
): CharacterEntropy {
  const charsetSize = [...resolveAlphabets(config).union].length;
  const bits = uniformBits(config.length, charsetSize);
  return {
    charsetSize,
    bits,
    degenerate: bits === 0,
    strength: strengthFromEntropy(bits),
  };
}

/**
 * `wordCount × log2(vocabSize)`. Duplicate vocabulary entries count towards
 * `vocabSize` even though they add no real entropy.
 */
export function estimatePassphraseEntropy(
  config: Pick<PassphraseConfig, 'words' | 'wordCount'>
): PassphraseEntropy {
  const vocabSize = config.words.length;
  const bits = uniformBits(config.wordCount, vocabSize);
  return {
    vocabSize,
    bits,
    degenerate: bits === 0,
    strength: strengthFromEntropy(bits),
  };
}

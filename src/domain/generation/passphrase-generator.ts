import { err, ok, type Result } from 'neverthrow';
import type { PassphraseConfig } from './types.js';
import { GenErr, type GenerationError } from './errors.js';
import type { SecureRandom } from './secure-random.js';

export interface PassphrasePlan {
  readonly words: readonly string[];
  readonly wordCount: number;
  readonly separator: string;
  readonly capitalizeWords: boolean;
}

export function planPassphrase(config: PassphraseConfig): Result<PassphrasePlan, GenerationError> {
  if (!Number.isInteger(config.wordCount) || config.wordCount < 1) {
    return err(GenErr.invalidParameter('wordCount', config.wordCount, 'an integer >= 1'));
  }
  if (config.words.length === 0) {
    return err(GenErr.emptyVocabulary());
  }
  return ok({
    words: config.words,
    wordCount: config.wordCount,
    separator: config.separator,
    capitalizeWords: config.capitalizeWords,
  });
}

/**
 * Uppercases the first character only; the rest of the word is left as loaded.
 */
export function capitalizeWord(word: string): string {
  const first = word.charAt(0);
  return first.toUpperCase() + word.slice(first.length);
}

export function drawPassphrase(plan: PassphrasePlan, random: SecureRandom): string {
  const picks: string[] = [];
  for (let i = 0; i < plan.wordCount; i += 1) {
    const word = random.pick(plan.words);
    picks.push(plan.capitalizeWords ? capitalizeWord(word) : word);
  }
  return picks.join(plan.separator);
}

export function generatePassphrase(
  config: PassphraseConfig,
  random: SecureRandom
): Result<string, GenerationError> {
  return planPassphrase(config).map((plan) => drawPassphrase(plan, random));
}

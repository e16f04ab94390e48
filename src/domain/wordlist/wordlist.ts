/**
 * Wordlist filtering. Pure functions over lines of text; file access lives in
 * infrastructure/wordlist.
 */

const WORD_PATTERN = /^[A-Za-z'-]+$/;

/** Below this many entries a passphrase vocabulary is flagged as small. */
export const RECOMMENDED_MIN_WORDS = 256;

/**
 * Keep trimmed lines made only of ASCII letters, apostrophes and hyphens.
 * Order is preserved; duplicates and case are left alone.
 */
export function filterWordlistLines(lines: Iterable<string>): string[] {
  const words: string[] = [];
  for (const line of lines) {
    const word = line.trim();
    if (WORD_PATTERN.test(word)) words.push(word);
  }
  return words;
}

export function parseWordlist(text: string): string[] {
  return filterWordlistLines(text.split(/\r?\n/));
}

export interface WordlistStats {
  readonly size: number;
  readonly distinct: number;
  /** Entries beyond the first occurrence of each word. */
  readonly duplicates: number;
  readonly belowRecommendedSize: boolean;
}

export function analyzeWordlist(words: readonly string[]): WordlistStats {
  const distinct = new Set(words).size;
  return {
    size: words.length,
    distinct,
    duplicates: words.length - distinct,
    belowRecommendedSize: words.length < RECOMMENDED_MIN_WORDS,
  };
}

export function wordlistWarnings(stats: WordlistStats): string[] {
  const warnings: string[] = [];
  if (stats.belowRecommendedSize) {
    warnings.push(
      `Wordlist has ${stats.size} words, fewer than ${RECOMMENDED_MIN_WORDS}; consider a larger list`
    );
  }
  if (stats.duplicates > 0) {
    warnings.push(
      `Wordlist has ${stats.duplicates} duplicate entr${stats.duplicates === 1 ? 'y' : 'ies'}; the entropy estimate counts them`
    );
  }
  return warnings;
}

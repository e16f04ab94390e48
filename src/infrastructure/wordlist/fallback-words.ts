import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { filterWordlistLines } from '../../domain/wordlist/index.js';

// Same depth from src/ and from dist/, so one relative path serves both.
const FALLBACK_WORDS_URL = new URL('../../../data/fallback-words.json', import.meta.url);

const WordArraySchema = z.array(z.string());

let cached: readonly string[] | null = null;

/**
 * Small built-in vocabulary for when no wordlist has been loaded.
 * Passed through the same filter as user wordlists.
 */
export function loadFallbackWords(): readonly string[] {
  if (cached === null) {
    const raw: unknown = JSON.parse(readFileSync(fileURLToPath(FALLBACK_WORDS_URL), 'utf8'));
    cached = filterWordlistLines(WordArraySchema.parse(raw));
  }
  return cached;
}

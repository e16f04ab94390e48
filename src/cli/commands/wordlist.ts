/**
 * Wordlist Command
 *
 * Reports how a wordlist file filters down and whether it is big enough.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import { wordlistWarnings } from '../../domain/wordlist/index.js';
import { estimatePassphraseEntropy } from '../../domain/generation/entropy.js';
import type { LoadedWordlist, WordlistLoadError } from '../../infrastructure/wordlist/wordlist-loader.js';
import { describeWordlistSource } from '../../infrastructure/wordlist/wordlist-loader.js';
import { formatBits } from '../output-formatter.js';
import { wordlistFailure } from './passphrase.js';

export interface WordlistCommandDeps {
  readonly loadWordlist: (filePath: string) => ResultAsync<LoadedWordlist, WordlistLoadError>;
}

export async function executeWordlistCommand(deps: WordlistCommandDeps, filePath: string): Promise<CliResult> {
  const result = await deps.loadWordlist(filePath);
  if (result.isErr()) {
    return wordlistFailure(result.error);
  }
  const wordlist = result.value;
  const perWord = estimatePassphraseEntropy({ words: wordlist.words, wordCount: 1 });

  return success({
    message: 'Wordlist loaded',
    details: [
      describeWordlistSource(wordlist),
      `Distinct words: ${wordlist.stats.distinct}`,
      `Duplicate entries: ${wordlist.stats.duplicates}`,
      `Entropy per word: ${formatBits(perWord.bits)}`,
    ],
    warnings: wordlistWarnings(wordlist.stats),
  });
}

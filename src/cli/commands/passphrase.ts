/**
 * Passphrase Command
 *
 * Wordlist passphrases from saved preferences plus CLI overrides.
 * Pure function with dependency injection.
 */

import type { Result, ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { generated, misuse } from '../types/cli-result.js';
import { formatBits } from '../output-formatter.js';
import type { GenerationError, PassphraseConfig, PassphraseEntropy } from '../../domain/generation/index.js';
import { wordlistWarnings } from '../../domain/wordlist/index.js';
import type { GeneratedBatch } from '../../application/services/generation-service.js';
import type { Preferences } from '../../infrastructure/preferences/preferences.js';
import type { PreferencesError } from '../../infrastructure/preferences/preferences-store.js';
import type { OutputFormat } from '../../infrastructure/output/output-format.js';
import type { SavedOutput } from '../../infrastructure/output/output-writer.js';
import {
  describeWordlistSource,
  type LoadedWordlist,
  type WordlistLoadError,
} from '../../infrastructure/wordlist/wordlist-loader.js';
import type { FileAccessError } from '../../errors/app-error.js';
import { formatAppError } from '../../errors/formatter.js';
import type { OutputOptions } from './generate.js';
import {
  appFailure,
  generationFailure,
  preferencesFailure,
  resolvePassphraseSettings,
  resolveWordlistPath,
  type PassphraseOverrides,
} from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface PassphraseCommandDeps {
  readonly settingsPath: string;
  /** Wordlist from the environment, used when neither flag nor settings name one */
  readonly defaultWordlist: string | null;
  readonly loadPreferences: () => ResultAsync<Preferences, PreferencesError>;
  readonly savePreferences: (prefs: Preferences) => ResultAsync<void, PreferencesError>;
  readonly loadWordlist: (filePath: string | null) => ResultAsync<LoadedWordlist, WordlistLoadError>;
  readonly generatePassphrases: (config: PassphraseConfig) => Result<GeneratedBatch<PassphraseEntropy>, GenerationError>;
  readonly saveOutput: (
    values: readonly string[],
    filePath: string,
    format?: OutputFormat
  ) => ResultAsync<SavedOutput, FileAccessError>;
}

export type PassphraseCommandOptions = PassphraseOverrides & OutputOptions;

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export function describePassphraseEntropy(entropy: PassphraseEntropy): string[] {
  return [
    `Vocabulary size: ${entropy.vocabSize}`,
    `Entropy: ${formatBits(entropy.bits)} (${entropy.strength.label.replace('_', ' ')})`,
  ];
}

export function wordlistFailure(error: WordlistLoadError): CliResult {
  if (error._tag === 'EmptyVocabulary') {
    return misuse('No usable words found in the selected wordlist', [
      'Use a file with one word per line (letters, apostrophes and hyphens only)',
    ]);
  }
  return appFailure(error, ['Check the wordlist path']);
}

export async function executePassphraseCommand(
  deps: PassphraseCommandDeps,
  options: PassphraseCommandOptions = {}
): Promise<CliResult> {
  const prefsResult = await deps.loadPreferences();
  if (prefsResult.isErr()) {
    return preferencesFailure(prefsResult.error, deps.settingsPath);
  }
  const prefs = prefsResult.value;

  const wordlistPath = resolveWordlistPath(prefs, options, deps.defaultWordlist);
  const wordlistResult = await deps.loadWordlist(wordlistPath);
  if (wordlistResult.isErr()) {
    return wordlistFailure(wordlistResult.error);
  }
  const wordlist = wordlistResult.value;

  const settings = resolvePassphraseSettings(prefs, options);
  const count = options.count ?? prefs.count;
  const batchResult = deps.generatePassphrases({ ...settings, words: wordlist.words, count });
  if (batchResult.isErr()) {
    return generationFailure(batchResult.error);
  }
  const batch = batchResult.value;

  const details = [describeWordlistSource(wordlist), ...describePassphraseEntropy(batch.entropy)];
  const warnings = wordlistWarnings(wordlist.stats);

  if (options.output !== undefined) {
    const saved = await deps.saveOutput(batch.values, options.output, options.format);
    if (saved.isErr()) {
      return appFailure(saved.error, ['Check that the destination directory is writable']);
    }
    details.push(`Saved ${saved.value.count} value(s) to: ${saved.value.path}`);
  }

  if (options.save) {
    const next: Preferences = {
      ...prefs,
      mode: 'passphrase',
      preset: 'passphrase',
      count,
      passphrase: settings,
      wordlistPath: wordlist.source.kind === 'file' ? wordlist.source.path : prefs.wordlistPath,
    };
    const persisted = await deps.savePreferences(next);
    if (persisted.isErr()) {
      warnings.push(`Settings not saved: ${formatAppError(persisted.error)}`);
    } else {
      details.push(`Settings saved to: ${deps.settingsPath}`);
    }
  }

  if (options.quiet && warnings.length === 0) {
    return generated(batch.values);
  }

  return generated(batch.values, {
    message: `Generated ${batch.values.length} passphrase(s)`,
    details: options.quiet ? undefined : details,
    warnings,
  });
}

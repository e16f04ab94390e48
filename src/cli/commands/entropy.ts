/**
 * Entropy Command
 *
 * Shows the entropy estimate for the effective settings without generating anything.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import {
  estimateCharacterEntropy,
  estimatePassphraseEntropy,
  planPassword,
  type GenerationMode,
} from '../../domain/generation/index.js';
import { wordlistWarnings } from '../../domain/wordlist/index.js';
import type { Preferences } from '../../infrastructure/preferences/preferences.js';
import type { PreferencesError } from '../../infrastructure/preferences/preferences-store.js';
import {
  describeWordlistSource,
  type LoadedWordlist,
  type WordlistLoadError,
} from '../../infrastructure/wordlist/wordlist-loader.js';
import { characterEntropyWarnings, describeCharacterEntropy } from './generate.js';
import { describePassphraseEntropy, wordlistFailure } from './passphrase.js';
import {
  preferencesFailure,
  resolvePassphraseSettings,
  resolvePasswordConfig,
  resolveWordlistPath,
  type PassphraseOverrides,
  type PasswordOverrides,
} from './shared.js';

export interface EntropyCommandDeps {
  readonly settingsPath: string;
  readonly defaultWordlist: string | null;
  readonly loadPreferences: () => ResultAsync<Preferences, PreferencesError>;
  readonly loadWordlist: (filePath: string | null) => ResultAsync<LoadedWordlist, WordlistLoadError>;
}

export interface EntropyCommandOptions {
  /** Defaults to the saved mode */
  readonly mode?: GenerationMode;
  readonly password?: PasswordOverrides;
  readonly passphrase?: PassphraseOverrides;
}

const ESTIMATE_NOTE = 'Estimate assumes every position is a free draw; per-class minimums are not subtracted';

export async function executeEntropyCommand(
  deps: EntropyCommandDeps,
  options: EntropyCommandOptions = {}
): Promise<CliResult> {
  const prefsResult = await deps.loadPreferences();
  if (prefsResult.isErr()) {
    return preferencesFailure(prefsResult.error, deps.settingsPath);
  }
  const prefs = prefsResult.value;
  const mode = options.mode ?? prefs.mode;

  if (mode === 'passphrase') {
    const overrides = options.passphrase ?? {};
    const wordlistResult = await deps.loadWordlist(resolveWordlistPath(prefs, overrides, deps.defaultWordlist));
    if (wordlistResult.isErr()) {
      return wordlistFailure(wordlistResult.error);
    }
    const wordlist = wordlistResult.value;
    const settings = resolvePassphraseSettings(prefs, overrides);
    const entropy = estimatePassphraseEntropy({ words: wordlist.words, wordCount: settings.wordCount });

    return success({
      message: 'Passphrase entropy estimate',
      details: [describeWordlistSource(wordlist), `Words: ${settings.wordCount}`, ...describePassphraseEntropy(entropy)],
      warnings: wordlistWarnings(wordlist.stats),
    });
  }

  const config = resolvePasswordConfig(prefs, options.password ?? {});
  const entropy = estimateCharacterEntropy(config);
  const warnings = characterEntropyWarnings(entropy);

  // The estimate is shown either way; an unusable config is flagged alongside it.
  const plan = planPassword(config);
  if (plan.isErr()) {
    warnings.push(`This configuration cannot generate: ${plan.error.message}`);
  }

  return success({
    message: 'Password entropy estimate',
    details: [`Length: ${config.length}`, ...describeCharacterEntropy(entropy), ESTIMATE_NOTE],
    warnings,
  });
}

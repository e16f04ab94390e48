/**
 * Helpers shared by the generation commands: folding CLI overrides over saved
 * preferences, and mapping errors to CliResults.
 */

import type { CliResult } from '../types/cli-result.js';
import { failure, misuse } from '../types/cli-result.js';
import { formatAppError } from '../../errors/formatter.js';
import type { AppError } from '../../errors/app-error.js';
import {
  applyPreset,
  suggestFix,
  formatGenerationError,
  type CharacterClassKind,
  type CharacterClassSetting,
  type GenerationConfig,
  type GenerationError,
  type PassphraseSettings,
  type PresetName,
} from '../../domain/generation/index.js';
import { generationConfigFrom, type Preferences } from '../../infrastructure/preferences/preferences.js';

export interface PasswordOverrides {
  readonly preset?: PresetName;
  readonly length?: number;
  readonly count?: number;
  readonly lower?: boolean;
  readonly upper?: boolean;
  readonly digits?: boolean;
  readonly symbols?: boolean;
  readonly minLower?: number;
  readonly minUpper?: number;
  readonly minDigits?: number;
  readonly minSymbols?: number;
  readonly customSymbols?: string;
  readonly excludeAmbiguous?: boolean;
}

export interface PassphraseOverrides {
  readonly words?: number;
  readonly separator?: string;
  readonly capitalize?: boolean;
  readonly wordlist?: string;
  readonly count?: number;
}

function overrideClass(
  base: CharacterClassSetting,
  enabled: boolean | undefined,
  minimum: number | undefined
): CharacterClassSetting {
  return {
    enabled: enabled ?? base.enabled,
    minimum: minimum ?? base.minimum,
  };
}

/**
 * Saved preferences, then the preset (if any), then individual flags.
 */
export function resolvePasswordConfig(prefs: Preferences, overrides: PasswordOverrides): GenerationConfig {
  const saved = generationConfigFrom(prefs);
  const base = overrides.preset ? applyPreset(saved, overrides.preset) : saved;

  const classes: Record<CharacterClassKind, CharacterClassSetting> = {
    lowercase: overrideClass(base.classes.lowercase, overrides.lower, overrides.minLower),
    uppercase: overrideClass(base.classes.uppercase, overrides.upper, overrides.minUpper),
    digit: overrideClass(base.classes.digit, overrides.digits, overrides.minDigits),
    symbol: overrideClass(base.classes.symbol, overrides.symbols, overrides.minSymbols),
  };

  return {
    classes,
    length: overrides.length ?? base.length,
    customSymbols: overrides.customSymbols ?? base.customSymbols,
    excludeAmbiguous: overrides.excludeAmbiguous ?? base.excludeAmbiguous,
    count: overrides.count ?? base.count,
  };
}

export function resolvePassphraseSettings(prefs: Preferences, overrides: PassphraseOverrides): PassphraseSettings {
  return {
    wordCount: overrides.words ?? prefs.passphrase.wordCount,
    separator: overrides.separator ?? prefs.passphrase.separator,
    capitalizeWords: overrides.capitalize ?? prefs.passphrase.capitalizeWords,
  };
}

/**
 * Flag, then saved preference, then the environment default. `null` means the
 * built-in list.
 */
export function resolveWordlistPath(
  prefs: Preferences,
  overrides: PassphraseOverrides,
  envDefault: string | null
): string | null {
  return overrides.wordlist ?? prefs.wordlistPath ?? envDefault;
}

export function generationFailure(error: GenerationError): CliResult {
  return misuse(formatGenerationError(error), [suggestFix(error)]);
}

export function appFailure(error: AppError, suggestions?: readonly string[]): CliResult {
  return failure(formatAppError(error), { suggestions });
}

export function preferencesFailure(error: AppError, settingsPath: string): CliResult {
  return appFailure(
    error,
    error._tag === 'ConfigInvalid'
      ? [`Fix or delete ${settingsPath}`, 'Run "keysmith settings reset" to go back to defaults']
      : undefined
  );
}

/**
 * Generate Command
 *
 * Character-mode passwords from saved preferences plus CLI overrides.
 * Pure function with dependency injection.
 */

import type { Result, ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { generated, misuse } from '../types/cli-result.js';
import { formatBits } from '../output-formatter.js';
import type { CharacterEntropy, GenerationConfig, GenerationError } from '../../domain/generation/index.js';
import type { GeneratedBatch } from '../../application/services/generation-service.js';
import type { Preferences } from '../../infrastructure/preferences/preferences.js';
import { withGenerationConfig } from '../../infrastructure/preferences/preferences.js';
import type { PreferencesError } from '../../infrastructure/preferences/preferences-store.js';
import type { OutputFormat } from '../../infrastructure/output/output-format.js';
import type { SavedOutput } from '../../infrastructure/output/output-writer.js';
import type { FileAccessError } from '../../errors/app-error.js';
import { formatAppError } from '../../errors/formatter.js';
import {
  appFailure,
  generationFailure,
  preferencesFailure,
  resolvePasswordConfig,
  type PasswordOverrides,
} from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface GenerateCommandDeps {
  readonly settingsPath: string;
  readonly loadPreferences: () => ResultAsync<Preferences, PreferencesError>;
  readonly savePreferences: (prefs: Preferences) => ResultAsync<void, PreferencesError>;
  readonly generatePasswords: (config: GenerationConfig) => Result<GeneratedBatch<CharacterEntropy>, GenerationError>;
  readonly saveOutput: (
    values: readonly string[],
    filePath: string,
    format?: OutputFormat
  ) => ResultAsync<SavedOutput, FileAccessError>;
}

export interface OutputOptions {
  /** Save the batch to this file as well as printing it */
  readonly output?: string;
  readonly format?: OutputFormat;
  /** Persist the effective settings as the new defaults */
  readonly save?: boolean;
  /** Print values only */
  readonly quiet?: boolean;
}

export type GenerateCommandOptions = PasswordOverrides & OutputOptions;

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export function describeCharacterEntropy(entropy: CharacterEntropy): string[] {
  return [
    `Charset size: ${entropy.charsetSize}`,
    `Entropy: ${formatBits(entropy.bits)} (${entropy.strength.label.replace('_', ' ')})`,
  ];
}

export function characterEntropyWarnings(entropy: CharacterEntropy): string[] {
  return entropy.degenerate ? ['Charset has at most one character: every output is the same'] : [];
}

export async function executeGenerateCommand(
  deps: GenerateCommandDeps,
  options: GenerateCommandOptions = {}
): Promise<CliResult> {
  if (options.preset === 'passphrase') {
    return misuse('The "passphrase" preset does not apply to character passwords', [
      'Run "keysmith passphrase" to generate passphrases',
    ]);
  }

  const prefsResult = await deps.loadPreferences();
  if (prefsResult.isErr()) {
    return preferencesFailure(prefsResult.error, deps.settingsPath);
  }
  const prefs = prefsResult.value;

  const config = resolvePasswordConfig(prefs, options);
  const batchResult = deps.generatePasswords(config);
  if (batchResult.isErr()) {
    return generationFailure(batchResult.error);
  }
  const batch = batchResult.value;

  const details = describeCharacterEntropy(batch.entropy);
  const warnings = characterEntropyWarnings(batch.entropy);

  if (options.output !== undefined) {
    const saved = await deps.saveOutput(batch.values, options.output, options.format);
    if (saved.isErr()) {
      return appFailure(saved.error, ['Check that the destination directory is writable']);
    }
    details.push(`Saved ${saved.value.count} value(s) to: ${saved.value.path}`);
  }

  if (options.save) {
    const next: Preferences = {
      ...withGenerationConfig(prefs, config),
      mode: 'password',
      preset: options.preset ?? prefs.preset,
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
    message: `Generated ${batch.values.length} password(s)`,
    details: options.quiet ? undefined : details,
    warnings,
  });
}

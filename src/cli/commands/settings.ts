/**
 * Settings Command
 *
 * Shows, locates or resets the saved preferences.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, successMessage, misuse } from '../types/cli-result.js';
import { CHARACTER_CLASS_KINDS } from '../../domain/generation/types.js';
import type { Preferences } from '../../infrastructure/preferences/preferences.js';
import type { PreferencesError } from '../../infrastructure/preferences/preferences-store.js';
import { appFailure, preferencesFailure } from './shared.js';

export const SETTINGS_ACTIONS = ['show', 'path', 'reset'] as const;

export type SettingsAction = (typeof SETTINGS_ACTIONS)[number];

export interface SettingsCommandDeps {
  readonly settingsPath: string;
  readonly loadPreferences: () => ResultAsync<Preferences, PreferencesError>;
  readonly resetPreferences: () => ResultAsync<void, PreferencesError>;
}

export function isSettingsAction(value: string): value is SettingsAction {
  return (SETTINGS_ACTIONS as readonly string[]).includes(value);
}

export function describePreferences(prefs: Preferences): string[] {
  const classes = CHARACTER_CLASS_KINDS.map((kind) => {
    const c = prefs.character.classes[kind];
    return `${kind}: ${c.enabled ? `on (min ${c.minimum})` : 'off'}`;
  });

  return [
    `mode: ${prefs.mode}`,
    `preset: ${prefs.preset}`,
    `count: ${prefs.count}`,
    `length: ${prefs.character.length}`,
    ...classes,
    `customSymbols: ${prefs.character.customSymbols || '(default)'}`,
    `excludeAmbiguous: ${prefs.character.excludeAmbiguous}`,
    `wordCount: ${prefs.passphrase.wordCount}`,
    `separator: ${JSON.stringify(prefs.passphrase.separator)}`,
    `capitalizeWords: ${prefs.passphrase.capitalizeWords}`,
    `wordlist: ${prefs.wordlistPath ?? '(fallback list)'}`,
  ];
}

export async function executeSettingsCommand(deps: SettingsCommandDeps, action: string = 'show'): Promise<CliResult> {
  if (!isSettingsAction(action)) {
    return misuse(`Unknown settings action: ${action}`, [`Use one of: ${SETTINGS_ACTIONS.join(', ')}`]);
  }

  switch (action) {
    case 'path':
      return successMessage(deps.settingsPath);

    case 'reset': {
      const result = await deps.resetPreferences();
      return result.isErr()
        ? appFailure(result.error)
        : success({ message: 'Settings reset to defaults', details: [`Removed: ${deps.settingsPath}`] });
    }

    case 'show': {
      const result = await deps.loadPreferences();
      if (result.isErr()) {
        return preferencesFailure(result.error, deps.settingsPath);
      }
      return success({ message: `Settings (${deps.settingsPath})`, details: describePreferences(result.value) });
    }
  }
}

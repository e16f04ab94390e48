/**
 * CLI Commands - Public API
 */

export {
  executeGenerateCommand,
  describeCharacterEntropy,
  type GenerateCommandDeps,
  type GenerateCommandOptions,
  type OutputOptions,
} from './generate.js';
export { executePassphraseCommand, type PassphraseCommandDeps, type PassphraseCommandOptions } from './passphrase.js';
export { executeEntropyCommand, type EntropyCommandDeps, type EntropyCommandOptions } from './entropy.js';
export { executePresetsCommand } from './presets.js';
export { executeWordlistCommand, type WordlistCommandDeps } from './wordlist.js';
export {
  executeSettingsCommand,
  SETTINGS_ACTIONS,
  type SettingsAction,
  type SettingsCommandDeps,
} from './settings.js';
export type { PasswordOverrides, PassphraseOverrides } from './shared.js';

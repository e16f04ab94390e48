/**
 * Presets Command
 *
 * Lists the built-in presets.
 */

import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import { PRESET_DESCRIPTIONS, PRESET_NAMES } from '../../domain/generation/presets.js';

export function executePresetsCommand(): CliResult {
  return success({
    message: 'Available presets',
    details: PRESET_NAMES.map((name) => `${name.padEnd(10)} ${PRESET_DESCRIPTIONS[name]}`),
    suggestions: ['Use "keysmith generate --preset <name>", or "keysmith passphrase" for wordlist mode'],
  });
}

import { InvalidArgumentError } from 'commander';
import { isPresetName, type PresetName } from '../domain/generation/presets.js';
import { isOutputFormat, type OutputFormat } from '../infrastructure/output/output-format.js';

/**
 * Commander argument parsers. Each throws InvalidArgumentError, which
 * commander reports as a usage error (exit code 1 with the message).
 */

function parseInteger(value: string, min: number, label: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`Expected ${label}.`);
  }
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed < min) {
    throw new InvalidArgumentError(`Expected ${label}.`);
  }
  return parsed;
}

export function parsePositiveInt(value: string): number {
  return parseInteger(value, 1, 'an integer >= 1');
}

export function parseNonNegativeInt(value: string): number {
  return parseInteger(value, 0, 'an integer >= 0');
}

export function parsePreset(value: string): PresetName {
  if (!isPresetName(value)) {
    throw new InvalidArgumentError('Unknown preset. Run "keysmith presets" to list them.');
  }
  return value;
}

export function parseOutputFormat(value: string): OutputFormat {
  const lower = value.toLowerCase();
  if (!isOutputFormat(lower)) {
    throw new InvalidArgumentError('Expected txt or csv.');
  }
  return lower;
}

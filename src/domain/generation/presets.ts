import type { CharacterClassSettings, GenerationConfig } from './types.js';

export const PRESET_NAMES = ['custom', 'memorable', 'strong', 'pin', 'passphrase'] as const;

export type PresetName = (typeof PRESET_NAMES)[number];

export type GenerationMode = 'password' | 'passphrase';

interface CharacterPreset {
  readonly classes: CharacterClassSettings;
  readonly length: number;
  readonly excludeAmbiguous: boolean;
}

const on = (minimum: number) => ({ enabled: true, minimum });
const off = { enabled: false, minimum: 0 } as const;

const CHARACTER_PRESETS: Readonly<Record<'memorable' | 'strong' | 'pin', CharacterPreset>> = {
  memorable: {
    classes: { lowercase: on(1), uppercase: on(1), digit: off, symbol: off },
    length: 16,
    excludeAmbiguous: true,
  },
  strong: {
    classes: { lowercase: on(1), uppercase: on(1), digit: on(1), symbol: on(1) },
    length: 20,
    excludeAmbiguous: true,
  },
  pin: {
    classes: { lowercase: off, uppercase: off, digit: on(4), symbol: off },
    length: 8,
    excludeAmbiguous: false,
  },
};

export const PRESET_DESCRIPTIONS: Readonly<Record<PresetName, string>> = {
  custom: 'Leave the current character settings as they are',
  memorable: 'Letters only, 16 characters, no look-alikes',
  strong: 'All classes, one of each required, 20 characters, no look-alikes',
  pin: '8 digits',
  passphrase: 'Switch to wordlist passphrases',
};

export function isPresetName(value: string): value is PresetName {
  return (PRESET_NAMES as readonly string[]).includes(value);
}

export function modeForPreset(preset: PresetName): GenerationMode {
  return preset === 'passphrase' ? 'passphrase' : 'password';
}

/**
 * Overlay a preset onto a character config. `customSymbols` and `count`
 * survive; `custom` and `passphrase` leave the config untouched.
 */
export function applyPreset(config: GenerationConfig, preset: PresetName): GenerationConfig {
  switch (preset) {
    case 'custom':
    case 'passphrase':
      return config;
    case 'memorable':
    case 'strong':
    case 'pin': {
      const p = CHARACTER_PRESETS[preset];
      return { ...config, classes: p.classes, length: p.length, excludeAmbiguous: p.excludeAmbiguous };
    }
  }
}

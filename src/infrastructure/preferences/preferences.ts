import { z } from 'zod';
import { PRESET_NAMES } from '../../domain/generation/presets.js';
import type { GenerationConfig } from '../../domain/generation/types.js';

const classDefault = { enabled: true, minimum: 1 };

const ClassSettingSchema = z
  .object({
    enabled: z.boolean().default(true),
    minimum: z.number().int().min(0).default(1),
  })
  .default(classDefault);

/**
 * Persisted user preferences. Every field has a default so that a partial or
 * older file still loads.
 */
export const PreferencesSchema = z.object({
  version: z.literal(1).default(1),
  mode: z.enum(['password', 'passphrase']).default('password'),
  preset: z.enum(PRESET_NAMES).default('custom'),
  count: z.number().int().min(1).default(1),
  character: z
    .object({
      classes: z
        .object({
          lowercase: ClassSettingSchema,
          uppercase: ClassSettingSchema,
          digit: ClassSettingSchema,
          symbol: ClassSettingSchema,
        })
        .default({}),
      length: z.number().int().min(1).default(16),
      customSymbols: z.string().default(''),
      excludeAmbiguous: z.boolean().default(false),
    })
    .default({}),
  passphrase: z
    .object({
      wordCount: z.number().int().min(1).default(6),
      separator: z.string().default('-'),
      capitalizeWords: z.boolean().default(false),
    })
    .default({}),
  wordlistPath: z.string().nullable().default(null),
});

export type Preferences = z.infer<typeof PreferencesSchema>;

export function defaultPreferences(): Preferences {
  return PreferencesSchema.parse({});
}

export function generationConfigFrom(prefs: Preferences): GenerationConfig {
  return {
    classes: prefs.character.classes,
    length: prefs.character.length,
    customSymbols: prefs.character.customSymbols,
    excludeAmbiguous: prefs.character.excludeAmbiguous,
    count: prefs.count,
  };
}

/**
 * Folds an effective character config back into preferences, for `--save`.
 */
export function withGenerationConfig(prefs: Preferences, config: GenerationConfig): Preferences {
  return {
    ...prefs,
    count: config.count,
    character: {
      classes: config.classes,
      length: config.length,
      customSymbols: config.customSymbols ?? '',
      excludeAmbiguous: config.excludeAmbiguous,
    },
  };
}

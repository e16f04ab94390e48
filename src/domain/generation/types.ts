/**
 * Generation config types.
 *
 * These are immutable snapshots built per request. The preferences store and
 * the CLI own the mutable state; the core only ever reads these.
 */

export const CHARACTER_CLASS_KINDS = ['lowercase', 'uppercase', 'digit', 'symbol'] as const;

export type CharacterClassKind = (typeof CHARACTER_CLASS_KINDS)[number];

export interface CharacterClassSetting {
  readonly enabled: boolean;
  /** Characters that must come from this class; ignored when the class is disabled. */
  readonly minimum: number;
}

/**
 * A class with its effective alphabet resolved (symbol override and
 * ambiguity exclusion applied).
 */
export interface CharacterClassSpec extends CharacterClassSetting {
  readonly kind: CharacterClassKind;
  readonly alphabet: string;
}

export type CharacterClassSettings = Readonly<Record<CharacterClassKind, CharacterClassSetting>>;

export interface GenerationConfig {
  readonly classes: CharacterClassSettings;
  readonly length: number;
  /** Replaces the default symbol alphabet when non-blank. */
  readonly customSymbols?: string;
  readonly excludeAmbiguous: boolean;
  readonly count: number;
}

/** The passphrase knobs a user can save; the vocabulary comes separately. */
export interface PassphraseSettings {
  readonly wordCount: number;
  readonly separator: string;
  readonly capitalizeWords: boolean;
}

export interface PassphraseConfig extends PassphraseSettings {
  /** Vocabulary in load order. Duplicates are allowed. */
  readonly words: readonly string[];
  readonly count: number;
}

import { CHARACTER_CLASS_KINDS, type CharacterClassKind, type CharacterClassSpec, type GenerationConfig } from './types.js';

export const DEFAULT_SYMBOLS = '!@#$%^&*()-_=+[]{};:,./?~';

/** Look-alike characters dropped from every alphabet when `excludeAmbiguous` is set. */
export const AMBIGUOUS_CHARACTERS = 'Il1O0B8S5Z2QG6';

export const BASE_ALPHABETS: Readonly<Record<CharacterClassKind, string>> = {
  lowercase: 'abcdefghijklmnopqrstuvwxyz',
  uppercase: 'ABCDEFGHIJKLMNOPQRSTUVWXYZ',
  digit: '0123456789',
  symbol: DEFAULT_SYMBOLS,
};

const AMBIGUOUS_SET: ReadonlySet<string> = new Set(AMBIGUOUS_CHARACTERS);

/** Line breaks, tabs and other C0/C1 controls; a value must stay on one line. */
const CONTROL_CHARACTERS = /\p{Cc}/gu;

/**
 * Resolved alphabets for one config: every class (enabled or not) with its
 * effective alphabet, plus the union of the enabled ones.
 */
export interface ResolvedAlphabets {
  readonly classes: readonly CharacterClassSpec[];
  readonly union: string;
}

/**
 * Custom symbols lose control characters, then surrounding whitespace. A blank
 * result falls back to the default set.
 */
export function symbolAlphabet(customSymbols: string | undefined): string {
  const trimmed = customSymbols?.replace(CONTROL_CHARACTERS, '').trim() ?? '';
  return trimmed.length > 0 ? trimmed : DEFAULT_SYMBOLS;
}

/**
 * Order-preserving de-duplication by code point.
 */
export function uniqueCharacters(chars: string): string {
  return [...new Set(chars)].join('');
}

export function effectiveAlphabet(
  kind: CharacterClassKind,
  options: { readonly customSymbols?: string; readonly excludeAmbiguous: boolean }
): string {
  const base = kind === 'symbol' ? symbolAlphabet(options.customSymbols) : BASE_ALPHABETS[kind];
  const filtered = options.excludeAmbiguous ? [...base].filter((ch) => !AMBIGUOUS_SET.has(ch)).join('') : base;
  return uniqueCharacters(filtered);
}

export function resolveAlphabets(config: Pick<GenerationConfig, 'classes' | 'customSymbols' | 'excludeAmbiguous'>): ResolvedAlphabets {
  const classes = CHARACTER_CLASS_KINDS.map((kind): CharacterClassSpec => ({
    kind,
    enabled: config.classes[kind].enabled,
    minimum: config.classes[kind].minimum,
    alphabet: effectiveAlphabet(kind, config),
  }));

  const union = uniqueCharacters(
    classes
      .filter((spec) => spec.enabled)
      .map((spec) => spec.alphabet)
      .join('')
  );

  return { classes, union };
}

export function enabledClasses(resolved: ResolvedAlphabets): readonly CharacterClassSpec[] {
  return resolved.classes.filter((spec) => spec.enabled);
}

/**
 * Sum of minimums over enabled classes. Disabled classes contribute nothing.
 */
export function requiredTotal(config: Pick<GenerationConfig, 'classes'>): number {
  return CHARACTER_CLASS_KINDS.reduce(
    (sum, kind) => (config.classes[kind].enabled ? sum + config.classes[kind].minimum : sum),
    0
  );
}

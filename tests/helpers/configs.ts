import type {
  CharacterClassKind,
  CharacterClassSetting,
  GenerationConfig,
} from '../../src/domain/generation/index.js';

type ClassOverrides = Partial<Record<CharacterClassKind, Partial<CharacterClassSetting>>>;

const ALL_ON: Record<CharacterClassKind, CharacterClassSetting> = {
  lowercase: { enabled: true, minimum: 1 },
  uppercase: { enabled: true, minimum: 1 },
  digit: { enabled: true, minimum: 1 },
  symbol: { enabled: true, minimum: 1 },
};

/**
 * Character config with every class on (minimum 1), length 16, count 1.
 */
export function passwordConfig(
  overrides: Partial<Omit<GenerationConfig, 'classes'>> & { classes?: ClassOverrides } = {}
): GenerationConfig {
  const { classes = {}, ...rest } = overrides;
  return {
    classes: {
      lowercase: { ...ALL_ON.lowercase, ...classes.lowercase },
      uppercase: { ...ALL_ON.uppercase, ...classes.uppercase },
      digit: { ...ALL_ON.digit, ...classes.digit },
      symbol: { ...ALL_ON.symbol, ...classes.symbol },
    },
    length: 16,
    excludeAmbiguous: false,
    count: 1,
    ...rest,
  };
}

/** Only the named classes enabled, each with the given minimum. */
export function onlyClasses(kinds: readonly CharacterClassKind[], minimum = 1): ClassOverrides {
  const off = { enabled: false, minimum: 0 };
  return {
    lowercase: kinds.includes('lowercase') ? { enabled: true, minimum } : off,
    uppercase: kinds.includes('uppercase') ? { enabled: true, minimum } : off,
    digit: kinds.includes('digit') ? { enabled: true, minimum } : off,
    symbol: kinds.includes('symbol') ? { enabled: true, minimum } : off,
  };
}

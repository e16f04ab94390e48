import type { CharacterClassKind } from './types.js';
import { assertNever } from '../../runtime/assert-never.js';

/**
 * Generation failures. All of them are local validation failures, detected
 * before any randomness is consumed, and none is worth retrying unchanged.
 */
export type ConstraintViolationError = Readonly<{
  readonly _tag: 'ConstraintViolation';
  readonly requiredTotal: number;
  readonly length: number;
  /** How many characters the minimums overshoot `length` by. */
  readonly excess: number;
  readonly message: string;
}>;

export type InsufficientAlphabetError = Readonly<{
  readonly _tag: 'InsufficientAlphabet';
  /** `union` when no class is enabled or none has a usable character left. */
  readonly scope: CharacterClassKind | 'union';
  readonly minimum: number;
  readonly message: string;
}>;

export type EmptyVocabularyError = Readonly<{
  readonly _tag: 'EmptyVocabulary';
  readonly message: string;
}>;

export type InvalidParameterError = Readonly<{
  readonly _tag: 'InvalidParameter';
  readonly field: string;
  readonly value: number;
  readonly expected: string;
  readonly message: string;
}>;

export type GenerationError =
  | ConstraintViolationError
  | InsufficientAlphabetError
  | EmptyVocabularyError
  | InvalidParameterError;

export const GenErr = {
  constraintViolation: (requiredTotal: number, length: number): ConstraintViolationError => ({
    _tag: 'ConstraintViolation',
    requiredTotal,
    length,
    excess: requiredTotal - length,
    message: `Required characters (${requiredTotal}) exceed length ${length} by ${requiredTotal - length}`,
  }),

  insufficientAlphabet: (scope: CharacterClassKind | 'union', minimum: number): InsufficientAlphabetError => ({
    _tag: 'InsufficientAlphabet',
    scope,
    minimum,
    message:
      scope === 'union'
        ? 'The character set is empty after applying exclusions'
        : `Minimum of ${minimum} ${scope} character(s) requested but the ${scope} alphabet is empty after exclusions`,
  }),

  noClassEnabled: (): InsufficientAlphabetError => ({
    _tag: 'InsufficientAlphabet',
    scope: 'union',
    minimum: 0,
    message: 'No character class is enabled',
  }),

  emptyVocabulary: (): EmptyVocabularyError => ({
    _tag: 'EmptyVocabulary',
    message: 'The vocabulary has no words',
  }),

  invalidParameter: (field: string, value: number, expected: string): InvalidParameterError => ({
    _tag: 'InvalidParameter',
    field,
    value,
    expected,
    message: `Invalid ${field}: ${value}. Expected ${expected}`,
  }),
} as const satisfies Record<string, (...args: never[]) => GenerationError>;

/**
 * One-line hint on how to fix the config, for the CLI.
 */
export function suggestFix(error: GenerationError): string {
  switch (error._tag) {
    case 'ConstraintViolation':
      return `Reduce the per-class minimums by ${error.excess} or increase the length to ${error.requiredTotal}`;
    case 'InsufficientAlphabet':
      return error.scope === 'union'
        ? 'Enable at least one character class with usable characters'
        : `Disable ambiguity exclusion, change the ${error.scope} alphabet, or set its minimum to 0`;
    case 'EmptyVocabulary':
      return 'Load a wordlist with at least one usable word';
    case 'InvalidParameter':
      return `Set ${error.field} to ${error.expected}`;
    default:
      return assertNever(error);
  }
}

export function formatGenerationError(error: GenerationError): string {
  return `${error._tag}: ${error.message}`;
}

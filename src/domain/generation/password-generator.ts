import { err, ok, type Result } from 'neverthrow';
import type { CharacterClassKind, GenerationConfig } from './types.js';
import { CHARACTER_CLASS_KINDS } from './types.js';
import { enabledClasses, requiredTotal, resolveAlphabets } from './character-classes.js';
import { GenErr, type GenerationError } from './errors.js';
import type { SecureRandom } from './secure-random.js';

/**
 * A config that passed every precondition, with alphabets resolved.
 * Drawing from a plan cannot fail.
 */
export interface PasswordPlan {
  readonly length: number;
  /** Enabled classes with a positive minimum, in class order. */
  readonly mandatory: readonly MandatoryDraw[];
  /** Code points of the union alphabet. */
  readonly union: readonly string[];
  readonly fillerCount: number;
}

export interface MandatoryDraw {
  readonly kind: CharacterClassKind;
  readonly minimum: number;
  readonly characters: readonly string[];
}

/**
 * Validate a config and resolve its alphabets. No randomness is consumed here.
 */
export function planPassword(config: GenerationConfig): Result<PasswordPlan, GenerationError> {
  if (!Number.isInteger(config.length) || config.length < 1) {
    return err(GenErr.invalidParameter('length', config.length, 'an integer >= 1'));
  }
  for (const kind of CHARACTER_CLASS_KINDS) {
    const { enabled, minimum } = config.classes[kind];
    if (enabled && (!Number.isInteger(minimum) || minimum < 0)) {
      return err(GenErr.invalidParameter(`${kind} minimum`, minimum, 'an integer >= 0'));
    }
  }

  const resolved = resolveAlphabets(config);
  const enabled = enabledClasses(resolved);
  if (enabled.length === 0) {
    return err(GenErr.noClassEnabled());
  }

  const required = requiredTotal(config);
  if (required > config.length) {
    return err(GenErr.constraintViolation(required, config.length));
  }

  const mandatory = enabled.filter((spec) => spec.minimum > 0);
  const starved = mandatory.find((spec) => spec.alphabet.length === 0);
  if (starved) {
    return err(GenErr.insufficientAlphabet(starved.kind, starved.minimum));
  }

  if (resolved.union.length === 0) {
    return err(GenErr.insufficientAlphabet('union', 0));
  }

  return ok({
    length: config.length,
    mandatory: mandatory.map((spec) => ({ kind: spec.kind, minimum: spec.minimum, characters: [...spec.alphabet] })),
    union: [...resolved.union],
    fillerCount: config.length - required,
  });
}

/**
 * Mandatory characters come from each class's own alphabet, the rest from the
 * union; the whole sequence is then shuffled so the mandatory ones can land anywhere.
 */
export function drawPassword(plan: PasswordPlan, random: SecureRandom): string {
  const chars: string[] = [];

  for (const spec of plan.mandatory) {
    for (let i = 0; i < spec.minimum; i += 1) {
      chars.push(random.pick(spec.characters));
    }
  }

  for (let i = 0; i < plan.fillerCount; i += 1) {
    chars.push(random.pick(plan.union));
  }

  return random.shuffle(chars).join('');
}

export function generatePassword(
  config: GenerationConfig,
  random: SecureRandom
): Result<string, GenerationError> {
  return planPassword(config).map((plan) => drawPassword(plan, random));
}

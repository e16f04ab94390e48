import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  DEFAULT_SYMBOLS,
  SecureRandom,
  generatePassword,
  planPassword,
  type CharacterClassKind,
  type GenerationConfig,
} from '../../../src/domain/generation/index.js';
import { FakeRandomEntropy } from '../../fakes/index.js';
import { onlyClasses, passwordConfig } from '../../helpers/configs.js';

const CLASS_PATTERNS: Record<CharacterClassKind, (ch: string) => boolean> = {
  lowercase: (ch) => /[a-z]/.test(ch),
  uppercase: (ch) => /[A-Z]/.test(ch),
  digit: (ch) => /[0-9]/.test(ch),
  symbol: (ch) => DEFAULT_SYMBOLS.includes(ch),
};

function countClass(password: string, kind: CharacterClassKind): number {
  return [...password].filter(CLASS_PATTERNS[kind]).length;
}

describe('generatePassword', () => {
  it('honours length and per-class minimums', () => {
    const random = new SecureRandom(new FakeRandomEntropy());
    const config = passwordConfig({ classes: onlyClasses(['lowercase', 'digit']), length: 8 });

    const result = generatePassword(config, random);

    expect(result.isOk()).toBe(true);
    const password = result._unsafeUnwrap();
    expect(password).toMatch(/^[a-z0-9]{8}$/);
    expect(countClass(password, 'lowercase')).toBeGreaterThanOrEqual(1);
    expect(countClass(password, 'digit')).toBeGreaterThanOrEqual(1);
  });

  it('draws only from the filtered alphabet when excluding look-alikes', () => {
    const random = new SecureRandom(new FakeRandomEntropy());
    const config = passwordConfig({ classes: onlyClasses(['digit']), length: 32, excludeAmbiguous: true });

    expect(generatePassword(config, random)._unsafeUnwrap()).toMatch(/^[3479]{32}$/);
  });

  it('repeats the only character of a one-symbol alphabet', () => {
    const random = new SecureRandom(new FakeRandomEntropy());
    const config = passwordConfig({ classes: onlyClasses(['symbol']), customSymbols: '#', length: 5 });

    expect(generatePassword(config, random)._unsafeUnwrap()).toBe('#####');
  });

  it('keeps astral custom symbols whole', () => {
    const random = new SecureRandom(new FakeRandomEntropy());
    const config = passwordConfig({ classes: onlyClasses(['symbol']), customSymbols: '🔑', length: 3 });

    expect(generatePassword(config, random)._unsafeUnwrap()).toBe('🔑🔑🔑');
  });

  it('allows minimums that exactly fill the length', () => {
    const random = new SecureRandom(new FakeRandomEntropy());
    const config = passwordConfig({ classes: onlyClasses(['lowercase', 'digit'], 2), length: 4 });

    const password = generatePassword(config, random)._unsafeUnwrap();
    expect(countClass(password, 'lowercase')).toBe(2);
    expect(countClass(password, 'digit')).toBe(2);
  });

  it('satisfies every minimum for any feasible config', () => {
    const random = new SecureRandom(new FakeRandomEntropy());
    const classArb = fc.record({ enabled: fc.boolean(), minimum: fc.integer({ min: 0, max: 4 }) });
    const configArb = fc
      .record({
        lowercase: classArb,
        uppercase: classArb,
        digit: classArb,
        symbol: classArb,
        length: fc.integer({ min: 1, max: 40 }),
      })
      .map(({ length, ...classes }): GenerationConfig => ({ classes, length, excludeAmbiguous: false, count: 1 }))
      .filter((config) => {
        const enabled = Object.values(config.classes).filter((c) => c.enabled);
        const required = enabled.reduce((sum, c) => sum + c.minimum, 0);
        return enabled.length > 0 && required <= config.length;
      });

    fc.assert(
      fc.property(configArb, (config) => {
        const password = generatePassword(config, random)._unsafeUnwrap();
        expect([...password]).toHaveLength(config.length);
        for (const kind of ['lowercase', 'uppercase', 'digit', 'symbol'] as const) {
          const setting = config.classes[kind];
          const count = countClass(password, kind);
          if (setting.enabled) {
            expect(count).toBeGreaterThanOrEqual(setting.minimum);
          } else {
            expect(count).toBe(0);
          }
        }
      })
    );
  });
});

describe('planPassword', () => {
  it('reports minimums that overshoot the length', () => {
    const config = passwordConfig({
      classes: { lowercase: { minimum: 5 }, uppercase: { minimum: 5 }, digit: { enabled: false }, symbol: { enabled: false } },
      length: 8,
    });

    const error = planPassword(config)._unsafeUnwrapErr();

    expect(error).toEqual({
      _tag: 'ConstraintViolation',
      requiredTotal: 10,
      length: 8,
      excess: 2,
      message: 'Required characters (10) exceed length 8 by 2',
    });
  });

  it('fails a length of 4 against minimums summing to 5', () => {
    const config = passwordConfig({
      classes: { lowercase: { minimum: 2 }, uppercase: { minimum: 1 }, digit: { minimum: 1 }, symbol: { minimum: 1 } },
      length: 4,
    });

    expect(planPassword(config)._unsafeUnwrapErr()).toMatchObject({
      _tag: 'ConstraintViolation',
      requiredTotal: 5,
      excess: 1,
    });
  });

  it('consumes no entropy when the config is rejected', () => {
    const entropy = new FakeRandomEntropy();
    const config = passwordConfig({ length: 2 });

    expect(generatePassword(config, new SecureRandom(entropy)).isErr()).toBe(true);
    expect(entropy.consumed).toBe(0);
  });

  it('rejects a config with no class enabled', () => {
    const error = planPassword(passwordConfig({ classes: onlyClasses([]) }))._unsafeUnwrapErr();
    expect(error).toMatchObject({ _tag: 'InsufficientAlphabet', scope: 'union', minimum: 0 });
    expect(error.message).toBe('No character class is enabled');
  });

  it('does not validate the minimum of a disabled class', () => {
    const config = passwordConfig({
      classes: { ...onlyClasses(['lowercase']), digit: { enabled: false, minimum: -1 } },
      length: 5,
    });

    const plan = planPassword(config)._unsafeUnwrap();
    expect(plan.mandatory).toEqual([
      { kind: 'lowercase', minimum: 1, characters: [...'abcdefghijklmnopqrstuvwxyz'] },
    ]);
    expect(plan.fillerCount).toBe(4);
  });

  it('rejects a required class whose alphabet was excluded away', () => {
    const config = passwordConfig({ classes: onlyClasses(['symbol']), customSymbols: 'O0', excludeAmbiguous: true });
    expect(planPassword(config)._unsafeUnwrapErr()).toMatchObject({
      _tag: 'InsufficientAlphabet',
      scope: 'symbol',
      minimum: 1,
    });
  });

  it('rejects an empty union even when nothing is required', () => {
    const config = passwordConfig({ classes: onlyClasses(['symbol'], 0), customSymbols: 'O0', excludeAmbiguous: true });
    expect(planPassword(config)._unsafeUnwrapErr()).toMatchObject({ _tag: 'InsufficientAlphabet', scope: 'union' });
  });

  it.each([0, -3, 2.5])('rejects length %s', (length) => {
    expect(planPassword(passwordConfig({ length }))._unsafeUnwrapErr()).toMatchObject({
      _tag: 'InvalidParameter',
      field: 'length',
      value: length,
    });
  });

  it('rejects a negative minimum', () => {
    const config = passwordConfig({ classes: { lowercase: { minimum: -1 } } });
    expect(planPassword(config)._unsafeUnwrapErr()).toMatchObject({
      _tag: 'InvalidParameter',
      field: 'lowercase minimum',
      message: 'Invalid lowercase minimum: -1. Expected an integer >= 0',
    });
  });

  it('ignores the minimum of a disabled class', () => {
    const config = passwordConfig({
      classes: { ...onlyClasses(['lowercase']), uppercase: { enabled: false, minimum: 50 } },
      length: 4,
    });
    expect(planPassword(config)._unsafeUnwrap()).toMatchObject({ length: 4, fillerCount: 3 });
  });
});

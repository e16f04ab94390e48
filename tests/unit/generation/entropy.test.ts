import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  estimateCharacterEntropy,
  estimatePassphraseEntropy,
  strengthFromEntropy,
} from '../../../src/domain/generation/entropy.js';
import { onlyClasses, passwordConfig } from '../../helpers/configs.js';

describe('estimateCharacterEntropy', () => {
  it('is length × log2(charset size)', () => {
    const entropy = estimateCharacterEntropy(passwordConfig({ length: 16 }));

    expect(entropy.charsetSize).toBe(87);
    expect(entropy.bits).toBeCloseTo(16 * Math.log2(87), 10);
    expect(entropy.degenerate).toBe(false);
    expect(entropy.strength).toEqual({ score: 4, label: 'excellent' });
  });

  it('counts the filtered alphabet', () => {
    const entropy = estimateCharacterEntropy(
      passwordConfig({ classes: onlyClasses(['digit']), length: 4, excludeAmbiguous: true })
    );
    expect(entropy.charsetSize).toBe(4);
    expect(entropy.bits).toBe(8);
  });

  it('flags a one-character charset as degenerate', () => {
    const entropy = estimateCharacterEntropy(
      passwordConfig({ classes: onlyClasses(['symbol']), customSymbols: '#', length: 30 })
    );
    expect(entropy).toEqual({
      charsetSize: 1,
      bits: 0,
      degenerate: true,
      strength: { score: 0, label: 'very_weak' },
    });
  });

  it('counts astral symbols once each', () => {
    const entropy = estimateCharacterEntropy(
      passwordConfig({ classes: onlyClasses(['symbol']), customSymbols: '🔑🗝', length: 1 })
    );
    expect(entropy.charsetSize).toBe(2);
    expect(entropy.bits).toBe(1);
  });

  it('never decreases as the length grows', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 200 }), fc.integer({ min: 0, max: 50 }), (length, extra) => {
        const shorter = estimateCharacterEntropy(passwordConfig({ length })).bits;
        const longer = estimateCharacterEntropy(passwordConfig({ length: length + extra })).bits;
        return longer >= shorter;
      })
    );
  });

  it('never decreases as the charset grows', () => {
    const pool = [...'!#$%&*+-=?@^~abcdefghijklmnopqrstuvwxyz'];
    fc.assert(
      fc.property(
        fc.uniqueArray(fc.constantFrom(...pool), { minLength: 1, maxLength: pool.length }),
        fc.integer({ min: 1, max: 40 }),
        fc.nat(),
        (symbols, length, cut) => {
          const prefix = symbols.slice(0, 1 + (cut % symbols.length)).join('');
          const smaller = estimateCharacterEntropy(
            passwordConfig({ classes: onlyClasses(['symbol']), customSymbols: prefix, length })
          );
          const larger = estimateCharacterEntropy(
            passwordConfig({ classes: onlyClasses(['symbol']), customSymbols: symbols.join(''), length })
          );
          return larger.charsetSize >= smaller.charsetSize && larger.bits >= smaller.bits;
        }
      )
    );
  });

  it('never decreases as classes are enabled', () => {
    const base = estimateCharacterEntropy(passwordConfig({ classes: onlyClasses(['digit']) }));
    const more = estimateCharacterEntropy(passwordConfig({ classes: onlyClasses(['digit', 'lowercase']) }));
    const all = estimateCharacterEntropy(passwordConfig());

    expect(base.bits).toBeLessThan(more.bits);
    expect(more.bits).toBeLessThan(all.bits);
  });
});

describe('estimatePassphraseEntropy', () => {
  it('counts duplicate entries in the vocabulary size', () => {
    const entropy = estimatePassphraseEntropy({ words: ['a', 'a', 'b', 'b'], wordCount: 1 });
    expect(entropy.vocabSize).toBe(4);
    expect(entropy.bits).toBe(2);
  });

  it('is zero for a one-word vocabulary', () => {
    const entropy = estimatePassphraseEntropy({ words: ['solo'], wordCount: 6 });
    expect(entropy.bits).toBe(0);
    expect(entropy.degenerate).toBe(true);
  });

  it('reaches the strong band with six words from 1024', () => {
    const words = Array.from({ length: 1024 }, (_, i) => `w${i}`);
    const entropy = estimatePassphraseEntropy({ words, wordCount: 6 });
    expect(entropy.bits).toBe(60);
    expect(entropy.strength.label).toBe('strong');
  });
});

describe('strengthFromEntropy', () => {
  it.each([
    [0, 'very_weak'],
    [29.99, 'very_weak'],
    [30, 'weak'],
    [44.9, 'weak'],
    [45, 'fair'],
    [60, 'strong'],
    [79.9, 'strong'],
    [80, 'excellent'],
    [256, 'excellent'],
  ] as const)('maps %s bits to %s', (bits, label) => {
    expect(strengthFromEntropy(bits).label).toBe(label);
  });
});

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { SecureRandom } from '../../../src/domain/generation/secure-random.js';
import { FakeRandomEntropy } from '../../fakes/index.js';

describe('SecureRandom.below', () => {
  it('rejects bytes in the incomplete top bucket', () => {
    // 256 % 3 = 1, so 255 is rejected and the next byte is used
    const entropy = new FakeRandomEntropy([255, 4]);
    const random = new SecureRandom(entropy);

    expect(random.below(3)).toBe(1);
    expect(entropy.consumed).toBe(2);
  });

  it('uses one byte per attempt for ranges up to 256', () => {
    const entropy = new FakeRandomEntropy([200]);
    const random = new SecureRandom(entropy);

    expect(random.below(256)).toBe(200);
    expect(entropy.consumed).toBe(1);
  });

  it('uses a little-endian uint32 for ranges above 256', () => {
    // 2^32 % 300 = 196; 0xffffffff is past the last full bucket
    const entropy = new FakeRandomEntropy([0xff, 0xff, 0xff, 0xff, 0x2d, 0x01, 0x00, 0x00]);
    const random = new SecureRandom(entropy);

    expect(random.below(300)).toBe(1);
    expect(entropy.consumed).toBe(8);
  });

  it('accepts the full uint32 range', () => {
    const random = new SecureRandom(new FakeRandomEntropy([0xff, 0xff, 0xff, 0xff]));
    expect(random.below(2 ** 32)).toBe(2 ** 32 - 1);
  });

  it('returns 0 for a range of 1 without consuming entropy', () => {
    const entropy = new FakeRandomEntropy();
    expect(new SecureRandom(entropy).below(1)).toBe(0);
    expect(entropy.consumed).toBe(0);
  });

  it.each([0, -1, 1.5, 2 ** 32 + 1, Number.NaN])('throws RangeError for range %s', (range) => {
    const random = new SecureRandom(new FakeRandomEntropy());
    expect(() => random.below(range)).toThrow(RangeError);
  });

  it('always lands in [0, range)', () => {
    const random = new SecureRandom(new FakeRandomEntropy());
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 100_000 }), (range) => {
        const value = random.below(range);
        return Number.isInteger(value) && value >= 0 && value < range;
      })
    );
  });
});

describe('SecureRandom.pick', () => {
  it('indexes strings and arrays alike', () => {
    const random = new SecureRandom(new FakeRandomEntropy([2, 0]));
    expect(random.pick('abc')).toBe('c');
    expect(random.pick(['x', 'y'])).toBe('x');
  });

  it('throws on an empty sequence', () => {
    const random = new SecureRandom(new FakeRandomEntropy());
    expect(() => random.pick([])).toThrow(RangeError);
  });
});

describe('SecureRandom.shuffle', () => {
  it('runs Fisher–Yates from the end, in place', () => {
    // i=2: below(3) -> 0, swap a/c; i=1: below(2) -> 1, no swap
    const random = new SecureRandom(new FakeRandomEntropy([0, 1]));
    const items = ['a', 'b', 'c'];

    const result = random.shuffle(items);

    expect(result).toBe(items);
    expect(items).toEqual(['c', 'b', 'a']);
  });

  it('keeps the same multiset', () => {
    const random = new SecureRandom(new FakeRandomEntropy());
    fc.assert(
      fc.property(fc.array(fc.integer(), { maxLength: 50 }), (items) => {
        const shuffled = random.shuffle([...items]);
        return JSON.stringify([...shuffled].sort()) === JSON.stringify([...items].sort());
      })
    );
  });
});

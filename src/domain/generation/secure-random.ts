import type { RandomEntropyPort } from '../../ports/random-entropy.port.js';

const BYTE_RANGE = 0x100;
const UINT32_RANGE = 0x1_0000_0000;

/**
 * Uniform choices over a byte source.
 *
 * Rejection sampling keeps every index equally likely: draws that land in the
 * incomplete top bucket are thrown away. Ranges up to 256 use one byte per
 * attempt, larger ones a little-endian uint32.
 */
export class SecureRandom {
  constructor(private readonly entropy: RandomEntropyPort) {}

  /**
   * Uniform integer in [0, range).
   */
  below(range: number): number {
    if (!Number.isInteger(range) || range <= 0 || range > UINT32_RANGE) {
      throw new RangeError(`range must be an integer in [1, 2^32], got ${range}`);
    }
    if (range === 1) return 0;

    if (range <= BYTE_RANGE) {
      const limit = BYTE_RANGE - (BYTE_RANGE % range);
      for (;;) {
        const value = this.entropy.generateBytes(1)[0];
        if (value < limit) return value % range;
      }
    }

    const limit = UINT32_RANGE - (UINT32_RANGE % range);
    for (;;) {
      const bytes = this.entropy.generateBytes(4);
      const value = new DataView(bytes.buffer, bytes.byteOffset, 4).getUint32(0, true);
      if (value < limit) return value % range;
    }
  }

  pick<T>(items: ArrayLike<T>): T {
    if (items.length === 0) {
      throw new RangeError('cannot pick from an empty sequence');
    }
    return items[this.below(items.length)];
  }

  /**
   * Fisher–Yates, in place.
   */
  shuffle<T>(items: T[]): T[] {
    for (let i = items.length - 1; i > 0; i -= 1) {
      const j = this.below(i + 1);
      [items[i], items[j]] = [items[j], items[i]];
    }
    return items;
  }
}

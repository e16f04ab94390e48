/**
 * Random entropy port for cryptographically secure random bytes.
 *
 * The generation core never touches `node:crypto` directly, so tests can
 * script exact byte sequences.
 *
 * Guarantees:
 * - Synchronous (randomness is CPU-bound, no I/O)
 * - Cryptographically secure (never Math.random())
 * - Returns exactly the requested byte count
 * - Safe for unlimited sequential reuse without reseeding
 *
 * @example
 * const bytes = entropy.generateBytes(4);
 */
export interface RandomEntropyPort {
  /**
   * @param count - Number of bytes to generate (must be positive)
   */
  generateBytes(count: number): Uint8Array;
}

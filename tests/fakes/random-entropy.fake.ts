import type { RandomEntropyPort } from '../../src/ports/random-entropy.port.js';

/**
 * Fake random entropy for deterministic testing.
 *
 * Serves scripted bytes first (in order), then a predictable counter
 * sequence. `consumed` counts every byte handed out.
 */
export class FakeRandomEntropy implements RandomEntropyPort {
  private sequence = 0;
  private scripted: number[];
  consumed = 0;

  constructor(scripted: readonly number[] = []) {
    this.scripted = [...scripted];
  }

  /** Queue bytes to be returned before the counter sequence. */
  push(...bytes: number[]): this {
    this.scripted.push(...bytes);
    return this;
  }

  generateBytes(count: number): Uint8Array {
    const bytes = new Uint8Array(count);
    for (let i = 0; i < count; i++) {
      const next = this.scripted.shift();
      if (next !== undefined) {
        bytes[i] = next;
      } else {
        bytes[i] = this.sequence % 256;
        this.sequence += 1;
      }
    }
    this.consumed += count;
    return bytes;
  }

  reset(): void {
    this.sequence = 0;
    this.scripted = [];
    this.consumed = 0;
  }
}

import { describe, it, expect, vi } from 'vitest';
import { generateMany } from '../../../src/domain/generation/generate-many.js';

describe('generateMany', () => {
  it('draws lazily, once per value, in order', () => {
    let n = 0;
    const draw = vi.fn(() => `value-${++n}`);

    const iterator = generateMany(draw, 3)._unsafeUnwrap();
    expect(draw).not.toHaveBeenCalled();

    expect(Array.from(iterator)).toEqual(['value-1', 'value-2', 'value-3']);
    expect(draw).toHaveBeenCalledTimes(3);
  });

  it('can only be consumed once', () => {
    const iterator = generateMany(() => 'x', 2)._unsafeUnwrap();
    expect(Array.from(iterator)).toHaveLength(2);
    expect(Array.from(iterator)).toHaveLength(0);
  });

  it.each([0, -1, 1.5])('rejects count %s without drawing', (count) => {
    const draw = vi.fn(() => 'x');

    const error = generateMany(draw, count)._unsafeUnwrapErr();

    expect(error).toMatchObject({ _tag: 'InvalidParameter', field: 'count', value: count, expected: 'an integer >= 1' });
    expect(draw).not.toHaveBeenCalled();
  });
});

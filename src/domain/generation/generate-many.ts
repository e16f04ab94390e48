import { err, ok, type Result } from 'neverthrow';
import { GenErr, type GenerationError } from './errors.js';

function* drawSequence(draw: () => string, count: number): Generator<string, void, undefined> {
  for (let i = 0; i < count; i += 1) {
    yield draw();
  }
}

/**
 * `count` independent draws, in order. The count is checked up front; the
 * returned iterator is lazy and can be consumed once.
 */
export function generateMany(
  draw: () => string,
  count: number
): Result<IterableIterator<string>, GenerationError> {
  if (!Number.isInteger(count) || count < 1) {
    return err(GenErr.invalidParameter('count', count, 'an integer >= 1'));
  }
  return ok(drawSequence(draw, count));
}

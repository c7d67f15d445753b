import { sortBy } from 'lodash';

import { SeededRandom } from './random';

/**
 * Uniform sample of `count` items from a stream of unknown length (algorithm R).
 *
 * Single pass, O(count) memory. The sample keeps the stream's order. A stream shorter than
 * `count` is returned whole.
 */
export async function reservoirSample<T>(
  items: AsyncIterable<T> | Iterable<T>,
  count: number,
  rng: SeededRandom,
): Promise<T[]> {
  if (count <= 0) {
    return [];
  }
  const reservoir: Array<{ position: number; item: T }> = [];
  let seen = 0;
  for await (const item of items) {
    if (seen < count) {
      reservoir.push({ position: seen, item });
    } else {
      const slot = rng.randint(0, seen);
      if (slot < count) {
        reservoir[slot] = { position: seen, item };
      }
    }
    seen++;
  }
  return sortBy(reservoir, 'position').map(({ item }) => item);
}

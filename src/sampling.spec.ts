import { SeededRandom } from './random';
import { reservoirSample } from './sampling';

describe('reservoirSample', () => {
  const upstream = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];

  it('samples in stream order', async () => {
    expect(await reservoirSample(upstream, 3, new SeededRandom(3))).toEqual([0, 3, 6]);
  });

  it('returns a short stream whole', async () => {
    expect(await reservoirSample([4, 5], 3, new SeededRandom(1))).toEqual([4, 5]);
  });

  it('returns nothing for a count of zero', async () => {
    expect(await reservoirSample(upstream, 0, new SeededRandom(1))).toEqual([]);
  });

  it('includes every item with probability count / length', async () => {
    const trials = 2000;
    const counts = new Array<number>(upstream.length).fill(0);
    for (let trial = 0; trial < trials; trial++) {
      for (const item of await reservoirSample(upstream, 3, new SeededRandom(trial))) {
        counts[item]++;
      }
    }
    for (const count of counts) {
      expect(Math.abs(count / trials - 0.3)).toBeLessThan(0.05);
    }
  });
});

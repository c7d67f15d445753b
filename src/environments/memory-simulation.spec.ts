import { readAll } from '../../test/testHelpers';
import { loggedInteraction } from '../interactions';

import { MemorySimulation } from './memory-simulation';

describe('MemorySimulation', () => {
  const simulation = MemorySimulation.fromTriples(
    [
      [[1], ['a', 'b'], [1, 0]],
      [[2], ['a', 'b'], [0, 1]],
    ],
    { name: 'pair' },
  );

  it('reads its interactions in order', async () => {
    const interactions = await readAll(simulation);
    expect(interactions.map((interaction) => interaction.rewards)).toEqual([
      [1, 0],
      [0, 1],
    ]);
  });

  it('reads the same interactions every time', async () => {
    expect(await readAll(simulation)).toEqual(await readAll(simulation));
  });

  it('holds logged interactions too', async () => {
    const logged = new MemorySimulation([loggedInteraction(null, ['a', 'b'], 'a', 1, 0.5)]);
    expect((await readAll(logged))[0].type).toBe('logged');
  });

  it('describes itself with its params', () => {
    expect(simulation.params).toEqual({ name: 'pair' });
    expect(String(simulation)).toBe('MemorySimulation(name=pair)');
  });
});

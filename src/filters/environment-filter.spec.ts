import { contextsOf, numberedInteractions, readAll } from '../../test/testHelpers';
import { MemorySimulation } from '../environments/memory-simulation';

import { FilteredEnvironment, applyFilters } from './environment-filter';
import { Shuffle, Take } from './sequence-filters';

describe('FilteredEnvironment', () => {
  const simulation = new MemorySimulation(numberedInteractions(10), { source: 'memory' });

  it('merges the filter params over the environment params', () => {
    const filtered = new FilteredEnvironment(simulation, new Take(2));
    expect(filtered.params).toEqual({ source: 'memory', take: 2 });
    expect(String(filtered)).toBe('MemorySimulation(source=memory) | Take(take=2)');
  });

  it('filters every read from the start', async () => {
    const filtered = new FilteredEnvironment(simulation, new Shuffle(1));
    const first = await readAll(filtered);
    expect(await readAll(filtered)).toEqual(first);
    expect(contextsOf(first)).toEqual([[1], [8], [5], [4], [6], [0], [7], [3], [2], [9]]);
  });
});

describe('applyFilters', () => {
  const simulation = new MemorySimulation(numberedInteractions(10));

  it('applies filters in order', async () => {
    const takeThenShuffle = applyFilters(simulation, [new Take(5), new Shuffle(1)]);
    const shuffleThenTake = applyFilters(simulation, [new Shuffle(1), new Take(5)]);
    expect(contextsOf(await readAll(takeThenShuffle))).toEqual([[0], [4], [3], [2], [1]]);
    expect(contextsOf(await readAll(shuffleThenTake))).toEqual([[1], [8], [5], [4], [6]]);
  });

  it('lets later filters override earlier params', () => {
    expect(applyFilters(simulation, [new Take(5), new Take(3)]).params).toEqual({ take: 3 });
  });

  it('returns the environment itself without filters', () => {
    expect(applyFilters(simulation, [])).toBe(simulation);
  });
});

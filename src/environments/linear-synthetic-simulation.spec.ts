import { readAll } from '../../test/testHelpers';
import { InvalidConfigurationError } from '../errors';

import { LinearSyntheticSimulation } from './linear-synthetic-simulation';

describe('LinearSyntheticSimulation', () => {
  it('generates the requested shape', async () => {
    const interactions = await readAll(
      new LinearSyntheticSimulation({
        nInteractions: 20,
        nActions: 3,
        nContextFeatures: 4,
        nActionFeatures: 2,
      }),
    );
    expect(interactions).toHaveLength(20);
    for (const interaction of interactions) {
      expect(interaction.context).toHaveLength(4);
      expect(interaction.actions).toHaveLength(3);
      expect(interaction.actions[0]).toHaveLength(2);
      for (const reward of interaction.rewards) {
        expect(reward).toBeGreaterThanOrEqual(0);
        expect(reward).toBeLessThanOrEqual(1);
      }
    }
  });

  it('is reproducible for a seed and differs between seeds', async () => {
    const options = { nInteractions: 10, seed: 3 };
    const first = await readAll(new LinearSyntheticSimulation(options));
    expect(await readAll(new LinearSyntheticSimulation(options))).toEqual(first);
    expect(await readAll(new LinearSyntheticSimulation({ ...options, seed: 4 }))).not.toEqual(first);
  });

  it('uses one-hot actions and no context when asked', async () => {
    const [interaction] = await readAll(
      new LinearSyntheticSimulation({
        nInteractions: 1,
        nActions: 2,
        nContextFeatures: 0,
        nActionFeatures: 0,
        terms: ['a'],
      }),
    );
    expect(interaction.context).toBeNull();
    expect(interaction.actions).toEqual([
      [1, 0],
      [0, 1],
    ]);
  });

  it('keeps rewards linear without noise', async () => {
    const [interaction] = await readAll(
      new LinearSyntheticSimulation({
        nInteractions: 1,
        nActions: 2,
        nContextFeatures: 0,
        nActionFeatures: 0,
        rewardNoiseVariance: 0,
        terms: ['a'],
      }),
    );
    const [first, second] = interaction.rewards;
    // with one-hot actions each reward is one weight, and the weights sum to at most one
    expect(first + second).toBeLessThanOrEqual(1);
    expect(first).toBeGreaterThan(0);
  });

  it('validates its options', () => {
    expect(() => new LinearSyntheticSimulation({ nActions: 1 })).toThrow(InvalidConfigurationError);
    expect(() => new LinearSyntheticSimulation({ terms: ['ab'] })).toThrow(InvalidConfigurationError);
    expect(() => new LinearSyntheticSimulation({ rewardNoiseVariance: -1 })).toThrow(
      InvalidConfigurationError,
    );
  });

  it('describes itself', () => {
    expect(new LinearSyntheticSimulation({ seed: 2 }).params).toEqual({
      type: 'LinearSynthetic',
      nActions: 10,
      nContextFeatures: 10,
      nActionFeatures: 10,
      rewardNoise: 1 / 1000,
      terms: ['a', 'xa'],
      seed: 2,
    });
  });
});

import { sum } from 'lodash';

import { DEFAULT_SYNTHETIC_ACTIONS, DEFAULT_SYNTHETIC_INTERACTIONS } from '../constants';
import { InvalidConfigurationError } from '../errors';
import { simulatedInteraction } from '../interactions';
import { SeededRandom, Seed } from '../random';

import { describeEnvironment } from './environment';
import { LambdaSimulation } from './lambda-simulation';
import { assertCount, assertTerms, interactionFeatures, oneHotVectors } from './synthetic-features';

export interface ILinearSyntheticOptions {
  nInteractions?: number;
  nActions?: number;
  nContextFeatures?: number;
  // 0 gives one-hot actions
  nActionFeatures?: number;
  rewardNoiseVariance?: number;
  // feature-interaction terms the reward is linear in
  terms?: readonly string[];
  seed?: Seed;
}

/**
 * Random contexts and actions with a reward that is linear in their interaction terms.
 *
 * The weights are drawn once from the seed and normalized so that, before noise, every reward
 * is in [0, 1]. Noise is uniform with the requested variance and the result is clipped to [0, 1].
 */
export class LinearSyntheticSimulation extends LambdaSimulation {
  constructor(options: ILinearSyntheticOptions = {}) {
    const nInteractions = options.nInteractions ?? DEFAULT_SYNTHETIC_INTERACTIONS;
    const nActions = options.nActions ?? DEFAULT_SYNTHETIC_ACTIONS;
    const nContextFeatures = options.nContextFeatures ?? 10;
    const nActionFeatures = options.nActionFeatures ?? 10;
    const noiseVariance = options.rewardNoiseVariance ?? 1 / 1000;
    const terms = options.terms ?? ['a', 'xa'];
    const seed = options.seed ?? 1;

    assertCount('nInteractions', nInteractions, 0);
    assertCount('nActions', nActions, 2);
    assertCount('nContextFeatures', nContextFeatures, 0);
    assertCount('nActionFeatures', nActionFeatures, 0);
    assertTerms(terms);
    if (!(noiseVariance >= 0)) {
      throw new InvalidConfigurationError('rewardNoiseVariance must be non-negative', {
        rewardNoiseVariance: noiseVariance,
      });
    }

    const rng = new SeededRandom(seed);
    const dummyContext = new Array<number>(Math.max(1, nContextFeatures)).fill(1);
    const dummyAction = new Array<number>(nActionFeatures || nActions).fill(1);
    const featureCount = interactionFeatures(dummyContext, dummyAction, terms).length;
    const raw = rng.randoms(featureCount);
    const total = sum(raw) || 1;
    const weights = raw.map((weight) => (rng.random() * weight) / total);
    const identity = oneHotVectors(nActions);
    const noiseScale = Math.sqrt(12) * Math.sqrt(noiseVariance);

    super(
      nInteractions,
      (_index, random) => {
        const context = nContextFeatures ? random.randoms(nContextFeatures) : null;
        const actions = nActionFeatures
          ? Array.from({ length: nActions }, () => random.randoms(nActionFeatures))
          : identity;
        const rewards = actions.map((action) => {
          const features = interactionFeatures(context ?? [1], action, terms);
          const linear = features.reduce((total, feature, i) => total + weights[i] * feature, 0);
          const noise = (random.random() - 1 / 2) * noiseScale;
          return Math.min(1, Math.max(0, linear + noise));
        });
        return simulatedInteraction(context, actions, rewards);
      },
      {
        seed,
        checkDeterminism: false,
        params: {
          type: 'LinearSynthetic',
          nActions,
          nContextFeatures,
          nActionFeatures,
          rewardNoise: noiseVariance,
          terms,
          seed,
        },
      },
    );
  }

  toString(): string {
    return describeEnvironment('LinearSynth', this.params);
  }
}

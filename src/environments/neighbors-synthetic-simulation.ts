import { DEFAULT_SYNTHETIC_ACTIONS, DEFAULT_SYNTHETIC_INTERACTIONS } from '../constants';
import { InvalidConfigurationError } from '../errors';
import { simulatedInteraction } from '../interactions';
import { SeededRandom, Seed } from '../random';

import { describeEnvironment } from './environment';
import { LambdaSimulation } from './lambda-simulation';
import { assertCount, euclideanDistance, oneHotVectors } from './synthetic-features';

export interface INeighborsSyntheticOptions {
  nInteractions?: number;
  nActions?: number;
  nContextFeatures?: number;
  // number of anchor contexts; each is labeled with the action it rewards most
  nNeighborhoods?: number;
  // standard deviation of the contexts around their anchor
  spread?: number;
  distanceToReward?: (distance: number) => number;
  seed?: Seed;
}

/**
 * Contexts scattered around a fixed set of anchors.
 *
 * Every anchor prefers one action. The reward of an action is a decreasing function of the
 * distance between the context and the nearest anchor preferring that action.
 */
export class NeighborsSyntheticSimulation extends LambdaSimulation {
  constructor(options: INeighborsSyntheticOptions = {}) {
    const nInteractions = options.nInteractions ?? DEFAULT_SYNTHETIC_INTERACTIONS;
    const nActions = options.nActions ?? DEFAULT_SYNTHETIC_ACTIONS;
    const nContextFeatures = options.nContextFeatures ?? 10;
    const nNeighborhoods = options.nNeighborhoods ?? nActions;
    const spread = options.spread ?? 0.1;
    const distanceToReward = options.distanceToReward ?? ((distance: number) => Math.exp(-distance));
    const seed = options.seed ?? 1;

    assertCount('nInteractions', nInteractions, 0);
    assertCount('nActions', nActions, 2);
    assertCount('nContextFeatures', nContextFeatures, 1);
    assertCount('nNeighborhoods', nNeighborhoods, nActions);
    if (!(spread >= 0)) {
      throw new InvalidConfigurationError('spread must be non-negative', { spread });
    }

    const rng = new SeededRandom(seed);
    const anchors = Array.from({ length: nNeighborhoods }, () => rng.randoms(nContextFeatures));
    // every action owns at least one anchor
    const owners = rng.shuffle(
      Array.from({ length: nNeighborhoods }, (_, i) => (i < nActions ? i : rng.randint(0, nActions - 1))),
    );
    const actions = oneHotVectors(nActions);

    super(
      nInteractions,
      (_index, random) => {
        const anchor = random.choice(anchors);
        const context = anchor.map((value) => value + random.gauss(0, spread));
        const nearest = new Array<number>(nActions).fill(Infinity);
        anchors.forEach((candidate, i) => {
          const distance = euclideanDistance(context, candidate);
          nearest[owners[i]] = Math.min(nearest[owners[i]], distance);
        });
        return simulatedInteraction(
          context,
          actions,
          nearest.map((distance) => distanceToReward(distance)),
        );
      },
      {
        seed,
        checkDeterminism: false,
        params: {
          type: 'NeighborsSynthetic',
          nActions,
          nContextFeatures,
          nNeighborhoods,
          spread,
          seed,
        },
      },
    );
  }

  toString(): string {
    return describeEnvironment('NeighborsSynth', this.params);
  }
}

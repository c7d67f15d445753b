import { InvalidConfigurationError } from '../errors';
import { Interaction } from '../interactions';
import { Params } from '../types';

import { IEnvironmentFilter } from './environment-filter';

/** Rewards at or above `threshold` become 1, everything else 0. */
export class Binary implements IEnvironmentFilter {
  constructor(readonly threshold = 0.5) {
    if (!Number.isFinite(threshold)) {
      throw new InvalidConfigurationError('Binary needs a finite threshold', { threshold });
    }
  }

  get params(): Params {
    return { binary: this.threshold };
  }

  async *filter(interactions: AsyncIterable<Interaction>): AsyncIterable<Interaction> {
    const binarize = (reward: number) => (reward >= this.threshold ? 1 : 0);
    for await (const interaction of interactions) {
      yield interaction.type === 'logged'
        ? { ...interaction, reward: binarize(interaction.reward) }
        : { ...interaction, rewards: interaction.rewards.map(binarize) };
    }
  }
}

/** Drops interactions that do not match `predicate`. */
export class Where implements IEnvironmentFilter {
  constructor(
    private readonly predicate: (interaction: Interaction) => boolean,
    private readonly label?: string,
  ) {}

  get params(): Params {
    return { where: this.label ?? (this.predicate.name || 'predicate') };
  }

  async *filter(interactions: AsyncIterable<Interaction>): AsyncIterable<Interaction> {
    for await (const interaction of interactions) {
      if (this.predicate(interaction)) {
        yield interaction;
      }
    }
  }
}

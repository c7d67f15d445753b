import { InvalidConfigurationError, InvalidInteractionError } from '../errors';
import { Interaction, SimulatedInteraction, loggedInteraction } from '../interactions';
import { SeededRandom, Seed, assertSeed } from '../random';
import { Params } from '../types';

import { IEnvironmentFilter, warnUnseeded } from './environment-filter';

export interface LoggingDecision {
  // index into the interaction's actions
  index: number;
  probability: number;
}

/** The policy that "logged" the warm start interactions. */
export type LoggingPolicy = (interaction: SimulatedInteraction, rng: SeededRandom) => LoggingDecision;

export const uniformLoggingPolicy: LoggingPolicy = (interaction, rng) => ({
  index: rng.randint(0, interaction.actions.length - 1),
  probability: 1 / interaction.actions.length,
});

export interface IWarmStartOptions {
  seed?: Seed;
  loggingPolicy?: LoggingPolicy;
}

/**
 * Turns the first `count` simulated interactions into logged ones: an action is drawn from
 * the logging policy and only its reward is kept. The rest of the sequence is unchanged.
 */
export class WarmStart implements IEnvironmentFilter {
  constructor(
    readonly count: number,
    private readonly options: IWarmStartOptions = {},
  ) {
    if (!Number.isInteger(count) || count < 0) {
      throw new InvalidConfigurationError('WarmStart needs a non-negative integer count', { count });
    }
    assertSeed(options.seed);
    if (options.seed === undefined) {
      warnUnseeded('WarmStart');
    }
  }

  get params(): Params {
    return { n_warm: this.count, warm_seed: this.options.seed ?? null };
  }

  async *filter(interactions: AsyncIterable<Interaction>): AsyncIterable<Interaction> {
    const rng = new SeededRandom(this.options.seed);
    const policy = this.options.loggingPolicy ?? uniformLoggingPolicy;
    let position = 0;
    for await (const interaction of interactions) {
      if (position++ >= this.count || interaction.type === 'logged') {
        yield interaction;
        continue;
      }
      const { index, probability } = policy(interaction, rng);
      if (!(index >= 0 && index < interaction.actions.length)) {
        throw new InvalidInteractionError('The logging policy chose an action that does not exist', {
          index,
          actions: interaction.actions.length,
        });
      }
      yield loggedInteraction(
        interaction.context,
        interaction.actions,
        interaction.actions[index],
        interaction.rewards[index],
        probability,
      );
    }
  }
}

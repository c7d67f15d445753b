import { isEqual } from 'lodash';

import { logger, loggerPrefix } from '../application-logger';
import { InvalidConfigurationError, NonDeterministicInputError } from '../errors';
import { SimulatedInteraction, simulatedInteraction } from '../interactions';
import { SeededRandom, Seed, assertSeed } from '../random';
import { Action, Context, Params } from '../types';

import { IEnvironment, describeEnvironment } from './environment';

/**
 * Produces the interaction at `index`.
 *
 * Must be a pure function of its arguments: called twice with generators seeded alike it has
 * to return equal interactions, or the environment stops being reproducible.
 */
export type InteractionGenerator = (index: number, rng: SeededRandom) => SimulatedInteraction;

export interface ILambdaSimulationOptions {
  seed?: Seed;
  // regenerate the first interaction and report when it differs; defaults to true
  checkDeterminism?: boolean;
  params?: Params;
}

/** An environment whose interactions come from a user supplied generator function. */
export class LambdaSimulation implements IEnvironment<SimulatedInteraction> {
  constructor(
    private readonly nInteractions: number | null,
    private readonly generate: InteractionGenerator,
    private readonly options: ILambdaSimulationOptions = {},
  ) {
    if (nInteractions !== null && (!Number.isInteger(nInteractions) || nInteractions < 0)) {
      throw new InvalidConfigurationError('nInteractions must be a non-negative integer or null', {
        nInteractions,
      });
    }
    assertSeed(options.seed);
    if (options.seed === undefined) {
      logger.warn(
        `${loggerPrefix} ${this.constructor.name} has no seed; its interactions will differ on every read`,
      );
    }
  }

  /** Build a simulation from separate context, action and reward functions. */
  static fromParts(
    nInteractions: number | null,
    context: (index: number, rng: SeededRandom) => Context,
    actions: (index: number, context: Context, rng: SeededRandom) => readonly Action[],
    reward: (index: number, context: Context, action: Action, rng: SeededRandom) => number,
    options: ILambdaSimulationOptions = {},
  ): LambdaSimulation {
    return new LambdaSimulation(
      nInteractions,
      (index, rng) => {
        const ctx = context(index, rng);
        const actionSet = actions(index, ctx, rng);
        const rewards = actionSet.map((action) => reward(index, ctx, action, rng));
        return simulatedInteraction(ctx, actionSet, rewards);
      },
      options,
    );
  }

  get params(): Params {
    return { ...this.options.params };
  }

  async *read(): AsyncIterable<SimulatedInteraction> {
    if (this.nInteractions !== 0 && this.options.seed !== undefined) {
      if (this.options.checkDeterminism ?? true) {
        this.checkDeterminism(this.options.seed);
      }
    }
    const rng = new SeededRandom(this.options.seed);
    for (let index = 0; this.nInteractions === null || index < this.nInteractions; index++) {
      yield this.generate(index, rng);
    }
  }

  toString(): string {
    return describeEnvironment(this.constructor.name, this.params);
  }

  private checkDeterminism(seed: Seed): void {
    const first = this.generate(0, new SeededRandom(seed));
    const second = this.generate(0, new SeededRandom(seed));
    if (!isEqual(first, second)) {
      const error = new NonDeterministicInputError(
        'The interaction generator returned different interactions for the same seed',
        { environment: this.toString(), seed },
      );
      logger.warn({ err: error }, `${loggerPrefix} ${error.message}`);
    }
  }
}

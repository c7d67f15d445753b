import { orderBy } from 'lodash';

import { InvalidConfigurationError } from '../errors';
import { Interaction } from '../interactions';
import { SeededRandom, Seed, assertSeed, deriveSeed } from '../random';
import { reservoirSample } from '../sampling';
import { FeatureValue, Params, isDense, isSparse } from '../types';
import { collect } from '../util';

import { IEnvironmentFilter, warnUnseeded } from './environment-filter';

function assertCount(name: string, count: number): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidConfigurationError(`${name} needs a non-negative integer count`, { count });
  }
}

export class Identity implements IEnvironmentFilter {
  readonly params: Params = {};

  filter(interactions: AsyncIterable<Interaction>): AsyncIterable<Interaction> {
    return interactions;
  }
}

/** A random permutation of the whole sequence; the same seed and length give the same order. */
export class Shuffle implements IEnvironmentFilter {
  constructor(private readonly seed?: Seed) {
    assertSeed(seed);
    if (seed === undefined) {
      warnUnseeded('Shuffle');
    }
  }

  get params(): Params {
    return { shuffle: this.seed ?? null };
  }

  async *filter(interactions: AsyncIterable<Interaction>): AsyncIterable<Interaction> {
    const rng = new SeededRandom(this.seed);
    yield* rng.shuffle(await collect(interactions));
  }
}

export type SortKey = number | string | ((interaction: Interaction) => FeatureValue);

function sortValue(interaction: Interaction, key: SortKey): FeatureValue {
  if (typeof key === 'function') {
    return key(interaction);
  }
  const { context } = interaction;
  if (isDense(context)) {
    return context[Number(key)] ?? null;
  }
  if (isSparse(context)) {
    // absent sparse features are zero
    return context[String(key)] ?? 0;
  }
  return null;
}

/** Orders interactions by one or more context features (index or sparse key) or functions. */
export class Sort implements IEnvironmentFilter {
  private readonly keys: readonly SortKey[];

  constructor(
    keys: SortKey | readonly SortKey[],
    private readonly options: { reverse?: boolean } = {},
  ) {
    this.keys = typeof keys === 'object' ? keys : [keys];
    if (!this.keys.length) {
      throw new InvalidConfigurationError('Sort needs at least one key');
    }
  }

  get params(): Params {
    const named = this.keys.map((key) => (typeof key === 'function' ? key.name || 'function' : key));
    return { sort: named, ...(this.options.reverse ? { reverse: true } : {}) };
  }

  async *filter(interactions: AsyncIterable<Interaction>): AsyncIterable<Interaction> {
    const direction = this.options.reverse ? 'desc' : 'asc';
    yield* orderBy(
      await collect(interactions),
      this.keys.map((key) => (interaction: Interaction) => sortValue(interaction, key)),
      this.keys.map(() => direction),
    );
  }
}

/** The first `count` interactions; stops pulling from upstream once it has them. */
export class Take implements IEnvironmentFilter {
  constructor(readonly count: number) {
    assertCount('Take', count);
  }

  get params(): Params {
    return { take: this.count };
  }

  async *filter(interactions: AsyncIterable<Interaction>): AsyncIterable<Interaction> {
    if (this.count === 0) {
      return;
    }
    let taken = 0;
    for await (const interaction of interactions) {
      yield interaction;
      if (++taken >= this.count) {
        break;
      }
    }
  }
}

/** A uniform sample of `count` interactions, kept in stream order. */
export class Reservoir implements IEnvironmentFilter {
  constructor(
    readonly count: number,
    private readonly seed?: Seed,
  ) {
    assertCount('Reservoir', count);
    assertSeed(seed);
    if (seed === undefined) {
      warnUnseeded('Reservoir');
    }
  }

  get params(): Params {
    return { reservoir_count: this.count, reservoir_seed: this.seed ?? null };
  }

  async *filter(interactions: AsyncIterable<Interaction>): AsyncIterable<Interaction> {
    yield* await reservoirSample(interactions, this.count, new SeededRandom(this.seed));
  }
}

/**
 * Repeats a finite sequence until `length` interactions have been produced.
 *
 * The first pass streams through unchanged. With a seed every later pass is a fresh
 * permutation, derived from the seed and the pass number.
 */
export class Cycle implements IEnvironmentFilter {
  constructor(
    readonly length: number,
    private readonly options: { seed?: Seed } = {},
  ) {
    assertCount('Cycle', length);
    assertSeed(options.seed);
  }

  get params(): Params {
    return {
      cycle: this.length,
      ...(this.options.seed === undefined ? {} : { cycle_seed: this.options.seed }),
    };
  }

  async *filter(interactions: AsyncIterable<Interaction>): AsyncIterable<Interaction> {
    if (this.length === 0) {
      return;
    }
    const firstPass: Interaction[] = [];
    for await (const interaction of interactions) {
      firstPass.push(interaction);
      yield interaction;
      if (firstPass.length >= this.length) {
        return;
      }
    }
    let produced = firstPass.length;
    for (let pass = 1; firstPass.length && produced < this.length; pass++) {
      const { seed } = this.options;
      const ordered =
        seed === undefined ? firstPass : new SeededRandom(deriveSeed(seed, pass)).shuffle(firstPass);
      for (const interaction of ordered.slice(0, this.length - produced)) {
        yield interaction;
      }
      produced += ordered.length;
    }
  }
}

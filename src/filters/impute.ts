import { InvalidConfigurationError } from '../errors';
import { Interaction } from '../interactions';
import { FeatureValue, Params } from '../types';

import { IEnvironmentFilter } from './environment-filter';
import { assertUsing, featureColumns, fitThenTransform, mapContext } from './feature-columns';
import { mean, median, mode } from './statistics';

export type ImputeStatistic = 'mean' | 'median' | 'mode' | number;

export interface IImputeOptions {
  statistic?: ImputeStatistic;
  using?: number | null;
}

function imputedValue(column: readonly FeatureValue[], statistic: ImputeStatistic): FeatureValue {
  if (typeof statistic === 'number') {
    return statistic;
  }
  const observed = column.filter((value): value is number | string => value !== null);
  if (statistic === 'mode') {
    return mode(observed);
  }
  const numbers = observed.filter((value): value is number => typeof value === 'number');
  if (!numbers.length) {
    return null;
  }
  return statistic === 'mean' ? mean(numbers) : median(numbers);
}

/** Replaces missing (`null`) context features with a statistic of the observed values. */
export class Impute implements IEnvironmentFilter {
  private readonly statistic: ImputeStatistic;
  private readonly using: number | null;

  constructor(options: IImputeOptions = {}) {
    this.statistic = options.statistic ?? 'mean';
    this.using = options.using ?? null;
    assertUsing(this.using);
    if (typeof this.statistic === 'number' && !Number.isFinite(this.statistic)) {
      throw new InvalidConfigurationError('A constant imputation value must be finite', {
        statistic: this.statistic,
      });
    }
  }

  get params(): Params {
    return { impute_stat: this.statistic, impute_using: this.using };
  }

  filter(interactions: AsyncIterable<Interaction>): AsyncIterable<Interaction> {
    return fitThenTransform(interactions, this.using, (prefix) => {
      const fills = new Map<string, FeatureValue>();
      for (const [key, column] of featureColumns(prefix).values) {
        fills.set(key, imputedValue(column, this.statistic));
      }
      return (interaction) => ({
        ...interaction,
        context: mapContext(interaction.context, (key, value) =>
          value === null ? fills.get(key) ?? null : value,
        ),
      });
    });
  }
}

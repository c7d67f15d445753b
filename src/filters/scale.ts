import { max, min } from 'lodash';

import { InvalidConfigurationError } from '../errors';
import { Interaction } from '../interactions';
import { Params, isSparse } from '../types';

import { IEnvironmentFilter } from './environment-filter';
import { assertUsing, featureColumns, fitThenTransform, mapContext } from './feature-columns';
import { mean, median, quantile, standardDeviation } from './statistics';

export type ShiftStatistic = 'mean' | 'min' | 'median' | number;
export type ScaleStatistic = 'std' | 'minmax' | 'iqr' | 'maxabs' | number;

export interface IScaleOptions {
  shift?: ShiftStatistic;
  scale?: ScaleStatistic;
  // how many leading interactions the statistics come from; null means all of them
  using?: number | null;
}

interface Affine {
  shift: number;
  factor: number;
}

function shiftOf(values: readonly number[], shift: ShiftStatistic): number {
  switch (shift) {
    case 'mean':
      return mean(values);
    case 'min':
      return min(values) ?? 0;
    case 'median':
      return median(values);
    default:
      return shift;
  }
}

function factorOf(values: readonly number[], scale: ScaleStatistic): number {
  let divisor: number;
  switch (scale) {
    case 'std':
      divisor = standardDeviation(values);
      break;
    case 'minmax':
      divisor = (max(values) ?? 0) - (min(values) ?? 0);
      break;
    case 'iqr':
      divisor = quantile(values, 0.75) - quantile(values, 0.25);
      break;
    case 'maxabs':
      divisor = max(values.map(Math.abs)) ?? 0;
      break;
    default:
      return scale;
  }
  // constant features are only shifted
  return divisor && Number.isFinite(divisor) ? 1 / divisor : 1;
}

/**
 * Applies `(value - shift) * factor` to every numeric context feature.
 *
 * Shift and factor are computed per feature from the first `using` interactions. Sparse
 * contexts are never shifted, so they stay sparse; their absent features count as zeros.
 * Non-numeric and missing values pass through unchanged.
 */
export class Scale implements IEnvironmentFilter {
  private readonly shift: ShiftStatistic;
  private readonly scale: ScaleStatistic;
  private readonly using: number | null;

  constructor(options: IScaleOptions = {}) {
    this.shift = options.shift ?? 'mean';
    this.scale = options.scale ?? 'std';
    this.using = options.using ?? null;
    assertUsing(this.using);
    if (typeof this.shift === 'number' && !Number.isFinite(this.shift)) {
      throw new InvalidConfigurationError('A numeric shift must be finite', { shift: this.shift });
    }
    if (typeof this.scale === 'number' && !Number.isFinite(this.scale)) {
      throw new InvalidConfigurationError('A numeric scale must be finite', { scale: this.scale });
    }
  }

  get params(): Params {
    return { scale_shift: this.shift, scale_scale: this.scale, scale_using: this.using };
  }

  filter(interactions: AsyncIterable<Interaction>): AsyncIterable<Interaction> {
    return fitThenTransform(interactions, this.using, (prefix) => {
      const affines = this.fit(prefix);
      return (interaction) => ({
        ...interaction,
        context: mapContext(interaction.context, (key, value) => {
          const affine = affines.get(key);
          return affine && typeof value === 'number' ? (value - affine.shift) * affine.factor : value;
        }),
      });
    });
  }

  private fit(prefix: readonly Interaction[]): Map<string, Affine> {
    const sparse = prefix.some(({ context }) => isSparse(context));
    const { values, rows } = featureColumns(prefix);
    const affines = new Map<string, Affine>();
    for (const [key, column] of values) {
      const numbers = column.filter((value): value is number => typeof value === 'number');
      if (sparse) {
        numbers.push(...new Array<number>(rows - column.length).fill(0));
      }
      if (numbers.length) {
        affines.set(key, {
          shift: sparse ? 0 : shiftOf(numbers, this.shift),
          factor: factorOf(numbers, this.scale),
        });
      }
    }
    return affines;
  }
}

import { countBy, mean, orderBy, sortBy } from 'lodash';

import { FeatureValue } from '../types';

export { mean };

/** Linear interpolation between the closest ranks, as most spreadsheet tools compute it. */
export function quantile(values: readonly number[], q: number): number {
  const sorted = sortBy(values);
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

export function median(values: readonly number[]): number {
  return quantile(values, 0.5);
}

/** Population standard deviation. */
export function standardDeviation(values: readonly number[]): number {
  const average = mean(values);
  return Math.sqrt(mean(values.map((value) => (value - average) ** 2)));
}

/** Most frequent value; ties go to the value seen first. */
export function mode(values: readonly Exclude<FeatureValue, null>[]): FeatureValue {
  const counts = countBy(values, (value) => `${typeof value}:${value}`);
  const [first] = orderBy(
    values.map((value, position) => ({ value, position, count: counts[`${typeof value}:${value}`] })),
    ['count', 'position'],
    ['desc', 'asc'],
  );
  return first ? first.value : null;
}

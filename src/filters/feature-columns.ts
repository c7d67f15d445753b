import { mapValues } from 'lodash';

import { InvalidConfigurationError } from '../errors';
import { Interaction } from '../interactions';
import { Context, FeatureValue, isDense, isSparse } from '../types';

/** Observed values of every context feature, keyed by dense index or sparse key. */
export interface FeatureColumns {
  values: Map<string, FeatureValue[]>;
  // number of contexts the columns were collected from
  rows: number;
}

export function featureColumns(interactions: readonly Interaction[]): FeatureColumns {
  const values = new Map<string, FeatureValue[]>();
  const append = (key: string, value: FeatureValue) => {
    const column = values.get(key) ?? [];
    column.push(value);
    values.set(key, column);
  };
  for (const { context } of interactions) {
    if (isDense(context)) {
      context.forEach((value, i) => append(String(i), value));
    } else if (isSparse(context)) {
      Object.entries(context).forEach(([key, value]) => append(key, value));
    }
  }
  return { values, rows: interactions.length };
}

export function mapContext(
  context: Context,
  transform: (key: string, value: FeatureValue) => FeatureValue,
): Context {
  if (isDense(context)) {
    return context.map((value, i) => transform(String(i), value));
  }
  if (isSparse(context)) {
    return mapValues(context, (value, key) => transform(key, value));
  }
  return context;
}

export function assertUsing(using: number | null): void {
  if (using !== null && (!Number.isInteger(using) || using < 0)) {
    throw new InvalidConfigurationError('using must be null or a non-negative integer', { using });
  }
}

/**
 * Collects the first `using` interactions (all of them when `using` is null), builds a
 * transform from them with `fit`, then streams every interaction through that transform.
 *
 * Only the prefix is held in memory; the rest of upstream is pulled one interaction at a time.
 */
export async function* fitThenTransform(
  interactions: AsyncIterable<Interaction>,
  using: number | null,
  fit: (prefix: readonly Interaction[]) => (interaction: Interaction) => Interaction,
): AsyncIterable<Interaction> {
  const iterator = interactions[Symbol.asyncIterator]();
  try {
    const prefix: Interaction[] = [];
    let exhausted = false;
    while (using === null || prefix.length < using) {
      const next = await iterator.next();
      if (next.done) {
        exhausted = true;
        break;
      }
      prefix.push(next.value);
    }
    const transform = fit(prefix);
    for (const interaction of prefix) {
      yield transform(interaction);
    }
    while (!exhausted) {
      const next = await iterator.next();
      if (next.done) {
        exhausted = true;
      } else {
        yield transform(next.value);
      }
    }
  } finally {
    await iterator.return?.();
  }
}

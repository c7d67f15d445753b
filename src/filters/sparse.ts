import { sortBy, uniq } from 'lodash';

import { InvalidConfigurationError } from '../errors';
import { Interaction } from '../interactions';
import { Action, Context, FeatureValue, Params, SparseContext, isDense, isSparse } from '../types';
import { collect } from '../util';

import { IEnvironmentFilter } from './environment-filter';

export interface ISparseOptions {
  to?: 'sparse' | 'dense';
  // which features are converted; contexts by default, actions only when asked
  context?: boolean;
  actions?: boolean;
}

function toSparse(features: readonly FeatureValue[]): SparseContext {
  const sparse: Record<string, FeatureValue> = {};
  features.forEach((value, i) => {
    if (value !== 0) {
      sparse[String(i)] = value;
    }
  });
  return sparse;
}

function toDense(features: SparseContext, keys: readonly string[]): FeatureValue[] {
  return keys.map((key) => features[key] ?? 0);
}

// numeric keys in numeric order, the rest after them in string order
function orderKeys(keys: readonly string[]): string[] {
  return sortBy(uniq(keys), [
    (key) => (/^\d+$/.test(key) ? 0 : 1),
    (key) => (/^\d+$/.test(key) ? Number(key) : 0),
    (key) => key,
  ]);
}

/**
 * Converts contexts (and optionally vector actions) between dense and sparse form.
 *
 * Dense to sparse keys every non-zero feature by its index. Sparse to dense needs the key set
 * of the whole sequence, so it reads all of upstream before yielding.
 */
export class Sparse implements IEnvironmentFilter {
  private readonly to: 'sparse' | 'dense';
  private readonly convertContext: boolean;
  private readonly convertActions: boolean;

  constructor(options: ISparseOptions = {}) {
    this.to = options.to ?? 'sparse';
    this.convertContext = options.context ?? true;
    this.convertActions = options.actions ?? false;
    if (this.to !== 'sparse' && this.to !== 'dense') {
      throw new InvalidConfigurationError('Sparse converts to "sparse" or "dense"', { to: this.to });
    }
  }

  get params(): Params {
    return { sparse_to: this.to, sparse_C: this.convertContext, sparse_A: this.convertActions };
  }

  filter(interactions: AsyncIterable<Interaction>): AsyncIterable<Interaction> {
    return this.to === 'sparse' ? this.sparsify(interactions) : this.densify(interactions);
  }

  private async *sparsify(interactions: AsyncIterable<Interaction>): AsyncIterable<Interaction> {
    const convert = <T extends Context | Action>(features: T): T | SparseContext =>
      isDense(features) ? toSparse(features) : features;
    for await (const interaction of interactions) {
      yield this.convert(interaction, convert, convert);
    }
  }

  private async *densify(interactions: AsyncIterable<Interaction>): AsyncIterable<Interaction> {
    const all = await collect(interactions);
    const keysOf = (features: Context | Action) => (isSparse(features) ? Object.keys(features) : []);
    const contextKeys = orderKeys(all.flatMap(({ context }) => keysOf(context)));
    const actionKeys = orderKeys(all.flatMap(({ actions }) => actions.flatMap(keysOf)));
    for (const interaction of all) {
      yield this.convert(
        interaction,
        (context) => (isSparse(context) ? toDense(context, contextKeys) : context),
        (action) => (isSparse(action) ? toDense(action, actionKeys) : action),
      );
    }
  }

  private convert(
    interaction: Interaction,
    convertContext: (context: Context) => Context,
    convertAction: (action: Action) => Action,
  ): Interaction {
    const context = this.convertContext ? convertContext(interaction.context) : interaction.context;
    if (!this.convertActions) {
      return { ...interaction, context };
    }
    const actions = interaction.actions.map(convertAction);
    return interaction.type === 'logged'
      ? { ...interaction, context, actions, action: convertAction(interaction.action) }
      : { ...interaction, context, actions };
  }
}

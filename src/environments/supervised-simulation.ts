import { sortBy, uniq } from 'lodash';

import { InvalidConfigurationError } from '../errors';
import { SimulatedInteraction, simulatedInteraction } from '../interactions';
import { ILabeledSource } from '../sources/labeled-source';
import { Action, Context, Label, LabelValue, LabeledRow, Params, ProblemType } from '../types';
import { collect } from '../util';

import { IEnvironment, describeEnvironment } from './environment';

/** Reward of choosing `action` when the observed value was `label`. */
export type RegressionReward = (label: number, action: number) => number;

export const negativeAbsoluteError: RegressionReward = (label, action) => -Math.abs(label - action);

export interface ISupervisedSimulationOptions {
  problemType?: ProblemType;
  // `onehot` turns each class into a one-hot action vector instead of the label itself
  labelEncoding?: 'label' | 'onehot';
  // regression only; defaults to the negative absolute error
  rewardFunction?: RegressionReward;
}

interface ActionSet {
  actions: readonly Action[];
  labels: readonly LabelValue[];
}

function labelValues(label: Label): readonly LabelValue[] {
  return typeof label === 'object' ? label : [label];
}

/**
 * Turns a labeled dataset into a bandit problem: the features of an observation become the
 * context and the label domain becomes the action set.
 *
 * Classification rewards 1 for a true label and 0 for every other label. Regression rewards
 * every candidate value with `rewardFunction(label, value)`.
 */
export class SupervisedSimulation implements IEnvironment<SimulatedInteraction> {
  private readonly rows: readonly LabeledRow[] | undefined;
  private readonly source: ILabeledSource | undefined;
  private readonly actionSet: ActionSet | undefined;

  constructor(
    data: readonly LabeledRow[] | ILabeledSource,
    private readonly options: ISupervisedSimulationOptions = {},
  ) {
    if ('read' in data) {
      this.source = data;
    } else {
      this.rows = [...data];
      // in memory data is checked now; source backed data before its first interaction
      this.actionSet = this.buildActionSet(this.rows);
    }
  }

  static fromArrays(
    features: readonly Context[],
    labels: readonly Label[],
    options: ISupervisedSimulationOptions = {},
  ): SupervisedSimulation {
    if (features.length !== labels.length) {
      throw new InvalidConfigurationError('Mismatched lengths of features and labels', {
        features: features.length,
        labels: labels.length,
      });
    }
    return new SupervisedSimulation(
      features.map((context, i) => ({ features: context, label: labels[i] })),
      options,
    );
  }

  get problemType(): ProblemType {
    return this.options.problemType ?? 'classification';
  }

  get params(): Params {
    return { ...this.source?.params, type: this.problemType };
  }

  async *read(): AsyncIterable<SimulatedInteraction> {
    const rows = this.rows ?? (this.source ? await collect(this.source.read()) : []);
    const actionSet = this.actionSet ?? this.buildActionSet(rows);
    for (const row of rows) {
      yield simulatedInteraction(row.features, actionSet.actions, this.rewards(row.label, actionSet));
    }
  }

  toString(): string {
    return describeEnvironment('SupervisedSimulation', this.params);
  }

  private buildActionSet(rows: readonly LabeledRow[]): ActionSet {
    const values = rows.flatMap((row) => labelValues(row.label));
    if (this.problemType === 'regression') {
      if (rows.some((row) => typeof row.label !== 'number')) {
        throw new InvalidConfigurationError('Regression labels must be single numbers', {
          params: this.params,
        });
      }
    }
    // numbers first, then strings, so the action set is the same whatever the row order
    const labels = sortBy(uniq(values), [
      (value) => (typeof value === 'number' ? 0 : 1),
      (value) => value,
    ]);
    if (labels.length < 2) {
      throw new InvalidConfigurationError(
        'A supervised simulation needs at least two distinct labels',
        { params: this.params, labels },
      );
    }
    const actions =
      this.options.labelEncoding === 'onehot'
        ? labels.map((_, i) => labels.map((__, j) => (i === j ? 1 : 0)))
        : labels;
    return { actions, labels };
  }

  private rewards(label: Label, { labels }: ActionSet): number[] {
    if (this.problemType === 'regression') {
      const reward = this.options.rewardFunction ?? negativeAbsoluteError;
      const observed = Number(label);
      return labels.map((candidate) => reward(observed, Number(candidate)));
    }
    const truths = labelValues(label);
    return labels.map((candidate) => (truths.includes(candidate) ? 1 : 0));
  }
}

import { IOpenmlSourceOptions, OpenmlSource } from '../remote/openml-source';

import { describeEnvironment } from './environment';
import { ISupervisedSimulationOptions, SupervisedSimulation } from './supervised-simulation';

export type IOpenmlSimulationOptions = IOpenmlSourceOptions &
  Pick<ISupervisedSimulationOptions, 'labelEncoding' | 'rewardFunction'>;

/**
 * A supervised simulation over an OpenML dataset: features become the context, the target's
 * values become the actions.
 */
export class OpenmlSimulation extends SupervisedSimulation {
  constructor(
    readonly datasetId: number,
    options: IOpenmlSimulationOptions = {},
  ) {
    super(new OpenmlSource(datasetId, options), {
      problemType: options.problemType,
      labelEncoding: options.labelEncoding,
      rewardFunction: options.rewardFunction,
    });
  }

  toString(): string {
    return describeEnvironment('OpenmlSimulation', this.params);
  }
}

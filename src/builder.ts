import { promises as fs } from 'fs';

import { logger, loggerPrefix } from './application-logger';
import { IDefinitionOptions, parseDefinition } from './definition';
import { InvalidConfigurationError, SourceUnavailableError } from './errors';
import { EnvironmentSpec, IEnvironment } from './environments/environment';
import {
  ILinearSyntheticOptions,
  LinearSyntheticSimulation,
} from './environments/linear-synthetic-simulation';
import {
  INeighborsSyntheticOptions,
  NeighborsSyntheticSimulation,
} from './environments/neighbors-synthetic-simulation';
import { IOpenmlSimulationOptions, OpenmlSimulation } from './environments/openml-simulation';
import {
  ISupervisedSimulationOptions,
  SupervisedSimulation,
} from './environments/supervised-simulation';
import { FilterStage, applyFilters } from './filters/environment-filter';
import { IImputeOptions, Impute } from './filters/impute';
import { IScaleOptions, Scale } from './filters/scale';
import { Binary, Where } from './filters/selection-filters';
import { Cycle, Identity, Reservoir, Shuffle, Sort, SortKey, Take } from './filters/sequence-filters';
import { ISparseOptions, Sparse } from './filters/sparse';
import { IWarmStartOptions, WarmStart } from './filters/warm-start';
import { Interaction } from './interactions';
import { Seed } from './random';
import { Context, Label } from './types';

type Many<T> = T | readonly T[];

function isList<T>(values: Many<T>): values is readonly T[] {
  return Array.isArray(values);
}

function many<T>(values: Many<T>): readonly T[] {
  return isList(values) ? values : [values];
}

/**
 * An immutable collection of environments.
 *
 * Filtering returns a new collection with one environment per combination of base environment
 * and filter alternatives; the collection it was called on is left as it was. Nothing is read
 * until a consumer reads one of the environments.
 */
export class Environments implements Iterable<IEnvironment> {
  private readonly environments: readonly IEnvironment[];

  private constructor(environments: readonly IEnvironment[]) {
    this.environments = [...environments];
  }

  /**
   * Collects environments. A factory that throws is logged and left out so that one bad
   * dataset does not cost the rest of an experiment.
   */
  static from(...specs: EnvironmentSpec[]): Environments {
    const environments: IEnvironment[] = [];
    specs.forEach((spec, position) => {
      if (typeof spec !== 'function') {
        environments.push(spec);
        return;
      }
      try {
        environments.push(spec());
      } catch (error) {
        logger.error(
          { err: error, position },
          `${loggerPrefix} Environment ${position} could not be built and was skipped`,
        );
      }
    });
    return new Environments(environments);
  }

  static fromLinearSynthetic(options: Many<ILinearSyntheticOptions> = {}): Environments {
    return Environments.from(
      ...many(options).map((option) => () => new LinearSyntheticSimulation(option)),
    );
  }

  static fromNeighborsSynthetic(options: Many<INeighborsSyntheticOptions> = {}): Environments {
    return Environments.from(
      ...many(options).map((option) => () => new NeighborsSyntheticSimulation(option)),
    );
  }

  static fromOpenml(datasetIds: Many<number>, options: IOpenmlSimulationOptions = {}): Environments {
    return Environments.from(...many(datasetIds).map((id) => () => new OpenmlSimulation(id, options)));
  }

  static fromSupervised(
    features: readonly Context[],
    labels: readonly Label[],
    options: ISupervisedSimulationOptions = {},
  ): Environments {
    return Environments.from(() => SupervisedSimulation.fromArrays(features, labels, options));
  }

  /** Builds the environments of a definition document (JSON text or its parsed value). */
  static fromDefinition(document: unknown, options: IDefinitionOptions = {}): Environments {
    const { environments, stages } = parseDefinition(document, options);
    return Environments.from(...environments).filter(...stages);
  }

  static async fromDefinitionFile(
    path: string,
    options: IDefinitionOptions = {},
  ): Promise<Environments> {
    let text: string;
    try {
      text = await fs.readFile(path, 'utf8');
    } catch (error) {
      throw new SourceUnavailableError(
        `Could not read the environments definition ${path}`,
        { path },
        error instanceof Error ? error : undefined,
      );
    }
    return Environments.fromDefinition(text, options);
  }

  get length(): number {
    return this.environments.length;
  }

  at(index: number): IEnvironment | undefined {
    return this.environments[index];
  }

  [Symbol.iterator](): Iterator<IEnvironment> {
    return this.environments[Symbol.iterator]();
  }

  concat(other: Environments): Environments {
    return new Environments([...this.environments, ...other.environments]);
  }

  /** Attaches each stage in order; a list of filters multiplies the environments by its length. */
  filter(...stages: FilterStage[]): Environments {
    let environments = this.environments;
    for (const stage of stages) {
      const alternatives = many(stage);
      if (!alternatives.length) {
        throw new InvalidConfigurationError('A filter stage needs at least one filter');
      }
      environments = environments.flatMap((environment) =>
        alternatives.map((alternative) => applyFilters(environment, [alternative])),
      );
    }
    return new Environments(environments);
  }

  identity(): Environments {
    return this.filter(new Identity());
  }

  shuffle(seeds: Many<Seed> = 1): Environments {
    return this.filter(many(seeds).map((seed) => new Shuffle(seed)));
  }

  sort(keys: SortKey | readonly SortKey[], options: { reverse?: boolean } = {}): Environments {
    return this.filter(new Sort(keys, options));
  }

  take(counts: Many<number>): Environments {
    return this.filter(many(counts).map((count) => new Take(count)));
  }

  reservoir(counts: Many<number>, seeds: Many<Seed> = 1): Environments {
    return this.filter(
      many(counts).flatMap((count) => many(seeds).map((seed) => new Reservoir(count, seed))),
    );
  }

  cycle(length: number, options: { seed?: Seed } = {}): Environments {
    return this.filter(new Cycle(length, options));
  }

  scale(options: IScaleOptions = {}): Environments {
    return this.filter(new Scale(options));
  }

  impute(options: Many<IImputeOptions> = {}): Environments {
    return this.filter(many(options).map((option) => new Impute(option)));
  }

  binary(threshold?: number): Environments {
    return this.filter(new Binary(threshold));
  }

  sparse(options: ISparseOptions = {}): Environments {
    return this.filter(new Sparse(options));
  }

  warmStart(counts: Many<number>, options: IWarmStartOptions = {}): Environments {
    return this.filter(many(counts).map((count) => new WarmStart(count, options)));
  }

  where(predicate: (interaction: Interaction) => boolean, label?: string): Environments {
    return this.filter(new Where(predicate, label));
  }

  toString(): string {
    return this.environments.map(String).join('\n');
  }
}

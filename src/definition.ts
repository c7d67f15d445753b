import { InvalidConfigurationError } from './errors';
import { EnvironmentSpec, IEnvironment } from './environments/environment';
import {
  ILinearSyntheticOptions,
  LinearSyntheticSimulation,
} from './environments/linear-synthetic-simulation';
import {
  INeighborsSyntheticOptions,
  NeighborsSyntheticSimulation,
} from './environments/neighbors-synthetic-simulation';
import { OpenmlSimulation } from './environments/openml-simulation';
import { SupervisedSimulation } from './environments/supervised-simulation';
import { FilterStage, IEnvironmentFilter } from './filters/environment-filter';
import { ImputeStatistic, Impute } from './filters/impute';
import { Scale, ScaleStatistic, ShiftStatistic } from './filters/scale';
import { Binary } from './filters/selection-filters';
import { Cycle, Identity, Reservoir, Shuffle, Sort, SortKey, Take } from './filters/sequence-filters';
import { Sparse } from './filters/sparse';
import { WarmStart } from './filters/warm-start';
import { Seed } from './random';
import { DatasetCache } from './remote/dataset-cache';
import { IHttpClient } from './remote/http-client';
import { ArffReader } from './sources/arff-reader';
import { CsvReader } from './sources/csv-reader';
import { LabeledRowSource } from './sources/labeled-source';
import { LibSvmReader, ManikReader } from './sources/libsvm-reader';
import { UrlSource } from './sources/line-source';
import { IRowReader } from './sources/reader-options';
import { ProblemType } from './types';
import { isRecord } from './util';

export interface IDefinitionOptions {
  httpClient?: IHttpClient;
  cache?: DatasetCache;
}

export interface EnvironmentsDefinition {
  environments: EnvironmentSpec[];
  stages: FilterStage[];
}

type Guard<T> = (value: unknown) => value is T;

const isNumber: Guard<number> = (value): value is number => typeof value === 'number';
const isString: Guard<string> = (value): value is string => typeof value === 'string';
const isBoolean: Guard<boolean> = (value): value is boolean => typeof value === 'boolean';
const isSeed: Guard<Seed> = (value): value is Seed => isNumber(value) || isString(value);
const isStringList: Guard<string[]> = (value): value is string[] =>
  Array.isArray(value) && value.every(isString);
const isProblemType: Guard<ProblemType> = (value): value is ProblemType =>
  value === 'classification' || value === 'regression';
const isShift: Guard<ShiftStatistic> = (value): value is ShiftStatistic =>
  isNumber(value) || value === 'mean' || value === 'min' || value === 'median';
const isScale: Guard<ScaleStatistic> = (value): value is ScaleStatistic =>
  isNumber(value) || value === 'std' || value === 'minmax' || value === 'iqr' || value === 'maxabs';
const isImputeStatistic: Guard<ImputeStatistic> = (value): value is ImputeStatistic =>
  isNumber(value) || value === 'mean' || value === 'median' || value === 'mode';
const isColumn: Guard<string | number> = (value): value is string | number =>
  isNumber(value) || isString(value);
const isSortKey: Guard<SortKey> = (value): value is SortKey => isColumn(value);
const isSparseTarget: Guard<'sparse' | 'dense'> = (value): value is 'sparse' | 'dense' =>
  value === 'sparse' || value === 'dense';
const isUsing: Guard<number | null> = (value): value is number | null =>
  value === null || isNumber(value);

function optional<T>(record: Record<string, unknown>, key: string, guard: Guard<T>): T | undefined {
  const value = record[key];
  if (value === undefined) {
    return undefined;
  }
  if (!guard(value)) {
    throw new InvalidConfigurationError(`Invalid value for "${key}"`, { key, value });
  }
  return value;
}

function required<T>(record: Record<string, unknown>, key: string, guard: Guard<T>): T {
  const value = optional(record, key, guard);
  if (value === undefined) {
    throw new InvalidConfigurationError(`Missing "${key}"`, { key, entry: record });
  }
  return value;
}

/** `{ "Kind": value }` entries have exactly one key. */
function singleEntry(item: unknown, what: string): [string, unknown] {
  const entries = isRecord(item) ? Object.entries(item) : [];
  if (entries.length !== 1) {
    throw new InvalidConfigurationError(`Each ${what} must be an object with exactly one key`, {
      [what]: item,
    });
  }
  return entries[0];
}

// a scalar shorthand like `{ "Take": 10 }` stands for `{ "Take": { "count": 10 } }`
function asRecord(value: unknown, shorthandKey: string): Record<string, unknown> {
  return isRecord(value) ? value : { [shorthandKey]: value };
}

function alternatives(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [value];
}

function linearOptions(record: Record<string, unknown>): ILinearSyntheticOptions {
  return {
    nInteractions: optional(record, 'nInteractions', isNumber),
    nActions: optional(record, 'nActions', isNumber),
    nContextFeatures: optional(record, 'nContextFeatures', isNumber),
    nActionFeatures: optional(record, 'nActionFeatures', isNumber),
    rewardNoiseVariance: optional(record, 'rewardNoiseVariance', isNumber),
    terms: optional(record, 'terms', isStringList),
    seed: optional(record, 'seed', isSeed),
  };
}

function neighborsOptions(record: Record<string, unknown>): INeighborsSyntheticOptions {
  return {
    nInteractions: optional(record, 'nInteractions', isNumber),
    nActions: optional(record, 'nActions', isNumber),
    nContextFeatures: optional(record, 'nContextFeatures', isNumber),
    nNeighborhoods: optional(record, 'nNeighborhoods', isNumber),
    spread: optional(record, 'spread', isNumber),
    seed: optional(record, 'seed', isSeed),
  };
}

function fileSimulation(
  record: Record<string, unknown>,
  reader: IRowReader,
  options: IDefinitionOptions,
): IEnvironment {
  const lines = new UrlSource(required(record, 'source', isString), options.httpClient);
  return new SupervisedSimulation(new LabeledRowSource(lines, reader), {
    problemType: optional(record, 'problemType', isProblemType),
  });
}

interface Kind<T> {
  // the option a scalar value stands for
  shorthand: string;
  build: (record: Record<string, unknown>, options: IDefinitionOptions) => T;
}

const ENVIRONMENT_KINDS: Record<string, Kind<IEnvironment>> = {
  OpenmlSimulation: {
    shorthand: 'id',
    build: (record, { httpClient, cache }) =>
      new OpenmlSimulation(required(record, 'id', isNumber), {
        problemType: optional(record, 'problemType', isProblemType),
        catAsString: optional(record, 'catAsString', isBoolean),
        take: optional(record, 'take', isNumber),
        md5Checksum: optional(record, 'md5Checksum', isString),
        httpClient,
        cache,
      }),
  },
  LinearSyntheticSimulation: {
    shorthand: 'nInteractions',
    build: (record) => new LinearSyntheticSimulation(linearOptions(record)),
  },
  NeighborsSyntheticSimulation: {
    shorthand: 'nInteractions',
    build: (record) => new NeighborsSyntheticSimulation(neighborsOptions(record)),
  },
  CsvSimulation: {
    shorthand: 'source',
    build: (record, options) =>
      fileSimulation(
        record,
        new CsvReader({
          hasHeader: optional(record, 'hasHeader', isBoolean),
          label: required(record, 'label', isColumn),
          strict: optional(record, 'strict', isBoolean),
        }),
        options,
      ),
  },
  ArffSimulation: {
    shorthand: 'source',
    build: (record, options) =>
      fileSimulation(
        record,
        new ArffReader({
          label: optional(record, 'label', isString),
          strict: optional(record, 'strict', isBoolean),
        }),
        options,
      ),
  },
  LibSvmSimulation: {
    shorthand: 'source',
    build: (record, options) =>
      fileSimulation(
        record,
        new LibSvmReader({ strict: optional(record, 'strict', isBoolean) }),
        options,
      ),
  },
  ManikSimulation: {
    shorthand: 'source',
    build: (record, options) =>
      fileSimulation(
        record,
        new ManikReader({ strict: optional(record, 'strict', isBoolean) }),
        options,
      ),
  },
};

const FILTER_KINDS: Record<string, Kind<IEnvironmentFilter>> = {
  Identity: { shorthand: 'value', build: () => new Identity() },
  Shuffle: { shorthand: 'seed', build: (record) => new Shuffle(optional(record, 'seed', isSeed)) },
  Take: { shorthand: 'count', build: (record) => new Take(required(record, 'count', isNumber)) },
  Reservoir: {
    shorthand: 'count',
    build: (record) =>
      new Reservoir(required(record, 'count', isNumber), optional(record, 'seed', isSeed)),
  },
  Sort: {
    shorthand: 'keys',
    build: (record) => {
      const keys = record.keys;
      const sortKeys = Array.isArray(keys)
        ? keys.filter(isSortKey)
        : [required(record, 'keys', isSortKey)];
      if (Array.isArray(keys) && sortKeys.length !== keys.length) {
        throw new InvalidConfigurationError('Sort keys must be feature indexes or names', { keys });
      }
      return new Sort(sortKeys, { reverse: optional(record, 'reverse', isBoolean) });
    },
  },
  Cycle: {
    shorthand: 'length',
    build: (record) =>
      new Cycle(required(record, 'length', isNumber), { seed: optional(record, 'seed', isSeed) }),
  },
  Scale: {
    shorthand: 'scale',
    build: (record) =>
      new Scale({
        shift: optional(record, 'shift', isShift),
        scale: optional(record, 'scale', isScale),
        using: optional(record, 'using', isUsing),
      }),
  },
  Impute: {
    shorthand: 'statistic',
    build: (record) =>
      new Impute({
        statistic: optional(record, 'statistic', isImputeStatistic),
        using: optional(record, 'using', isUsing),
      }),
  },
  Binary: {
    shorthand: 'threshold',
    build: (record) => new Binary(optional(record, 'threshold', isNumber)),
  },
  Sparse: {
    shorthand: 'to',
    build: (record) =>
      new Sparse({
        to: optional(record, 'to', isSparseTarget),
        context: optional(record, 'context', isBoolean),
        actions: optional(record, 'actions', isBoolean),
      }),
  },
  WarmStart: {
    shorthand: 'count',
    build: (record) =>
      new WarmStart(required(record, 'count', isNumber), { seed: optional(record, 'seed', isSeed) }),
  },
};

function lookup<T>(kinds: Record<string, T>, kind: string, what: string): T {
  if (!Object.prototype.hasOwnProperty.call(kinds, kind)) {
    throw new InvalidConfigurationError(`Unknown ${what} "${kind}"`, {
      [what]: kind,
      known: Object.keys(kinds),
    });
  }
  return kinds[kind];
}

/**
 * Reads an environments definition document:
 *
 * ```json
 * {
 *   "environments": [{ "OpenmlSimulation": [150, 1116] }, { "CsvSimulation": "data.csv" }],
 *   "filters": [{ "Shuffle": [1, 2, 3] }, { "Take": 1000 }]
 * }
 * ```
 *
 * Each entry names one kind; a list value fans out into one environment per element (or one
 * filter alternative per element). Entries are only checked for their kind here. Their options
 * are checked when the environment is built, so a bad entry costs only itself.
 */
export function parseDefinition(
  document: unknown,
  options: IDefinitionOptions = {},
): EnvironmentsDefinition {
  let parsed = document;
  if (typeof document === 'string') {
    try {
      parsed = JSON.parse(document);
    } catch (error) {
      throw new InvalidConfigurationError(
        'An environments definition must be valid JSON',
        {},
        error instanceof Error ? error : undefined,
      );
    }
  }
  if (!isRecord(parsed) || !Array.isArray(parsed.environments)) {
    throw new InvalidConfigurationError('An environments definition needs an "environments" list');
  }
  const filters = parsed.filters ?? [];
  if (!Array.isArray(filters)) {
    throw new InvalidConfigurationError('"filters" must be a list of filter stages', { filters });
  }

  const environments = parsed.environments.flatMap((entry: unknown) => {
    const [kind, value] = singleEntry(entry, 'environment');
    const { shorthand, build } = lookup(ENVIRONMENT_KINDS, kind, 'environment');
    return alternatives(value).map((item) => () => build(asRecord(item, shorthand), options));
  });
  const stages = filters.map((stage: unknown) => {
    const [kind, value] = singleEntry(stage, 'filter');
    const { shorthand, build } = lookup(FILTER_KINDS, kind, 'filter');
    return alternatives(value).map((item) => build(asRecord(item, shorthand), options));
  });
  return { environments, stages };
}

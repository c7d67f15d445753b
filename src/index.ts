import { logger as applicationLogger } from './application-logger';
import { Environments } from './builder';
import { IEnvironmentsConfig, loadConfig } from './config';
import * as constants from './constants';
import { EnvironmentsDefinition, IDefinitionOptions, parseDefinition } from './definition';
import { EnvironmentSpec, IEnvironment } from './environments/environment';
import {
  ILambdaSimulationOptions,
  InteractionGenerator,
  LambdaSimulation,
} from './environments/lambda-simulation';
import {
  ILinearSyntheticOptions,
  LinearSyntheticSimulation,
} from './environments/linear-synthetic-simulation';
import { MemorySimulation } from './environments/memory-simulation';
import {
  INeighborsSyntheticOptions,
  NeighborsSyntheticSimulation,
} from './environments/neighbors-synthetic-simulation';
import { IOpenmlSimulationOptions, OpenmlSimulation } from './environments/openml-simulation';
import {
  ISupervisedSimulationOptions,
  RegressionReward,
  SupervisedSimulation,
  negativeAbsoluteError,
} from './environments/supervised-simulation';
import {
  EnvironmentError,
  InvalidConfigurationError,
  InvalidInteractionError,
  MalformedRecordError,
  NonDeterministicInputError,
  SourceUnavailableError,
} from './errors';
import {
  FilterStage,
  FilteredEnvironment,
  IEnvironmentFilter,
  applyFilters,
} from './filters/environment-filter';
import { IImputeOptions, ImputeStatistic, Impute } from './filters/impute';
import { IScaleOptions, Scale, ScaleStatistic, ShiftStatistic } from './filters/scale';
import { Binary, Where } from './filters/selection-filters';
import { Cycle, Identity, Reservoir, Shuffle, Sort, SortKey, Take } from './filters/sequence-filters';
import { ISparseOptions, Sparse } from './filters/sparse';
import {
  IWarmStartOptions,
  LoggingDecision,
  LoggingPolicy,
  WarmStart,
  uniformLoggingPolicy,
} from './filters/warm-start';
import {
  Interaction,
  LoggedInteraction,
  SimulatedInteraction,
  loggedInteraction,
  rewardFor,
  simulatedInteraction,
} from './interactions';
import { SeededRandom, Seed, deriveSeed } from './random';
import OpenmlEndpoints from './remote/api-endpoints';
import {
  DatasetCache,
  DiskCacher,
  ICacher,
  MemoryCacher,
  getDatasetCache,
  setDatasetCache,
} from './remote/dataset-cache';
import FetchHttpClient, { HttpRequestError, IHttpClient } from './remote/http-client';
import { IOpenmlSourceOptions, OpenmlSource } from './remote/openml-source';
import { ArffReader, IArffReaderOptions } from './sources/arff-reader';
import { CsvDialect, CsvReader, ICsvReaderOptions } from './sources/csv-reader';
import { ColumnType, NominalEncoding } from './sources/encoding';
import { ILabeledSource, LabeledRowSource } from './sources/labeled-source';
import { LibSvmReader, ManikReader } from './sources/libsvm-reader';
import { DiskSource, HttpSource, ILineSource, ListSource, UrlSource } from './sources/line-source';
import { IReaderOptions, IRowReader } from './sources/reader-options';
import {
  Action,
  Context,
  DenseContext,
  FeatureValue,
  Label,
  LabeledRow,
  Params,
  ProblemType,
  RawRow,
  SparseContext,
  isDense,
  isSparse,
} from './types';

export {
  applicationLogger,
  constants,
  loadConfig,
  IEnvironmentsConfig,
  Environments,
  EnvironmentSpec,
  EnvironmentsDefinition,
  IDefinitionOptions,
  parseDefinition,

  // Errors
  EnvironmentError,
  InvalidConfigurationError,
  InvalidInteractionError,
  MalformedRecordError,
  NonDeterministicInputError,
  SourceUnavailableError,
  HttpRequestError,

  // Interactions
  Interaction,
  SimulatedInteraction,
  LoggedInteraction,
  simulatedInteraction,
  loggedInteraction,
  rewardFor,
  Action,
  Context,
  DenseContext,
  SparseContext,
  FeatureValue,
  Label,
  LabeledRow,
  Params,
  ProblemType,
  RawRow,
  isDense,
  isSparse,
  SeededRandom,
  Seed,
  deriveSeed,

  // Environments
  IEnvironment,
  MemorySimulation,
  LambdaSimulation,
  ILambdaSimulationOptions,
  InteractionGenerator,
  SupervisedSimulation,
  ISupervisedSimulationOptions,
  RegressionReward,
  negativeAbsoluteError,
  OpenmlSimulation,
  IOpenmlSimulationOptions,
  LinearSyntheticSimulation,
  ILinearSyntheticOptions,
  NeighborsSyntheticSimulation,
  INeighborsSyntheticOptions,

  // Filters
  IEnvironmentFilter,
  FilterStage,
  FilteredEnvironment,
  applyFilters,
  Identity,
  Shuffle,
  Sort,
  SortKey,
  Take,
  Reservoir,
  Cycle,
  Scale,
  IScaleOptions,
  ScaleStatistic,
  ShiftStatistic,
  Impute,
  IImputeOptions,
  ImputeStatistic,
  Binary,
  Sparse,
  ISparseOptions,
  WarmStart,
  IWarmStartOptions,
  LoggingDecision,
  LoggingPolicy,
  uniformLoggingPolicy,
  Where,

  // Sources
  ILineSource,
  ListSource,
  DiskSource,
  HttpSource,
  UrlSource,
  IRowReader,
  IReaderOptions,
  CsvReader,
  ICsvReaderOptions,
  CsvDialect,
  ArffReader,
  IArffReaderOptions,
  LibSvmReader,
  ManikReader,
  ColumnType,
  NominalEncoding,
  ILabeledSource,
  LabeledRowSource,

  // Remote datasets
  OpenmlSource,
  IOpenmlSourceOptions,
  OpenmlEndpoints,
  IHttpClient,
  FetchHttpClient,
  ICacher,
  MemoryCacher,
  DiskCacher,
  DatasetCache,
  getDatasetCache,
  setDatasetCache,
};

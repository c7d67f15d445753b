import { logger, loggerPrefix } from '../application-logger';
import { loadConfig } from '../config';
import {
  OPENML_CLASSIFICATION_TASK_TYPE,
  OPENML_REGRESSION_TASK_TYPE,
  OPENML_TAKE_SEED,
} from '../constants';
import {
  EnvironmentError,
  InvalidConfigurationError,
  SourceUnavailableError,
} from '../errors';
import { getMD5Hash } from '../hashing';
import { SeededRandom } from '../random';
import { reservoirSample } from '../sampling';
import { ArffReader } from '../sources/arff-reader';
import { CsvReader } from '../sources/csv-reader';
import { parseNumber } from '../sources/encoding';
import { ILabeledSource } from '../sources/labeled-source';
import { IReaderOptions, IRowReader } from '../sources/reader-options';
import {
  FeatureValue,
  LabeledRow,
  Params,
  ProblemType,
  RawRow,
  isDense,
  isSparse,
} from '../types';
import { collect, isRecord } from '../util';

import OpenmlEndpoints from './api-endpoints';
import { DatasetCache, getDatasetCache } from './dataset-cache';
import FetchHttpClient, { HttpRequestError, IHttpClient } from './http-client';

export interface IOpenmlSourceOptions extends IReaderOptions {
  problemType?: ProblemType;
  // keep nominal features as strings instead of one-hot encoding them
  catAsString?: boolean;
  // reservoir sample this many rows
  take?: number;
  // md5 of the dataset file (lines joined with trailing newlines); a mismatch evicts the cache
  md5Checksum?: string;
  httpClient?: IHttpClient;
  endpoints?: OpenmlEndpoints;
  cache?: DatasetCache;
}

interface OpenmlFeature {
  name: string;
  dataType: string;
  isTarget: boolean;
  isIgnore: boolean;
  isRowIdentifier: boolean;
}

interface DatasetPlan {
  columns: string[];
  kept: string[];
  numeric: Set<string>;
  target: string;
}

// OpenML's csv files quote with ' and escape with \
const OPENML_DIALECT = { quote: "'", escape: '\\', doubleQuote: false };

function stripQuotes(name: string): string {
  return name.trim().replace(/^['"]|['"]$/g, '');
}

function flag(value: unknown): boolean {
  return value === true || value === 'true';
}

/**
 * Labeled rows of an OpenML dataset.
 *
 * Every payload (description, feature list, task list, data file) goes through the dataset
 * cache, so a dataset is downloaded at most once per process (or once per cache directory).
 */
export class OpenmlSource implements ILabeledSource {
  private readonly problemType: ProblemType;
  private readonly httpClient: IHttpClient;
  private readonly endpoints: OpenmlEndpoints;
  private readonly cacheKeys: Record<'descr' | 'feats' | 'csv' | 'arff' | 'tasks', string>;

  constructor(
    readonly datasetId: number,
    private readonly options: IOpenmlSourceOptions = {},
  ) {
    if (!Number.isInteger(datasetId) || datasetId <= 0) {
      throw new InvalidConfigurationError('An OpenML dataset id must be a positive integer', {
        datasetId,
      });
    }
    if (options.take !== undefined && (!Number.isInteger(options.take) || options.take < 0)) {
      throw new InvalidConfigurationError('take must be a non-negative integer', {
        take: options.take,
      });
    }
    const config = loadConfig();
    this.problemType = options.problemType ?? 'classification';
    this.httpClient = options.httpClient ?? new FetchHttpClient(config.requestTimeoutMs);
    this.endpoints = options.endpoints ?? new OpenmlEndpoints({ apiKey: config.openmlApiKey });
    const prefix = `openml_${String(datasetId).padStart(6, '0')}`;
    this.cacheKeys = {
      descr: `${prefix}_descr`,
      feats: `${prefix}_feats`,
      csv: `${prefix}_csv`,
      arff: `${prefix}_arff`,
      tasks: `${prefix}_tasks`,
    };
  }

  get params(): Params {
    const params: Params = {
      openml: this.datasetId,
      catAsString: this.options.catAsString ?? false,
      problemType: this.problemType,
    };
    if (this.options.take !== undefined) {
      params.openmlTake = this.options.take;
    }
    return params;
  }

  async *read(): AsyncIterable<LabeledRow> {
    let rows: LabeledRow[];
    try {
      rows = await this.load();
    } catch (error) {
      if (!(error instanceof EnvironmentError)) {
        // something unexpected went wrong so the cached payloads may be corrupt
        await this.evictAll();
      }
      throw error;
    }
    yield* rows;
  }

  toString(): string {
    return `OpenmlSource(${this.datasetId})`;
  }

  private get cache(): DatasetCache {
    return this.options.cache ?? getDatasetCache();
  }

  private async load(): Promise<LabeledRow[]> {
    const description = await this.getDescription();
    if (description.status === 'deactivated') {
      throw new SourceUnavailableError(
        `Openml ${this.datasetId} has been deactivated. This is often due to flags on the data.`,
        { datasetId: this.datasetId },
      );
    }
    const plan = await this.planColumns(await this.getFeatures());
    const missing = (row: RawRow) => plan.kept.some((name) => this.valueOf(row, plan, name) === null);

    const complete = this.withoutMissing(this.readRows(description.fileId, plan), missing);
    const sampled =
      this.options.take === undefined
        ? await collect(complete)
        : await reservoirSample(complete, this.options.take, new SeededRandom(OPENML_TAKE_SEED));

    return this.encode(sampled, plan);
  }

  private async *withoutMissing(
    rows: AsyncIterable<RawRow>,
    missing: (row: RawRow) => boolean,
  ): AsyncIterable<RawRow> {
    for await (const row of rows) {
      if (!missing(row)) {
        yield row;
      }
    }
  }

  private async *readRows(fileId: string, plan: DatasetPlan): AsyncIterable<RawRow> {
    const readerOptions: IReaderOptions = {
      sourceId: this.toString(),
      strict: this.options.strict,
      onMalformedRecord: this.options.onMalformedRecord,
    };
    const csvReader = new CsvReader({
      ...readerOptions,
      hasHeader: true,
      dialect: OPENML_DIALECT,
      columnTypes: Object.fromEntries(plan.columns.map((name) => [name, 'string' as const])),
    });
    const arffReader = new ArffReader({
      ...readerOptions,
      label: null,
      nominalEncoding: 'string',
      dialect: OPENML_DIALECT,
    });

    let lines: string[];
    let reader: IRowReader;
    if (await this.cache.has(this.cacheKeys.arff)) {
      lines = await this.getLines(this.cacheKeys.arff, this.endpoints.arffEndpoint(fileId));
      reader = arffReader;
    } else {
      try {
        lines = await this.getLines(this.cacheKeys.csv, this.endpoints.csvEndpoint(fileId));
        reader = csvReader;
      } catch (error) {
        logger.warn(
          { err: error },
          `${loggerPrefix} Unable to get the csv file of openml ${this.datasetId}, trying arff`,
        );
        lines = await this.getLines(this.cacheKeys.arff, this.endpoints.arffEndpoint(fileId));
        reader = arffReader;
      }
    }
    await this.verifyChecksum(lines, reader === arffReader ? this.cacheKeys.arff : this.cacheKeys.csv);
    yield* reader.read(lines);
  }

  private valueOf(row: RawRow, plan: DatasetPlan, name: string): FeatureValue {
    const { features } = row;
    if (isDense(features)) {
      return features[plan.columns.indexOf(name)] ?? null;
    }
    if (isSparse(features)) {
      // omitted sparse values are zero
      return features[name] ?? 0;
    }
    return null;
  }

  private encode(rows: RawRow[], plan: DatasetPlan): LabeledRow[] {
    const featureNames = plan.kept.filter((name) => name !== plan.target);
    const domains = new Map<string, string[]>();
    for (const name of featureNames) {
      if (!plan.numeric.has(name) && !this.options.catAsString) {
        const values = new Set(rows.map((row) => String(this.valueOf(row, plan, name))));
        domains.set(name, [...values].sort());
      }
    }

    return rows.map((row) => {
      const features: FeatureValue[] = [];
      for (const name of featureNames) {
        const value = this.valueOf(row, plan, name);
        const domain = domains.get(name);
        if (plan.numeric.has(name)) {
          features.push(this.toNumber(value, name));
        } else if (domain) {
          features.push(...domain.map((candidate) => (candidate === String(value) ? 1 : 0)));
        } else {
          features.push(String(value));
        }
      }
      const target = this.valueOf(row, plan, plan.target);
      const label =
        this.problemType === 'regression' ? this.toNumber(target, plan.target) : String(target);
      return { features, label };
    });
  }

  private toNumber(value: FeatureValue, column: string): number {
    const number = typeof value === 'number' ? value : parseNumber(String(value));
    if (number === undefined) {
      throw new InvalidConfigurationError(`Openml ${this.datasetId} has a non numeric value`, {
        datasetId: this.datasetId,
        column,
        value,
      });
    }
    return number;
  }

  private async planColumns(features: OpenmlFeature[]): Promise<DatasetPlan> {
    const columns = features.map((feature) => stripQuotes(feature.name));
    const numeric = new Set<string>();
    const ignored = new Set<string>();
    let target = '';

    features.forEach((feature, i) => {
      const name = columns[i];
      if (
        feature.isIgnore ||
        feature.isRowIdentifier ||
        !['numeric', 'nominal'].includes(feature.dataType)
      ) {
        ignored.add(name);
      }
      if (feature.isTarget) {
        target = name;
      }
      if (feature.dataType === 'numeric') {
        numeric.add(name);
      }
    });

    const targetFits =
      target !== '' && (this.problemType === 'regression') === numeric.has(target);
    if (!targetFits) {
      target = await this.getTargetForProblemType();
    }
    ignored.delete(target);

    if (this.problemType === 'classification') {
      numeric.delete(target);
    }

    return { columns, kept: columns.filter((name) => !ignored.has(name)), numeric, target };
  }

  private async getTargetForProblemType(): Promise<string> {
    const response = await this.getJson(
      this.cacheKeys.tasks,
      this.endpoints.tasksEndpoint(this.datasetId),
    );
    const tasks = isRecord(response) && isRecord(response.tasks) ? response.tasks.task : [];
    const taskType =
      this.problemType === 'classification'
        ? OPENML_CLASSIFICATION_TASK_TYPE
        : OPENML_REGRESSION_TASK_TYPE;

    for (const task of Array.isArray(tasks) ? tasks : []) {
      if (!isRecord(task) || Number(task.task_type_id) !== taskType) {
        continue;
      }
      const inputs = Array.isArray(task.input) ? task.input : [];
      for (const input of inputs) {
        if (isRecord(input) && input.name === 'target_feature' && typeof input.value === 'string') {
          // just take the first one
          return stripQuotes(input.value);
        }
      }
    }
    throw new InvalidConfigurationError(
      `Openml ${this.datasetId} does not appear to be a ${this.problemType} dataset`,
      { datasetId: this.datasetId },
    );
  }

  private async getDescription(): Promise<{ status: string; fileId: string }> {
    const response = await this.getJson(
      this.cacheKeys.descr,
      this.endpoints.descriptionEndpoint(this.datasetId),
    );
    const description = isRecord(response) ? response.data_set_description : undefined;
    if (!isRecord(description) || description.file_id === undefined) {
      throw this.unexpectedResponse('data_set_description');
    }
    return { status: String(description.status ?? ''), fileId: String(description.file_id) };
  }

  private async getFeatures(): Promise<OpenmlFeature[]> {
    const response = await this.getJson(
      this.cacheKeys.feats,
      this.endpoints.featuresEndpoint(this.datasetId),
    );
    const dataFeatures = isRecord(response) ? response.data_features : undefined;
    const features = isRecord(dataFeatures) ? dataFeatures.feature : undefined;
    if (!Array.isArray(features)) {
      throw this.unexpectedResponse('data_features');
    }
    return features.filter(isRecord).map((feature) => ({
      name: String(feature.name),
      dataType: String(feature.data_type),
      isTarget: flag(feature.is_target),
      isIgnore: flag(feature.is_ignore),
      isRowIdentifier: flag(feature.is_row_identifier),
    }));
  }

  private async verifyChecksum(lines: string[], key: string): Promise<void> {
    const expected = this.options.md5Checksum;
    if (!expected) {
      return;
    }
    const actual = getMD5Hash(lines.map((line) => `${line}\n`).join(''));
    if (actual !== expected) {
      await this.cache.evict(key);
      throw new SourceUnavailableError(
        `The data of openml ${this.datasetId} did not match the given checksum. It may have been ` +
          'corrupted in transit; requesting it again will download it again.',
        { datasetId: this.datasetId, expected, actual },
      );
    }
  }

  private async getJson(key: string, url: URL): Promise<unknown> {
    const lines = await this.getLines(key, url);
    try {
      return JSON.parse(lines.join('\n'));
    } catch (error) {
      await this.cache.evict(key);
      throw this.unexpectedResponse(key, error instanceof Error ? error : undefined);
    }
  }

  private getLines(key: string, url: URL): Promise<string[]> {
    return this.cache.getOrFetch(key, () => this.request(url));
  }

  private async request(url: URL): Promise<string[]> {
    try {
      return await this.httpClient.getLines(url);
    } catch (error) {
      if (!(error instanceof HttpRequestError)) {
        throw error;
      }
      throw new SourceUnavailableError(
        this.describeFailure(error),
        { datasetId: this.datasetId, url: url.pathname, status: error.status },
        error,
      );
    }
  }

  private describeFailure(error: HttpRequestError): string {
    const body = error.body?.toLowerCase() ?? '';
    if (error.status === 412 && body.includes('please provide api key')) {
      return (
        'Openml has requested an API key to access its REST api. A key can be obtained by ' +
        'creating an openml account and then set as OPENML_API_KEY.'
      );
    }
    if (error.status === 412 && body.includes('authentication failed')) {
      return 'The openml API key provided is no longer valid; a new one can be generated on openml.';
    }
    if (error.status === 404) {
      return `Unable to find openml dataset ${this.datasetId}.`;
    }
    return `Unable to reach openml for dataset ${this.datasetId}: ${error.message}`;
  }

  private unexpectedResponse(what: string, cause?: Error): SourceUnavailableError {
    return new SourceUnavailableError(
      `An unexpected response was returned by openml for ${what}`,
      { datasetId: this.datasetId },
      cause,
    );
  }

  private async evictAll(): Promise<void> {
    await Promise.all(Object.values(this.cacheKeys).map((key) => this.cache.evict(key)));
  }
}

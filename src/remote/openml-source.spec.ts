import * as td from 'testdouble';

import { OPENML_DESCRIPTION, fakeOpenmlHttpClient, whenRequested } from '../../test/testHelpers';
import { InvalidConfigurationError, SourceUnavailableError } from '../errors';
import { collect } from '../util';

import OpenmlEndpoints from './api-endpoints';
import { DatasetCache } from './dataset-cache';
import { HttpRequestError, IHttpClient } from './http-client';
import { IOpenmlSourceOptions, OpenmlSource } from './openml-source';

describe('OpenmlSource', () => {
  let httpClient: IHttpClient;
  let cache: DatasetCache;

  const source = (options: IOpenmlSourceOptions = {}) =>
    new OpenmlSource(61, {
      httpClient,
      cache,
      endpoints: new OpenmlEndpoints({ baseUrl: 'http://openml.test' }),
      ...options,
    });

  beforeEach(() => {
    httpClient = fakeOpenmlHttpClient();
    cache = new DatasetCache();
  });

  afterEach(() => {
    td.reset();
  });

  it('reads complete rows with one-hot encoded nominal features', async () => {
    expect(await collect(source().read())).toEqual([
      { features: [0.5, 0, 0, 1], label: 'yes' },
      { features: [1.5, 1, 0, 0], label: 'no' },
      { features: [2, 0, 1, 0], label: 'yes' },
    ]);
  });

  it('keeps nominal features as strings when asked', async () => {
    const rows = await collect(source({ catAsString: true }).read());
    expect(rows.map((row) => row.features)).toEqual([
      [0.5, 'red'],
      [1.5, 'blue'],
      [2, 'green'],
    ]);
  });

  it('takes the regression target from the task list', async () => {
    expect(await collect(source({ problemType: 'regression' }).read())).toEqual([
      { features: [0, 0, 1, 0, 1], label: 0.5 },
      { features: [1, 0, 0, 1, 0], label: 1.5 },
      { features: [0, 1, 0, 0, 1], label: 2 },
    ]);
  });

  it('samples rows in stream order with take', async () => {
    expect(await collect(source({ take: 2 }).read())).toEqual([
      { features: [1.5, 1, 0], label: 'no' },
      { features: [2, 0, 1], label: 'yes' },
    ]);
  });

  it('falls back to the arff file when the csv file is unavailable', async () => {
    whenRequested(httpClient, '/get_csv/61').thenReject(
      new HttpRequestError('Failed to fetch data', 500),
    );
    expect(await collect(source().read())).toEqual([
      { features: [0.5, 0, 0, 1], label: 'yes' },
      { features: [1.5, 1, 0, 0], label: 'no' },
      { features: [2, 0, 1, 0], label: 'yes' },
    ]);
  });

  it('downloads each payload once', async () => {
    const openml = source();
    await collect(openml.read());
    await collect(openml.read());
    expect(td.explain(httpClient.getLines).callCount).toBe(3);
  });

  it('accepts a matching checksum', async () => {
    const rows = await collect(source({ md5Checksum: '2b792617a9e44ed5d979574d5e463a49' }).read());
    expect(rows).toHaveLength(3);
  });

  it('evicts data that does not match its checksum', async () => {
    await expect(collect(source({ md5Checksum: 'not-the-checksum' }).read())).rejects.toThrow(
      SourceUnavailableError,
    );
    expect(await cache.has('openml_000061_csv')).toBe(false);
    expect(await cache.has('openml_000061_descr')).toBe(true);
  });

  it('reports deactivated datasets as unavailable', async () => {
    whenRequested(httpClient, '/json/data/61').thenResolve([
      OPENML_DESCRIPTION.replace('"active"', '"deactivated"'),
    ]);
    await expect(collect(source().read())).rejects.toThrow(
      'Openml 61 has been deactivated. This is often due to flags on the data.',
    );
  });

  it('explains missing datasets and api keys', async () => {
    whenRequested(httpClient, '/json/data/61').thenReject(
      new HttpRequestError('Failed to fetch data', 404),
    );
    await expect(collect(source().read())).rejects.toThrow('Unable to find openml dataset 61.');

    whenRequested(httpClient, '/json/data/61').thenReject(
      new HttpRequestError('Failed to fetch data', 412, undefined, 'Please provide API key'),
    );
    await expect(collect(source().read())).rejects.toThrow(
      'Openml has requested an API key to access its REST api.',
    );
  });

  it('rejects datasets without a target for the problem type', async () => {
    whenRequested(httpClient, '/json/task/list/data_id/61').thenResolve(['{"tasks":{"task":[]}}']);
    await expect(collect(source({ problemType: 'regression' }).read())).rejects.toThrow(
      InvalidConfigurationError,
    );
  });

  it('evicts every payload after an unexpected failure', async () => {
    whenRequested(httpClient, '/json/data/features/61').thenReject(new Error('socket hang up'));
    await expect(collect(source().read())).rejects.toThrow('socket hang up');
    expect(await cache.has('openml_000061_descr')).toBe(false);
  });

  it('validates its options', () => {
    expect(() => new OpenmlSource(0)).toThrow(InvalidConfigurationError);
    expect(() => source({ take: -1 })).toThrow(InvalidConfigurationError);
  });

  it('describes itself in params', () => {
    expect(source({ take: 2 }).params).toEqual({
      openml: 61,
      catAsString: false,
      problemType: 'classification',
      openmlTake: 2,
    });
  });
});

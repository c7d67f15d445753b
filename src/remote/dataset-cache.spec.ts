import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';

import { InvalidConfigurationError } from '../errors';

import { DatasetCache, DiskCacher, MemoryCacher, getDatasetCache, setDatasetCache } from './dataset-cache';

describe('DiskCacher', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'environments-cache-'));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('stores lines as a gzip file per key', async () => {
    const cacher = new DiskCacher(directory);
    await cacher.put('openml_000061_csv', ['a,b', '1,2']);

    expect(await cacher.has('openml_000061_csv')).toBe(true);
    expect(await cacher.get('openml_000061_csv')).toEqual(['a,b', '1,2']);
    expect(await fs.readdir(directory)).toEqual(['openml_000061_csv.gz']);
  });

  it('forgets removed keys', async () => {
    const cacher = new DiskCacher(directory);
    await cacher.put('key', ['x']);
    await cacher.remove('key');

    expect(await cacher.has('key')).toBe(false);
    expect(await cacher.get('key')).toBeUndefined();
  });

  it('refuses keys that are not plain file names', async () => {
    await expect(new DiskCacher(directory).put('../escape', ['x'])).rejects.toThrow(
      InvalidConfigurationError,
    );
  });
});

describe('DatasetCache', () => {
  it('fetches a key once for concurrent callers', async () => {
    const cache = new DatasetCache();
    const fetcher = jest.fn().mockResolvedValue(['payload']);

    const results = await Promise.all([
      cache.getOrFetch('key', fetcher),
      cache.getOrFetch('key', fetcher),
    ]);

    expect(results).toEqual([['payload'], ['payload']]);
    expect(fetcher).toHaveBeenCalledTimes(1);
  });

  it('forgets failed fetches so they can be retried', async () => {
    const cache = new DatasetCache();
    const fetcher = jest
      .fn()
      .mockRejectedValueOnce(new Error('connection reset'))
      .mockResolvedValueOnce(['payload']);

    await expect(cache.getOrFetch('key', fetcher)).rejects.toThrow('connection reset');
    expect(await cache.getOrFetch('key', fetcher)).toEqual(['payload']);
    expect(fetcher).toHaveBeenCalledTimes(2);
  });

  it('serves persisted payloads without fetching', async () => {
    const store = new MemoryCacher();
    await store.put('key', ['stored']);
    const fetcher = jest.fn();

    expect(await new DatasetCache(store).getOrFetch('key', fetcher)).toEqual(['stored']);
    expect(fetcher).not.toHaveBeenCalled();
  });

  it('persists fetched payloads and evicts them on request', async () => {
    const store = new MemoryCacher();
    const cache = new DatasetCache(store);
    await cache.getOrFetch('key', async () => ['fresh']);

    expect(await store.get('key')).toEqual(['fresh']);
    await cache.evict('key');
    expect(await cache.has('key')).toBe(false);
  });
});

describe('getDatasetCache', () => {
  it('returns the cache that was set', () => {
    const cache = new DatasetCache();
    setDatasetCache(cache);
    expect(getDatasetCache()).toBe(cache);
  });
});

import { promises as fs } from 'fs';
import * as path from 'path';
import { promisify } from 'util';
import { gunzip, gzip } from 'zlib';

import { logger, loggerPrefix } from '../application-logger';
import { loadConfig } from '../config';
import { InvalidConfigurationError } from '../errors';

import { splitLines } from './http-client';

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

/**
 * Storage for fetched dataset payloads, one list of text lines per key.
 *
 * - MemoryCacher: lives as long as the process
 * - DiskCacher: gzip files in a directory, shared between processes and runs
 */
export interface ICacher {
  has(key: string): Promise<boolean>;
  get(key: string): Promise<string[] | undefined>;
  put(key: string, lines: string[]): Promise<void>;
  remove(key: string): Promise<void>;
}

export class MemoryCacher implements ICacher {
  private readonly store = new Map<string, string[]>();

  async has(key: string): Promise<boolean> {
    return this.store.has(key);
  }

  async get(key: string): Promise<string[] | undefined> {
    return this.store.get(key);
  }

  async put(key: string, lines: string[]): Promise<void> {
    this.store.set(key, [...lines]);
  }

  async remove(key: string): Promise<void> {
    this.store.delete(key);
  }
}

export class DiskCacher implements ICacher {
  constructor(private readonly directory: string) {}

  async has(key: string): Promise<boolean> {
    try {
      await fs.access(this.cachePath(key));
      return true;
    } catch {
      return false;
    }
  }

  async get(key: string): Promise<string[] | undefined> {
    if (!(await this.has(key))) {
      return undefined;
    }
    const compressed = await fs.readFile(this.cachePath(key));
    const text = (await gunzipAsync(compressed)).toString('utf-8');
    return splitLines(text);
  }

  async put(key: string, lines: string[]): Promise<void> {
    const cachePath = this.cachePath(key);
    await fs.mkdir(this.directory, { recursive: true });
    try {
      await fs.writeFile(cachePath, await gzipAsync(lines.map((line) => `${line}\n`).join('')));
    } catch (error) {
      // never leave a partial file behind
      await fs.rm(cachePath, { force: true });
      throw error;
    }
  }

  async remove(key: string): Promise<void> {
    await fs.rm(this.cachePath(key), { force: true });
  }

  private cachePath(key: string): string {
    if (!/^[\w .-]+$/.test(key)) {
      throw new InvalidConfigurationError(`"${key}" cannot be used as a cache file name`, { key });
    }
    return path.join(this.directory, `${key}.gz`);
  }
}

/**
 * Fetch-once cache of dataset payloads keyed by dataset identifier.
 *
 * Concurrent requests for a key share one in-flight fetch; there is no lock held across
 * different keys. A failed fetch is forgotten so a later request can try again.
 */
export class DatasetCache {
  private readonly servingStore = new Map<string, Promise<string[]>>();

  constructor(private readonly persistentStore: ICacher | null = null) {}

  async has(key: string): Promise<boolean> {
    return this.servingStore.has(key) || ((await this.persistentStore?.has(key)) ?? false);
  }

  getOrFetch(key: string, fetcher: () => Promise<string[]>): Promise<string[]> {
    const existing = this.servingStore.get(key);
    if (existing) {
      logger.debug(`${loggerPrefix} Serving ${key} from memory`);
      return existing;
    }
    const pending = this.load(key, fetcher);
    this.servingStore.set(key, pending);
    return pending;
  }

  async evict(key: string): Promise<void> {
    this.servingStore.delete(key);
    await this.persistentStore?.remove(key);
  }

  private async load(key: string, fetcher: () => Promise<string[]>): Promise<string[]> {
    try {
      const persisted = await this.persistentStore?.get(key);
      if (persisted) {
        logger.debug(`${loggerPrefix} Serving ${key} from the persistent cache`);
        return persisted;
      }
      logger.info(`${loggerPrefix} Fetching ${key}`);
      const lines = await fetcher();
      await this.persistentStore?.put(key, lines);
      return lines;
    } catch (error) {
      this.servingStore.delete(key);
      throw error;
    }
  }
}

let datasetCache: DatasetCache | undefined;

/** The process-wide cache, created from the environment's configuration on first use. */
export function getDatasetCache(): DatasetCache {
  if (!datasetCache) {
    const { cacheDirectory } = loadConfig();
    datasetCache = new DatasetCache(cacheDirectory ? new DiskCacher(cacheDirectory) : null);
  }
  return datasetCache;
}

export function setDatasetCache(cache: DatasetCache): void {
  datasetCache = cache;
}

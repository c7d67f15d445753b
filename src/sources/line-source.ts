import { createReadStream, promises as fs } from 'fs';
import { createInterface } from 'readline';
import { Readable } from 'stream';
import { createGunzip } from 'zlib';

import { InvalidConfigurationError, SourceUnavailableError } from '../errors';
import FetchHttpClient, { HttpRequestError, IHttpClient, splitLines } from '../remote/http-client';

/** A re-readable stream of text lines; each `read()` starts again from the first line. */
export interface ILineSource {
  readonly id: string;
  read(): AsyncIterable<string>;
}

export class ListSource implements ILineSource {
  private readonly lines: readonly string[];

  constructor(lines: readonly string[] | string, readonly id = 'memory') {
    this.lines = typeof lines === 'string' ? splitLines(lines) : lines;
  }

  async *read(): AsyncIterable<string> {
    yield* this.lines;
  }
}

/** Reads a file line by line; files ending in `.gz` are decompressed on the fly. */
export class DiskSource implements ILineSource {
  readonly id: string;

  constructor(private readonly filename: string) {
    this.id = filename;
  }

  async *read(): AsyncIterable<string> {
    try {
      await fs.access(this.filename);
    } catch (error) {
      throw new SourceUnavailableError(
        `Unable to read ${this.filename}`,
        { sourceId: this.id },
        error instanceof Error ? error : undefined,
      );
    }

    const stream = createReadStream(this.filename);
    const input: Readable = this.filename.endsWith('.gz') ? stream.pipe(createGunzip()) : stream;
    const lines = createInterface({ input, crlfDelay: Infinity });
    try {
      for await (const line of lines) {
        yield line;
      }
    } finally {
      // runs when the consumer stops pulling early as well
      lines.close();
      stream.destroy();
    }
  }
}

export class HttpSource implements ILineSource {
  constructor(
    readonly id: string,
    private readonly httpClient: IHttpClient = new FetchHttpClient(),
  ) {}

  async *read(): AsyncIterable<string> {
    let lines: string[];
    try {
      lines = await this.httpClient.getLines(new URL(this.id));
    } catch (error) {
      if (error instanceof HttpRequestError) {
        throw new SourceUnavailableError(
          `Unable to fetch ${this.id}: ${error.message}`,
          { sourceId: this.id, status: error.status },
          error,
        );
      }
      throw error;
    }
    yield* lines;
  }
}

/** Picks a disk or http source from the url's scheme. */
export class UrlSource implements ILineSource {
  private readonly source: ILineSource;

  constructor(readonly id: string, httpClient?: IHttpClient) {
    if (id.startsWith('http://') || id.startsWith('https://')) {
      this.source = new HttpSource(id, httpClient);
    } else if (id.startsWith('file://')) {
      this.source = new DiskSource(id.slice('file://'.length));
    } else if (!id.includes('://')) {
      this.source = new DiskSource(id);
    } else {
      throw new InvalidConfigurationError(
        'Unrecognized scheme, supported schemes are: http, https or file.',
        { url: id },
      );
    }
  }

  read(): AsyncIterable<string> {
    return this.source.read();
  }
}

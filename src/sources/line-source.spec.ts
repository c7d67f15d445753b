import * as td from 'testdouble';

import { InvalidConfigurationError, SourceUnavailableError } from '../errors';
import { HttpRequestError, IHttpClient } from '../remote/http-client';
import { collect } from '../util';

import { DiskSource, HttpSource, ListSource, UrlSource } from './line-source';

const WEATHER_LINES = [
  'temperature,humidity,outlook,play',
  '21.5,0.8,sunny,no',
  '18,0.65,rainy,yes',
  '"25.25",0.4,"overcast",yes',
];

describe('ListSource', () => {
  it('splits text into lines', async () => {
    expect(await collect(new ListSource('a\r\nb\n').read())).toEqual(['a', 'b']);
  });

  it('can be read more than once', async () => {
    const source = new ListSource(['x', 'y']);
    expect(await collect(source.read())).toEqual(await collect(source.read()));
  });
});

describe('DiskSource', () => {
  it('reads a file line by line', async () => {
    expect(await collect(new DiskSource('./test/data/weather.csv').read())).toEqual(WEATHER_LINES);
  });

  it('decompresses gzip files', async () => {
    expect(await collect(new DiskSource('./test/data/weather.csv.gz').read())).toEqual(WEATHER_LINES);
  });

  it('stops reading when the consumer stops', async () => {
    const lines: string[] = [];
    for await (const line of new DiskSource('./test/data/weather.csv').read()) {
      lines.push(line);
      break;
    }
    expect(lines).toEqual([WEATHER_LINES[0]]);
  });

  it('reports a missing file as unavailable', async () => {
    await expect(collect(new DiskSource('./test/data/missing.csv').read())).rejects.toThrow(
      SourceUnavailableError,
    );
  });
});

describe('HttpSource', () => {
  it('reads the lines of a response', async () => {
    const httpClient = td.object<IHttpClient>();
    td.when(httpClient.getLines(td.matchers.anything())).thenResolve(['a', 'b']);
    expect(await collect(new HttpSource('https://data.example.com/a.csv', httpClient).read())).toEqual([
      'a',
      'b',
    ]);
  });

  it('reports failed requests as unavailable', async () => {
    const httpClient = td.object<IHttpClient>();
    td.when(httpClient.getLines(td.matchers.anything())).thenReject(
      new HttpRequestError('Failed to fetch data', 503),
    );
    const source = new HttpSource('https://data.example.com/a.csv', httpClient);
    await expect(collect(source.read())).rejects.toThrow(
      'Unable to fetch https://data.example.com/a.csv: Failed to fetch data',
    );
  });
});

describe('UrlSource', () => {
  it('reads file urls from disk', async () => {
    expect(await collect(new UrlSource('file://./test/data/weather.csv').read())).toEqual(WEATHER_LINES);
  });

  it('fetches http urls', async () => {
    const httpClient = td.object<IHttpClient>();
    td.when(httpClient.getLines(new URL('http://data.example.com/b.csv'))).thenResolve(['1']);
    expect(await collect(new UrlSource('http://data.example.com/b.csv', httpClient).read())).toEqual([
      '1',
    ]);
  });

  it('rejects other schemes', () => {
    expect(() => new UrlSource('ftp://data.example.com/c.csv')).toThrow(InvalidConfigurationError);
  });
});

import { MalformedRecordError } from '../errors';
import { Label, LabelValue, RawRow } from '../types';

import { parseLabel, parseNumber } from './encoding';
import { IReaderOptions, IRowReader, Lines, reportMalformedRecord } from './reader-options';

function parseFeatures(tokens: string[]): Record<string, number> {
  const features: Record<string, number> = {};
  for (const token of tokens) {
    const separator = token.indexOf(':');
    const key = token.slice(0, separator);
    const value = parseNumber(token.slice(separator + 1));
    if (separator <= 0 || value === undefined) {
      throw new Error(`"${token}" is not an index:value pair`);
    }
    features[key] = value;
  }
  return features;
}

function parseLabels(token: string): LabelValue[] {
  return token
    .split(',')
    .filter((label) => label.length)
    .map(parseLabel);
}

/**
 * Reads the sparse LIBSVM/SVMLight format: `label[,label...] index:value ...`.
 *
 * A comma in the label token makes the row multi-label; a row that starts with a feature has
 * an empty label set.
 */
export class LibSvmReader implements IRowReader {
  constructor(protected readonly options: IReaderOptions = {}) {}

  async *read(lines: Lines): AsyncIterable<RawRow> {
    let rowIndex = 0;
    for await (const line of lines) {
      if (!line.trim()) {
        continue;
      }
      const row = this.parseRow(rowIndex++, line, false);
      if (row) {
        yield row;
      }
    }
  }

  protected parseRow(index: number, line: string, multiLabel: boolean): RawRow | undefined {
    const tokens = line.trim().split(/\s+/);
    try {
      const hasLabel = !tokens[0].includes(':');
      const labels = hasLabel ? parseLabels(tokens[0]) : [];
      const features = parseFeatures(hasLabel ? tokens.slice(1) : tokens);
      const label: Label = multiLabel || labels.length !== 1 ? labels : labels[0];
      return { index, features, label };
    } catch (error) {
      if (!(error instanceof Error)) {
        throw error;
      }
      reportMalformedRecord(
        new MalformedRecordError(
          error.message,
          { sourceId: this.options.sourceId ?? 'libsvm', rowIndex: index, value: line },
          error,
        ),
        this.options,
      );
      return undefined;
    }
  }
}

/**
 * Reads the extreme multi-label repository variant of LIBSVM: a `rows features labels` header
 * line followed by LIBSVM rows whose labels are always a set.
 */
export class ManikReader extends LibSvmReader {
  async *read(lines: Lines): AsyncIterable<RawRow> {
    let header = true;
    let rowIndex = 0;
    for await (const line of lines) {
      if (!line.trim()) {
        continue;
      }
      if (header) {
        this.checkHeader(line);
        header = false;
        continue;
      }
      const row = this.parseRow(rowIndex++, line, true);
      if (row) {
        yield row;
      }
    }
  }

  private checkHeader(line: string): void {
    const counts = line.trim().split(/\s+/).map(Number);
    if (counts.length !== 3 || !counts.every((count) => Number.isInteger(count) && count >= 0)) {
      throw new MalformedRecordError('Expected a "rows features labels" header', {
        sourceId: this.options.sourceId ?? 'manik',
        rowIndex: 0,
        value: line,
      });
    }
  }
}

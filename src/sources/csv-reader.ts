import { InvalidConfigurationError, MalformedRecordError } from '../errors';
import { FeatureValue, Label, RawRow } from '../types';

import { ColumnType, NominalEncoding, encodeValue, isMissing, parseLabel } from './encoding';
import { IReaderOptions, IRowReader, Lines, reportMalformedRecord } from './reader-options';

export interface CsvDialect {
  delimiter: string;
  quote: string;
  // escapes the next character; empty disables escaping
  escape: string;
  // a doubled quote inside a quoted field is a literal quote
  doubleQuote: boolean;
}

export const DEFAULT_CSV_DIALECT: CsvDialect = {
  delimiter: ',',
  quote: '"',
  escape: '',
  doubleQuote: true,
};

export interface ICsvReaderOptions extends IReaderOptions {
  hasHeader?: boolean;
  // header name or column index of the label
  label?: string | number;
  // keyed by header name or column index; undeclared columns are inferred cell by cell
  columnTypes?: Record<string, ColumnType>;
  nominalEncoding?: NominalEncoding;
  dialect?: Partial<CsvDialect>;
}

interface TokenizedLine {
  fields: string[];
  // false while a quoted field is still open at the end of the line
  complete: boolean;
}

export function tokenizeCsvLine(line: string, dialect: CsvDialect): TokenizedLine {
  const fields: string[] = [];
  let field = '';
  let quoted = false;
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (dialect.escape && char === dialect.escape && i + 1 < line.length) {
      field += line[++i];
      continue;
    }
    if (inQuotes) {
      if (char === dialect.quote) {
        if (dialect.doubleQuote && line[i + 1] === dialect.quote) {
          field += dialect.quote;
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }
    if (char === dialect.quote && !field.trim()) {
      field = '';
      inQuotes = true;
      quoted = true;
    } else if (char === dialect.delimiter) {
      fields.push(quoted ? field : field.trim());
      field = '';
      quoted = false;
    } else {
      field += char;
    }
  }

  if (inQuotes) {
    return { fields, complete: false };
  }
  fields.push(quoted ? field : field.trim());
  return { fields, complete: true };
}

/** Reads delimited text into dense rows. */
export class CsvReader implements IRowReader {
  private readonly dialect: CsvDialect;

  constructor(private readonly options: ICsvReaderOptions = {}) {
    this.dialect = { ...DEFAULT_CSV_DIALECT, ...options.dialect };
  }

  async *read(lines: Lines): AsyncIterable<RawRow> {
    const sourceId = this.options.sourceId ?? 'csv';
    let headers: string[] | undefined;
    let pending: string | undefined;
    let rowIndex = 0;

    for await (const line of lines) {
      const text = pending === undefined ? line : `${pending}\n${line}`;
      if (pending === undefined && !text.trim()) {
        continue;
      }
      const { fields, complete } = tokenizeCsvLine(text, this.dialect);
      if (!complete) {
        pending = text;
        continue;
      }
      pending = undefined;

      if (this.options.hasHeader && headers === undefined) {
        headers = fields;
        continue;
      }

      const index = rowIndex++;
      let row: RawRow;
      try {
        row = this.toRow(index, fields, headers);
      } catch (error) {
        if (!(error instanceof Error) || error instanceof InvalidConfigurationError) {
          throw error;
        }
        const malformed =
          error instanceof MalformedRecordError
            ? error
            : new MalformedRecordError(error.message, { sourceId, rowIndex: index, value: text }, error);
        reportMalformedRecord(malformed, this.options);
        continue;
      }
      yield row;
    }

    if (pending !== undefined) {
      reportMalformedRecord(
        new MalformedRecordError('Unterminated quoted field', {
          sourceId,
          rowIndex,
          value: pending,
        }),
        this.options,
      );
    }
  }

  private toRow(index: number, fields: string[], headers: string[] | undefined): RawRow {
    if (headers && fields.length !== headers.length) {
      throw new Error(`Expected ${headers.length} fields but found ${fields.length}`);
    }
    const labelIndex = this.labelIndex(headers);
    const encoding = this.options.nominalEncoding ?? 'onehot';
    const features: FeatureValue[] = [];
    let label: Label | undefined;

    fields.forEach((text, column) => {
      const type = this.columnType(column, headers);
      if (column === labelIndex) {
        label = this.toLabel(text, type);
        return;
      }
      features.push(...encodeValue(text, type, encoding));
    });

    if (labelIndex !== undefined && labelIndex >= fields.length) {
      throw new Error(`Expected a label in column ${labelIndex} but found ${fields.length} fields`);
    }

    return label === undefined ? { index, features } : { index, features, label };
  }

  private toLabel(text: string, type: ColumnType | undefined): Label {
    if (isMissing(text)) {
      throw new Error('The label is missing');
    }
    const trimmed = text.trim();
    if (typeof type === 'object' && !type.nominal.includes(trimmed)) {
      throw new Error(`"${text}" is not one of the declared values {${type.nominal.join(',')}}`);
    }
    if (type !== undefined && type !== 'numeric') {
      // nominal labels stay as their value; turning them into actions is the simulation's job
      return trimmed;
    }
    const label = parseLabel(text);
    if (type === 'numeric' && typeof label !== 'number') {
      throw new Error(`"${text}" is not a number`);
    }
    return label;
  }

  private labelIndex(headers: string[] | undefined): number | undefined {
    const { label } = this.options;
    if (label === undefined || typeof label === 'number') {
      return label;
    }
    const index = headers?.indexOf(label) ?? -1;
    if (index === -1) {
      throw new InvalidConfigurationError(`Label column "${label}" is not in the header`, {
        sourceId: this.options.sourceId,
        headers,
      });
    }
    return index;
  }

  private columnType(column: number, headers: string[] | undefined): ColumnType | undefined {
    const types = this.options.columnTypes;
    if (!types) {
      return undefined;
    }
    const header = headers?.[column];
    return (header !== undefined ? types[header] : undefined) ?? types[String(column)];
  }
}

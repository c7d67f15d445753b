import { InvalidConfigurationError, MalformedRecordError } from '../errors';
import { FeatureValue, Label, LabelValue, RawRow } from '../types';

import { CsvDialect, tokenizeCsvLine } from './csv-reader';
import { ColumnType, NominalEncoding, encodeValue, isMissing, parseLabel } from './encoding';
import { IReaderOptions, IRowReader, Lines, reportMalformedRecord } from './reader-options';

export interface IArffReaderOptions extends IReaderOptions {
  // attribute holding the label; defaults to the last attribute, `null` reads every attribute as a feature
  label?: string | null;
  nominalEncoding?: NominalEncoding;
  dialect?: Partial<Pick<CsvDialect, 'quote' | 'escape'>>;
}

interface ArffAttribute {
  name: string;
  type: ColumnType;
}

const ATTRIBUTE_PATTERN = /^@attribute\s+('(?:[^'\\]|\\.)*'|"(?:[^"\\]|\\.)*"|\S+)\s+(.+)$/i;

function unquote(text: string): string {
  const trimmed = text.trim();
  const first = trimmed[0];
  if ((first === "'" || first === '"') && trimmed.endsWith(first) && trimmed.length > 1) {
    return trimmed.slice(1, -1).replace(/\\(.)/g, '$1');
  }
  return trimmed;
}

/**
 * Reads attribute-typed ARFF data, both dense rows and sparse `{index value, ...}` rows.
 *
 * Sparse rows are keyed by the position their features have in a dense row, so a file that
 * mixes both kinds describes the same features either way.
 */
export class ArffReader implements IRowReader {
  private readonly dialect: CsvDialect;

  constructor(private readonly options: IArffReaderOptions = {}) {
    this.dialect = {
      delimiter: ',',
      quote: options.dialect?.quote ?? "'",
      escape: options.dialect?.escape ?? '\\',
      doubleQuote: false,
    };
  }

  async *read(lines: Lines): AsyncIterable<RawRow> {
    const sourceId = this.options.sourceId ?? 'arff';
    const attributes: ArffAttribute[] = [];
    let inData = false;
    let lineNumber = 0;
    let rowIndex = 0;
    let labelIndex = -1;
    let offsets: number[] = [];

    for await (const line of lines) {
      lineNumber++;
      const text = line.trim();
      if (!text || text.startsWith('%')) {
        continue;
      }

      if (!inData) {
        const lower = text.toLowerCase();
        if (lower.startsWith('@relation')) {
          continue;
        }
        if (lower.startsWith('@attribute')) {
          attributes.push(this.parseAttribute(text, sourceId, lineNumber));
          continue;
        }
        if (lower.startsWith('@data')) {
          if (!attributes.length) {
            throw new MalformedRecordError('ARFF data section has no attributes declared', {
              sourceId,
              rowIndex: lineNumber,
              value: text,
            });
          }
          labelIndex = this.labelIndex(attributes, sourceId);
          offsets = this.featureOffsets(attributes, labelIndex);
          inData = true;
          continue;
        }
        throw new MalformedRecordError('Unreadable ARFF header line', {
          sourceId,
          rowIndex: lineNumber,
          value: text,
        });
      }

      const index = rowIndex++;
      let row: RawRow;
      try {
        row = text.startsWith('{')
          ? this.sparseRow(index, text, attributes, labelIndex, offsets)
          : this.denseRow(index, text, attributes, labelIndex);
      } catch (error) {
        if (!(error instanceof Error)) {
          throw error;
        }
        reportMalformedRecord(
          new MalformedRecordError(error.message, { sourceId, rowIndex: index, value: text }, error),
          this.options,
        );
        continue;
      }
      yield row;
    }
  }

  private parseAttribute(text: string, sourceId: string, lineNumber: number): ArffAttribute {
    const match = ATTRIBUTE_PATTERN.exec(text);
    const malformed = () =>
      new MalformedRecordError('Unreadable ARFF attribute declaration', {
        sourceId,
        rowIndex: lineNumber,
        value: text,
      });
    if (!match) {
      throw malformed();
    }
    const name = unquote(match[1]);
    const declaredType = match[2].trim();

    if (declaredType.startsWith('{')) {
      if (!declaredType.endsWith('}')) {
        throw malformed();
      }
      const { fields } = tokenizeCsvLine(declaredType.slice(1, -1), this.dialect);
      return { name, type: { nominal: fields.map(unquote) } };
    }

    const keyword = declaredType.split(/\s+/)[0].toLowerCase();
    if (['numeric', 'real', 'integer'].includes(keyword)) {
      return { name, type: 'numeric' };
    }
    if (['string', 'date'].includes(keyword)) {
      return { name, type: 'string' };
    }
    throw malformed();
  }

  private labelIndex(attributes: ArffAttribute[], sourceId: string): number {
    if (this.options.label === null) {
      return -1;
    }
    if (this.options.label === undefined) {
      return attributes.length - 1;
    }
    const index = attributes.findIndex((attribute) => attribute.name === this.options.label);
    if (index === -1) {
      throw new InvalidConfigurationError(`Label attribute "${this.options.label}" is not declared`, {
        sourceId,
      });
    }
    return index;
  }

  // where each attribute's features start in a dense row; the label has none
  private featureOffsets(attributes: readonly ArffAttribute[], labelIndex: number): number[] {
    const encoding = this.options.nominalEncoding ?? 'onehot';
    let offset = 0;
    return attributes.map(({ type }, column) => {
      if (column === labelIndex) {
        return -1;
      }
      const start = offset;
      offset += typeof type === 'object' && encoding === 'onehot' ? type.nominal.length : 1;
      return start;
    });
  }

  private denseRow(
    index: number,
    text: string,
    attributes: ArffAttribute[],
    labelIndex: number,
  ): RawRow {
    const { fields } = tokenizeCsvLine(text, this.dialect);
    if (fields.length !== attributes.length) {
      throw new Error(`Expected ${attributes.length} values but found ${fields.length}`);
    }
    const encoding = this.options.nominalEncoding ?? 'onehot';
    const features: FeatureValue[] = [];
    let label: Label | undefined;
    fields.forEach((field, column) => {
      const { type } = attributes[column];
      if (column === labelIndex) {
        label = this.toLabel(field, type);
      } else {
        features.push(...encodeValue(field, type, encoding));
      }
    });
    return label === undefined ? { index, features } : { index, features, label };
  }

  private sparseRow(
    index: number,
    text: string,
    attributes: ArffAttribute[],
    labelIndex: number,
    offsets: readonly number[],
  ): RawRow {
    if (!text.endsWith('}')) {
      throw new Error('Sparse row is missing its closing brace');
    }
    const encoding = this.options.nominalEncoding ?? 'onehot';
    const features: Record<string, FeatureValue> = {};
    const { fields } = tokenizeCsvLine(text.slice(1, -1), this.dialect);
    let label: Label | undefined;

    for (const field of fields) {
      if (!field) {
        continue;
      }
      const separator = field.search(/\s/);
      const column = Number(field.slice(0, separator));
      const attribute = attributes[column];
      if (separator === -1 || !Number.isInteger(column) || !attribute) {
        throw new Error(`"${field}" is not a valid sparse entry`);
      }
      const value = unquote(field.slice(separator + 1));
      if (column === labelIndex) {
        label = this.toLabel(value, attribute.type);
        continue;
      }
      encodeValue(value, attribute.type, encoding).forEach((feature, i) => {
        if (feature !== 0) {
          features[String(offsets[column] + i)] = feature;
        }
      });
    }

    if (label === undefined && labelIndex >= 0) {
      // an omitted sparse value is the attribute's zero: its first nominal value or 0
      const { type } = attributes[labelIndex];
      label = typeof type === 'object' ? type.nominal[0] : 0;
    }
    return label === undefined ? { index, features } : { index, features, label };
  }

  private toLabel(text: string, type: ColumnType): LabelValue {
    if (isMissing(text)) {
      throw new Error('The label is missing');
    }
    const trimmed = unquote(text);
    if (typeof type === 'object') {
      if (!type.nominal.includes(trimmed)) {
        throw new Error(`"${trimmed}" is not one of the declared values {${type.nominal.join(',')}}`);
      }
      return trimmed;
    }
    if (type === 'string') {
      return trimmed;
    }
    const label = parseLabel(trimmed);
    if (typeof label !== 'number') {
      throw new Error(`"${trimmed}" is not a number`);
    }
    return label;
  }
}

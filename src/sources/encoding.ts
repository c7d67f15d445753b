import { MISSING_VALUE_TOKENS } from '../constants';
import { FeatureValue, LabelValue } from '../types';

export type ColumnType = 'numeric' | 'string' | { nominal: readonly string[] };

/**
 * How a nominal column becomes features: `onehot` expands it into one 0/1 feature per value,
 * `index` replaces it by the value's position, `string` keeps the value.
 */
export type NominalEncoding = 'onehot' | 'index' | 'string';

export function isMissing(text: string): boolean {
  return MISSING_VALUE_TOKENS.includes(text.trim());
}

export function parseNumber(text: string): number | undefined {
  const trimmed = text.trim();
  if (!trimmed.length) {
    return undefined;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

export function parseLabel(text: string): LabelValue {
  return parseNumber(text) ?? text.trim();
}

/**
 * Encode one cell. Throws when the cell does not fit the declared column type; readers turn
 * that into a malformed record.
 */
export function encodeValue(
  text: string,
  type: ColumnType | undefined,
  encoding: NominalEncoding,
): FeatureValue[] {
  if (type !== undefined && typeof type === 'object') {
    return encodeNominal(text, type.nominal, encoding);
  }
  if (isMissing(text)) {
    return [null];
  }
  if (type === 'string') {
    return [text];
  }
  const value = parseNumber(text);
  if (value !== undefined) {
    return [value];
  }
  if (type === 'numeric') {
    throw new Error(`"${text}" is not a number`);
  }
  return [text];
}

function encodeNominal(
  text: string,
  values: readonly string[],
  encoding: NominalEncoding,
): FeatureValue[] {
  if (isMissing(text)) {
    return encoding === 'onehot' ? values.map(() => null) : [null];
  }
  const trimmed = text.trim();
  const index = values.indexOf(trimmed);
  if (index === -1) {
    throw new Error(`"${text}" is not one of the declared values {${values.join(',')}}`);
  }
  switch (encoding) {
    case 'onehot':
      return values.map((_, i) => (i === index ? 1 : 0));
    case 'index':
      return [index];
    case 'string':
      return [trimmed];
  }
}

/** A single feature value; `null` marks a missing value. */
export type FeatureValue = number | string | null;
export type DenseContext = readonly FeatureValue[];
/** Sparse features: absent keys are zero. */
export type SparseContext = Readonly<Record<string, FeatureValue>>;
/** `null` is the context of a multi-armed (context free) problem. */
export type Context = DenseContext | SparseContext | null;
export type Action = string | number | DenseContext | SparseContext;
export type LabelValue = string | number;
/** An array label is a multi-label observation. */
export type Label = LabelValue | readonly LabelValue[];
export type Params = Record<string, unknown>;
export type ProblemType = 'classification' | 'regression';

/** Intermediate output of a source reader. */
export interface RawRow {
  index: number;
  features: Context;
  label?: Label;
}

/** A labeled observation ready to be turned into an interaction. */
export interface LabeledRow {
  features: Context;
  label: Label;
}

export function isDense(features: Context | Action): features is DenseContext {
  return Array.isArray(features);
}

export function isSparse(features: Context | Action): features is SparseContext {
  return typeof features === 'object' && features !== null && !Array.isArray(features);
}

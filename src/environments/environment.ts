import { Interaction } from '../interactions';
import { Params } from '../types';

/**
 * A re-enterable specification of an interaction sequence.
 *
 * Every call to `read()` starts a fresh, independent iteration; reading the same environment
 * twice gives the same interactions in the same order.
 */
export interface IEnvironment<I extends Interaction = Interaction> {
  // describes the environment; experiment harnesses use these as result columns
  readonly params: Params;
  read(): AsyncIterable<I>;
}

/** An environment, or a factory for one whose failure should only cost that environment. */
export type EnvironmentSpec = IEnvironment | (() => IEnvironment);

export function describeEnvironment(name: string, params: Params): string {
  const entries = Object.entries(params)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'object' ? JSON.stringify(value) : String(value)}`);
  return `${name}(${entries.join(',')})`;
}

import { logger, loggerPrefix } from '../application-logger';
import { IEnvironment, describeEnvironment } from '../environments/environment';
import { Interaction } from '../interactions';
import { Params } from '../types';

/**
 * A transformation of an interaction sequence.
 *
 * Filters are immutable once built. `filter` is called once per read of the environment it is
 * attached to, so any random state has to be created inside it.
 */
export interface IEnvironmentFilter {
  readonly params: Params;
  filter(interactions: AsyncIterable<Interaction>): AsyncIterable<Interaction>;
}

/** One filter, or alternatives of which every environment gets each in turn. */
export type FilterStage = IEnvironmentFilter | readonly IEnvironmentFilter[];

/** An environment with a filter attached; the filter's params override the environment's. */
export class FilteredEnvironment implements IEnvironment {
  constructor(
    readonly environment: IEnvironment,
    readonly environmentFilter: IEnvironmentFilter,
  ) {}

  get params(): Params {
    return { ...this.environment.params, ...this.environmentFilter.params };
  }

  read(): AsyncIterable<Interaction> {
    return this.environmentFilter.filter(this.environment.read());
  }

  toString(): string {
    return `${String(this.environment)} | ${describeEnvironment(
      this.environmentFilter.constructor.name,
      this.environmentFilter.params,
    )}`;
  }
}

/** Attaches `filters` to `environment` in order; the first filter sees the raw interactions. */
export function applyFilters(
  environment: IEnvironment,
  filters: readonly IEnvironmentFilter[],
): IEnvironment {
  return filters.reduce<IEnvironment>(
    (filtered, environmentFilter) => new FilteredEnvironment(filtered, environmentFilter),
    environment,
  );
}

export function warnUnseeded(filterName: string): void {
  logger.warn(
    `${loggerPrefix} ${filterName} has no seed; environments using it will not be reproducible`,
  );
}

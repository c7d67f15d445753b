import { Interaction, SimulatedInteraction, simulatedInteraction } from '../interactions';
import { Action, Context, Params } from '../types';

import { IEnvironment, describeEnvironment } from './environment';

/** An environment over interactions that are already in memory. */
export class MemorySimulation<I extends Interaction = SimulatedInteraction>
  implements IEnvironment<I>
{
  private readonly interactions: readonly I[];

  constructor(
    interactions: readonly I[],
    private readonly extraParams: Params = {},
  ) {
    this.interactions = [...interactions];
  }

  static fromTriples(
    triples: ReadonlyArray<readonly [Context, readonly Action[], readonly number[]]>,
    params: Params = {},
  ): MemorySimulation<SimulatedInteraction> {
    return new MemorySimulation(
      triples.map(([context, actions, rewards]) => simulatedInteraction(context, actions, rewards)),
      params,
    );
  }

  get params(): Params {
    return { ...this.extraParams };
  }

  async *read(): AsyncIterable<I> {
    yield* this.interactions;
  }

  toString(): string {
    return describeEnvironment('MemorySimulation', this.params);
  }
}

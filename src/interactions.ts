import { isEqual } from 'lodash';

import { InvalidInteractionError } from './errors';
import { Action, Context } from './types';

export interface SimulatedInteraction {
  readonly type: 'simulated';
  readonly context: Context;
  readonly actions: readonly Action[];
  // rewards[i] is the reward for actions[i]
  readonly rewards: readonly number[];
}

export interface LoggedInteraction {
  readonly type: 'logged';
  readonly context: Context;
  readonly actions: readonly Action[];
  readonly action: Action;
  readonly reward: number;
  // probability the logging policy gave `action`, when it is known
  readonly probability?: number;
}

export type Interaction = SimulatedInteraction | LoggedInteraction;

export function simulatedInteraction(
  context: Context,
  actions: readonly Action[],
  rewards: readonly number[],
): SimulatedInteraction {
  if (!actions.length) {
    throw new InvalidInteractionError('An interaction needs at least one action', { context });
  }
  if (actions.length !== rewards.length) {
    throw new InvalidInteractionError('Every action needs exactly one reward', {
      actions: actions.length,
      rewards: rewards.length,
    });
  }
  return { type: 'simulated', context, actions, rewards };
}

export function loggedInteraction(
  context: Context,
  actions: readonly Action[],
  action: Action,
  reward: number,
  probability?: number,
): LoggedInteraction {
  if (!actions.some((candidate) => isEqual(candidate, action))) {
    throw new InvalidInteractionError('The logged action is not one of the available actions', {
      action,
    });
  }
  if (probability !== undefined && !(probability > 0 && probability <= 1)) {
    throw new InvalidInteractionError('A propensity must be in (0, 1]', { probability });
  }
  return probability === undefined
    ? { type: 'logged', context, actions, action, reward }
    : { type: 'logged', context, actions, action, reward, probability };
}

/**
 * The reward known for `action`, or `undefined` when the interaction does not know it
 * (a logged interaction only knows the reward of the action that was taken).
 */
export function rewardFor(interaction: Interaction, action: Action): number | undefined {
  if (interaction.type === 'logged') {
    return isEqual(interaction.action, action) ? interaction.reward : undefined;
  }
  const index = interaction.actions.findIndex((candidate) => isEqual(candidate, action));
  return index === -1 ? undefined : interaction.rewards[index];
}

// Change logging subscriber

import type { VariableChangeEvent, VariableChangeHandler } from '@appstate/protocol';
import type { StateLogger } from '../logging.js';
import type { SubscriptionHandle } from './notifier.js';
import { asString } from '../values/value.js';

/**
 * Describe a change event in one line.
 */
export function describeChange(event: VariableChangeEvent): string {
  switch (event.type) {
    case 'variable.added':
      return `The ${event.variableName} variable added with value: '${asString(event.newValue)}'.`;
    case 'variable.updated':
      return `The ${event.variableName} variable value: '${asString(event.oldValue)}' updated to: '${asString(event.newValue)}'.`;
    case 'variable.removed':
      return `The ${event.variableName} variable removed. Its value was: '${asString(event.oldValue)}'.`;
  }
}

/**
 * Anything handlers can subscribe to: a ChangeNotifier or an AppState.
 */
export type ChangeSource = {
  subscribe(handler: VariableChangeHandler): SubscriptionHandle;
};

/**
 * Log every variable change at info level.
 *
 * @returns The registration handle
 */
export function logVariableChanges(
  source: ChangeSource,
  logger: StateLogger
): SubscriptionHandle {
  return source.subscribe((event) => {
    logger.info(describeChange(event), { type: event.type, variableName: event.variableName });
  });
}

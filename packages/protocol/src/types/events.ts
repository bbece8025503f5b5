// Change event types for dynamic variables
//
// Typed property writes never produce these events.

import type { Value } from './values.js';

/**
 * All change event types.
 */
export type VariableChangeType = 'variable.added' | 'variable.updated' | 'variable.removed';

/**
 * Raised when a set creates a variable that did not exist.
 */
export type VariableAddedEvent = {
  type: 'variable.added';
  /** Normalized variable name */
  variableName: string;
  oldValue?: undefined;
  newValue: Value;
};

/**
 * Raised when a set replaces an existing variable's value.
 * Fired even if the two values are equal.
 */
export type VariableUpdatedEvent = {
  type: 'variable.updated';
  variableName: string;
  oldValue: Value;
  newValue: Value;
};

/**
 * Raised when a variable is removed.
 */
export type VariableRemovedEvent = {
  type: 'variable.removed';
  variableName: string;
  oldValue: Value;
  newValue?: undefined;
};

/**
 * Union of all variable change events.
 */
export type VariableChangeEvent = VariableAddedEvent | VariableUpdatedEvent | VariableRemovedEvent;

/**
 * Handler function for change events.
 */
export type VariableChangeHandler<T extends VariableChangeEvent = VariableChangeEvent> = (
  event: T
) => void;

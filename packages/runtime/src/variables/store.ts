// Variable store - the dynamic part of the state
//
// Insertion-ordered map from normalized name to Value. An entry never
// holds a null value: setting null deletes it.

import type { Value, VariableChangeEvent } from '@appstate/protocol';
import type { ChangeNotifier } from '../events/notifier.js';
import { normalizeName } from '../names.js';

export class VariableStore {
  private readonly values = new Map<string, Value>();
  private readonly notifier: ChangeNotifier;

  constructor(notifier: ChangeNotifier) {
    this.notifier = notifier;
  }

  /**
   * Check if a variable is defined.
   */
  has(name: string): boolean {
    return this.values.has(normalizeName(name));
  }

  /**
   * Get a variable's value.
   *
   * @returns The value, or undefined if the variable is not defined
   */
  get(name: string): Value | undefined {
    return this.values.get(normalizeName(name));
  }

  /**
   * Create, replace or (with null) delete a variable.
   *
   * The change is committed before any handler runs. Replacing a value
   * keeps the variable's position in iteration order.
   *
   * @returns The change that happened, or null when deleting a variable that did not exist
   */
  set(name: string, value: Value | null): VariableChangeEvent | null {
    const variableName = normalizeName(name);
    const previousValue = this.values.get(variableName);

    let change: VariableChangeEvent;
    if (value === null) {
      if (previousValue === undefined) {
        return null;
      }
      this.values.delete(variableName);
      change = { type: 'variable.removed', variableName, oldValue: previousValue };
    } else {
      this.values.set(variableName, value);
      change =
        previousValue === undefined
          ? { type: 'variable.added', variableName, newValue: value }
          : { type: 'variable.updated', variableName, oldValue: previousValue, newValue: value };
    }

    this.notifier.notify(change);
    return change;
  }

  /**
   * Delete a variable.
   *
   * @returns true if a variable was removed
   */
  delete(name: string): boolean {
    return this.set(name, null) !== null;
  }

  /**
   * Variable names in insertion order.
   */
  names(): string[] {
    return Array.from(this.values.keys());
  }

  /**
   * Name/value pairs in insertion order.
   */
  entries(): [string, Value][] {
    return Array.from(this.values.entries());
  }

  get size(): number {
    return this.values.size;
  }
}

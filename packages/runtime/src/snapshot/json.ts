// JSON snapshot - one-way export of state
//
// Every value is written in its canonical string form, so booleans and
// numbers come out as JSON strings. Reading a snapshot back is not supported.

import type { SnapshotDocument } from '@appstate/protocol';
import type { TypedPropertyRegistry } from '../properties/registry.js';
import type { VariableStore } from '../variables/store.js';
import { readProperty } from '../state/dispatch.js';
import { asString } from '../values/value.js';
import { NotSupportedError } from '../errors.js';

const INDENT = 2;

/**
 * Build the snapshot document for typed properties, keyed by declared name.
 */
export function propertiesToDocument<TState>(
  registry: TypedPropertyRegistry<TState>,
  state: TState
): SnapshotDocument {
  return Object.fromEntries(
    registry.list().map((property) => [property.name, asString(readProperty(property, state))])
  );
}

/**
 * Serialize typed properties to pretty-printed JSON.
 */
export function propertiesToJson<TState>(
  registry: TypedPropertyRegistry<TState>,
  state: TState
): string {
  return JSON.stringify(propertiesToDocument(registry, state), null, INDENT);
}

/**
 * Build the snapshot document for dynamic variables, keyed by normalized name.
 */
export function variablesToDocument(store: VariableStore): SnapshotDocument {
  return Object.fromEntries(store.entries().map(([name, value]) => [name, asString(value)]));
}

/**
 * Serialize dynamic variables to pretty-printed JSON.
 */
export function variablesToJson(store: VariableStore): string {
  return JSON.stringify(variablesToDocument(store), null, INDENT);
}

/**
 * Snapshots are export-only.
 *
 * @throws NotSupportedError always
 */
export function fromJson(_json: string): never {
  throw new NotSupportedError('snapshot deserialization');
}

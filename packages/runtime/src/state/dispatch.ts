// Typed property dispatch
//
// Reads and writes go through the closed set of property kinds. A kind
// outside that set can only arrive from an untyped declaration and is
// rejected with UnsupportedCoercionError.

import type { TypedProperty, Value } from '@appstate/protocol';
import {
  asBoolean,
  asFloat,
  asInteger,
  asString,
  booleanValue,
  floatValue,
  integerValue,
  stringValue,
} from '../values/value.js';
import { CoercionError, UnsupportedCoercionError } from '../errors.js';

/**
 * Significant digits kept by decimalFloat properties.
 */
export const DECIMAL_PRECISION = 15;

/**
 * Read a typed property and wrap it in a Value of the matching kind.
 * decimalFloat properties read as floats.
 */
export function readProperty<TState>(property: TypedProperty<TState>, state: TState): Value {
  switch (property.kind) {
    case 'string':
      return stringValue(property.get(state));
    case 'boolean':
      return booleanValue(property.get(state));
    case 'integer':
      return integerValue(property.get(state));
    case 'float':
    case 'decimalFloat':
      return floatValue(property.get(state));
    default:
      return unsupportedKind(property);
  }
}

/**
 * Coerce a value into the property's kind and write it.
 * The setter is not called when coercion fails.
 */
export function writeProperty<TState>(
  property: TypedProperty<TState>,
  state: TState,
  value: Value
): void {
  switch (property.kind) {
    case 'string':
      property.set(state, asString(value));
      return;
    case 'boolean':
      property.set(state, asBoolean(value));
      return;
    case 'integer':
      property.set(state, asInteger(value));
      return;
    case 'float':
      property.set(state, asFloat(value));
      return;
    case 'decimalFloat':
      property.set(state, asDecimal(value));
      return;
    default:
      unsupportedKind(property);
  }
}

/**
 * Coerce a value to a decimal: finite, rounded to DECIMAL_PRECISION significant digits.
 */
export function asDecimal(value: Value): number {
  const float = asFloat(value);
  if (!Number.isFinite(float)) {
    throw new CoercionError(value.kind, 'decimalFloat', `'${asString(value)}' is not a finite number`);
  }

  const rounded = Number(float.toPrecision(DECIMAL_PRECISION));
  return rounded === 0 ? 0 : rounded;
}

function unsupportedKind(property: { name: string; kind: string }): never {
  throw new UnsupportedCoercionError(property.name, property.kind);
}

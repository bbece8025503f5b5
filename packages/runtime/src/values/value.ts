// Value construction and coercion
//
// Every Value exposes a canonical string form that never fails, plus
// best-effort coercion to boolean, integer and float. String coercion
// parses invariant literals only; nothing here depends on the locale.

import type {
  Value,
  ValueInput,
  StringValue,
  BooleanValue,
  IntegerValue,
  FloatValue,
} from '@appstate/protocol';
import { CoercionError } from '../errors.js';

const INTEGER_LITERAL = /^[+-]?\d+$/;
const FLOAT_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

const SPECIAL_FLOAT_LITERALS = new Map<string, number>([
  ['nan', Number.NaN],
  ['infinity', Number.POSITIVE_INFINITY],
  ['+infinity', Number.POSITIVE_INFINITY],
  ['-infinity', Number.NEGATIVE_INFINITY],
]);

// --- Construction ---

export function stringValue(value: string): StringValue {
  const result: StringValue = { kind: 'string', value };
  return Object.freeze(result);
}

export function booleanValue(value: boolean): BooleanValue {
  const result: BooleanValue = { kind: 'boolean', value };
  return Object.freeze(result);
}

/**
 * Create an integer value. Fractions are truncated and the result is
 * clamped to the safe-integer range.
 */
export function integerValue(value: number): IntegerValue {
  const result: IntegerValue = { kind: 'integer', value: narrowToInteger(value) };
  return Object.freeze(result);
}

export function floatValue(value: number): FloatValue {
  const result: FloatValue = { kind: 'float', value };
  return Object.freeze(result);
}

/**
 * Tag a native scalar, or rebuild a tagged Value through its constructor.
 *
 * Whole numbers inside the safe-integer range become integers,
 * every other number becomes a float.
 */
export function toValue(input: ValueInput): Value {
  switch (typeof input) {
    case 'string':
      return stringValue(input);
    case 'boolean':
      return booleanValue(input);
    case 'number':
      return Number.isSafeInteger(input) ? integerValue(input) : floatValue(input);
    default:
      return rebuildValue(input);
  }
}

function rebuildValue(value: Value): Value {
  switch (value.kind) {
    case 'string':
      return stringValue(value.value);
    case 'boolean':
      return booleanValue(value.value);
    case 'integer':
      return integerValue(value.value);
    case 'float':
      return floatValue(value.value);
  }
}

/**
 * Narrow a number to an integer. Truncates toward zero and never fails:
 * NaN and non-numbers become 0, anything past the safe range is clamped.
 */
export function narrowToInteger(value: number): number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    return 0;
  }
  if (value >= Number.MAX_SAFE_INTEGER) {
    return Number.MAX_SAFE_INTEGER;
  }
  if (value <= Number.MIN_SAFE_INTEGER) {
    return Number.MIN_SAFE_INTEGER;
  }

  const truncated = Math.trunc(value);
  return truncated === 0 ? 0 : truncated;
}

// --- Coercion ---

/**
 * Canonical string form.
 */
export function asString(value: Value): string {
  switch (value.kind) {
    case 'string':
      return value.value;
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'integer':
    case 'float':
      return String(value.value);
  }
}

export function asBoolean(value: Value): boolean {
  switch (value.kind) {
    case 'boolean':
      return value.value;
    case 'integer':
    case 'float':
      return value.value !== 0;
    case 'string':
      return parseBooleanLiteral(value.value);
  }
}

export function asInteger(value: Value): number {
  switch (value.kind) {
    case 'integer':
      return value.value;
    case 'boolean':
      return value.value ? 1 : 0;
    case 'float':
      return narrowToInteger(value.value);
    case 'string':
      return parseIntegerLiteral(value.value);
  }
}

export function asFloat(value: Value): number {
  switch (value.kind) {
    case 'float':
    case 'integer':
      return value.value;
    case 'boolean':
      return value.value ? 1 : 0;
    case 'string':
      return parseFloatLiteral(value.value);
  }
}

/**
 * Two values are equal when they share a kind and a native value.
 * NaN floats compare equal to each other.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  return a.kind === b.kind && Object.is(a.value, b.value);
}

// --- Literal parsing ---

function parseBooleanLiteral(text: string): boolean {
  const literal = text.trim().toLowerCase();
  if (literal === 'true') {
    return true;
  }
  if (literal === 'false') {
    return false;
  }
  throw new CoercionError('string', 'boolean', `'${text}' is not a boolean literal`);
}

function parseIntegerLiteral(text: string): number {
  const literal = text.trim();
  if (!INTEGER_LITERAL.test(literal)) {
    throw new CoercionError('string', 'integer', `'${text}' is not an integer literal`);
  }

  const parsed = Number(literal);
  if (!Number.isSafeInteger(parsed)) {
    throw new CoercionError('string', 'integer', `'${text}' is out of range`);
  }

  return parsed === 0 ? 0 : parsed;
}

function parseFloatLiteral(text: string): number {
  const literal = text.trim();
  if (FLOAT_LITERAL.test(literal)) {
    return Number(literal);
  }

  const special = SPECIAL_FLOAT_LITERALS.get(literal.toLowerCase());
  if (special !== undefined) {
    return special;
  }

  throw new CoercionError('string', 'float', `'${text}' is not a number literal`);
}

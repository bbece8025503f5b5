// Value types - the script-visible scalar

/**
 * The kinds a script-visible value can carry.
 */
export type ValueKind = 'string' | 'boolean' | 'integer' | 'float';

/**
 * A string value.
 */
export type StringValue = {
  readonly kind: 'string';
  readonly value: string;
};

/**
 * A boolean value.
 */
export type BooleanValue = {
  readonly kind: 'boolean';
  readonly value: boolean;
};

/**
 * An integer value. Always a whole number inside the safe-integer range,
 * so it covers 32-bit integers but not the full 64-bit range.
 */
export type IntegerValue = {
  readonly kind: 'integer';
  readonly value: number;
};

/**
 * A double-precision float value.
 */
export type FloatValue = {
  readonly kind: 'float';
  readonly value: number;
};

/**
 * A Value is exactly one tagged scalar.
 * Values are immutable: changing a variable means replacing its Value.
 */
export type Value = StringValue | BooleanValue | IntegerValue | FloatValue;

/**
 * Native scalars accepted wherever a Value is expected.
 * Whole numbers are tagged as integers, other numbers as floats.
 */
export type NativeScalar = string | boolean | number;

/**
 * Anything that can be turned into a Value.
 */
export type ValueInput = Value | NativeScalar;

// Value construction and coercion

export {
  stringValue,
  booleanValue,
  integerValue,
  floatValue,
  toValue,
  narrowToInteger,
  asString,
  asBoolean,
  asInteger,
  asFloat,
  valuesEqual,
} from './value.js';

// Value validation
//
// Zod schemas for values crossing the scripting boundary. The host hands
// the container opaque stack items; these schemas decide what is a Value.

import { z } from 'zod';
import type { Value, ValueInput } from '../types/values.js';

export const StringValueSchema = z.object({
  kind: z.literal('string'),
  value: z.string(),
});

export const BooleanValueSchema = z.object({
  kind: z.literal('boolean'),
  value: z.boolean(),
});

export const IntegerValueSchema = z.object({
  kind: z.literal('integer'),
  value: z.number().int().refine(Number.isSafeInteger, {
    message: 'Integer value must be inside the safe-integer range',
  }),
});

export const FloatValueSchema = z.object({
  kind: z.literal('float'),
  value: z.union([z.number(), z.nan()]),
});

/**
 * Schema for a tagged Value.
 */
export const ValueSchema: z.ZodType<Value> = z.discriminatedUnion('kind', [
  StringValueSchema,
  BooleanValueSchema,
  IntegerValueSchema,
  FloatValueSchema,
]);

/**
 * Schema for anything that can become a Value: a tagged Value or a native scalar.
 */
export const ValueInputSchema: z.ZodType<ValueInput> = z.union([
  ValueSchema,
  z.string(),
  z.boolean(),
  z.number(),
  z.nan(),
]);

/**
 * A validation error with context
 */
export type ValueValidationError = {
  path: string;
  message: string;
};

/**
 * Result of validating a value input
 */
export type ValueValidationResult =
  | { valid: true; value: ValueInput; errors: [] }
  | { valid: false; errors: ValueValidationError[] };

/**
 * Validate an unknown item as a value input.
 */
export function validateValueInput(input: unknown): ValueValidationResult {
  const parsed = ValueInputSchema.safeParse(input);
  if (parsed.success) {
    return { valid: true, value: parsed.data, errors: [] };
  }

  return {
    valid: false,
    errors: parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  };
}

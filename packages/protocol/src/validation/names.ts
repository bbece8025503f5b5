// Name validation
//
// A name must contain at least one non-whitespace character. The raw name
// is kept as given; folding to lowercase happens in the runtime.

import { z } from 'zod';

export const NameSchema = z
  .string()
  .refine((name) => name.trim().length > 0, { message: 'A variable name expected' });

/**
 * Check whether a value is a usable state name.
 */
export function isValidName(name: unknown): name is string {
  return NameSchema.safeParse(name).success;
}

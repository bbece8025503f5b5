// Name normalization shared by typed properties and dynamic variables

import { isValidName } from '@appstate/protocol';
import { InvalidNameError } from './errors.js';

/**
 * Check a name and fold it to its lookup key.
 *
 * Folding is lowercase only: no trimming and no locale rules.
 * Normalizing an already normalized name returns it unchanged.
 *
 * @throws InvalidNameError if the name is empty or whitespace-only
 */
export function normalizeName(name: string): string {
  if (!isValidName(name)) {
    throw new InvalidNameError(name);
  }
  return name.toLowerCase();
}

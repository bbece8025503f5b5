// Snapshot document validation

import { z } from 'zod';
import type { SnapshotDocument } from '../types/snapshot.js';

/**
 * Flat object of strings. JSON numbers and booleans are rejected.
 */
export const SnapshotDocumentSchema: z.ZodType<SnapshotDocument> = z.record(z.string(), z.string());

/**
 * Check that a parsed JSON document follows the snapshot format.
 */
export function isSnapshotDocument(document: unknown): document is SnapshotDocument {
  return SnapshotDocumentSchema.safeParse(document).success;
}

// Snapshot document - the one-way JSON export of typed state

/**
 * A flat object keyed by declared property name.
 * Every value is the canonical string form, never a JSON number or boolean.
 */
export type SnapshotDocument = Record<string, string>;

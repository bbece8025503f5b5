// Re-export all protocol types

export * from './values.js';
export * from './properties.js';
export * from './events.js';
export * from './snapshot.js';

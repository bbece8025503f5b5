// Validation schemas for data crossing the scripting boundary

export * from './values.js';
export * from './names.js';
export * from './snapshot.js';

// @appstate/protocol
// Shared types and boundary schemas for the application state container.

export * from './types/index.js';
export * from './validation/index.js';

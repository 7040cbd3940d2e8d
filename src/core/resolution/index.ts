/**
 * Resolution engine exports barrel file.
 */
export * from './types.js';
export * from './value-store.js';
export * from './strategies.js';
export * from './applier.js';
export * from './engine.js';
export * from './messages.js';

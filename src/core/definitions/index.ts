/**
 * Option definition exports barrel file.
 */
export * from './types.js';
export * from './names.js';
export * from './validate.js';
export * from './builder.js';

/**
 * optbind - typed command-line option resolution.
 * Main library exports barrel file.
 */

// Tokens
export * from './core/tokens/token-stream.js';

// Definitions and registration
export * from './core/definitions/index.js';

// Conversion
export * from './core/conversion/converters.js';

// Matching
export * from './core/matching/name-matcher.js';

// Resolution
export * from './core/resolution/index.js';

// Declaration files
export * from './core/declarations/index.js';

// Configuration
export * from './core/config/schema.js';
export * from './core/config/loader.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';

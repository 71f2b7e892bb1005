/**
 * codesim: pairwise similarity detection for C-family source code.
 * Main library exports barrel file.
 */

// Comparison
export * from './core/compare/index.js';

// Configuration
export * from './core/config/index.js';

// Pipeline stages
export * from './core/lexicon/index.js';
export * from './core/normalize/index.js';
export * from './core/tokenize/index.js';
export * from './core/fingerprint/index.js';
export * from './core/structure/index.js';
export * from './core/blocks/index.js';
export * from './core/ensemble/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';

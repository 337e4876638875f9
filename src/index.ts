/**
 * argcheck - static checks for command-line argument schemas.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Diagnostics
export * from './core/diagnostics/index.js';

// Schema analysis
export * from './core/schema/index.js';

// Validation
export * from './core/validation/index.js';

// Metadata
export * from './metadata/types.js';
export { TypeScriptMetadataProvider, type TypeScriptMetadataProviderOptions } from './metadata/typescript.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';

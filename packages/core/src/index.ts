/**
 * @cqlsink/core
 *
 * Identifiers, consistency levels, column and record types shared by the sink packages
 */

// Types
export * from './types/index.js';

// Identifiers
export * from './identifiers/index.js';

// Destination store types
export * from './cql/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';

/**
 * @cqlsink/sink-config
 *
 * Resolves the per-table configuration of the sink from a flat settings bag:
 * settings schema, mapping grammar and field type resolution.
 */

// Mapping grammar
export * from './mapping/index.js';

// Settings schema
export * from './settings/index.js';

// Table configuration
export * from './table/index.js';

// Record metadata
export * from './metadata/index.js';

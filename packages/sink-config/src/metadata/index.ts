/**
 * Record metadata exports
 */

export { StructRecordMetadata, SchemalessRecordMetadata, resolveFieldType } from './record-metadata.js';
export type { RecordMetadata } from './record-metadata.js';
export { representationForSchema, representationForColumn } from './representation-types.js';

/**
 * Type exports for core
 */

export type { RecordSchemaType, LogicalType, RecordField, RecordSchema } from './schema.js';
export type { PrimitiveRepresentation, RepresentationType } from './representation.js';
export { primitive, formatRepresentation } from './representation.js';

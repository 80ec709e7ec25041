/**
 * Mapping module exports
 */

export { FieldPath, WHOLE_RECORD_FIELD } from './field-path.js';
export type { RecordPart } from './field-path.js';
export { Mapping } from './mapping.js';
export type { MappingEntry } from './mapping.js';
export { parseMapping } from './mapping-parser.js';
export type { MappingParseResult } from './mapping-parser.js';

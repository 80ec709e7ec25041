/**
 * Schema types for describing structured records
 */

export type RecordSchemaType =
  | 'int8'
  | 'int16'
  | 'int32'
  | 'int64'
  | 'float32'
  | 'float64'
  | 'boolean'
  | 'string'
  | 'bytes'
  | 'array'
  | 'map'
  | 'struct';

/** Logical types refine a physical type (e.g. `decimal` over `bytes`) */
export type LogicalType = 'decimal' | 'date' | 'time' | 'timestamp';

export interface RecordField {
  name: string;
  schema: RecordSchema;
}

export interface RecordSchema {
  type: RecordSchemaType;
  logicalType?: LogicalType;
  /** Schema name, e.g. the struct's record name */
  name?: string;
  optional?: boolean;
  description?: string;
  /** For struct types: nested field definitions */
  fields?: RecordField[];
  /** For array types: the type of array elements */
  items?: RecordSchema;
  /** For map types */
  keys?: RecordSchema;
  values?: RecordSchema;
}

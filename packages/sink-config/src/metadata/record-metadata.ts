/**
 * Record metadata
 *
 * Tells the write path what a mapped field's value will look like, given the
 * type of the column it is written to.
 */

import {
  ConnectorError,
  type ColumnType,
  type RecordSchema,
  type RepresentationType,
} from '@cqlsink/core';
import { WHOLE_RECORD_FIELD } from '../mapping/index.js';
import { representationForColumn, representationForSchema } from './representation-types.js';

export interface RecordMetadata {
  /**
   * Representation type of `field` (a dotted name within the key or value).
   * {@link WHOLE_RECORD_FIELD} always yields a struct.
   */
  getFieldType(field: string, columnType: ColumnType): RepresentationType;
}

/**
 * Metadata of a record that carries a schema
 */
export class StructRecordMetadata implements RecordMetadata {
  constructor(private readonly schema: RecordSchema) {}

  getFieldType(field: string, _columnType: ColumnType): RepresentationType {
    if (field === WHOLE_RECORD_FIELD) {
      return { kind: 'struct' };
    }
    return representationForSchema(this.lookup(field));
  }

  private lookup(field: string): RecordSchema {
    let current = this.schema;
    for (const segment of field.split('.')) {
      const fields = current.type === 'struct' ? (current.fields ?? []) : [];
      const match = fields.find((candidate) => candidate.name === segment);
      if (!match) {
        throw new ConnectorError({
          code: 'FIELD_NOT_FOUND',
          message: `Field '${field}' not found in record schema`,
          suggestion:
            fields.length > 0
              ? `Available fields: ${fields.map((candidate) => candidate.name).join(', ')}`
              : `'${segment}' is looked up in a ${current.type} schema, which has no fields.`,
          context: { field },
        });
      }
      current = match.schema;
    }
    return current;
  }
}

/**
 * Metadata of a schemaless (e.g. JSON) record: field values are converted
 * to whatever the target column holds.
 */
export class SchemalessRecordMetadata implements RecordMetadata {
  getFieldType(field: string, columnType: ColumnType): RepresentationType {
    if (field === WHOLE_RECORD_FIELD) {
      return { kind: 'struct' };
    }
    return representationForColumn(columnType);
  }
}

/**
 * Resolve the representation type of one field of a schema-carrying record.
 */
export function resolveFieldType(
  fieldName: string,
  columnType: ColumnType,
  recordSchema: RecordSchema
): RepresentationType {
  return new StructRecordMetadata(recordSchema).getFieldType(fieldName, columnType);
}

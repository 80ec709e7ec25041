/**
 * Correspondence tables from record-schema and column types to representation types
 */

import cassandra from 'cassandra-driver';
import {
  ConnectorError,
  elementType,
  formatColumnType,
  mapTypes,
  primitive,
  tupleTypes,
  type ColumnType,
  type LogicalType,
  type PrimitiveRepresentation,
  type RecordSchema,
  type RecordSchemaType,
  type RepresentationType,
} from '@cqlsink/core';

const { dataTypes } = cassandra.types;

const SCHEMA_PRIMITIVES: Partial<Record<RecordSchemaType, PrimitiveRepresentation>> = {
  int8: 'byte',
  int16: 'short',
  int32: 'int',
  int64: 'long',
  float32: 'float',
  float64: 'double',
  boolean: 'boolean',
  string: 'string',
  bytes: 'bytes',
};

const LOGICAL_PRIMITIVES: Record<LogicalType, PrimitiveRepresentation> = {
  decimal: 'decimal',
  date: 'date',
  time: 'time',
  timestamp: 'timestamp',
};

const COLUMN_PRIMITIVES = new Map<number, PrimitiveRepresentation>([
  [dataTypes.ascii, 'string'],
  [dataTypes.text, 'string'],
  [dataTypes.varchar, 'string'],
  [dataTypes.bigint, 'long'],
  [dataTypes.counter, 'long'],
  [dataTypes.blob, 'bytes'],
  [dataTypes.boolean, 'boolean'],
  [dataTypes.decimal, 'decimal'],
  [dataTypes.double, 'double'],
  [dataTypes.float, 'float'],
  [dataTypes.int, 'int'],
  [dataTypes.smallint, 'short'],
  [dataTypes.tinyint, 'byte'],
  [dataTypes.varint, 'varint'],
  [dataTypes.timestamp, 'timestamp'],
  [dataTypes.date, 'date'],
  [dataTypes.time, 'time'],
  [dataTypes.uuid, 'uuid'],
  [dataTypes.timeuuid, 'uuid'],
  [dataTypes.inet, 'inet'],
  [dataTypes.duration, 'duration'],
]);

function unsupported(message: string, suggestion?: string): ConnectorError {
  return new ConnectorError({ code: 'UNSUPPORTED_TYPE', message, suggestion });
}

function required(schema: RecordSchema | undefined, what: string, of: RecordSchemaType): RecordSchema {
  if (!schema) {
    throw unsupported(`${of} schema has no ${what} schema`);
  }
  return schema;
}

/**
 * Representation of values described by a record schema.
 * @throws ConnectorError (UNSUPPORTED_TYPE) for schemas without a correspondence
 */
export function representationForSchema(schema: RecordSchema): RepresentationType {
  if (schema.logicalType) {
    return primitive(LOGICAL_PRIMITIVES[schema.logicalType]);
  }

  const type = schema.type;
  switch (type) {
    case 'array':
      return { kind: 'list', element: representationForSchema(required(schema.items, 'items', type)) };
    case 'map':
      return {
        kind: 'map',
        key: representationForSchema(required(schema.keys, 'keys', type)),
        value: representationForSchema(required(schema.values, 'values', type)),
      };
    case 'struct':
      return { kind: 'struct' };
    default: {
      const name = SCHEMA_PRIMITIVES[type];
      if (!name) {
        throw unsupported(
          `No representation type for record schema type '${String(type)}'`,
          'Declare the field with a supported schema type.'
        );
      }
      return primitive(name);
    }
  }
}

/**
 * Representation a column expects when the record carries no schema.
 * @throws ConnectorError (UNSUPPORTED_TYPE) for custom column types
 */
export function representationForColumn(column: ColumnType): RepresentationType {
  switch (column.code) {
    case dataTypes.list:
      return { kind: 'list', element: representationForColumn(elementType(column)) };
    case dataTypes.set:
      return { kind: 'set', element: representationForColumn(elementType(column)) };
    case dataTypes.map: {
      const [key, value] = mapTypes(column);
      return { kind: 'map', key: representationForColumn(key), value: representationForColumn(value) };
    }
    case dataTypes.tuple:
      return { kind: 'tuple', elements: tupleTypes(column).map(representationForColumn) };
    case dataTypes.udt:
      return { kind: 'struct' };
    default: {
      const name = COLUMN_PRIMITIVES.get(column.code);
      if (!name) {
        throw unsupported(`No representation type for column type ${formatColumnType(column)}`);
      }
      return primitive(name);
    }
  }
}

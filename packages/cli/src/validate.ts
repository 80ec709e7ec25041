/**
 * Configuration validation
 *
 * Resolves every table of a connector configuration and, where column types
 * are declared, the representation type of every mapped field.
 */

import {
  ConnectorError,
  formatColumnType,
  formatRepresentation,
  parseColumnType,
  type ConsistencyLevel,
  type RecordSchema,
} from '@cqlsink/core';
import {
  SchemalessRecordMetadata,
  StructRecordMetadata,
  resolveSinkConfig,
  type RecordMetadata,
  type RecordPart,
  type TableConfig,
} from '@cqlsink/sink-config';
import type { ConfigFile } from './config.js';
import type { Logger } from './logger.js';

export interface FieldTypeReport {
  column: string;
  field: string;
  columnType: string;
  representation: string;
}

export interface TableReport {
  topic: string;
  table: string;
  consistencyLevel: ConsistencyLevel;
  ttl: number;
  nullToUnset: boolean;
  deletesEnabled: boolean;
  mapping: string[];
  /** Present when column types are declared for the table */
  fieldTypes?: FieldTypeReport[];
}

export interface ValidationReport {
  name?: string;
  tables: TableReport[];
  ignored: string[];
}

/** Schemas of record keys and values; schemaless when absent */
export interface RecordSchemas {
  key?: RecordSchema;
  value?: RecordSchema;
}

/** Own property of a JSON-derived record; inherited members never count */
function ownValue<T>(record: Record<string, T>, name: string): T | undefined {
  return Object.hasOwn(record, name) ? record[name] : undefined;
}

function metadataFor(schema: RecordSchema | undefined): RecordMetadata {
  return schema ? new StructRecordMetadata(schema) : new SchemalessRecordMetadata();
}

function resolveFieldTypes(
  table: TableConfig,
  columns: Record<string, string>,
  metadata: Record<RecordPart, RecordMetadata>
): FieldTypeReport[] {
  return Array.from(table.mapping, ({ column, field }) => {
    const typeName = ownValue(columns, column.asInternal());
    if (typeName === undefined) {
      throw new ConnectorError({
        code: 'CONFIGURATION_ERROR',
        message: `No column type declared for ${table.keyspaceAndTable}.${column.asCql(true)}`,
        suggestion: `Add "${column.asInternal()}" under columns["${table.keyspaceAndTable}"].`,
      });
    }

    const columnType = parseColumnType(typeName);
    return {
      column: column.asCql(true),
      field: field.toString(),
      columnType: formatColumnType(columnType),
      representation: formatRepresentation(metadata[field.part].getFieldType(field.fieldName, columnType)),
    };
  });
}

export function validateConnectorConfig(
  config: ConfigFile,
  schemas: RecordSchemas,
  logger: Logger
): ValidationReport {
  const sink = resolveSinkConfig(config.settings, config.topics);

  for (const setting of sink.ignored) {
    logger.warn('Ignoring setting that configures no subscribed table', { setting });
  }

  const metadata: Record<RecordPart, RecordMetadata> = {
    key: metadataFor(schemas.key),
    value: metadataFor(schemas.value),
  };

  const tables = sink.topics.flatMap(({ tables }) =>
    tables.map((table): TableReport => {
      const tableLogger = logger.child({ topic: table.topicName, table: table.keyspaceAndTable });
      const report: TableReport = {
        topic: table.topicName,
        table: table.keyspaceAndTable,
        consistencyLevel: table.consistencyLevel,
        ttl: table.ttl,
        nullToUnset: table.nullToUnset,
        deletesEnabled: table.deletesEnabled,
        mapping: table.mapping.toPathList(),
      };

      const columns = config.columns ? ownValue(config.columns, table.keyspaceAndTable) : undefined;
      if (columns) {
        report.fieldTypes = resolveFieldTypes(table, columns, metadata);
      } else {
        tableLogger.debug('No column types declared; skipping field type resolution');
      }

      tableLogger.info('Resolved table configuration', {
        consistencyLevel: table.consistencyLevel,
        ttl: table.ttl,
        mapping: table.mapping.toString(),
      });
      return report;
    })
  );

  return { name: config.name, tables, ignored: sink.ignored };
}

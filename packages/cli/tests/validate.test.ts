import { describe, expect, it } from 'vitest';
import { ConnectorError, type RecordSchema } from '@cqlsink/core';
import { Logger, parseConfigFile, validateConnectorConfig } from '../src/index.js';

const keySchema: RecordSchema = {
  type: 'struct',
  fields: [{ name: 'id', schema: { type: 'int64' } }],
};

const valueSchema: RecordSchema = {
  type: 'struct',
  fields: [
    { name: 'total', schema: { type: 'bytes', logicalType: 'decimal' } },
    { name: 'note', schema: { type: 'string' } },
  ],
};

function sinkConfig(columns?: Record<string, Record<string, string>>) {
  return parseConfigFile({
    name: 'orders-sink',
    topics: ['orders'],
    settings: {
      'topic.orders.shop.orders_by_id.mapping': 'id=key.id, total=value.total, doc=value',
      'topic.orders.shop.orders_by_id.ttl': 60,
      'topic.orders.shop.audit.mapping': 'id=key.id',
      'topic.stale.ks.t.mapping': 'a=value.a',
    },
    columns,
  });
}

function quietLogger(lines: string[] = []): Logger {
  return new Logger({ format: 'json', write: (line) => lines.push(line) });
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('validateConnectorConfig', () => {
  it('reports every resolved table', () => {
    const report = validateConnectorConfig(sinkConfig(), {}, quietLogger());

    expect(report.name).toBe('orders-sink');
    expect(report.ignored).toEqual(['topic.stale.ks.t.mapping']);
    expect(report.tables).toEqual([
      {
        topic: 'orders',
        table: 'shop.orders_by_id',
        consistencyLevel: 'LOCAL_ONE',
        ttl: 60,
        nullToUnset: true,
        deletesEnabled: true,
        mapping: ['id=key.id', 'total=value.total', 'doc=value.__self'],
      },
      {
        topic: 'orders',
        table: 'shop.audit',
        consistencyLevel: 'LOCAL_ONE',
        ttl: -1,
        nullToUnset: true,
        deletesEnabled: true,
        mapping: ['id=key.id'],
      },
    ]);
  });

  it('warns about settings for unsubscribed topics', () => {
    const lines: string[] = [];
    validateConnectorConfig(sinkConfig(), {}, quietLogger(lines));

    const warnings = lines
      .map((line): unknown => JSON.parse(line))
      .filter((record) => typeof record === 'object' && record !== null && 'level' in record && record.level === 'warn');

    expect(warnings).toEqual([
      expect.objectContaining({
        msg: 'Ignoring setting that configures no subscribed table',
        setting: 'topic.stale.ks.t.mapping',
      }),
    ]);
  });

  it('resolves field types from record schemas', () => {
    const config = sinkConfig({ 'shop.orders_by_id': { id: 'bigint', total: 'decimal', doc: 'frozen<order_doc>' } });

    const report = validateConnectorConfig(config, { key: keySchema, value: valueSchema }, quietLogger());

    expect(report.tables[0]?.fieldTypes).toEqual([
      { column: 'id', field: 'key.id', columnType: 'bigint', representation: 'long' },
      { column: 'total', field: 'value.total', columnType: 'decimal', representation: 'decimal' },
      { column: 'doc', field: 'value.__self', columnType: 'order_doc', representation: 'struct' },
    ]);
    expect(report.tables[1]?.fieldTypes).toBeUndefined();
  });

  it('derives field types from column types for schemaless records', () => {
    const config = sinkConfig({ 'shop.orders_by_id': { id: 'bigint', total: 'map<text, int>', doc: 'text' } });

    const report = validateConnectorConfig(config, {}, quietLogger());

    expect(report.tables[0]?.fieldTypes?.map((entry) => entry.representation)).toEqual([
      'long',
      'map<string, int>',
      'struct',
    ]);
  });

  it('requires a type for every mapped column of a described table', () => {
    const config = sinkConfig({ 'shop.orders_by_id': { id: 'bigint' } });

    const error = captureError(() => validateConnectorConfig(config, {}, quietLogger()));

    expect(error).toBeInstanceOf(ConnectorError);
    if (error instanceof ConnectorError) {
      expect(error.code).toBe('CONFIGURATION_ERROR');
      expect(error.message).toBe('No column type declared for shop.orders_by_id.total');
    }
  });

  it('fails on fields missing from the record schema', () => {
    const config = sinkConfig({ 'shop.orders_by_id': { id: 'bigint', total: 'decimal', doc: 'text' } });
    const value: RecordSchema = { type: 'struct', fields: [{ name: 'note', schema: { type: 'string' } }] };

    const error = captureError(() => validateConnectorConfig(config, { key: keySchema, value }, quietLogger()));

    expect(error).toBeInstanceOf(ConnectorError);
    if (error instanceof ConnectorError) {
      expect(error.code).toBe('FIELD_NOT_FOUND');
      expect(error.message).toBe("Field 'total' not found in record schema");
      expect(error.suggestion).toBe('Available fields: note');
    }
  });

  it('ignores inherited object members when looking up column types', () => {
    const config = parseConfigFile({
      topics: ['t'],
      settings: { 'topic.t.ks.tbl.mapping': 'constructor=value.x' },
      columns: { 'ks.tbl': { other: 'int' } },
    });

    const error = captureError(() => validateConnectorConfig(config, {}, quietLogger()));

    expect(error).toBeInstanceOf(ConnectorError);
    if (error instanceof ConnectorError) {
      expect(error.message).toBe('No column type declared for ks.tbl.constructor');
    }
  });
});

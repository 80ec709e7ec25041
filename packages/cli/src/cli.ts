#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   cqlsink validate --config ./sink.json [--key-schema ./key.json] [--value-schema ./value.json]
 *   cqlsink settings
 */

import { wrapError } from '@cqlsink/core';
import { loadConfigFile, loadRecordSchema } from './config.js';
import { Logger } from './logger.js';
import { formatTableSettingsHelp } from './settings-help.js';
import { validateConnectorConfig, type RecordSchemas } from './validate.js';

function optionValue(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  return index !== -1 ? args[index + 1] : undefined;
}

function printUsage(): void {
  console.error('Usage: cqlsink validate --config <sink.json> [--key-schema <file>] [--value-schema <file>]');
  console.error('       cqlsink settings');
  console.error('');
  console.error('Example sink.json:');
  console.error(
    JSON.stringify(
      {
        name: 'orders-sink',
        topics: ['orders'],
        settings: {
          'topic.orders.shop.orders_by_id.mapping': 'id=key.id, total=value.total',
          'topic.orders.shop.orders_by_id.consistencyLevel': 'LOCAL_QUORUM',
          'topic.orders.shop.orders_by_id.ttl': 86400,
        },
        columns: { 'shop.orders_by_id': { id: 'bigint', total: 'decimal' } },
      },
      null,
      2
    )
  );
}

async function main(): Promise<void> {
  let logger = new Logger();
  const args = process.argv.slice(2);
  const configPath = optionValue(args, '--config');

  if (args[0] === 'settings') {
    process.stdout.write(formatTableSettingsHelp());
    return;
  }

  if (args[0] !== 'validate' || !configPath) {
    printUsage();
    process.exitCode = 1;
    return;
  }

  try {
    const config = await loadConfigFile(configPath);
    logger = new Logger({
      level: config.logging?.level,
      format: config.logging?.format,
    });

    const keySchemaPath = optionValue(args, '--key-schema');
    const valueSchemaPath = optionValue(args, '--value-schema');
    const schemas: RecordSchemas = {
      key: keySchemaPath ? await loadRecordSchema(keySchemaPath) : undefined,
      value: valueSchemaPath ? await loadRecordSchema(valueSchemaPath) : undefined,
    };

    const report = validateConnectorConfig(config, schemas, logger);
    logger.info('Configuration is valid', { tables: report.tables.length });
    process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
  } catch (error) {
    const wrapped = wrapError(error);
    logger.error('Configuration is invalid', { error: wrapped.toJSON() });
    console.error(wrapped.toActionableMessage());
    process.exitCode = 1;
  }
}

void main();

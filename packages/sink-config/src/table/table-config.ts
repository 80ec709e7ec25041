/**
 * Table Configuration
 *
 * The resolved, immutable settings of one (topic, keyspace, table) triple.
 */

import {
  CONSISTENCY_LEVELS,
  ConfigError,
  parseConsistencyLevel,
  safeParseIdentifier,
  indentLines,
  type ConsistencyLevel,
  type Identifier,
} from '@cqlsink/core';
import { Mapping, parseMapping } from '../mapping/index.js';
import {
  buildTableSettingsSchema,
  getTableSettingPath,
  readSetting,
  settingDefinitions,
  type SettingsBag,
  type TableSettingName,
} from '../settings/index.js';
import { TableKey } from './table-key.js';

export interface TableConfigData {
  key: TableKey;
  /** Keyspace and table as written in the setting paths */
  rawKeyspace: string;
  rawTable: string;
  mappingString: string;
  mapping: Mapping;
  consistencyLevel: ConsistencyLevel;
  ttl: number;
  nullToUnset: boolean;
  deletesEnabled: boolean;
}

/** `pathPrefix` is the `topic.<topic>.<keyspace>.<table>` prefix shared by the table's settings */
function parseTableIdentifier(raw: string, what: 'keyspace' | 'table', pathPrefix: string): Identifier {
  const result = safeParseIdentifier(raw);
  if (!result.success) {
    throw ConfigError.invalidValue(
      pathPrefix,
      raw,
      `invalid ${what} name: ${result.error}`,
      `Fix the ${what} name in every setting under ${pathPrefix}.`
    );
  }
  return result.identifier;
}

export class TableConfig {
  readonly key: TableKey;
  readonly mappingString: string;
  readonly mapping: Mapping;
  readonly consistencyLevel: ConsistencyLevel;
  /** Seconds; -1 when rows do not expire */
  readonly ttl: number;
  readonly nullToUnset: boolean;
  readonly deletesEnabled: boolean;
  private readonly rawKeyspace: string;
  private readonly rawTable: string;

  private constructor(data: TableConfigData) {
    this.key = data.key;
    this.rawKeyspace = data.rawKeyspace;
    this.rawTable = data.rawTable;
    this.mappingString = data.mappingString;
    this.mapping = data.mapping;
    this.consistencyLevel = data.consistencyLevel;
    this.ttl = data.ttl;
    this.nullToUnset = data.nullToUnset;
    this.deletesEnabled = data.deletesEnabled;
    Object.freeze(this);
  }

  /**
   * Resolve the configuration of one table from a flat settings bag.
   * Either returns a complete configuration or throws; nothing partial
   * escapes.
   *
   * @throws ConfigError for the first setting that fails validation
   */
  static resolve(topic: string, keyspace: string, table: string, settings: SettingsBag): TableConfig {
    const schema = buildTableSettingsSchema(topic, keyspace, table);

    // Type and range checks for every setting before any interpretation
    for (const definition of settingDefinitions(schema)) {
      readSetting(definition, settings);
    }

    const pathPrefix = `topic.${topic}.${keyspace}.${table}`;
    const key = new TableKey(
      topic,
      parseTableIdentifier(keyspace, 'keyspace', pathPrefix),
      parseTableIdentifier(table, 'table', pathPrefix)
    );

    const mappingString = readSetting(schema.mapping, settings);
    const parsed = parseMapping(mappingString, schema.mapping.path);
    if (parsed.errors.length > 0) {
      throw ConfigError.invalidValue(
        schema.mapping.path,
        mappingString,
        indentLines(['Encountered the following errors:', ...parsed.errors]),
        'Fix every listed entry; each is written as column=key.field or column=value.field.'
      );
    }

    const clString = readSetting(schema.consistencyLevel, settings);
    const consistencyLevel = parseConsistencyLevel(clString);
    if (consistencyLevel === undefined) {
      throw ConfigError.invalidValue(
        schema.consistencyLevel.path,
        clString,
        `valid values include: ${CONSISTENCY_LEVELS.join(', ')}`
      );
    }

    return new TableConfig({
      key,
      rawKeyspace: keyspace,
      rawTable: table,
      mappingString,
      mapping: parsed.mapping,
      consistencyLevel,
      ttl: readSetting(schema.ttl, settings),
      nullToUnset: readSetting(schema.nullToUnset, settings),
      deletesEnabled: readSetting(schema.deletesEnabled, settings),
    });
  }

  get topicName(): string {
    return this.key.topic;
  }

  get keyspace(): Identifier {
    return this.key.keyspace;
  }

  get table(): Identifier {
    return this.key.table;
  }

  /** `keyspace.table`, quoted where CQL needs it */
  get keyspaceAndTable(): string {
    return `${this.keyspace.asCql(true)}.${this.table.asCql(true)}`;
  }

  /** Full path of one of this table's settings, spelled as configured */
  getSettingPath(setting: TableSettingName): string {
    return getTableSettingPath(this.topicName, this.rawKeyspace, this.rawTable, setting);
  }

  equals(other: TableConfig): boolean {
    return this.key.equals(other.key);
  }

  /** Equal configurations share a hash key */
  hashKey(): string {
    return this.key.id;
  }

  toString(): string {
    const mappingLines = this.mapping.toPathList().map((entry) => `      ${entry}`);
    return [
      `{keyspace: ${this.keyspace}, table: ${this.table}, cl: ${this.consistencyLevel}, ttl: ${this.ttl}, ` +
        `nullToUnset: ${this.nullToUnset}, deletesEnabled: ${this.deletesEnabled}, mapping:`,
      ...mappingLines,
      '}',
    ].join('\n');
  }
}

export function resolveTableConfig(
  topic: string,
  keyspace: string,
  table: string,
  settings: SettingsBag
): TableConfig {
  return TableConfig.resolve(topic, keyspace, table, settings);
}

/**
 * Collects the settings of one table, then resolves them.
 */
export class TableConfigBuilder {
  private readonly settings = new Map<string, string>();

  constructor(
    readonly topic: string,
    readonly keyspace: string,
    readonly table: string
  ) {}

  addSetting(key: string, value: string): this {
    this.settings.set(key, value);
    return this;
  }

  get settingKeys(): string[] {
    return Array.from(this.settings.keys());
  }

  build(): TableConfig {
    return TableConfig.resolve(this.topic, this.keyspace, this.table, Object.fromEntries(this.settings));
  }
}

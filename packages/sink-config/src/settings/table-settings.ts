/**
 * Per-table settings schema
 *
 * Each (topic, keyspace, table) triple gets its own schema whose setting
 * names are scoped under `topic.<topic>.<keyspace>.<table>.`, so one flat
 * settings bag can configure any number of tables.
 */

import { z } from 'zod';
import { DEFAULT_CONSISTENCY_LEVEL } from '@cqlsink/core';

export const TABLE_SETTING_NAMES = [
  'mapping',
  'deletesEnabled',
  'consistencyLevel',
  'ttl',
  'nullToUnset',
] as const;

export type TableSettingName = (typeof TABLE_SETTING_NAMES)[number];

/** Resolved value type of each table setting */
export interface TableSettingValues {
  mapping: string;
  deletesEnabled: boolean;
  consistencyLevel: string;
  ttl: number;
  nullToUnset: boolean;
}

export type SettingType = 'string' | 'boolean' | 'int';
export type SettingImportance = 'high' | 'medium' | 'low';

export interface SettingDefinition<T> {
  name: TableSettingName;
  /** Fully qualified path of the setting in the settings bag */
  path: string;
  type: SettingType;
  /** Absent for required settings */
  defaultValue?: T;
  importance: SettingImportance;
  documentation: string;
  /** Converts the raw string; its issue messages explain rejections */
  validator: z.ZodType<T, z.ZodTypeDef, string>;
}

export type TableSettingsSchema = {
  readonly [K in TableSettingName]: SettingDefinition<TableSettingValues[K]>;
};

/** Flat, string-keyed settings as supplied to the connector */
export type SettingsBag = Readonly<Record<string, string>>;

const INT_MIN = -2147483648;
const INT_MAX = 2147483647;

const stringSetting = z.string();

const booleanSetting = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(
    z.enum(['true', 'false'], {
      errorMap: () => ({ message: 'Expected value to be either true or false' }),
    })
  )
  .transform((value) => value === 'true');

function intSetting(atLeast?: number): z.ZodType<number, z.ZodTypeDef, string> {
  const bounded =
    atLeast === undefined ? z.number() : z.number().min(atLeast, `Value must be at least ${atLeast}`);

  return z
    .string()
    .transform((raw, ctx) => {
      const trimmed = raw.trim();
      const value = Number(trimmed);
      if (!/^[+-]?\d+$/.test(trimmed) || value < INT_MIN || value > INT_MAX) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Not a number of type INT' });
        return z.NEVER;
      }
      return value;
    })
    .pipe(bounded);
}

/**
 * Full path of a table setting, in the form
 * `topic.<topic>.<keyspace>.<table>.<setting>`.
 */
export function getTableSettingPath(
  topic: string,
  keyspace: string,
  table: string,
  setting: TableSettingName
): string {
  return `topic.${topic}.${keyspace}.${table}.${setting}`;
}

/**
 * Build the settings schema for one table. Pure: every call returns a fresh,
 * frozen schema and nothing is shared between triples.
 */
export function buildTableSettingsSchema(
  topic: string,
  keyspace: string,
  table: string
): TableSettingsSchema {
  const path = (setting: TableSettingName) => getTableSettingPath(topic, keyspace, table, setting);

  const schema: TableSettingsSchema = {
    mapping: {
      name: 'mapping',
      path: path('mapping'),
      type: 'string',
      importance: 'high',
      documentation: "Mapping of record fields to table columns, in the form of 'col1=value.f1, col2=key.f1'",
      validator: stringSetting,
    },
    deletesEnabled: {
      name: 'deletesEnabled',
      path: path('deletesEnabled'),
      type: 'boolean',
      defaultValue: true,
      importance: 'high',
      documentation: 'Whether to delete rows where only the primary key is non-null',
      validator: booleanSetting,
    },
    consistencyLevel: {
      name: 'consistencyLevel',
      path: path('consistencyLevel'),
      type: 'string',
      defaultValue: DEFAULT_CONSISTENCY_LEVEL,
      importance: 'high',
      documentation: 'Query consistency level',
      validator: stringSetting,
    },
    ttl: {
      name: 'ttl',
      path: path('ttl'),
      type: 'int',
      defaultValue: -1,
      importance: 'high',
      documentation: 'TTL of inserted rows in seconds; -1 means no TTL',
      validator: intSetting(-1),
    },
    nullToUnset: {
      name: 'nullToUnset',
      path: path('nullToUnset'),
      type: 'boolean',
      defaultValue: true,
      importance: 'high',
      documentation: 'Whether null field values are written as unset instead of null',
      validator: booleanSetting,
    },
  };
  return Object.freeze(schema);
}

export type AnySettingDefinition = SettingDefinition<TableSettingValues[TableSettingName]>;

/** Schema definitions in declaration order */
export function settingDefinitions(schema: TableSettingsSchema): AnySettingDefinition[] {
  return TABLE_SETTING_NAMES.map((name) => schema[name]);
}

export interface TableSettingDescription {
  name: TableSettingName;
  path: string;
  type: SettingType;
  /** Rendered default; absent for required settings */
  defaultValue?: string;
  importance: SettingImportance;
  documentation: string;
}

/**
 * Documentation of every table setting, in declaration order. Without
 * arguments the paths carry `<topic>`, `<keyspace>` and `<table>` placeholders.
 */
export function describeTableSettings(
  topic = '<topic>',
  keyspace = '<keyspace>',
  table = '<table>'
): TableSettingDescription[] {
  return settingDefinitions(buildTableSettingsSchema(topic, keyspace, table)).map((definition) => ({
    name: definition.name,
    path: definition.path,
    type: definition.type,
    defaultValue: definition.defaultValue === undefined ? undefined : String(definition.defaultValue),
    importance: definition.importance,
    documentation: definition.documentation,
  }));
}

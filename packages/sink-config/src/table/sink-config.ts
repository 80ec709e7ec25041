/**
 * Sink-wide table settings
 *
 * Splits one flat settings bag into per-table builders and resolves the
 * tables of every subscribed topic.
 */

import { ConnectorError } from '@cqlsink/core';
import { TABLE_SETTING_NAMES, type SettingsBag } from '../settings/index.js';
import { TableConfig, TableConfigBuilder } from './table-config.js';

/**
 * `topic.<topic>.<keyspace>.<table>.<setting>`; keyspace and table are either
 * dot-free or double-quoted.
 */
const TABLE_SETTING_PATTERN = new RegExp(
  `^topic\\.([a-zA-Z0-9._-]+)\\.([^."]+|"[^"]+")\\.([^."]+|"[^"]+")\\.(${TABLE_SETTING_NAMES.join('|')})$`
);

export interface TableSettingsGroups {
  /** One builder per (topic, keyspace, table), in first-seen order */
  builders: TableConfigBuilder[];
  /** `topic.*` keys that name no recognized table setting */
  ignored: string[];
}

export interface TopicConfig {
  topic: string;
  tables: TableConfig[];
}

export interface SinkConfig {
  topics: TopicConfig[];
  /** Keys that were not used for any subscribed topic's table */
  ignored: string[];
}

export function groupTableSettings(settings: SettingsBag): TableSettingsGroups {
  const builders = new Map<string, TableConfigBuilder>();
  const ignored: string[] = [];

  for (const [key, value] of Object.entries(settings)) {
    const match = TABLE_SETTING_PATTERN.exec(key);
    const [, topic, keyspace, table] = match ?? [];
    if (!topic || !keyspace || !table) {
      if (key.startsWith('topic.')) {
        ignored.push(key);
      }
      continue;
    }

    const id = JSON.stringify([topic, keyspace, table]);
    let builder = builders.get(id);
    if (!builder) {
      builder = new TableConfigBuilder(topic, keyspace, table);
      builders.set(id, builder);
    }
    builder.addSetting(key, value);
  }

  return { builders: Array.from(builders.values()), ignored };
}

/**
 * Resolve the tables of every listed topic.
 *
 * @throws ConnectorError if a listed topic has no table, or one table is
 *   configured twice under equal identifiers (e.g. `ks` and `KS`)
 * @throws ConfigError from the first table that fails to resolve
 */
export function resolveSinkConfig(settings: SettingsBag, topics: readonly string[]): SinkConfig {
  const { builders, ignored } = groupTableSettings(settings);
  const byTopic = new Map<string, TableConfig[]>(topics.map((topic) => [topic, []]));

  const subscribed = builders.filter((builder) => byTopic.has(builder.topic));
  for (const builder of builders) {
    if (!byTopic.has(builder.topic)) {
      ignored.push(...builder.settingKeys);
    }
  }

  for (const topic of byTopic.keys()) {
    if (!subscribed.some((builder) => builder.topic === topic)) {
      throw new ConnectorError({
        code: 'CONFIGURATION_ERROR',
        message: `Topic '${topic}' has no table mappings configured`,
        suggestion: `Add settings such as topic.${topic}.<keyspace>.<table>.mapping.`,
        context: { topic },
      });
    }
  }

  const seen = new Map<string, TableConfig>();
  for (const builder of subscribed) {
    const config = builder.build();
    const previous = seen.get(config.hashKey());
    if (previous) {
      throw new ConnectorError({
        code: 'CONFIGURATION_ERROR',
        message: `Table ${config.keyspaceAndTable} is configured more than once for topic '${config.topicName}'`,
        suggestion: `Keep only one of ${previous.getSettingPath('mapping')} and ${config.getSettingPath('mapping')}.`,
        context: { topic: config.topicName, table: config.keyspaceAndTable },
      });
    }
    seen.set(config.hashKey(), config);
    byTopic.get(builder.topic)?.push(config);
  }

  return {
    topics: Array.from(byTopic, ([topic, tables]) => ({ topic, tables })),
    ignored,
  };
}

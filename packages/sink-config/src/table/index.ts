/**
 * Table configuration exports
 */

export { TableKey } from './table-key.js';
export { TableConfig, TableConfigBuilder, resolveTableConfig } from './table-config.js';
export type { TableConfigData } from './table-config.js';
export { groupTableSettings, resolveSinkConfig } from './sink-config.js';
export type { TableSettingsGroups, TopicConfig, SinkConfig } from './sink-config.js';

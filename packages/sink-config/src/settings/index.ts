/**
 * Settings module exports
 */

export {
  TABLE_SETTING_NAMES,
  getTableSettingPath,
  buildTableSettingsSchema,
  settingDefinitions,
  describeTableSettings,
} from './table-settings.js';
export type {
  TableSettingName,
  TableSettingValues,
  SettingType,
  SettingImportance,
  SettingDefinition,
  AnySettingDefinition,
  TableSettingsSchema,
  SettingsBag,
  TableSettingDescription,
} from './table-settings.js';
export { readSetting } from './read-setting.js';

/**
 * Reading settings through their schema definitions
 */

import { ConfigError } from '@cqlsink/core';
import type { SettingDefinition, SettingsBag } from './table-settings.js';

/**
 * Value of one setting: the validated bag entry, or the default when absent.
 * @throws ConfigError if the value is rejected or a required setting is missing
 */
export function readSetting<T>(definition: SettingDefinition<T>, settings: SettingsBag): T {
  const raw = settings[definition.path];

  if (raw === undefined) {
    if (definition.defaultValue === undefined) {
      throw ConfigError.missing(definition.path);
    }
    return definition.defaultValue;
  }

  const result = definition.validator.safeParse(raw);
  if (!result.success) {
    const explanation = result.error.issues.map((issue) => issue.message).join('; ');
    throw ConfigError.invalidValue(definition.path, raw, explanation);
  }
  return result.data;
}

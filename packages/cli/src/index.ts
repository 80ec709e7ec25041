/**
 * @cqlsink/cli
 *
 * Configuration file loading, logging and validation behind the cqlsink command
 */

export {
  configFileSchema,
  expandEnvVars,
  formatZodError,
  loadConfigFile,
  loadRecordSchema,
  parseConfigFile,
} from './config.js';
export type { ConfigFile, EnvExpansionOptions } from './config.js';
export { Logger, redactSecrets } from './logger.js';
export type { LogLevel, LogFormat, LoggerOptions } from './logger.js';
export { formatTableSettingsHelp } from './settings-help.js';
export { validateConnectorConfig } from './validate.js';
export type { FieldTypeReport, TableReport, ValidationReport, RecordSchemas } from './validate.js';

/**
 * Configuration errors
 *
 * Raised when a setting of the flat settings bag cannot be turned into a
 * resolved value. Always names the setting path; carries the offending raw
 * value when there was one.
 */

import { singleQuote } from '../utils/strings.js';
import { ConnectorError } from './connector-error.js';

export class ConfigError extends ConnectorError {
  readonly settingPath: string;
  readonly value?: string;

  private constructor(settingPath: string, value: string | undefined, message: string, suggestion?: string) {
    super({
      code: 'CONFIGURATION_ERROR',
      message,
      suggestion,
      context: value === undefined ? { settingPath } : { settingPath, value },
    });
    this.name = 'ConfigError';
    this.settingPath = settingPath;
    this.value = value;
  }

  /**
   * A setting was present but its value is not acceptable.
   *
   * @example
   * ConfigError.invalidValue('topic.t.ks.tbl.ttl', '-2', 'Value must be at least -1').message
   * // "Invalid value '-2' for configuration topic.t.ks.tbl.ttl: Value must be at least -1"
   */
  static invalidValue(
    settingPath: string,
    value: string,
    explanation: string,
    suggestion?: string
  ): ConfigError {
    return new ConfigError(
      settingPath,
      value,
      `Invalid value ${singleQuote(value)} for configuration ${settingPath}: ${explanation}`,
      suggestion
    );
  }

  /** A required setting without default is absent from the settings bag. */
  static missing(settingPath: string): ConfigError {
    return new ConfigError(
      settingPath,
      undefined,
      `Missing required configuration "${settingPath}" which has no default value.`,
      `Add "${settingPath}" to the connector settings.`
    );
  }
}

import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Context setting a {@link ConfigurationError} was raised for. */
export type ConfigurationSetting = 'hostName' | 'credentials';

/**
 * Error thrown while constructing a data context with settings it cannot work with:
 * an unrecognized host name or invalid credentials.
 */
export class ConfigurationError extends Error {
  /** ConfigurationError error-name */
  static name = 'ConfigurationError';
  /** Setting that was rejected */
  #setting: ConfigurationSetting;

  /** Creates a new instance of a ConfigurationError for the rejected setting */
  constructor(message: string, setting: ConfigurationSetting, opts?: ErrorOptions) {
    super(message, opts);
    this.#setting = setting;
  }

  /** Setting that was rejected */
  get setting(): ConfigurationSetting {
    return this.#setting;
  }
}

/**
 * Type guard for {@link ConfigurationError}.
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return isErrorType(ConfigurationError, error);
}

/**
 * Extract a {@link ConfigurationError} from an unknown error value, following nested causes.
 */
export function getConfigurationError(error: unknown): ConfigurationError | null {
  return unwrapErrorType(ConfigurationError, error);
}

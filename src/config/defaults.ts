/**
 * Default configuration values
 *
 * Provides the default configuration used when no config file exists
 * or when fields are omitted from the user's configuration.
 *
 * @module config/defaults
 */

import type { Config } from './schema';

/**
 * Default configuration.
 *
 * No image reference is set: it must come from the config file or
 * the CONFTEST_IMAGE_REF environment variable.
 */
export const DEFAULT_CONFIG: Config = {
  version: '1',
  conftest: {
    serviceAccountName: 'config-audit',
    policiesConfigMap: 'policies',
  },
};

/**
 * Default configuration file name.
 */
export const DEFAULT_CONFIG_FILENAME = '.config-audit.yml';

/**
 * Alternative configuration file names (checked in order).
 */
export const ALTERNATIVE_CONFIG_FILENAMES = [
  '.config-audit.yaml',
  'config-audit.yml',
  'config-audit.yaml',
];

/**
 * Environment variable overriding `conftest.imageRef`.
 */
export const IMAGE_REF_ENV_VAR = 'CONFTEST_IMAGE_REF';

/**
 * Get a fresh copy of the default configuration.
 * Returns a deep copy to prevent accidental mutation.
 *
 * @returns Deep copy of default configuration
 */
export function getDefaultConfig(): Config {
  return JSON.parse(JSON.stringify(DEFAULT_CONFIG)) as Config;
}

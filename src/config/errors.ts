/**
 * Configuration errors shared by the loader and the plugin.
 *
 * @module config/errors
 */

/**
 * Error thrown when a required setting is unresolved or malformed.
 * The plugin surfaces it from both scan job building and result parsing.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

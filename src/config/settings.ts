/**
 * Plugin settings accessor
 *
 * Exposes the resolved configuration through the narrow interface
 * the Conftest plugin consumes.
 *
 * @module config/settings
 */

import type { Config } from './schema';
import { ConfigError } from './errors';

/**
 * Configuration collaborator consulted by the Conftest plugin.
 */
export interface ConftestSettings {
  /**
   * @throws ConfigError if no image reference is configured
   */
  getConftestImageRef(): string;

  /** Service account the scan job runs as */
  getServiceAccountName(): string;

  /** ConfigMap holding the policy bundle */
  getPoliciesConfigMap(): string;
}

/**
 * Read-only view over a validated configuration.
 */
export class PluginSettings implements ConftestSettings {
  constructor(private readonly config: Config) {}

  getConftestImageRef(): string {
    const imageRef = this.config.conftest.imageRef?.trim();
    if (!imageRef) {
      throw new ConfigError(
        "Conftest image reference is not set. Set 'conftest.imageRef' in the configuration " +
          'or the CONFTEST_IMAGE_REF environment variable.'
      );
    }
    return imageRef;
  }

  getServiceAccountName(): string {
    return this.config.conftest.serviceAccountName;
  }

  getPoliciesConfigMap(): string {
    return this.config.conftest.policiesConfigMap;
  }
}

/**
 * Configuration schema definitions using Zod
 *
 * Defines the validation schema for the plugin configuration file.
 * All configuration is validated against this schema at runtime.
 *
 * @module config/schema
 */

import { z } from 'zod';

/**
 * Kubernetes object names (RFC 1123 subdomain).
 */
const K8S_NAME_PATTERN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?(\.[a-z0-9]([-a-z0-9]*[a-z0-9])?)*$/;

const KubernetesNameSchema = z.string().min(1).max(253).regex(K8S_NAME_PATTERN, {
  message: 'Must be a lowercase RFC 1123 subdomain name',
});

/**
 * Conftest plugin configuration.
 */
export const ConftestConfigSchema = z.object({
  /** Conftest container image reference (e.g., openpolicyagent/conftest:v0.25.0) */
  imageRef: z.string().min(1).max(512).optional(),

  /** Service account the scan job runs as */
  serviceAccountName: KubernetesNameSchema.default('config-audit'),

  /** ConfigMap holding the policy bundle */
  policiesConfigMap: KubernetesNameSchema.default('policies'),
});
export type ConftestConfig = z.infer<typeof ConftestConfigSchema>;

/**
 * Root configuration schema.
 * This is the complete schema for .config-audit.yml
 */
export const RootConfigSchema = z.object({
  /** Schema version (currently only "1" is supported) */
  version: z.literal('1').default('1'),

  /** Conftest plugin settings */
  conftest: ConftestConfigSchema.optional().default({}),
});

/**
 * Fully resolved configuration type (after defaults applied).
 */
export type Config = z.infer<typeof RootConfigSchema>;

/**
 * Partial configuration type (as provided by user before defaults).
 */
export type PartialConfig = z.input<typeof RootConfigSchema>;

/**
 * Configuration validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: z.ZodError['errors']
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format validation errors as a human-readable string.
   */
  formatErrors(): string {
    return this.errors
      .map((err) => {
        const path = err.path.join('.');
        return path ? `  - ${path}: ${err.message}` : `  - ${err.message}`;
      })
      .join('\n');
  }
}

/**
 * Validate and parse configuration object.
 *
 * @param data - Raw configuration data to validate
 * @returns Validated and typed configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(data: unknown): Config {
  const result = RootConfigSchema.safeParse(data);

  if (!result.success) {
    throw new ConfigValidationError('Configuration validation failed', result.error.errors);
  }

  return result.data;
}

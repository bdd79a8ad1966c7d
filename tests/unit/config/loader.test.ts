/**
 * @file Configuration Loader Tests
 * @description Unit tests for the configuration loading and validation system.
 *
 * Key test scenarios:
 * - Valid YAML parsing
 * - Invalid YAML handling
 * - Schema validation errors
 * - Default value merging
 * - Environment overrides
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import * as core from '@actions/core';

import { loadConfig, ConfigParseError } from '../../../src/config/loader';
import { ConfigValidationError } from '../../../src/config/schema';
import { DEFAULT_CONFIG } from '../../../src/config/defaults';

// Mock @actions/core
vi.mock('@actions/core', () => ({
  debug: vi.fn(),
  warning: vi.fn(),
  info: vi.fn(),
}));

describe('config loader', () => {
  let testDir: string;

  beforeEach(() => {
    vi.clearAllMocks();
    testDir = join(
      tmpdir(),
      `config-audit-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`
    );
    mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    try {
      rmSync(testDir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  describe('loadConfig', () => {
    describe('default config generation', () => {
      it('returns defaults when no config file exists', async () => {
        const result = await loadConfig({ workingDirectory: testDir, env: {} });

        expect(result.usingDefaults).toBe(true);
        expect(result.configFile).toBeNull();
        expect(result.config).toEqual(DEFAULT_CONFIG);
      });

      it('emits debug message when using defaults', async () => {
        await loadConfig({ workingDirectory: testDir, env: {} });

        expect(core.debug).toHaveBeenCalledWith('No configuration file found, using defaults');
      });

      it('warns when explicit config path not found', async () => {
        await loadConfig({
          workingDirectory: testDir,
          configPath: 'custom-config.yml',
          env: {},
        });

        expect(core.warning).toHaveBeenCalledWith(
          "Configuration file not found at 'custom-config.yml', using defaults"
        );
      });
    });

    describe('valid YAML parsing', () => {
      it('parses valid YAML configuration', async () => {
        const configContent = `
version: "1"
conftest:
  imageRef: example.com/conftest:v0.25.0
  serviceAccountName: audit-runner
  policiesConfigMap: conftest-policies
`;
        writeFileSync(join(testDir, '.config-audit.yml'), configContent);

        const result = await loadConfig({ workingDirectory: testDir, env: {} });

        expect(result.usingDefaults).toBe(false);
        expect(result.configFile).toBe(join(testDir, '.config-audit.yml'));
        expect(result.config.conftest).toEqual({
          imageRef: 'example.com/conftest:v0.25.0',
          serviceAccountName: 'audit-runner',
          policiesConfigMap: 'conftest-policies',
        });
      });

      it('finds alternative config filenames', async () => {
        writeFileSync(
          join(testDir, '.config-audit.yaml'),
          'version: "1"\nconftest:\n  imageRef: conftest:v1'
        );

        const result = await loadConfig({ workingDirectory: testDir, env: {} });

        expect(result.usingDefaults).toBe(false);
        expect(result.config.conftest.imageRef).toBe('conftest:v1');
      });

      it('handles empty config file', async () => {
        writeFileSync(join(testDir, '.config-audit.yml'), '');

        const result = await loadConfig({ workingDirectory: testDir, env: {} });

        expect(result.usingDefaults).toBe(true);
        expect(result.config).toEqual(DEFAULT_CONFIG);
        expect(core.debug).toHaveBeenCalledWith('Configuration file is empty, using defaults');
      });

      it('handles config with only comments', async () => {
        writeFileSync(
          join(testDir, '.config-audit.yml'),
          '# This is a comment\n# Another comment'
        );

        const result = await loadConfig({ workingDirectory: testDir, env: {} });

        expect(result.usingDefaults).toBe(true);
      });
    });

    describe('invalid YAML syntax', () => {
      it('throws ConfigParseError for invalid YAML', async () => {
        writeFileSync(join(testDir, '.config-audit.yml'), 'invalid: yaml: content:\n  - broken');

        await expect(loadConfig({ workingDirectory: testDir, env: {} })).rejects.toThrow(
          ConfigParseError
        );
      });

      it('includes file path in parse error', async () => {
        writeFileSync(join(testDir, '.config-audit.yml'), 'invalid: yaml: : :bad');

        try {
          await loadConfig({ workingDirectory: testDir, env: {} });
          expect.fail('Should have thrown');
        } catch (error) {
          expect(error).toBeInstanceOf(ConfigParseError);
          expect((error as ConfigParseError).filePath).toBe(join(testDir, '.config-audit.yml'));
        }
      });

      it('rejects a top-level sequence', async () => {
        writeFileSync(join(testDir, '.config-audit.yml'), '- conftest\n- policies');

        await expect(loadConfig({ workingDirectory: testDir, env: {} })).rejects.toThrow(
          'Configuration file must contain a YAML mapping at the top level'
        );
      });
    });

    describe('schema validation errors', () => {
      it('throws ConfigValidationError for unsupported version', async () => {
        writeFileSync(join(testDir, '.config-audit.yml'), 'version: "2"');

        await expect(loadConfig({ workingDirectory: testDir, env: {} })).rejects.toThrow(
          ConfigValidationError
        );
      });

      it('reports the failing field for an invalid service account name', async () => {
        writeFileSync(
          join(testDir, '.config-audit.yml'),
          'conftest:\n  serviceAccountName: Audit_Runner'
        );

        try {
          await loadConfig({ workingDirectory: testDir, env: {} });
          expect.fail('Should have thrown');
        } catch (error) {
          expect(error).toBeInstanceOf(ConfigValidationError);
          const validationError = error as ConfigValidationError;
          expect(validationError.formatErrors()).toBe(
            '  - conftest.serviceAccountName: Must be a lowercase RFC 1123 subdomain name'
          );
          expect(validationError.message).toContain('.config-audit.yml');
        }
      });
    });

    describe('merge behaviour', () => {
      it('merges user config with defaults', async () => {
        writeFileSync(
          join(testDir, '.config-audit.yml'),
          'conftest:\n  imageRef: openpolicyagent/conftest:v0.25.0'
        );

        const result = await loadConfig({ workingDirectory: testDir, env: {} });

        expect(result.config.version).toBe('1');
        expect(result.config.conftest.imageRef).toBe('openpolicyagent/conftest:v0.25.0');
        expect(result.config.conftest.serviceAccountName).toBe('config-audit');
        expect(result.config.conftest.policiesConfigMap).toBe('policies');
      });

      it('treats an empty conftest section as defaults', async () => {
        writeFileSync(join(testDir, '.config-audit.yml'), 'version: "1"\nconftest:');

        const result = await loadConfig({ workingDirectory: testDir, env: {} });

        expect(result.config.conftest).toEqual(DEFAULT_CONFIG.conftest);
      });
    });

    describe('environment overrides', () => {
      it('reads the image reference from CONFTEST_IMAGE_REF without a config file', async () => {
        const result = await loadConfig({
          workingDirectory: testDir,
          env: { CONFTEST_IMAGE_REF: 'example.com/conftest:v0.30.0' },
        });

        expect(result.usingDefaults).toBe(true);
        expect(result.config.conftest.imageRef).toBe('example.com/conftest:v0.30.0');
      });

      it('prefers CONFTEST_IMAGE_REF over the config file', async () => {
        writeFileSync(
          join(testDir, '.config-audit.yml'),
          'conftest:\n  imageRef: example.com/conftest:v0.25.0'
        );

        const result = await loadConfig({
          workingDirectory: testDir,
          env: { CONFTEST_IMAGE_REF: 'example.com/conftest:v0.30.0' },
        });

        expect(result.config.conftest.imageRef).toBe('example.com/conftest:v0.30.0');
      });

      it('ignores a blank CONFTEST_IMAGE_REF', async () => {
        writeFileSync(
          join(testDir, '.config-audit.yml'),
          'conftest:\n  imageRef: example.com/conftest:v0.25.0'
        );

        const result = await loadConfig({
          workingDirectory: testDir,
          env: { CONFTEST_IMAGE_REF: '   ' },
        });

        expect(result.config.conftest.imageRef).toBe('example.com/conftest:v0.25.0');
      });
    });

    describe('custom config path', () => {
      it('loads from custom config path', async () => {
        mkdirSync(join(testDir, 'config'), { recursive: true });
        writeFileSync(
          join(testDir, 'config', 'audit.yml'),
          'conftest:\n  policiesConfigMap: team-policies'
        );

        const result = await loadConfig({
          workingDirectory: testDir,
          configPath: 'config/audit.yml',
          env: {},
        });

        expect(result.config.conftest.policiesConfigMap).toBe('team-policies');
        expect(result.configFile).toBe(join(testDir, 'config', 'audit.yml'));
      });
    });
  });
});

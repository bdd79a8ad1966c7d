/**
 * Conftest config audit plugin
 *
 * Audits Kubernetes workloads with the official Conftest image and a fixed
 * bundle of Rego policies.
 *
 * @module plugin/conftest
 */

import type { Readable } from 'stream';
import { text } from 'stream/consumers';
import type { KubernetesObject } from '@kubernetes/client-node';

import type { ConftestSettings } from '../../config/settings';
import type {
  ConfigAuditPlugin,
  ConfigAuditResult,
  GroupVersionKind,
  ScanJobSpec,
  Scanner,
} from '../types';
import { UUIDGenerator, type Clock, type IDGenerator } from '../../utils/ext';
import { Logger } from '../../utils/logger';
import { CONFTEST_CONTAINER_NAME, buildScanJob } from './job-spec';
import {
  ParseError,
  buildConfigAuditResult,
  decodeConftestOutput,
  getConftestScanner,
  type ConftestCheckResult,
} from './result';

type ScannerResolution = { scanner: Scanner } | { error: unknown };

/**
 * Optional collaborators for the plugin.
 */
export interface ConftestPluginOptions {
  /** Names the per-audit secret (default: UUID v4) */
  idGenerator?: IDGenerator;
  logger?: Logger;
}

/**
 * Config audit plugin backed by Conftest.
 */
export class ConftestPlugin implements ConfigAuditPlugin {
  private readonly idGenerator: IDGenerator;
  private readonly logger: Logger;

  constructor(
    private readonly clock: Clock,
    private readonly settings: ConftestSettings,
    options: ConftestPluginOptions = {}
  ) {
    this.idGenerator = options.idGenerator ?? new UUIDGenerator();
    this.logger = options.logger ?? new Logger();
  }

  /**
   * @throws ConfigError if the Conftest image reference is not set
   * @throws SerializationError if the workload cannot be serialised
   */
  getScanJobSpec(workload: KubernetesObject, gvk: GroupVersionKind): ScanJobSpec {
    const imageRef = this.settings.getConftestImageRef();
    const secretName = this.idGenerator.generateID();

    const spec = buildScanJob(workload, gvk, {
      imageRef,
      secretName,
      serviceAccountName: this.settings.getServiceAccountName(),
      policiesConfigMap: this.settings.getPoliciesConfigMap(),
    });

    this.logger.debug(
      `Built Conftest scan job for ${gvk.kind}/${workload.metadata?.name ?? '<unnamed>'} ` +
        `with secret ${secretName}`
    );

    return spec;
  }

  getContainerName(): string {
    return CONFTEST_CONTAINER_NAME;
  }

  /**
   * @throws ParseError if the logs are not Conftest JSON output
   * @throws ConfigError if the scanner version cannot be resolved
   */
  async parseConfigAuditResult(logs: Readable): Promise<ConfigAuditResult> {
    let output: string;
    try {
      output = await text(logs);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return this.fail(
        new ParseError(
          `Failed to read Conftest output: ${message}`,
          error instanceof Error ? error : undefined
        ),
        this.resolveScanner()
      );
    }
    return this.parseConfigAuditOutput(output);
  }

  /**
   * Parse Conftest output that has already been read into memory.
   *
   * The scanner version is resolved even when decoding fails, so a
   * ParseError carries it; a decoding failure wins over a version failure.
   *
   * @throws ParseError if the output is not Conftest JSON output
   * @throws ConfigError if the scanner version cannot be resolved
   */
  parseConfigAuditOutput(output: string): ConfigAuditResult {
    let results: ConftestCheckResult[] = [];
    let decodeError: ParseError | undefined;
    try {
      results = decodeConftestOutput(output);
    } catch (error) {
      if (!(error instanceof ParseError)) {
        throw error;
      }
      decodeError = error;
    }

    const resolved = this.resolveScanner();

    if (decodeError) {
      return this.fail(decodeError, resolved);
    }
    if ('error' in resolved) {
      throw resolved.error;
    }

    const result = buildConfigAuditResult(results, resolved.scanner, this.clock.now());
    this.logger.debug(
      `Parsed Conftest output: ${result.summary.warningCount} warning(s), ` +
        `${result.summary.dangerCount} danger(s)`
    );
    return result;
  }

  private resolveScanner(): ScannerResolution {
    try {
      return { scanner: getConftestScanner(this.settings.getConftestImageRef()) };
    } catch (error) {
      return { error };
    }
  }

  /**
   * Re-throw a parse error, attaching the scanner identity when known.
   */
  private fail(error: ParseError, resolved: ScannerResolution): never {
    this.logger.debug(error.message);
    if ('scanner' in resolved) {
      throw new ParseError(error.message, error.cause, resolved.scanner);
    }
    throw error;
  }
}

/**
 * Construct a config audit plugin that uses the official Conftest image.
 */
export function createConftestPlugin(
  clock: Clock,
  settings: ConftestSettings,
  options: ConftestPluginOptions = {}
): ConfigAuditPlugin {
  return new ConftestPlugin(clock, settings, options);
}

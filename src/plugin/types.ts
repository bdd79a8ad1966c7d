/**
 * Config audit plugin type definitions
 *
 * Defines the plugin contract shared by policy scanners and the
 * normalised result schema handed to reporting.
 *
 * @module plugin/types
 */

import type { Readable } from 'stream';
import type { KubernetesObject, V1PodSpec, V1Secret } from '@kubernetes/client-node';

/**
 * Severity levels for configuration checks.
 */
export type CheckSeverity = 'WARNING' | 'DANGER';

/**
 * Group, version and kind of a Kubernetes object.
 */
export interface GroupVersionKind {
  /** API group; empty for the core group */
  group: string;
  version: string;
  kind: string;
}

/**
 * A single normalised configuration check.
 */
export interface Check {
  /** Identifier of the check within its result */
  id: string;

  severity: CheckSeverity;

  /** Human-readable message reported by the scanner */
  message: string;

  category: string;
}

/**
 * Scanner identity.
 */
export interface Scanner {
  name: string;
  vendor: string;
  version: string;
}

/**
 * Check counts by outcome.
 */
export interface ConfigAuditSummary {
  passCount: number;
  warningCount: number;
  dangerCount: number;
}

/**
 * Normalised result of auditing one workload.
 */
export interface ConfigAuditResult {
  /** When the result was produced */
  updateTimestamp: Date;

  scanner: Scanner;

  summary: ConfigAuditSummary;

  /** Checks that apply to the workload as a whole */
  podChecks: Check[];

  /** Checks keyed by container name */
  containerChecks: Record<string, Check[]>;
}

/**
 * Specification of a scan job: the pod to run and the secrets it mounts.
 * The orchestrator creates the secrets before the pod and deletes them
 * once the job completes.
 */
export interface ScanJobSpec {
  podSpec: V1PodSpec;
  secrets: V1Secret[];
}

/**
 * Interface that all config audit plugins must implement.
 */
export interface ConfigAuditPlugin {
  /**
   * Build the pod that audits a workload.
   *
   * @param workload - Object under audit; its apiVersion and kind are overwritten from gvk
   * @param gvk - Resolved group, version and kind of the workload
   */
  getScanJobSpec(workload: KubernetesObject, gvk: GroupVersionKind): ScanJobSpec;

  /** Name of the container whose logs carry the scan output */
  getContainerName(): string;

  /**
   * Read the scan container's logs to completion and normalise them.
   */
  parseConfigAuditResult(logs: Readable): Promise<ConfigAuditResult>;
}


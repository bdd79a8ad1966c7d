/**
 * Conftest output parsing
 *
 * Decodes the JSON that `conftest test --output json` writes and maps each
 * warning and failure onto a normalised check.
 *
 * @module plugin/conftest/result
 */

import { z } from 'zod';

import type { Check, ConfigAuditResult, Scanner } from '../types';
import { getVersionFromImageRef } from '../../utils/image-ref';

export const SCANNER_NAME = 'Conftest';
export const SCANNER_VENDOR = 'Open Policy Agent';

/** Category assigned to every Conftest check */
export const DEFAULT_CATEGORY = 'Security';

/**
 * A single warning or failure. Conftest writes the text under `msg`.
 */
const ConftestMessageSchema = z.object({
  msg: z.string().optional(),
  message: z.string().optional(),
  metadata: z.record(z.unknown()).optional(),
});

/**
 * Result for one resource document.
 */
const ConftestCheckResultSchema = z.object({
  filename: z.string().optional(),
  namespace: z.string().optional(),
  successes: z.number().optional(),
  warnings: z.array(ConftestMessageSchema).nullish(),
  failures: z.array(ConftestMessageSchema).nullish(),
});

const ConftestOutputSchema = z.array(ConftestCheckResultSchema);

export type ConftestMessage = z.infer<typeof ConftestMessageSchema>;
export type ConftestCheckResult = z.infer<typeof ConftestCheckResultSchema>;

/**
 * Error thrown when Conftest output is not the expected JSON array.
 */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
    /** Scanner identity, when it could still be resolved */
    public readonly scanner?: Scanner
  ) {
    super(message);
    this.name = 'ParseError';
  }
}

/**
 * Decode Conftest JSON output.
 *
 * @throws ParseError if the text is not JSON or not an array of check results
 */
export function decodeConftestOutput(output: string): ConftestCheckResult[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(output);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ParseError(
      `Failed to parse Conftest JSON output: ${message}`,
      error instanceof Error ? error : undefined
    );
  }

  const result = ConftestOutputSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.errors
      .map((err) => (err.path.length > 0 ? `${err.path.join('.')}: ${err.message}` : err.message))
      .join('; ');
    throw new ParseError(`Unexpected Conftest output structure: ${issues}`, result.error);
  }

  return result.data;
}

/**
 * Flatten check results into normalised checks.
 *
 * Warnings come before failures within each record. Identifiers are the
 * position within the record's warnings or failures, so they repeat
 * across records.
 */
export function toChecks(results: ConftestCheckResult[]): {
  checks: Check[];
  warningCount: number;
  dangerCount: number;
} {
  const checks: Check[] = [];
  let warningCount = 0;
  let dangerCount = 0;

  for (const result of results) {
    // TODO Use the policy rule name as the check ID once Conftest output carries it
    (result.warnings ?? []).forEach((warning, i) => {
      checks.push({
        id: `warning ${i}`,
        severity: 'WARNING',
        message: messageOf(warning),
        category: DEFAULT_CATEGORY,
      });
      warningCount++;
    });

    (result.failures ?? []).forEach((failure, i) => {
      checks.push({
        id: `failure ${i}`,
        severity: 'DANGER',
        message: messageOf(failure),
        category: DEFAULT_CATEGORY,
      });
      dangerCount++;
    });
  }

  return { checks, warningCount, dangerCount };
}

function messageOf(entry: ConftestMessage): string {
  return entry.msg ?? entry.message ?? '';
}

/**
 * Scanner identity for a Conftest image.
 *
 * @throws VersionError if the image reference is malformed
 */
export function getConftestScanner(imageRef: string): Scanner {
  return {
    name: SCANNER_NAME,
    vendor: SCANNER_VENDOR,
    version: getVersionFromImageRef(imageRef),
  };
}

/**
 * Assemble the audit result.
 * Conftest's own success tally is not read; passCount is always zero.
 */
export function buildConfigAuditResult(
  results: ConftestCheckResult[],
  scanner: Scanner,
  timestamp: Date
): ConfigAuditResult {
  const { checks, warningCount, dangerCount } = toChecks(results);

  return {
    updateTimestamp: timestamp,
    scanner,
    summary: {
      passCount: 0,
      warningCount,
      dangerCount,
    },
    podChecks: checks,
    containerChecks: {},
  };
}

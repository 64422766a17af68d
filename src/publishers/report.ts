/**
 * Unpublish report generation and persistence
 *
 * Naming convention: unpublish-{timestamp}.json or unpublish-dryrun-{timestamp}.json
 */

import * as fs from 'fs';
import * as path from 'path';
import type {
  DatasetRequest,
  EventKind,
  OperationReport,
  RegistryOperation,
  RepublishCandidate,
  UnpublishReport,
} from '../config/types.js';
import { logger } from '../utils/logger.js';

export interface UnpublishReportInput {
  requests: DatasetRequest[];
  unresolved: string[];
  registryOperation: RegistryOperation;
  phases: UnpublishReport['phases'];
  outcomes: Map<string, EventKind>;
  republish: RepublishCandidate[];
  dryRun: boolean;
  error?: string;
}

function isFailure(kind: EventKind): boolean {
  return kind.endsWith('-failed');
}

export function buildUnpublishReport(input: UnpublishReportInput): UnpublishReport {
  const outcomes = Object.fromEntries(input.outcomes);
  const kinds = [...input.outcomes.values()];
  const requested = new Set(input.requests.map(r => r.identifier)).size;

  return {
    operationType: 'unpublish',
    timestamp: new Date().toISOString(),
    success: input.error === undefined,
    dryRun: input.dryRun,
    error: input.error,
    registryOperation: input.registryOperation,
    phases: input.phases,
    summary: {
      requested,
      resolved: requested - input.unresolved.length,
      registrySucceeded: kinds.filter(k => !isFailure(k)).length,
      registryFailed: kinds.filter(isFailure).length,
      republishCandidates: input.republish.length,
    },
    details: {
      outcomes,
      republish: input.republish,
      unresolved: input.unresolved,
    },
  };
}

/**
 * Save an operation report to disk.
 *
 * @returns The path of the saved report file.
 */
export function saveOperationReport(report: OperationReport, outputDir: string): string {
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }

  const timestamp = report.timestamp.replace(/[:.]/g, '-');
  const dryRunSuffix = report.dryRun ? '-dryrun' : '';
  const filepath = path.join(outputDir, `${report.operationType}${dryRunSuffix}-${timestamp}.json`);

  fs.writeFileSync(filepath, JSON.stringify(report, null, 2));
  logger.success(`Report saved: ${filepath}`);

  return filepath;
}

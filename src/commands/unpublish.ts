/**
 * Unpublish command handler - retract or delete datasets listed on the command line or in a
 * spreadsheet
 *
 * Pipeline: parse requests -> resolve (preview) -> dry-run OR (confirm -> run phases -> report)
 *
 * @returns process exit code
 */

import * as fs from 'fs';
import * as path from 'path';

import { loadSettings } from '../config/settings.js';
import type { UnpublishSettings } from '../config/settings.js';
import { ALL_VERSIONS } from '../config/types.js';
import type { DatasetRequest, RegistryOperation, RepublishCandidate, UnpublishReport } from '../config/types.js';
import type { DeletionResult, DeletionRunOptions, RepublishingDeletionResult, UnpublishCommandOptions } from '../config/unpublish-types.js';
import { parseDatasetRequests, parseRequestSpec } from '../parsers/dataset-id-parser.js';
import { DeletionCoordinator, parseRegistryOperation } from '../processors/deletion-coordinator.js';
import type { ResolvedRequests } from '../processors/deletion-coordinator.js';
import { buildUnpublishReport, saveOperationReport } from '../publishers/report.js';
import { confirmAction } from '../utils/cli-helpers.js';
import { errorMessage, isUnpublishError } from '../utils/errors.js';
import { logger, setVerbose } from '../utils/logger.js';

export const REQUEST_TAB = 'Datasets to unpublish';

function collectRequests(specs: string[], options: UnpublishCommandOptions): { requests: DatasetRequest[]; errors: string[] } {
  const requests: DatasetRequest[] = [];
  const errors: string[] = [];
  const defaultVersion = options.version ?? ALL_VERSIONS;
  // identifier -> where it was first requested
  const origins = new Map<string, string>();

  const add = (request: DatasetRequest, origin: string): void => {
    const first = origins.get(request.identifier);
    if (first !== undefined) {
      errors.push(`Duplicate request for "${request.identifier}": ${origin} repeats ${first}`);
      return;
    }
    origins.set(request.identifier, origin);
    requests.push(request);
  };

  for (const spec of specs) {
    try {
      add(parseRequestSpec(spec, defaultVersion), `argument "${spec}"`);
    } catch (error) {
      errors.push(errorMessage(error));
    }
  }

  if (options.file) {
    if (!fs.existsSync(options.file)) {
      errors.push(`File not found: ${options.file}`);
    } else {
      try {
        const parsed = parseDatasetRequests(path.resolve(options.file), REQUEST_TAB);
        for (const request of parsed.requests) {
          add(request, `${options.file} entry "${request.identifier}"`);
        }
        errors.push(...parsed.errors);
      } catch (error) {
        errors.push(`${options.file}: ${errorMessage(error)}`);
      }
    }
  }

  return { requests, errors };
}

function printPreview(resolved: ResolvedRequests): void {
  logger.table(
    ['Identifier', 'Local dataset', 'Target versions', 'Full delete', 'Latest'],
    [...resolved].map(([identifier, r]) => [
      identifier,
      r.dataset?.name ?? '(not found)',
      r.targetVersions.map(v => String(v.version)).join(', ') || '-',
      r.forceDeleteAll ? 'yes' : 'no',
      r.isLatestVersion ? 'yes' : 'no',
    ])
  );
}

function unresolvedOf(resolved: ResolvedRequests): string[] {
  return [...resolved].filter(([, r]) => !r.dataset).map(([identifier]) => identifier);
}

export async function unpublishCommand(specs: string[], options: UnpublishCommandOptions): Promise<number> {
  setVerbose(options.verbose);

  let operation: RegistryOperation;
  try {
    operation = parseRegistryOperation(options.operation);
  } catch (error) {
    logger.error(errorMessage(error));
    return 1;
  }

  const phases: UnpublishReport['phases'] = {
    registry: operation !== 'none',
    serving: options.serving,
    discovery: options.serving && options.discovery,
    localCatalog: options.deleteLocal,
  };

  logger.section('Dataset Unpublish');
  logger.keyValue('Registry operation', operation);
  logger.keyValue('Serving layer', phases.serving);
  logger.keyValue('Discovery reinit', phases.discovery);
  logger.keyValue('Delete local records', phases.localCatalog);
  logger.keyValue('All versions', options.allVersions);
  logger.keyValue('Republish', options.republish);
  logger.keyValue('Dry Run', options.dryRun);

  // Step a: Collect requests
  logger.section('Parsing Requests');
  const { requests, errors } = collectRequests(specs, options);
  if (errors.length > 0) {
    logger.error('Request parsing errors:');
    for (const err of errors) {
      logger.listItem(err);
    }
    return 1;
  }
  if (requests.length === 0) {
    logger.error('No datasets given. Pass dataset names or --file.');
    return 1;
  }
  logger.success(`Parsed ${requests.length} dataset request(s)`);

  let settings: UnpublishSettings;
  try {
    settings = loadSettings(process.env);
  } catch (error) {
    logger.error(errorMessage(error));
    return 1;
  }

  const coordinator = new DeletionCoordinator({ settings });
  const runOptions: DeletionRunOptions = {
    operation,
    servingLayer: options.serving,
    discoveryReinit: options.discovery,
    deleteLocal: options.deleteLocal,
    forceDeleteAll: options.allVersions,
    wantRepublish: options.republish,
    compositeIds: options.compositeIds,
    progress: {
      callback: value => logger.progress(value, 100, 'Unpublishing'),
      initial: 0,
      final: 100,
    },
  };

  let unresolved: string[] = [];
  try {
    // Step b: Resolve against the local catalog
    logger.section('Resolving Datasets');
    const resolved = coordinator.preview(requests, runOptions);
    printPreview(resolved);
    unresolved = unresolvedOf(resolved);

    // Step c: Dry run
    if (options.dryRun) {
      const report = buildUnpublishReport({
        requests,
        unresolved,
        registryOperation: operation,
        phases,
        outcomes: new Map(),
        republish: [],
        dryRun: true,
      });
      saveOperationReport(report, options.output);
      logger.section('Dry Run Complete');
      logger.info('No changes were made. Remove --dry-run flag to execute.');
      return 0;
    }

    // Step d: Confirm
    if (!options.force) {
      const confirmed = await confirmAction(
        `About to ${operation === 'none' ? 'unpublish' : operation} ${resolved.size} dataset(s). Proceed?`
      );
      if (!confirmed) {
        logger.info('Unpublish cancelled by user.');
        return 0;
      }
    }

    // Step e: Run phases
    logger.section('Unpublishing');
    const pending: Promise<DeletionResult | RepublishingDeletionResult> = coordinator.run(requests, runOptions);
    const result = await pending;
    const republish: RepublishCandidate[] = 'republishList' in result ? result.republishList : [];

    const report = buildUnpublishReport({
      requests,
      unresolved,
      registryOperation: operation,
      phases,
      outcomes: result.outcomes,
      republish,
      dryRun: false,
    });
    saveOperationReport(report, options.output);

    logger.section('Unpublish Complete');
    if (result.outcomes.size > 0) {
      logger.table(['Identifier', 'Registry outcome'], [...result.outcomes].map(([id, kind]) => [id, kind]));
    }
    logger.keyValue('Registry succeeded', report.summary.registrySucceeded);
    logger.keyValue('Registry failed', report.summary.registryFailed);

    if (options.republish) {
      logger.subsection('Versions to republish');
      if (republish.length === 0) {
        logger.info('None');
      }
      for (const candidate of republish) {
        logger.listItem(`${candidate.datasetName} (version ${candidate.version})`);
      }
    }

    return report.summary.registryFailed > 0 ? 2 : 0;
  } catch (error) {
    logger.error(`Unpublish failed: ${errorMessage(error)}`);
    if (isUnpublishError(error)) {
      for (const [key, value] of Object.entries(error.context)) {
        logger.keyValue(key, String(value), 1);
      }
    }

    saveOperationReport(
      buildUnpublishReport({
        requests,
        unresolved,
        registryOperation: operation,
        phases,
        outcomes: new Map(),
        republish: [],
        dryRun: options.dryRun,
        error: errorMessage(error),
      }),
      options.output
    );

    if (options.verbose && error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    return 1;
  }
}

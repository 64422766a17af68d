/**
 * Deletion coordinator - retract or delete a batch of datasets everywhere they were published
 *
 * Phases, in order, each independently enabled:
 *   0. resolve every request once against the local catalog (results shared by later phases)
 *   1. registry delete/retract, per dataset or per version
 *   2. serving-layer catalog pruning, then one index regeneration for the batch
 *   3. local-catalog deletion, collecting versions to republish as the new latest
 *
 * One catalog session spans the run. It is committed after phase 2 and after each dataset in
 * phase 3, and committed on close; a thrown error rolls back the uncommitted remainder.
 */

import { CatalogSession } from '../catalog/database.js';
import { CatalogRepository } from '../catalog/repository.js';
import type { RegistrySettings, UnpublishSettings } from '../config/settings.js';
import { REGISTRY_OPERATIONS } from '../config/types.js';
import type {
  Dataset,
  DatasetRequest,
  EventKind,
  RegistryOperation,
  RepublishCandidate,
  ResolutionResult,
} from '../config/types.js';
import type {
  DeletionResult,
  DeletionRunOptions,
  DiscoveryService,
  ProgressReporter,
  RegistryTransport,
  RepublishingDeletionResult,
  ServingIndex,
} from '../config/unpublish-types.js';
import { createRegistryTransport } from '../api/registry-client.js';
import { FileServingIndex } from '../services/serving-index.js';
import { HttpDiscoveryService } from '../services/discovery.js';
import { UnpublishError, firstLines, isUnpublishError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { CatalogPruner } from './catalog-pruner.js';
import { LocalCatalogDeleter } from './local-catalog-deleter.js';
import { NameResolver } from './name-resolver.js';
import { RegistryDeletionClient } from './registry-deletion.js';
import type { ActiveRegistryOperation } from './registry-deletion.js';

export interface DeletionCoordinatorDeps {
  settings: UnpublishSettings;
  openCatalog?: (filename: string) => CatalogSession;
  createTransport?: (settings: RegistrySettings) => RegistryTransport;
  createServingIndex?: (repository: CatalogRepository, settings: UnpublishSettings) => ServingIndex;
  discovery?: DiscoveryService;
}

export type ResolvedRequests = Map<string, ResolutionResult>;

/**
 * Validate a registry operation name. Anything else is a configuration error.
 */
export function parseRegistryOperation(value: string): RegistryOperation {
  const operation = REGISTRY_OPERATIONS.find(op => op === value.toLowerCase());
  if (!operation) {
    throw new UnpublishError(
      'ConfigurationError',
      `Invalid registry operation: "${value}". Must be one of ${REGISTRY_OPERATIONS.join(', ')}.`
    );
  }
  return operation;
}

/**
 * Report `initial` first, then evenly spaced values, ending exactly at `final`.
 */
function progressTracker(reporter: ProgressReporter | undefined, steps: number): () => void {
  if (!reporter) return () => undefined;

  const { callback, initial, final } = reporter;
  let done = 0;
  callback(initial);

  return () => {
    done = Math.min(done + 1, steps);
    callback(done === steps ? final : initial + ((final - initial) * done) / steps);
  };
}

export class DeletionCoordinator {
  private readonly settings: UnpublishSettings;
  private readonly openCatalog: (filename: string) => CatalogSession;
  private readonly createTransport: (settings: RegistrySettings) => RegistryTransport;
  private readonly createServingIndex: (repository: CatalogRepository, settings: UnpublishSettings) => ServingIndex;
  private readonly discovery?: DiscoveryService;

  constructor(deps: DeletionCoordinatorDeps) {
    this.settings = deps.settings;
    this.openCatalog = deps.openCatalog ?? (filename => new CatalogSession(filename));
    this.createTransport = deps.createTransport ?? createRegistryTransport;
    this.createServingIndex =
      deps.createServingIndex ?? ((repository, settings) => new FileServingIndex(repository, settings.servingIndexFile));
    this.discovery =
      deps.discovery ??
      (deps.settings.discoveryUrl ? new HttpDiscoveryService(deps.settings.discoveryUrl) : undefined);
  }

  /**
   * Resolve requests without changing anything (dry runs and previews).
   */
  preview(requests: DatasetRequest[], options: Pick<DeletionRunOptions, 'forceDeleteAll' | 'compositeIds'>): ResolvedRequests {
    const session = this.openCatalog(this.settings.catalogPath);
    try {
      return this.resolveAll(new NameResolver(new CatalogRepository(session.db)), requests, options);
    } finally {
      session.rollback();
      session.close();
    }
  }

  run(requests: DatasetRequest[], options: DeletionRunOptions & { wantRepublish: true }): Promise<RepublishingDeletionResult>;
  run(requests: DatasetRequest[], options: DeletionRunOptions): Promise<DeletionResult>;
  async run(
    requests: DatasetRequest[],
    options: DeletionRunOptions
  ): Promise<DeletionResult | RepublishingDeletionResult> {
    const operation = parseRegistryOperation(options.operation);

    const steps = 1 + [operation !== 'none', options.servingLayer, options.deleteLocal].filter(Boolean).length;
    const advance = progressTracker(options.progress, steps);

    const session = this.openCatalog(this.settings.catalogPath);
    const repository = new CatalogRepository(session.db);
    const outcomes = new Map<string, EventKind>();
    let republishList: RepublishCandidate[] = [];

    try {
      logger.subsection('Resolving datasets');
      const resolved = this.resolveAll(new NameResolver(repository), requests, options);
      advance();

      if (operation !== 'none') {
        logger.subsection(`Registry ${operation}`);
        await this.registryPhase(operation, resolved, repository, outcomes, options.compositeIds);
        advance();
      }

      if (options.servingLayer) {
        logger.subsection('Serving layer');
        await this.servingPhase(resolved, repository, session, options.discoveryReinit);
        advance();
      }

      if (options.deleteLocal) {
        logger.subsection('Local catalog');
        republishList = this.localPhase(resolved, repository, session, options.wantRepublish);
        advance();
      }
    } catch (error) {
      session.rollback();
      session.close();
      throw error;
    }

    session.close();
    return options.wantRepublish ? { outcomes, republishList } : { outcomes };
  }

  private resolveAll(
    resolver: NameResolver,
    requests: DatasetRequest[],
    options: Pick<DeletionRunOptions, 'forceDeleteAll' | 'compositeIds'>
  ): ResolvedRequests {
    const resolved: ResolvedRequests = new Map();

    for (const { identifier, version } of requests) {
      if (resolved.has(identifier)) {
        logger.warn(`Duplicate request for ${identifier}; using version ${version}`);
      }
      const result = resolver.resolve(identifier, version, {
        forceDeleteAll: options.forceDeleteAll,
        compositeId: options.compositeIds,
      });
      if (!result.dataset) {
        logger.warn(`Dataset not found in local catalog: ${identifier}`);
      }
      resolved.set(identifier, result);
    }

    return resolved;
  }

  private async registryPhase(
    operation: ActiveRegistryOperation,
    resolved: ResolvedRequests,
    repository: CatalogRepository,
    outcomes: Map<string, EventKind>,
    compositeIds: boolean
  ): Promise<void> {
    const transport = this.createTransport(this.settings.registry);
    const client = new RegistryDeletionClient(transport, repository);
    logger.debug('Registry transport', { transport: transport.description });

    for (const [identifier, { dataset, targetVersions }] of resolved) {
      if (!this.settings.deleteAtDatasetLevel && dataset) {
        for (const versionObj of targetVersions) {
          const eventKind = await this.applyRegistryOperation(client, operation, versionObj.name, identifier, dataset);
          if (eventKind) outcomes.set(identifier, eventKind);
        }
        continue;
      }

      // Also reached when the dataset is only known remotely
      const targetName = this.settings.deleteAtDatasetLevel && dataset && !compositeIds ? dataset.name : identifier;
      const eventKind = await this.applyRegistryOperation(client, operation, targetName, identifier, dataset);
      if (eventKind) outcomes.set(identifier, eventKind);
    }
  }

  /**
   * Transport faults propagate and end the phase. Other pipeline errors for one target are
   * logged and that target is left out of the outcome map.
   */
  private async applyRegistryOperation(
    client: RegistryDeletionClient,
    operation: ActiveRegistryOperation,
    targetName: string,
    identifier: string,
    dataset: Dataset | undefined
  ): Promise<EventKind | undefined> {
    try {
      const outcome = await client.apply(operation, targetName, dataset);
      if (outcome.status === 'failed') {
        logger.error(`Deletion/retraction failed for dataset/version ${identifier} with message: ${outcome.reason}`);
      }
      logger.info(`  Result: ${outcome.status === 'succeeded' ? 'SUCCESSFUL' : 'UNSUCCESSFUL'}`);
      return outcome.eventKind;
    } catch (error) {
      if (isUnpublishError(error) && error.kind !== 'TransportFault') {
        logger.error(`Deletion/retraction failed for dataset/version ${identifier} with message: ${firstLines(error.originalMessage)}`);
        return undefined;
      }
      throw error;
    }
  }

  private async servingPhase(
    resolved: ResolvedRequests,
    repository: CatalogRepository,
    session: CatalogSession,
    discoveryReinit: boolean
  ): Promise<void> {
    const pruner = new CatalogPruner({
      repository,
      servingRoot: this.settings.servingRoot,
      servingIndex: this.createServingIndex(repository, this.settings),
      discovery: this.discovery,
      commit: () => session.commit(),
    });

    for (const { dataset, targetVersions } of resolved.values()) {
      if (!dataset || targetVersions.length === 0) continue;
      pruner.prune(dataset, targetVersions);
    }

    await pruner.complete({ discoveryReinit });
  }

  private localPhase(
    resolved: ResolvedRequests,
    repository: CatalogRepository,
    session: CatalogSession,
    wantRepublish: boolean
  ): RepublishCandidate[] {
    const deleter = new LocalCatalogDeleter(repository, () => session.commit());
    const republishList: RepublishCandidate[] = [];

    for (const { dataset, targetVersions, isLatestVersion, forceDeleteAll } of resolved.values()) {
      if (!dataset) continue;
      const candidate = deleter.deleteRecords({
        dataset,
        targetVersions,
        isLatestVersion,
        isFullDatasetDelete: forceDeleteAll,
        wantRepublish,
      });
      if (candidate) republishList.push(candidate);
    }

    return republishList;
  }
}

/**
 * Remove serving-layer catalog entries (and their files) for deleted versions, then rebuild
 * the serving layer's aggregate index once for the whole batch.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { CatalogRepository } from '../catalog/repository.js';
import type { Dataset, VersionRecord } from '../config/types.js';
import type { DiscoveryService, ServingIndex } from '../config/unpublish-types.js';
import { logger } from '../utils/logger.js';

export interface CatalogPrunerDeps {
  repository: CatalogRepository;
  servingRoot: string;
  servingIndex: ServingIndex;
  discovery?: DiscoveryService;
  /** Commit local-catalog work done so far */
  commit: () => void;
}

export class CatalogPruner {
  private readonly root: string;

  constructor(private readonly deps: CatalogPrunerDeps) {
    this.root = path.resolve(deps.servingRoot);
  }

  /**
   * Versions without a catalog entry are skipped. An entry is dropped from the local catalog
   * whether or not its file was still on disk.
   *
   * @returns number of catalog files removed
   */
  prune(dataset: Dataset, targetVersions: VersionRecord[]): number {
    const { repository } = this.deps;
    let removed = 0;

    for (const versionObj of targetVersions) {
      const entry = repository.findCatalogEntry(dataset.name, versionObj.version);
      if (!entry) continue;

      const filePath = path.resolve(this.root, entry.location);
      if (!filePath.startsWith(this.root + path.sep)) {
        logger.warn(`Catalog location outside serving root, not removing file: ${entry.location}`, {
          dataset: dataset.name,
          version: versionObj.version,
        });
      } else if (fs.existsSync(filePath)) {
        logger.info(`Deleting serving catalog: ${filePath}`);
        fs.unlinkSync(filePath);
        repository.appendEvent(dataset.name, versionObj.version, 'serving-catalog-entry-removed');
        removed++;
      }

      repository.deleteCatalogEntry(dataset.name, versionObj.version);
    }

    return removed;
  }

  /**
   * Commit, regenerate the aggregate index and, if requested, reinitialize discovery.
   * Called once after every dataset has been pruned.
   */
  async complete(options: { discoveryReinit: boolean }): Promise<void> {
    this.deps.commit();

    logger.info('Regenerating serving index');
    await this.deps.servingIndex.regenerateIndex();

    if (options.discoveryReinit) {
      if (this.deps.discovery) {
        await this.deps.discovery.reinitialize();
      } else {
        logger.warn('Discovery reinitialization requested but no discovery service is configured');
      }
    }
  }
}

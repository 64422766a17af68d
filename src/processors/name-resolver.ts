/**
 * Resolve a requested identifier to a local dataset and the versions targeted for deletion.
 *
 * A missing dataset or version is never an error here: the registry and serving layer may
 * still hold it, so the caller gets an empty target list and carries on.
 */

import type { CatalogRepository } from '../catalog/repository.js';
import { ALL_VERSIONS } from '../config/types.js';
import type { ResolutionResult } from '../config/types.js';
import { parseCompositeId } from '../parsers/dataset-id-parser.js';
import { logger } from '../utils/logger.js';

export interface ResolveOptions {
  forceDeleteAll: boolean;
  /** Identifier has the form `master_id.vN|data_node` */
  compositeId: boolean;
}

export class NameResolver {
  constructor(private readonly repository: CatalogRepository) {}

  resolve(identifier: string, version: number, options: ResolveOptions): ResolutionResult {
    let name = identifier;

    if (options.compositeId) {
      const parsed = parseCompositeId(identifier);
      if (!parsed.dataNode) {
        logger.warn(`Dataset: ${identifier}, composite dataset identifiers should have the form dataset_id|data_node`);
      }
      name = parsed.name;
      version = parsed.version ?? version;
    }

    const forceDeleteAll = options.forceDeleteAll || version === ALL_VERSIONS;
    const dataset = this.repository.findDataset(name);

    if (!dataset) {
      return { forceDeleteAll, dataset: undefined, targetVersions: [], isLatestVersion: false };
    }

    const versionObj = dataset.versions.find(v => v.version === version);
    if (!versionObj && version !== ALL_VERSIONS) {
      logger.warn(`Version ${version} of dataset ${dataset.name} not found`);
    }

    const latest = dataset.versions.at(-1);
    const isLatestVersion = versionObj !== undefined && versionObj.version === latest?.version;

    // A single remaining version leaves nothing for a version-only delete to keep
    const deleteAll = forceDeleteAll || dataset.versions.length === 1;

    let targetVersions = deleteAll ? [...dataset.versions] : [];
    if (!deleteAll && versionObj) {
      targetVersions = [versionObj];
    }

    return { forceDeleteAll: deleteAll, dataset, targetVersions, isLatestVersion };
  }
}

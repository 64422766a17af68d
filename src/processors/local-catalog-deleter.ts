/**
 * Delete dataset and dataset-version rows from the local catalog.
 *
 * Each call is one dataset and ends with a commit, so datasets handled earlier in a batch stay
 * deleted if a later one fails.
 */

import type { CatalogRepository } from '../catalog/repository.js';
import { ALL_VERSIONS } from '../config/types.js';
import type { Dataset, RepublishCandidate, VersionRecord } from '../config/types.js';
import { logger } from '../utils/logger.js';

export interface LocalDeleteRequest {
  dataset: Dataset;
  targetVersions: VersionRecord[];
  isLatestVersion: boolean;
  isFullDatasetDelete: boolean;
  wantRepublish: boolean;
}

export class LocalCatalogDeleter {
  constructor(
    private readonly repository: CatalogRepository,
    private readonly commit: () => void
  ) {}

  /**
   * @returns the version that becomes latest and should be republished, if any
   */
  deleteRecords(request: LocalDeleteRequest): RepublishCandidate | undefined {
    const candidate = this.deleteWithoutCommit(request);
    this.commit();
    return candidate;
  }

  private deleteWithoutCommit(request: LocalDeleteRequest): RepublishCandidate | undefined {
    const { dataset, targetVersions } = request;
    const { repository } = this;

    if (!repository.findDatasetRecord(dataset.name)) {
      logger.warn(`Dataset ${dataset.name} is no longer in the local catalog, skipping`);
      return undefined;
    }

    if (request.isFullDatasetDelete) {
      logger.info(`Deleting existing dataset: ${dataset.name}`);
      const latest = repository.latestVersionNumber(dataset.id) ?? ALL_VERSIONS;
      repository.appendEvent(dataset.name, latest, 'dataset-deleted');
      repository.deleteDatasetChildren(dataset.id);
      repository.deleteDataset(dataset.id);
      return undefined;
    }

    const versionObj = targetVersions[0];
    if (!versionObj) {
      return undefined;
    }

    const remaining = repository.listVersions(dataset.id);
    if (!remaining.some(v => v.id === versionObj.id)) {
      logger.warn(`Version ${versionObj.version} of dataset ${dataset.name} already deleted, skipping`);
      return undefined;
    }

    let candidate: RepublishCandidate | undefined;
    if (request.isLatestVersion && request.wantRepublish) {
      // Highest version left below the one being deleted becomes the new latest
      const next = remaining.filter(v => v.version < versionObj.version).at(-1);
      if (next) {
        candidate = { datasetName: dataset.name, version: next.version };
      }
    }

    logger.info(`Deleting existing dataset version: ${dataset.name} (version ${versionObj.version})`);
    repository.appendEvent(dataset.name, versionObj.version, 'dataset-version-deleted');
    repository.deleteVersion(versionObj.id);

    if (request.isLatestVersion) {
      repository.deleteVariables(dataset.id);
    }

    return candidate;
  }
}

/**
 * Apply a delete or retract operation for one target against the registry and record the
 * outcome on the local dataset, when there is one.
 */

import type { CatalogRepository } from '../catalog/repository.js';
import { ALL_VERSIONS } from '../config/types.js';
import type { DatasetRecord, EventKind, RegistryOperation, RegistryOutcome } from '../config/types.js';
import type { RegistryResponse, RegistryTransport } from '../config/unpublish-types.js';
import { firstLines } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export type ActiveRegistryOperation = Exclude<RegistryOperation, 'none'>;

const OUTCOME_EVENTS: Record<ActiveRegistryOperation, { success: EventKind; failure: EventKind }> = {
  delete: { success: 'registry-delete-succeeded', failure: 'registry-delete-failed' },
  retract: { success: 'registry-retract-succeeded', failure: 'registry-retract-failed' },
};

export class RegistryDeletionClient {
  constructor(
    private readonly transport: RegistryTransport,
    private readonly repository: CatalogRepository
  ) {}

  /**
   * A rejection from the registry becomes a Failed outcome (plus a dataset warning and a
   * failure event). Transport faults thrown by the transport are not caught.
   *
   * @param dataset - Local record for the target; without one no event or warning is stored.
   */
  async apply(operation: ActiveRegistryOperation, targetName: string, dataset?: DatasetRecord): Promise<RegistryOutcome> {
    if (dataset) {
      this.repository.clearWarnings(dataset.id);
    }

    const { success, failure } = OUTCOME_EVENTS[operation];

    let response: RegistryResponse;
    if (operation === 'delete') {
      logger.info(`Deleting ${targetName}`);
      response = await this.transport.delete(targetName);
    } else {
      logger.info(`Retracting ${targetName}`);
      response = await this.transport.retract(targetName);
    }

    if (!response.ok) {
      const reason = firstLines(response.message, 2);
      if (dataset) {
        this.repository.addWarning(
          dataset.id,
          `Deletion/retraction failed for dataset ${targetName} with message: ${reason.split('\n').join(' ')}`
        );
        this.recordEvent(dataset, failure);
      }
      return { status: 'failed', eventKind: failure, reason };
    }

    if (dataset) {
      this.recordEvent(dataset, success);
    }
    return { status: 'succeeded', eventKind: success };
  }

  private recordEvent(dataset: DatasetRecord, kind: EventKind): void {
    const version = this.repository.latestVersionNumber(dataset.id) ?? ALL_VERSIONS;
    this.repository.appendEvent(dataset.name, version, kind);
  }
}

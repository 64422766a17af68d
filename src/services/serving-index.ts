/**
 * Aggregate serving-layer index, rebuilt from the catalog entries left in the local catalog.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { CatalogRepository } from '../catalog/repository.js';
import type { CatalogEntry } from '../config/types.js';
import type { ServingIndex } from '../config/unpublish-types.js';
import { logger } from '../utils/logger.js';

export interface ServingIndexDocument {
  generatedAt: string;
  entries: CatalogEntry[];
}

export class FileServingIndex implements ServingIndex {
  constructor(
    private readonly repository: CatalogRepository,
    private readonly indexFile: string
  ) {}

  async regenerateIndex(): Promise<void> {
    const document: ServingIndexDocument = {
      generatedAt: new Date().toISOString(),
      entries: this.repository.listCatalogEntries(),
    };

    await fs.promises.mkdir(path.dirname(this.indexFile), { recursive: true });
    // Write beside the target and rename so readers never see a partial index
    const tmpFile = `${this.indexFile}.tmp`;
    await fs.promises.writeFile(tmpFile, JSON.stringify(document, null, 2));
    await fs.promises.rename(tmpFile, this.indexFile);

    logger.success(`Serving index regenerated: ${this.indexFile}`, { entries: document.entries.length });
  }
}

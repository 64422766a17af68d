import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FileServingIndex, type ServingIndexDocument } from './serving-index.js';
import { openMemoryCatalog, silenceConsole, tempDir } from '../test/fixtures.js';

describe('FileServingIndex', () => {
  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes the remaining catalog entries', async () => {
    const { repository } = openMemoryCatalog();
    repository.addCatalogEntry({ datasetName: 'A', version: 1, location: 'A/v1.xml' });
    repository.addCatalogEntry({ datasetName: 'B', version: 4, location: 'B/v4.xml' });
    repository.deleteCatalogEntry('A', 1);
    const indexFile = path.join(tempDir(), 'nested', 'catalog-index.json');

    await new FileServingIndex(repository, indexFile).regenerateIndex();

    const document: ServingIndexDocument = JSON.parse(fs.readFileSync(indexFile, 'utf8'));
    expect(document.entries).toEqual([{ datasetName: 'B', version: 4, location: 'B/v4.xml' }]);
    expect(fs.existsSync(`${indexFile}.tmp`)).toBe(false);
  });
});

/**
 * Shared test fixtures: in-memory and on-disk catalogs, seeded datasets, fake registry
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { vi } from 'vitest';
import { CatalogSession } from '../catalog/database.js';
import { CatalogRepository } from '../catalog/repository.js';
import type { Dataset } from '../config/types.js';
import type { RegistryResponse } from '../config/unpublish-types.js';

export function openMemoryCatalog(): { session: CatalogSession; repository: CatalogRepository } {
  const session = new CatalogSession(':memory:');
  return { session, repository: new CatalogRepository(session.db) };
}

export function seedDataset(
  repository: CatalogRepository,
  name: string,
  versions: number[],
  variables: string[] = []
): Dataset {
  const record = repository.createDataset(name);
  for (const version of versions) {
    repository.addVersion(record, version);
  }
  for (const variable of variables) {
    repository.addVariable(record.id, variable);
  }

  const dataset = repository.findDataset(name);
  if (!dataset) {
    throw new Error(`seeded dataset ${name} not found`);
  }
  return dataset;
}

const createdDirs: string[] = [];

/**
 * Create a temporary directory. `removeTempDirs` (run after every test by `setup.ts`) deletes it.
 */
export function tempDir(prefix = 'unpublish-test-'): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  createdDirs.push(dir);
  return dir;
}

export function removeTempDirs(): void {
  for (const dir of createdDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

/**
 * Registry fake: every name succeeds unless listed in `rejections` (name -> message).
 */
export function fakeTransport(rejections: Record<string, string> = {}) {
  const respond = async (name: string): Promise<RegistryResponse> =>
    name in rejections ? { ok: false, message: rejections[name] } : { ok: true };

  return {
    description: 'fake',
    delete: vi.fn(respond),
    retract: vi.fn(respond),
  };
}

export function silenceConsole(): void {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
  vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
}

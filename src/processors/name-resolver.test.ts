import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { NameResolver } from './name-resolver.js';
import type { CatalogRepository } from '../catalog/repository.js';
import { openMemoryCatalog, seedDataset, silenceConsole } from '../test/fixtures.js';

const defaults = { forceDeleteAll: false, compositeId: false };

describe('NameResolver', () => {
  let repository: CatalogRepository;
  let resolver: NameResolver;

  beforeEach(() => {
    silenceConsole();
    ({ repository } = openMemoryCatalog());
    resolver = new NameResolver(repository);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns an empty target list for an unknown dataset', () => {
    expect(resolver.resolve('missing', 2, defaults)).toEqual({
      forceDeleteAll: false,
      dataset: undefined,
      targetVersions: [],
      isLatestVersion: false,
    });
  });

  it('keeps the all-versions request for an unknown dataset', () => {
    expect(resolver.resolve('missing', -1, defaults).forceDeleteAll).toBe(true);
    expect(resolver.resolve('missing', 2, { ...defaults, forceDeleteAll: true }).forceDeleteAll).toBe(true);
  });

  it('targets a single non-latest version', () => {
    seedDataset(repository, 'D', [1, 2, 3]);
    const result = resolver.resolve('D', 2, defaults);

    expect(result.forceDeleteAll).toBe(false);
    expect(result.isLatestVersion).toBe(false);
    expect(result.targetVersions.map(v => v.version)).toEqual([2]);
  });

  it('flags the latest version', () => {
    seedDataset(repository, 'D', [1, 2, 3]);
    const result = resolver.resolve('D', 3, defaults);

    expect(result.isLatestVersion).toBe(true);
    expect(result.targetVersions.map(v => v.name)).toEqual(['D.v3']);
  });

  it('targets every version for -1', () => {
    seedDataset(repository, 'D', [1, 2, 3]);
    const result = resolver.resolve('D', -1, defaults);

    expect(result.forceDeleteAll).toBe(true);
    expect(result.targetVersions.map(v => v.version)).toEqual([1, 2, 3]);
  });

  it('targets every version when forced', () => {
    seedDataset(repository, 'D', [1, 2]);
    const result = resolver.resolve('D', 1, { ...defaults, forceDeleteAll: true });

    expect(result.forceDeleteAll).toBe(true);
    expect(result.isLatestVersion).toBe(false);
    expect(result.targetVersions.map(v => v.version)).toEqual([1, 2]);
  });

  it('always deletes a single-version dataset entirely', () => {
    seedDataset(repository, 'solo', [4]);

    const exact = resolver.resolve('solo', 4, defaults);
    expect(exact.forceDeleteAll).toBe(true);
    expect(exact.isLatestVersion).toBe(true);
    expect(exact.targetVersions.map(v => v.version)).toEqual([4]);

    const unknownVersion = resolver.resolve('solo', 9, defaults);
    expect(unknownVersion.forceDeleteAll).toBe(true);
    expect(unknownVersion.isLatestVersion).toBe(false);
    expect(unknownVersion.targetVersions.map(v => v.version)).toEqual([4]);
  });

  it('warns and targets nothing for a missing version', () => {
    seedDataset(repository, 'D', [1, 2, 3]);
    const result = resolver.resolve('D', 7, defaults);

    expect(result.dataset?.name).toBe('D');
    expect(result.targetVersions).toEqual([]);
    expect(result.isLatestVersion).toBe(false);
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('Version 7 of dataset D not found'));
  });

  it('parses composite identifiers', () => {
    seedDataset(repository, 'proj.tas', [2, 3]);
    const result = resolver.resolve('proj.tas.v3|data.node.test', -1, { ...defaults, compositeId: true });

    expect(result.forceDeleteAll).toBe(false);
    expect(result.isLatestVersion).toBe(true);
    expect(result.targetVersions.map(v => v.version)).toEqual([3]);
    expect(console.warn).not.toHaveBeenCalled();
  });

  it('warns about a composite identifier without a data node but still resolves it', () => {
    seedDataset(repository, 'proj.tas', [2, 3]);
    const result = resolver.resolve('proj.tas.v2', -1, { ...defaults, compositeId: true });

    expect(result.targetVersions.map(v => v.version)).toEqual([2]);
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringContaining('composite dataset identifiers should have the form dataset_id|data_node')
    );
  });
});

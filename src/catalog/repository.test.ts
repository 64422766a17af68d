import { describe, expect, it } from 'vitest';
import { CatalogSession } from './database.js';
import { versionName } from './repository.js';
import { openMemoryCatalog, seedDataset } from '../test/fixtures.js';

describe('CatalogRepository', () => {
  it('names versions for the registry', () => {
    expect(versionName('proj.tas', 3)).toBe('proj.tas.v3');
  });

  it('returns versions in ascending order regardless of insertion', () => {
    const { repository } = openMemoryCatalog();
    const record = repository.createDataset('D');
    repository.addVersion(record, 3);
    repository.addVersion(record, 1);
    repository.addVersion(record, 2);

    expect(repository.findDataset('D')?.versions.map(v => v.version)).toEqual([1, 2, 3]);
    expect(repository.latestVersionNumber(record.id)).toBe(3);
  });

  it('has no latest version once every version is gone', () => {
    const { repository } = openMemoryCatalog();
    const dataset = seedDataset(repository, 'D', [1]);
    repository.deleteVersion(dataset.versions[0].id);

    expect(repository.latestVersionNumber(dataset.id)).toBeUndefined();
  });

  it('keeps events after the dataset row is deleted', () => {
    const { repository } = openMemoryCatalog();
    const dataset = seedDataset(repository, 'D', [1, 2]);
    repository.appendEvent('D', 2, 'dataset-deleted');
    repository.deleteDatasetChildren(dataset.id);
    repository.deleteDataset(dataset.id);

    expect(repository.findDataset('D')).toBeUndefined();
    expect(repository.listEvents('D').map(e => e.kind)).toEqual(['dataset-deleted']);
  });
});

describe('CatalogSession', () => {
  it('discards work since the last commit on rollback', () => {
    const { session, repository } = openMemoryCatalog();
    repository.createDataset('kept');
    session.commit();
    repository.createDataset('discarded');
    session.rollback();

    expect(repository.findDatasetRecord('kept')?.name).toBe('kept');
    expect(repository.findDatasetRecord('discarded')).toBeUndefined();
  });

  it('commits pending work on close', () => {
    const session = new CatalogSession(':memory:');
    session.close();

    expect(session.db.open).toBe(false);
    expect(() => session.close()).not.toThrow();
  });
});

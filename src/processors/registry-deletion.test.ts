import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RegistryDeletionClient } from './registry-deletion.js';
import type { CatalogRepository } from '../catalog/repository.js';
import { UnpublishError } from '../utils/errors.js';
import { fakeTransport, openMemoryCatalog, seedDataset, silenceConsole } from '../test/fixtures.js';

describe('RegistryDeletionClient', () => {
  let repository: CatalogRepository;

  beforeEach(() => {
    silenceConsole();
    ({ repository } = openMemoryCatalog());
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('records a retract success against the latest version', async () => {
    const dataset = seedDataset(repository, 'D', [1, 2]);
    const transport = fakeTransport();
    const client = new RegistryDeletionClient(transport, repository);

    const outcome = await client.apply('retract', 'D', dataset);

    expect(outcome).toEqual({ status: 'succeeded', eventKind: 'registry-retract-succeeded' });
    expect(transport.retract).toHaveBeenCalledWith('D');
    expect(transport.delete).not.toHaveBeenCalled();
    expect(repository.listEvents('D').map(e => [e.version, e.kind])).toEqual([[2, 'registry-retract-succeeded']]);
  });

  it('records a rejection as a warning and a failure event', async () => {
    const dataset = seedDataset(repository, 'D', [1, 2]);
    const transport = fakeTransport({ D: 'Dataset is locked\nby another publisher\ntrace line' });
    const client = new RegistryDeletionClient(transport, repository);

    const outcome = await client.apply('delete', 'D', dataset);

    expect(outcome).toEqual({
      status: 'failed',
      eventKind: 'registry-delete-failed',
      reason: 'Dataset is locked\nby another publisher',
    });
    expect(repository.listWarnings(dataset.id)).toEqual([
      {
        datasetId: dataset.id,
        module: 'publish',
        level: 'warning',
        message: 'Deletion/retraction failed for dataset D with message: Dataset is locked by another publisher',
      },
    ]);
    expect(repository.listEvents('D').map(e => e.kind)).toEqual(['registry-delete-failed']);
  });

  it('clears earlier publication warnings before calling the registry', async () => {
    const dataset = seedDataset(repository, 'D', [1]);
    repository.addWarning(dataset.id, 'stale warning');
    const client = new RegistryDeletionClient(fakeTransport(), repository);

    await client.apply('delete', 'D', dataset);

    expect(repository.listWarnings(dataset.id)).toEqual([]);
  });

  it('succeeds without recording anything when no local dataset is known', async () => {
    const transport = fakeTransport();
    const client = new RegistryDeletionClient(transport, repository);

    const outcome = await client.apply('delete', 'remote-only');

    expect(outcome).toEqual({ status: 'succeeded', eventKind: 'registry-delete-succeeded' });
    expect(transport.delete).toHaveBeenCalledWith('remote-only');
    expect(repository.listEvents()).toEqual([]);
  });

  it('lets transport faults propagate', async () => {
    const dataset = seedDataset(repository, 'D', [1]);
    const transport = fakeTransport();
    transport.delete.mockRejectedValueOnce(new UnpublishError('TransportFault', 'connection refused'));
    const client = new RegistryDeletionClient(transport, repository);

    await expect(client.apply('delete', 'D', dataset)).rejects.toMatchObject({ kind: 'TransportFault' });
    expect(repository.listEvents('D')).toEqual([]);
  });
});

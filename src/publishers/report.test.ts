import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { EventKind } from '../config/types.js';
import { buildUnpublishReport, saveOperationReport } from './report.js';
import { silenceConsole, tempDir } from '../test/fixtures.js';

const phases = { registry: true, serving: true, discovery: false, localCatalog: true };

describe('unpublish reports', () => {
  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('summarizes outcomes and republish candidates', () => {
    const report = buildUnpublishReport({
      requests: [
        { identifier: 'A', version: 2 },
        { identifier: 'B', version: -1 },
        { identifier: 'ghost', version: 1 },
      ],
      unresolved: ['ghost'],
      registryOperation: 'retract',
      phases,
      outcomes: new Map<string, EventKind>([
        ['A', 'registry-retract-succeeded'],
        ['B', 'registry-retract-failed'],
        ['ghost', 'registry-retract-succeeded'],
      ]),
      republish: [{ datasetName: 'A', version: 1 }],
      dryRun: false,
    });

    expect(report.success).toBe(true);
    expect(report.summary).toEqual({
      requested: 3,
      resolved: 2,
      registrySucceeded: 2,
      registryFailed: 1,
      republishCandidates: 1,
    });
    expect(report.details.outcomes).toEqual({
      A: 'registry-retract-succeeded',
      B: 'registry-retract-failed',
      ghost: 'registry-retract-succeeded',
    });
  });

  it('marks a report with an error as unsuccessful', () => {
    const report = buildUnpublishReport({
      requests: [{ identifier: 'A', version: 2 }],
      unresolved: [],
      registryOperation: 'delete',
      phases,
      outcomes: new Map(),
      republish: [],
      dryRun: false,
      error: 'connection refused',
    });

    expect(report.success).toBe(false);
    expect(report.error).toBe('connection refused');
  });

  it('saves dry-run reports under a dryrun name', () => {
    const outputDir = path.join(tempDir(), 'reports');
    const report = {
      ...buildUnpublishReport({
        requests: [],
        unresolved: [],
        registryOperation: 'none',
        phases,
        outcomes: new Map(),
        republish: [],
        dryRun: true,
      }),
      timestamp: '2026-01-02T03:04:05.678Z',
    };

    const filepath = saveOperationReport(report, outputDir);

    expect(filepath).toBe(path.join(outputDir, 'unpublish-dryrun-2026-01-02T03-04-05-678Z.json'));
    expect(JSON.parse(fs.readFileSync(filepath, 'utf8'))).toEqual(JSON.parse(JSON.stringify(report)));
  });
});

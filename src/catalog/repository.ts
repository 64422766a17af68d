/**
 * Queries over the local catalog
 *
 * Row shapes mirror the tables in database.ts; every read maps rows to the shared record types.
 */

import type Database from 'better-sqlite3';
import type {
  CatalogEntry,
  Dataset,
  DatasetEvent,
  DatasetRecord,
  DatasetWarning,
  EventKind,
  VersionRecord,
  WarningLevel,
} from '../config/types.js';
import { EVENT_KINDS } from '../config/types.js';

interface VersionRow {
  id: number;
  dataset_id: number;
  version: number;
  name: string;
}

interface CatalogRow {
  dataset_name: string;
  version: number;
  location: string;
}

interface EventRow {
  dataset_name: string;
  version: number;
  kind: string;
  created_at: string;
}

interface StatusRow {
  dataset_id: number;
  module: string;
  level: string;
  message: string;
}

/** Module name used for publication warnings in dataset_status */
export const PUBLISH_MODULE = 'publish';

/**
 * Canonical registry name of one dataset version
 */
export function versionName(datasetName: string, version: number): string {
  return `${datasetName}.v${version}`;
}

function toVersion(row: VersionRow): VersionRecord {
  return { id: row.id, datasetId: row.dataset_id, version: row.version, name: row.name };
}

function toEventKind(kind: string): EventKind {
  const match = EVENT_KINDS.find(k => k === kind);
  if (!match) {
    throw new Error(`Unknown event kind in catalog: "${kind}"`);
  }
  return match;
}

function toWarningLevel(level: string): WarningLevel {
  return level === 'info' || level === 'error' ? level : 'warning';
}

export class CatalogRepository {
  constructor(private readonly db: Database.Database) {}

  // --------------------------------------------------------------------------
  // Datasets and versions
  // --------------------------------------------------------------------------

  findDatasetRecord(name: string): DatasetRecord | undefined {
    return this.db
      .prepare<[string], DatasetRecord>('SELECT id, name FROM datasets WHERE name = ?')
      .get(name);
  }

  /**
   * Dataset with its versions in ascending version order, or undefined if not catalogued.
   */
  findDataset(name: string): Dataset | undefined {
    const record = this.findDatasetRecord(name);
    if (!record) return undefined;
    return { ...record, versions: this.listVersions(record.id) };
  }

  listVersions(datasetId: number): VersionRecord[] {
    return this.db
      .prepare<[number], VersionRow>(
        'SELECT id, dataset_id, version, name FROM dataset_versions WHERE dataset_id = ? ORDER BY version'
      )
      .all(datasetId)
      .map(toVersion);
  }

  /**
   * Highest version number currently present, or undefined when the dataset has none.
   */
  latestVersionNumber(datasetId: number): number | undefined {
    const row = this.db
      .prepare<[number], { latest: number | null }>(
        'SELECT MAX(version) AS latest FROM dataset_versions WHERE dataset_id = ?'
      )
      .get(datasetId);
    return row?.latest ?? undefined;
  }

  createDataset(name: string): DatasetRecord {
    const result = this.db.prepare('INSERT INTO datasets (name) VALUES (?)').run(name);
    return { id: Number(result.lastInsertRowid), name };
  }

  addVersion(dataset: DatasetRecord, version: number): VersionRecord {
    const name = versionName(dataset.name, version);
    const result = this.db
      .prepare('INSERT INTO dataset_versions (dataset_id, version, name) VALUES (?, ?, ?)')
      .run(dataset.id, version, name);
    return { id: Number(result.lastInsertRowid), datasetId: dataset.id, version, name };
  }

  deleteVersion(versionId: number): void {
    this.db.prepare('DELETE FROM dataset_versions WHERE id = ?').run(versionId);
  }

  /**
   * Remove every row owned by the dataset (versions, variables, status notes).
   * Catalog entries and events are keyed by name and are left alone.
   */
  deleteDatasetChildren(datasetId: number): void {
    this.db.prepare('DELETE FROM dataset_versions WHERE dataset_id = ?').run(datasetId);
    this.deleteVariables(datasetId);
    this.db.prepare('DELETE FROM dataset_status WHERE dataset_id = ?').run(datasetId);
  }

  deleteDataset(datasetId: number): void {
    this.db.prepare('DELETE FROM datasets WHERE id = ?').run(datasetId);
  }

  // --------------------------------------------------------------------------
  // Variables (latest-version projection)
  // --------------------------------------------------------------------------

  addVariable(datasetId: number, name: string): void {
    this.db.prepare('INSERT INTO dataset_variables (dataset_id, name) VALUES (?, ?)').run(datasetId, name);
  }

  listVariables(datasetId: number): string[] {
    return this.db
      .prepare<[number], { name: string }>('SELECT name FROM dataset_variables WHERE dataset_id = ? ORDER BY id')
      .all(datasetId)
      .map(row => row.name);
  }

  deleteVariables(datasetId: number): void {
    this.db.prepare('DELETE FROM dataset_variables WHERE dataset_id = ?').run(datasetId);
  }

  // --------------------------------------------------------------------------
  // Serving-layer catalog entries
  // --------------------------------------------------------------------------

  addCatalogEntry(entry: CatalogEntry): void {
    this.db
      .prepare('INSERT INTO catalogs (dataset_name, version, location) VALUES (?, ?, ?)')
      .run(entry.datasetName, entry.version, entry.location);
  }

  findCatalogEntry(datasetName: string, version: number): CatalogEntry | undefined {
    const row = this.db
      .prepare<[string, number], CatalogRow>(
        'SELECT dataset_name, version, location FROM catalogs WHERE dataset_name = ? AND version = ?'
      )
      .get(datasetName, version);
    return row && { datasetName: row.dataset_name, version: row.version, location: row.location };
  }

  deleteCatalogEntry(datasetName: string, version: number): void {
    this.db.prepare('DELETE FROM catalogs WHERE dataset_name = ? AND version = ?').run(datasetName, version);
  }

  listCatalogEntries(): CatalogEntry[] {
    return this.db
      .prepare<[], CatalogRow>('SELECT dataset_name, version, location FROM catalogs ORDER BY dataset_name, version')
      .all()
      .map(row => ({ datasetName: row.dataset_name, version: row.version, location: row.location }));
  }

  // --------------------------------------------------------------------------
  // Events
  // --------------------------------------------------------------------------

  appendEvent(datasetName: string, version: number, kind: EventKind): DatasetEvent {
    const event: DatasetEvent = { datasetName, version, kind, timestamp: new Date().toISOString() };
    this.db
      .prepare('INSERT INTO events (dataset_name, version, kind, created_at) VALUES (?, ?, ?, ?)')
      .run(event.datasetName, event.version, event.kind, event.timestamp);
    return event;
  }

  listEvents(datasetName?: string): DatasetEvent[] {
    const rows =
      datasetName === undefined
        ? this.db
            .prepare<[], EventRow>('SELECT dataset_name, version, kind, created_at FROM events ORDER BY id')
            .all()
        : this.db
            .prepare<[string], EventRow>(
              'SELECT dataset_name, version, kind, created_at FROM events WHERE dataset_name = ? ORDER BY id'
            )
            .all(datasetName);
    return rows.map(row => ({
      datasetName: row.dataset_name,
      version: row.version,
      kind: toEventKind(row.kind),
      timestamp: row.created_at,
    }));
  }

  // --------------------------------------------------------------------------
  // Publication warnings
  // --------------------------------------------------------------------------

  clearWarnings(datasetId: number, module: string = PUBLISH_MODULE): void {
    this.db.prepare('DELETE FROM dataset_status WHERE dataset_id = ? AND module = ?').run(datasetId, module);
  }

  addWarning(datasetId: number, message: string, level: WarningLevel = 'warning', module: string = PUBLISH_MODULE): void {
    this.db
      .prepare('INSERT INTO dataset_status (dataset_id, module, level, message, created_at) VALUES (?, ?, ?, ?, ?)')
      .run(datasetId, module, level, message, new Date().toISOString());
  }

  listWarnings(datasetId: number): DatasetWarning[] {
    return this.db
      .prepare<[number], StatusRow>(
        'SELECT dataset_id, module, level, message FROM dataset_status WHERE dataset_id = ? ORDER BY id'
      )
      .all(datasetId)
      .map(row => ({
        datasetId: row.dataset_id,
        module: row.module,
        level: toWarningLevel(row.level),
        message: row.message,
      }));
  }
}

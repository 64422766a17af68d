/**
 * Local catalog database (better-sqlite3)
 *
 * A CatalogSession is one logical unit of work for a run: it opens the database, applies the
 * schema and starts a transaction. `commit()` makes the work so far durable and starts the
 * next transaction; `close()` commits whatever is pending.
 */

import Database from 'better-sqlite3';
import { logger } from '../utils/logger.js';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS datasets (
    id          INTEGER PRIMARY KEY AUTOINCREMENT,
    name        TEXT NOT NULL UNIQUE
  );

  CREATE TABLE IF NOT EXISTS dataset_versions (
    id          INTEGER PRIMARY KEY AUTOINCREMENT,
    dataset_id  INTEGER NOT NULL REFERENCES datasets(id),
    version     INTEGER NOT NULL,
    name        TEXT NOT NULL,
    UNIQUE (dataset_id, version)
  );

  CREATE TABLE IF NOT EXISTS dataset_variables (
    id          INTEGER PRIMARY KEY AUTOINCREMENT,
    dataset_id  INTEGER NOT NULL REFERENCES datasets(id),
    name        TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS dataset_status (
    id          INTEGER PRIMARY KEY AUTOINCREMENT,
    dataset_id  INTEGER NOT NULL REFERENCES datasets(id),
    module      TEXT NOT NULL,
    level       TEXT NOT NULL,
    message     TEXT NOT NULL,
    created_at  TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS catalogs (
    dataset_name TEXT NOT NULL,
    version      INTEGER NOT NULL,
    location     TEXT NOT NULL,
    PRIMARY KEY (dataset_name, version)
  );

  -- Keyed by name, not id: history outlives the dataset row
  CREATE TABLE IF NOT EXISTS events (
    id           INTEGER PRIMARY KEY AUTOINCREMENT,
    dataset_name TEXT NOT NULL,
    version      INTEGER NOT NULL,
    kind         TEXT NOT NULL,
    created_at   TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_events_dataset ON events(dataset_name);
`;

export function applySchema(db: Database.Database): void {
  db.exec(SCHEMA);
}

export class CatalogSession {
  readonly db: Database.Database;

  constructor(filename: string) {
    this.db = new Database(filename);
    this.db.pragma('foreign_keys = ON');
    applySchema(this.db);
    this.begin();
    logger.debug('Opened local catalog', { filename });
  }

  private begin(): void {
    this.db.exec('BEGIN');
  }

  /**
   * Commit the current unit of work and start the next one.
   */
  commit(): void {
    if (this.db.inTransaction) {
      this.db.exec('COMMIT');
    }
    this.begin();
  }

  /**
   * Discard everything since the last commit.
   */
  rollback(): void {
    if (this.db.inTransaction) {
      this.db.exec('ROLLBACK');
    }
    this.begin();
  }

  close(): void {
    if (!this.db.open) return;
    if (this.db.inTransaction) {
      this.db.exec('COMMIT');
    }
    this.db.close();
  }
}

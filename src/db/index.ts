/**
 * Database - SQLite (sql.js WASM) for local persistence
 *
 * In-memory WASM database that saves to ~/.bakeplan/bakeplan.db after each
 * committed mutation. Writes go through a temp file and a rename so a crash
 * never leaves a half-written database behind.
 */

import initSqlJs from 'sql.js';
import type { Database as SqlJsDatabase, SqlValue } from 'sql.js';
import { dirname, join } from 'path';
import { mkdirSync, existsSync, readFileSync, writeFileSync, renameSync } from 'fs';
import { createLogger } from '../utils/logger';
import { resolveStateDir } from '../utils/config';
import { PersistenceFailure, errorMessage } from '../infra/errors';

const logger = createLogger('db');

export type { SqlValue } from 'sql.js';

/** A result row keyed by column name. */
export type SqlRow = Record<string, SqlValue>;

// ---------------------------------------------------------------------------
// Database interface
// ---------------------------------------------------------------------------

export interface Database {
  close(): void;
  save(): void;

  // Raw SQL access
  run(sql: string, params?: SqlValue[]): void;
  query(sql: string, params?: SqlValue[]): SqlRow[];
  lastInsertId(): number;

  /**
   * Run `fn` inside BEGIN/COMMIT. Any throw rolls the whole unit back and is
   * rethrown unchanged; SQL errors inside `fn` are already PersistenceFailure
   * from run/query. Nested calls join the outer transaction.
   */
  transaction<T>(fn: () => T): T;
}

export interface OpenDatabaseOptions {
  /** Path of the database file; null keeps everything in memory */
  file: string | null;
}

// ---------------------------------------------------------------------------
// Schema DDL
// ---------------------------------------------------------------------------

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS items (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    canonical_name TEXT NOT NULL,
    normalized_name TEXT UNIQUE NOT NULL,
    active INTEGER NOT NULL DEFAULT 1,
    created_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS item_aliases (
    normalized_alias TEXT PRIMARY KEY,
    alias TEXT NOT NULL,
    item_id INTEGER NOT NULL,
    created_at INTEGER NOT NULL,
    FOREIGN KEY (item_id) REFERENCES items(id)
  );

  CREATE TABLE IF NOT EXISTS ingestion_batches (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    content_hash TEXT NOT NULL,
    source_name TEXT,
    accepted INTEGER NOT NULL,
    rejected INTEGER NOT NULL,
    min_date TEXT,
    max_date TEXT,
    committed_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS sales_records (
    date TEXT NOT NULL,
    item_id INTEGER NOT NULL,
    quantity REAL NOT NULL,
    source_row_ref TEXT NOT NULL,
    batch_id INTEGER,
    PRIMARY KEY (date, item_id),
    FOREIGN KEY (item_id) REFERENCES items(id)
  );

  CREATE TABLE IF NOT EXISTS weather (
    date TEXT NOT NULL,
    location TEXT NOT NULL,
    max_temp REAL,
    rain_mm REAL,
    source TEXT,
    recorded_at INTEGER NOT NULL,
    PRIMARY KEY (date, location)
  );

  CREATE TABLE IF NOT EXISTS events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    date TEXT NOT NULL,
    name TEXT NOT NULL,
    kind TEXT NOT NULL,
    multiplier REAL NOT NULL,
    weight REAL NOT NULL DEFAULT 1
  );

  CREATE TABLE IF NOT EXISTS item_models (
    item_id INTEGER PRIMARY KEY,
    version INTEGER NOT NULL,
    algorithm_tag TEXT NOT NULL,
    parameters TEXT NOT NULL,
    feature_schema TEXT NOT NULL,
    n_training_samples INTEGER NOT NULL,
    cross_val_error REAL,
    low_confidence INTEGER NOT NULL,
    trained_at INTEGER NOT NULL,
    FOREIGN KEY (item_id) REFERENCES items(id)
  );

  CREATE TABLE IF NOT EXISTS forecast_runs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    week_start_date TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    parameters TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS forecast_run_lines (
    run_id INTEGER NOT NULL,
    position INTEGER NOT NULL,
    item_id INTEGER NOT NULL,
    item_name TEXT NOT NULL,
    mon REAL NOT NULL,
    tue REAL NOT NULL,
    wed REAL NOT NULL,
    thu REAL NOT NULL,
    fri REAL NOT NULL,
    sat REAL NOT NULL,
    weekly_total REAL NOT NULL,
    cold_start INTEGER NOT NULL,
    model_version INTEGER,
    note TEXT NOT NULL,
    days TEXT NOT NULL,
    PRIMARY KEY (run_id, item_id),
    FOREIGN KEY (run_id) REFERENCES forecast_runs(id)
  );

  CREATE TABLE IF NOT EXISTS forecast_run_alerts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    run_id INTEGER NOT NULL,
    item_id INTEGER NOT NULL,
    day TEXT,
    reason TEXT NOT NULL,
    detail TEXT NOT NULL,
    FOREIGN KEY (run_id) REFERENCES forecast_runs(id)
  );

  CREATE TRIGGER IF NOT EXISTS forecast_runs_no_update BEFORE UPDATE ON forecast_runs
  BEGIN SELECT RAISE(ABORT, 'forecast runs are immutable'); END;
  CREATE TRIGGER IF NOT EXISTS forecast_runs_no_delete BEFORE DELETE ON forecast_runs
  BEGIN SELECT RAISE(ABORT, 'forecast runs are immutable'); END;
  CREATE TRIGGER IF NOT EXISTS forecast_run_lines_no_update BEFORE UPDATE ON forecast_run_lines
  BEGIN SELECT RAISE(ABORT, 'forecast runs are immutable'); END;
  CREATE TRIGGER IF NOT EXISTS forecast_run_lines_no_delete BEFORE DELETE ON forecast_run_lines
  BEGIN SELECT RAISE(ABORT, 'forecast runs are immutable'); END;
  CREATE TRIGGER IF NOT EXISTS forecast_run_alerts_no_update BEFORE UPDATE ON forecast_run_alerts
  BEGIN SELECT RAISE(ABORT, 'forecast runs are immutable'); END;
  CREATE TRIGGER IF NOT EXISTS forecast_run_alerts_no_delete BEFORE DELETE ON forecast_run_alerts
  BEGIN SELECT RAISE(ABORT, 'forecast runs are immutable'); END;

  CREATE INDEX IF NOT EXISTS idx_sales_item_date ON sales_records(item_id, date);
  CREATE INDEX IF NOT EXISTS idx_aliases_item ON item_aliases(item_id);
  CREATE INDEX IF NOT EXISTS idx_events_date ON events(date);
  CREATE INDEX IF NOT EXISTS idx_runs_week ON forecast_runs(week_start_date);
  CREATE INDEX IF NOT EXISTS idx_batches_hash ON ingestion_batches(content_hash);
`;

// ---------------------------------------------------------------------------
// Row readers
// ---------------------------------------------------------------------------

export function rowString(row: SqlRow, column: string): string {
  const value = row[column];
  return value === null || value === undefined ? '' : String(value);
}

export function rowOptionalString(row: SqlRow, column: string): string | null {
  const value = row[column];
  return value === null || value === undefined ? null : String(value);
}

export function rowNumber(row: SqlRow, column: string): number {
  const value = row[column];
  return typeof value === 'number' ? value : Number(value ?? 0);
}

export function rowOptionalNumber(row: SqlRow, column: string): number | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  return typeof value === 'number' ? value : Number(value);
}

// ---------------------------------------------------------------------------
// Open
// ---------------------------------------------------------------------------

/**
 * Open a database. With `file: null` the database lives only in memory,
 * which is what the tests use.
 */
export async function openDatabase(options: OpenDatabaseOptions): Promise<Database> {
  const { file } = options;
  const SQL = await initSqlJs();

  let raw: SqlJsDatabase;
  if (file && existsSync(file)) {
    logger.info(`Opening database: ${file}`);
    raw = new SQL.Database(readFileSync(file));
  } else {
    if (file) {
      mkdirSync(dirname(file), { recursive: true });
      logger.info(`Creating database: ${file}`);
    }
    raw = new SQL.Database();
  }

  raw.exec('PRAGMA foreign_keys = ON;');
  raw.exec(SCHEMA_SQL);

  let depth = 0;
  let closed = false;

  function saveDb(): void {
    if (!file || closed) return;
    try {
      const tmpPath = file + '.tmp';
      writeFileSync(tmpPath, Buffer.from(raw.export()));
      renameSync(tmpPath, file);
    } catch (error) {
      throw new PersistenceFailure(`Could not save database to ${file}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  function wrap(error: unknown, sql: string): never {
    if (error instanceof PersistenceFailure) throw error;
    throw new PersistenceFailure(`SQL failed (${sql.trim().split(/\s+/).slice(0, 3).join(' ')}…): ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const db: Database = {
    close() {
      if (closed) return;
      saveDb();
      raw.close();
      closed = true;
    },

    save() {
      saveDb();
    },

    run(sql: string, params: SqlValue[] = []): void {
      try {
        raw.run(sql, params);
      } catch (error) {
        wrap(error, sql);
      }
      if (depth === 0) saveDb();
    },

    query(sql: string, params: SqlValue[] = []): SqlRow[] {
      try {
        const stmt = raw.prepare(sql);
        try {
          stmt.bind(params);
          const results: SqlRow[] = [];
          while (stmt.step()) {
            results.push(stmt.getAsObject());
          }
          return results;
        } finally {
          stmt.free();
        }
      } catch (error) {
        return wrap(error, sql);
      }
    },

    lastInsertId(): number {
      const rows = db.query('SELECT last_insert_rowid() AS id');
      return rows.length > 0 ? rowNumber(rows[0], 'id') : 0;
    },

    transaction<T>(fn: () => T): T {
      if (depth > 0) {
        depth++;
        try {
          return fn();
        } finally {
          depth--;
        }
      }

      raw.exec('BEGIN');
      depth = 1;
      let result: T;
      try {
        result = fn();
        raw.exec('COMMIT');
      } catch (error) {
        try {
          raw.exec('ROLLBACK');
        } catch (rollbackError) {
          logger.error({ err: rollbackError }, 'Rollback failed');
        }
        throw error;
      } finally {
        depth = 0;
      }
      saveDb();
      return result;
    },
  };

  return db;
}

// ---------------------------------------------------------------------------
// Shared instance for the CLI
// ---------------------------------------------------------------------------

let dbInitPromise: Promise<Database> | null = null;

/**
 * Open (once) the database in the state directory.
 */
export function createDatabase(): Promise<Database> {
  if (!dbInitPromise) {
    const file = join(resolveStateDir(), 'bakeplan.db');
    dbInitPromise = openDatabase({ file });
  }
  return dbInitPromise;
}

import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { resolvePath } from '../shared/utils.js';
import { DbError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { runMigrations } from './migrate.js';
import type { MigrationReport } from './migrate.js';

export interface OpenOptions {
  /** Create the file (and its directory) when it does not exist yet. */
  create?: boolean;
}

export interface OpenedDb {
  db: Database.Database;
  migrations: MigrationReport;
}

let current: { path: string; db: Database.Database } | null = null;

/**
 * Open the post store and bring its schema up to date. The handle is shared:
 * a second open of the same path returns it, a different path is an error
 * until `closeDb`.
 */
export function openDatabase(dbPath: string, options: OpenOptions = {}): OpenedDb {
  const resolved = dbPath === ':memory:' ? ':memory:' : resolvePath(dbPath);

  if (current) {
    if (current.path !== resolved) {
      throw new DbError(`Another database is already open: ${current.path}`, { path: resolved });
    }
    return { db: current.db, migrations: runMigrations(current.db) };
  }

  if (resolved !== ':memory:') {
    if (!fs.existsSync(resolved)) {
      if (!options.create) {
        throw new DbError(`Database not found at ${resolved}. Run relaypost init first.`, { path: resolved });
      }
      fs.mkdirSync(path.dirname(resolved), { recursive: true });
    }
  }

  let db: Database.Database;
  try {
    db = new Database(resolved);
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.pragma('busy_timeout = 5000');
  } catch (err) {
    throw new DbError(`Failed to open database at ${resolved}`, { path: resolved, cause: errorMessage(err) });
  }

  const migrations = runMigrations(db);
  current = { path: resolved, db };
  logger.debug({ path: resolved, applied: migrations.applied.length }, 'Database opened');
  return { db, migrations };
}

export function getDb(): Database.Database {
  if (!current) {
    throw new DbError('Database not open. Call openDatabase() first.');
  }
  return current.db;
}

export function closeDb(): void {
  if (current) {
    current.db.close();
    current = null;
  }
}

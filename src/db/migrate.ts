import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { DbError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';

export interface MigrationReport {
  applied: string[];
  skipped: string[];
}

export function getMigrationsDir(): string {
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

function listMigrationFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) {
    throw new DbError(`Migrations directory not found: ${dir}`);
  }
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();
}

/**
 * Apply every *.sql file in the migrations directory that is not yet listed
 * in `_migrations`. Each file runs in its own transaction.
 */
export function runMigrations(
  db: Database.Database,
  migrationsDir: string = getMigrationsDir(),
): MigrationReport {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const rows = db.prepare('SELECT name FROM _migrations').all() as Array<{ name: string }>;
  const alreadyApplied = new Set(rows.map((r) => r.name));
  const pending = listMigrationFiles(migrationsDir).filter((f) => !alreadyApplied.has(f));

  const report: MigrationReport = { applied: [], skipped: [...alreadyApplied] };
  const record = db.prepare('INSERT INTO _migrations (name) VALUES (?)');

  for (const migration of pending) {
    const sql = fs.readFileSync(path.join(migrationsDir, migration), 'utf-8');
    const apply = db.transaction(() => {
      db.exec(sql);
      record.run(migration);
    });

    try {
      apply();
      report.applied.push(migration);
      logger.info({ migration }, 'Migration applied');
    } catch (err) {
      throw new DbError(`Migration failed: ${migration}`, {
        migration,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  }

  return report;
}

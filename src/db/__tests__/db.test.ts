import { describe, it, expect, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { closeDb, getDb, openDatabase } from '../db.js';
import { DbError } from '../../shared/errors.js';

let tmpDir: string | undefined;

afterEach(() => {
  closeDb();
  if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
  tmpDir = undefined;
});

describe('openDatabase', () => {
  it('applies migrations on first open and reuses the handle after', () => {
    const first = openDatabase(':memory:');
    expect(first.migrations.applied).toContain('001_init.sql');
    expect(first.db.pragma('foreign_keys', { simple: true })).toBe(1);

    const second = openDatabase(':memory:');
    expect(second.db).toBe(first.db);
    expect(second.migrations.applied).toEqual([]);
    expect(getDb()).toBe(first.db);
  });

  it('refuses a missing file unless asked to create it', () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'relaypost-db-'));
    const dbPath = path.join(tmpDir, 'nested', 'relaypost.db');

    expect(() => openDatabase(dbPath)).toThrow(DbError);
    expect(fs.existsSync(dbPath)).toBe(false);

    const { db } = openDatabase(dbPath, { create: true });
    expect(fs.existsSync(dbPath)).toBe(true);
    const row = db.prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='posts'").get();
    expect(row).toEqual({ name: 'posts' });
  });

  it('will not switch to another path while one is open', () => {
    openDatabase(':memory:');
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'relaypost-db-'));
    expect(() => openDatabase(path.join(tmpDir ?? '', 'other.db'), { create: true })).toThrow(
      'Another database is already open: :memory:',
    );
  });

  it('throws from getDb after closeDb', () => {
    openDatabase(':memory:');
    closeDb();
    expect(() => getDb()).toThrow(DbError);
  });
});

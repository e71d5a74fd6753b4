/**
 * Integration tests for database operations
 * Tests the SQLite database setup and migrations
 */

import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import type Database from 'better-sqlite3';
import { openDatabase } from '../../src/database/db.js';
import { runMigrations } from '../../src/database/migration-runner.js';
import { createTestDatabase, cleanupTestDatabase } from '../utils/database.js';

describe('Database Integration Tests', () => {
  const opened: Database.Database[] = [];
  const tempDirs: string[] = [];

  afterEach(() => {
    opened.splice(0).forEach((db) => db.close());
    tempDirs.splice(0).forEach((dir) => fs.rmSync(dir, { recursive: true, force: true }));
    cleanupTestDatabase();
  });

  it('should create every table the repository uses', () => {
    const db = createTestDatabase();
    expect(runMigrations(db)).toEqual(['001_initial_schema']);

    const tables = db
      .prepare(
        `
        SELECT name FROM sqlite_master
        WHERE type='table' AND name NOT LIKE 'sqlite_%'
        ORDER BY name
      `,
      )
      .all() as { name: string }[];

    expect(tables.map((table) => table.name)).toEqual([
      'escalation_levels',
      'legacy_schedule',
      'manual_schedule',
      'overrides',
      'rotations',
      'schema_migrations',
      'settings',
      'users',
      'webhook_deliveries',
      'webhooks',
    ]);
  });

  it('should apply each migration only once', () => {
    const db = createTestDatabase();
    runMigrations(db);

    expect(runMigrations(db)).toEqual([]);
  });

  it('should create the database file and its directory', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'oncall-db-'));
    tempDirs.push(dir);
    const dbPath = path.join(dir, 'nested', 'oncall.db');

    const db = openDatabase(dbPath);
    opened.push(db);

    expect(fs.existsSync(dbPath)).toBe(true);
    expect(db.pragma('journal_mode', { simple: true })).toBe('wal');
  });
});

/**
 * Database migration runner - isolated from any particular database instance
 */

import * as fs from 'fs';
import * as path from 'path';
import type Database from 'better-sqlite3';
import { Logger } from '../logger.js';

const logger = new Logger('migration-runner');

/**
 * Runs all pending `.sql` migrations, in file name order, on the provided database
 * @param migrationsPath - Optional path to the migrations directory (defaults to 'migrations' in cwd)
 * @returns Versions applied by this run
 */
export function runMigrations(db: Database.Database, migrationsPath?: string): string[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version TEXT PRIMARY KEY,
      applied_at DATETIME DEFAULT CURRENT_TIMESTAMP
    )
  `);

  const migrationsDir = migrationsPath || path.join(process.cwd(), 'migrations');

  const migrationFiles = fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith('.sql'))
    .sort();

  const appliedMigrations = new Set(
    (db.prepare('SELECT version FROM schema_migrations').all() as { version: string }[]).map((row) => row.version),
  );

  logger.debug(`Found ${migrationFiles.length} migration files`);

  const applied: string[] = [];
  for (const file of migrationFiles) {
    const version = path.basename(file, '.sql');

    if (appliedMigrations.has(version)) {
      continue;
    }

    logger.info(`Applying migration: ${file}`);
    const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf8');

    try {
      db.transaction(() => {
        db.exec(sql);
        db.prepare('INSERT INTO schema_migrations (version) VALUES (?)').run(version);
      })();
      applied.push(version);
    } catch (error) {
      logger.error(`✗ Failed to apply ${file}:`, error);
      throw error;
    }
  }

  return applied;
}

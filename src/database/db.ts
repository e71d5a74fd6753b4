import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { Logger } from '../logger.js';
import { getDatabasePath } from './getDatabasePath.js';

const logger = new Logger('db');

/** Opens (creating if needed) the on-call database file. */
export function openDatabase(dbPath: string = getDatabasePath()): Database.Database {
  logger.info('Connecting to database', { dbPath });
  if (!fs.existsSync(dbPath)) {
    logger.info('Database file does not exist, creating', { dbPath });
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  return db;
}

import path from 'path';
import { DATABASE_PATH } from '../config.js';

export function getDatabasePath(): string {
  return DATABASE_PATH || path.join(process.cwd(), 'database', 'oncall.db');
}

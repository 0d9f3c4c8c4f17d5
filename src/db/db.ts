import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { resolvePath } from '../shared/utils.js';
import { DbError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

interface OpenDb {
  path: string;
  db: Database.Database;
}

let current: OpenDb | null = null;

function locate(dbPath: string): string {
  return dbPath === ':memory:' ? dbPath : resolvePath(dbPath);
}

/**
 * Open the process-wide database. Calling it again with the same path returns
 * the open handle; another path is an error until closeDb().
 */
export function initDb(dbPath: string): Database.Database {
  const resolved = locate(dbPath);
  if (current) {
    if (current.path === resolved) return current.db;
    throw new DbError(`Database already open at ${current.path}`, {
      open: current.path,
      requested: resolved,
    });
  }

  try {
    if (resolved !== ':memory:') {
      fs.mkdirSync(path.dirname(resolved), { recursive: true });
    }

    const db = new Database(resolved);
    db.pragma('journal_mode = WAL');
    // Under WAL, NORMAL loses no commit on a process crash, only on power loss.
    db.pragma('synchronous = NORMAL');
    db.pragma('busy_timeout = 5000');

    current = { path: resolved, db };
    logger.debug({ path: resolved }, 'Database opened');
    return db;
  } catch (err) {
    throw new DbError(`Failed to open database at ${resolved}`, {
      path: resolved,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}

export function closeDb(): void {
  if (!current) return;
  const { db, path: dbPath } = current;
  current = null;
  db.close();
  logger.debug({ path: dbPath }, 'Database closed');
}

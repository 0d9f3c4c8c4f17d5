import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { DbError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';

export interface MigrationResult {
  applied: string[];
  skipped: string[];
}

interface Migration {
  name: string;
  sql: string;
}

interface ColumnInfo {
  name: string;
  pk: number;
}

interface IndexInfo {
  name: string;
  unique: number;
}

/** Tables the scanner writes to, with the column each one is keyed on. */
const REQUIRED_KEYS: Array<{ table: string; column: string }> = [
  { table: 'sources', column: 'url' },
  { table: 'seen_items', column: 'item_id' },
];

export function defaultMigrationsDir(): string {
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

function loadMigrations(dir: string): Migration[] {
  if (!fs.existsSync(dir)) {
    throw new DbError(`Migrations directory not found: ${dir}`, { dir });
  }
  return fs
    .readdirSync(dir)
    .filter((f) => /^\d+_.+\.sql$/.test(f))
    .sort()
    .map((name) => ({ name, sql: fs.readFileSync(path.join(dir, name), 'utf-8') }));
}

function appliedNames(db: Database.Database): Set<string> {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
  const rows = db.prepare<[], { name: string }>('SELECT name FROM _migrations').all();
  return new Set(rows.map((r) => r.name));
}

/**
 * True when `column` alone is the table's primary key or carries a unique
 * index. The seen-item claim relies on this for INSERT OR IGNORE.
 */
function isUniqueKey(db: Database.Database, table: string, column: string): boolean {
  const columns = db.prepare<[], ColumnInfo>(`PRAGMA table_info(${table})`).all();
  const pk = columns.filter((c) => c.pk > 0);
  if (pk.length === 1 && pk[0]?.name === column) return true;

  const indexes = db.prepare<[], IndexInfo>(`PRAGMA index_list(${table})`).all();
  return indexes.some((index) => {
    if (index.unique !== 1) return false;
    const cols = db.prepare<[], { name: string }>(`PRAGMA index_info(${index.name})`).all();
    return cols.length === 1 && cols[0]?.name === column;
  });
}

/**
 * Check that the tables exist with their unique keys. A database created by
 * hand or by an older tool can otherwise let two scans claim the same listing.
 */
export function verifySchema(db: Database.Database): void {
  const tables = new Set(
    db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table'")
      .all()
      .map((t) => t.name),
  );

  for (const { table, column } of REQUIRED_KEYS) {
    if (!tables.has(table)) {
      throw new DbError(`Schema check failed: table ${table} is missing`, { table });
    }
    if (!isUniqueKey(db, table, column)) {
      throw new DbError(`Schema check failed: ${table}.${column} is not a unique key`, {
        table,
        column,
      });
    }
  }
}

/**
 * Apply pending `NNN_name.sql` files in order, each in its own transaction,
 * then verify the resulting schema.
 */
export function runMigrations(
  db: Database.Database,
  dir: string = defaultMigrationsDir(),
): MigrationResult {
  const done = appliedNames(db);
  const result: MigrationResult = { applied: [], skipped: [] };

  for (const migration of loadMigrations(dir)) {
    if (done.has(migration.name)) {
      result.skipped.push(migration.name);
      continue;
    }

    const apply = db.transaction(() => {
      db.exec(migration.sql);
      db.prepare<[string]>('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
    });

    try {
      apply();
    } catch (err) {
      throw new DbError(`Migration failed: ${migration.name}`, {
        migration: migration.name,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    result.applied.push(migration.name);
    logger.info({ migration: migration.name }, 'Migration applied');
  }

  verifySchema(db);
  return result;
}

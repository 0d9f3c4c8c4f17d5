import type Database from 'better-sqlite3';
import { DbError } from '../shared/errors.js';

export interface SeenRecord {
  itemId: string;
  sourceUrl: string;
  firstSeenAt: Date;
}

/**
 * Record of listings already reported. `record` is the single claim point:
 * whichever caller gets `true` owns the report for that identifier.
 */
export interface SeenStore {
  isNew(itemId: string): boolean;
  record(itemId: string, sourceUrl: string, at: Date): boolean;
  sweep(retentionMs: number, now: Date): number;
  get(itemId: string): SeenRecord | undefined;
  count(): number;
  clear(): number;
}

interface SeenRow {
  item_id: string;
  source_url: string;
  first_seen_at: string;
}

function wrap<T>(op: string, fn: () => T, details?: Record<string, unknown>): T {
  try {
    return fn();
  } catch (err) {
    throw new DbError(
      `Seen store ${op} failed: ${err instanceof Error ? err.message : String(err)}`,
      details,
    );
  }
}

export class SqliteSeenStore implements SeenStore {
  private readonly existsStmt: Database.Statement<[string]>;
  private readonly insertStmt: Database.Statement<[string, string, string]>;
  private readonly getStmt: Database.Statement<[string], SeenRow>;
  private readonly sweepStmt: Database.Statement<[string]>;

  constructor(private readonly db: Database.Database) {
    this.existsStmt = db.prepare<[string]>('SELECT 1 FROM seen_items WHERE item_id = ?');
    this.insertStmt = db.prepare<[string, string, string]>(
      'INSERT OR IGNORE INTO seen_items (item_id, source_url, first_seen_at) VALUES (?, ?, ?)',
    );
    this.getStmt = db.prepare<[string], SeenRow>('SELECT * FROM seen_items WHERE item_id = ?');
    this.sweepStmt = db.prepare<[string]>('DELETE FROM seen_items WHERE first_seen_at < ?');
  }

  isNew(itemId: string): boolean {
    return wrap('lookup', () => this.existsStmt.get(itemId) === undefined, { itemId });
  }

  record(itemId: string, sourceUrl: string, at: Date): boolean {
    return wrap(
      'insert',
      () => this.insertStmt.run(itemId, sourceUrl, at.toISOString()).changes > 0,
      { itemId, sourceUrl },
    );
  }

  sweep(retentionMs: number, now: Date): number {
    const cutoff = new Date(now.getTime() - retentionMs).toISOString();
    return wrap('sweep', () => this.sweepStmt.run(cutoff).changes, { cutoff });
  }

  get(itemId: string): SeenRecord | undefined {
    const row = wrap('lookup', () => this.getStmt.get(itemId), { itemId });
    if (!row) return undefined;
    return {
      itemId: row.item_id,
      sourceUrl: row.source_url,
      firstSeenAt: new Date(row.first_seen_at),
    };
  }

  count(): number {
    const row = wrap('count', () =>
      this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM seen_items').get(),
    );
    return row?.count ?? 0;
  }

  clear(): number {
    return wrap('clear', () => this.db.prepare('DELETE FROM seen_items').run().changes);
  }
}

import type Database from 'better-sqlite3';
import type { SourceRow, TrackedSource } from './adapter.js';
import { nowISO } from '../shared/utils.js';
import { DbError, SourceError } from '../shared/errors.js';

export function normalizeHashtag(tag: string | null | undefined): string | null {
  if (!tag) return null;
  const trimmed = tag.trim().replace(/\s+/g, '_');
  if (!trimmed) return null;
  return trimmed.startsWith('#') ? trimmed : `#${trimmed}`;
}

function assertHttpUrl(url: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new SourceError(`Invalid source URL: ${url}`, { url });
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new SourceError(`Source URL must be http(s): ${url}`, { url });
  }
}

function wrap<T>(op: string, fn: () => T, details?: Record<string, unknown>): T {
  try {
    return fn();
  } catch (err) {
    throw new DbError(`Failed to ${op}: ${err instanceof Error ? err.message : String(err)}`, details);
  }
}

export function addSource(
  db: Database.Database,
  opts: { url: string; hashtag?: string | null; title?: string | null },
): boolean {
  const url = opts.url.trim();
  assertHttpUrl(url);

  return wrap(
    'add source',
    () =>
      db
        .prepare<[string, string | null, string | null, string]>(
          `INSERT OR IGNORE INTO sources (url, hashtag, title, created_at)
           VALUES (?, ?, ?, ?)`,
        )
        .run(url, normalizeHashtag(opts.hashtag), opts.title ?? null, nowISO()).changes > 0,
    { url },
  );
}

export function listSources(
  db: Database.Database,
  opts: { activeOnly?: boolean } = {},
): SourceRow[] {
  const where = opts.activeOnly ? 'WHERE is_active = 1' : '';
  return wrap('list sources', () =>
    db.prepare<[], SourceRow>(`SELECT * FROM sources ${where} ORDER BY created_at ASC, rowid ASC`).all(),
  );
}

export function getSource(db: Database.Database, url: string): SourceRow | undefined {
  return wrap(
    'read source',
    () => db.prepare<[string], SourceRow>('SELECT * FROM sources WHERE url = ?').get(url),
    { url },
  );
}

export function updateSource(
  db: Database.Database,
  url: string,
  updates: { hashtag?: string | null; title?: string | null; is_active?: number },
): boolean {
  const sets: string[] = [];
  const values: Array<string | number | null> = [];

  if (updates.hashtag !== undefined) {
    sets.push('hashtag = ?');
    values.push(normalizeHashtag(updates.hashtag));
  }
  if (updates.title !== undefined) {
    sets.push('title = ?');
    values.push(updates.title);
  }
  if (updates.is_active !== undefined) {
    sets.push('is_active = ?');
    values.push(updates.is_active);
  }

  if (sets.length === 0) return false;

  values.push(url);
  return wrap(
    'update source',
    () => db.prepare(`UPDATE sources SET ${sets.join(', ')} WHERE url = ?`).run(...values).changes > 0,
    { url },
  );
}

export function removeSource(db: Database.Database, url: string): boolean {
  return wrap(
    'remove source',
    () => db.prepare<[string]>('DELETE FROM sources WHERE url = ?').run(url).changes > 0,
    { url },
  );
}

export function markScanned(
  db: Database.Database,
  url: string,
  status: string,
  at: Date = new Date(),
): void {
  wrap(
    'record scan status',
    () =>
      db
        .prepare<[string, string, string]>(
          'UPDATE sources SET last_scanned_at = ?, last_status = ? WHERE url = ?',
        )
        .run(at.toISOString(), status, url),
    { url, status },
  );
}

/**
 * Insert sources named in the config file. Existing rows are left alone so
 * admin edits (tags, disabling) survive a restart.
 */
export function syncConfigSources(
  db: Database.Database,
  sources: Array<{ url: string; hashtag?: string; title?: string }>,
): number {
  let added = 0;
  for (const s of sources) {
    if (addSource(db, s)) added++;
  }
  return added;
}

export function toTrackedSource(row: SourceRow): TrackedSource {
  return { url: row.url, hashtag: row.hashtag, title: row.title };
}

export function listTrackedSources(db: Database.Database): TrackedSource[] {
  return listSources(db, { activeOnly: true }).map(toTrackedSource);
}

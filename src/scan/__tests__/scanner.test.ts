import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import { SqliteSeenStore } from '../seenStore.js';
import { scanSource, type ScanOptions } from '../scanner.js';
import type { FetchOptions, PageFetcher, RawItem, TrackedSource } from '../../source/adapter.js';
import { FetchEmptyError, FetchError, FetchTimeoutError } from '../../shared/errors.js';

const MINUTE = 60_000;
const NOW = new Date('2025-03-10T12:00:00.000Z');
const SOURCE: TrackedSource = {
  url: 'https://www.olx.pl/elektronika/telefony/',
  hashtag: '#phones',
  title: null,
};

function item(id: string, postedText: string): RawItem {
  return { id, url: `https://www.olx.pl/d/oferta/${id}.html`, title: `Listing ${id}`, postedText };
}

class StaticFetcher implements PageFetcher {
  calls: FetchOptions[] = [];

  constructor(private readonly result: RawItem[] | Error) {}

  async fetch(_source: TrackedSource, options: FetchOptions): Promise<RawItem[]> {
    this.calls.push(options);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

function options(overrides: Partial<ScanOptions> = {}): ScanOptions {
  return {
    now: NOW,
    thresholds: { veryFreshMs: 10 * MINUTE, maxAgeMs: 60 * MINUTE },
    skipFirstN: 2,
    maxItemsPerScan: 13,
    consecutiveStaleThreshold: 3,
    maxPages: 1,
    timeZone: 'Europe/Warsaw',
    ...overrides,
  };
}

let db: Database.Database;
let store: SqliteSeenStore;

beforeEach(() => {
  db = new Database(':memory:');
  runMigrations(db);
  store = new SqliteSeenStore(db);
});

afterEach(() => {
  db.close();
});

describe('scanSource', () => {
  it('skips promoted slots and reports fresh unseen listings in page order', async () => {
    const fetcher = new StaticFetcher([
      item('P1', '1 minut temu'),
      item('P2', '1 minut temu'),
      item('I3', '5 minut temu'),
      item('I4', '45 minut temu'),
      item('I5', '5 minut temu'),
    ]);

    const outcome = await scanSource(
      SOURCE,
      { fetcher, store },
      options({ thresholds: { veryFreshMs: 10 * MINUTE, maxAgeMs: 50 * MINUTE } }),
    );

    expect(outcome.status).toBe('ok');
    expect(outcome.items.map((i) => i.id)).toEqual(['I3', 'I4', 'I5']);
    expect(outcome.items.map((i) => i.tier)).toEqual(['very_fresh', 'fresh', 'very_fresh']);
    expect(outcome.foundNew).toBe(true);
    expect(outcome.examined).toBe(3);
    expect(store.isNew('P1')).toBe(true);
    expect(store.isNew('I4')).toBe(false);
  });

  it('asks the fetcher for the promoted slots plus the scan window', async () => {
    const fetcher = new StaticFetcher([item('a', '1 minut temu')]);
    await scanSource(SOURCE, { fetcher, store }, options({ maxPages: 2 }));
    expect(fetcher.calls).toEqual([{ maxItems: 15, maxPages: 2, signal: undefined }]);
  });

  it('stops after a run of stale listings', async () => {
    const stale = ['s1', 's2', 's3'].map((id) => item(id, '3 godziny temu'));
    const fresh = Array.from({ length: 10 }, (_, i) => item(`f${i}`, '1 minut temu'));
    const fetcher = new StaticFetcher([item('P1', '1 minut temu'), item('P2', '1 minut temu'), ...stale, ...fresh]);

    const outcome = await scanSource(SOURCE, { fetcher, store }, options());

    expect(outcome.earlyExit).toBe(true);
    expect(outcome.examined).toBe(3);
    expect(outcome.stale).toBe(3);
    expect(outcome.items).toEqual([]);
    expect(outcome.foundNew).toBe(false);
    expect(store.count()).toBe(0);
  });

  it('resets the stale run on a fresh listing', async () => {
    const fetcher = new StaticFetcher([
      item('s1', '2 godziny temu'),
      item('s2', '2 godziny temu'),
      item('f1', '3 minut temu'),
      item('s3', '2 godziny temu'),
      item('s4', '2 godziny temu'),
      item('f2', '3 minut temu'),
    ]);

    const outcome = await scanSource(SOURCE, { fetcher, store }, options({ skipFirstN: 0 }));

    expect(outcome.earlyExit).toBe(false);
    expect(outcome.examined).toBe(6);
    expect(outcome.stale).toBe(4);
    expect(outcome.items.map((i) => i.id)).toEqual(['f1', 'f2']);
  });

  it('counts unreadable dates as stale', async () => {
    const fetcher = new StaticFetcher([
      item('u1', 'Wyróżnione'),
      item('u2', ''),
      item('u3', 'Pilne'),
      item('f1', '1 minut temu'),
    ]);

    const outcome = await scanSource(SOURCE, { fetcher, store }, options({ skipFirstN: 0 }));

    expect(outcome.earlyExit).toBe(true);
    expect(outcome.examined).toBe(3);
    expect(outcome.items).toEqual([]);
  });

  it('examines at most the scan window', async () => {
    const fetcher = new StaticFetcher(
      Array.from({ length: 10 }, (_, i) => item(`f${i}`, '1 minut temu')),
    );

    const outcome = await scanSource(SOURCE, { fetcher, store }, options({ maxItemsPerScan: 3 }));

    expect(outcome.examined).toBe(3);
    expect(outcome.items.map((i) => i.id)).toEqual(['f2', 'f3', 'f4']);
  });

  it('does not report the same listing twice', async () => {
    const fetcher = new StaticFetcher([item('a', '1 minut temu'), item('b', '2 minut temu')]);
    const opts = options({ skipFirstN: 0 });

    const first = await scanSource(SOURCE, { fetcher, store }, opts);
    const second = await scanSource(SOURCE, { fetcher, store }, opts);

    expect(first.items.map((i) => i.id)).toEqual(['a', 'b']);
    expect(second.items).toEqual([]);
    expect(second.duplicates).toBe(2);
    expect(second.foundNew).toBe(false);
  });

  it.each([
    ['timeout', new FetchTimeoutError('slow')],
    ['empty', new FetchEmptyError('no cards')],
    ['error', new FetchError('HTTP 503')],
    ['error', new Error('socket hang up')],
  ] as const)('reports a %s failure without touching the store', async (kind, err) => {
    const outcome = await scanSource(SOURCE, { fetcher: new StaticFetcher(err), store }, options());

    expect(outcome.status).toBe('failed');
    expect(outcome.failure).toBe(kind);
    expect(outcome.error).toBe(err.message);
    expect(outcome.items).toEqual([]);
    expect(outcome.foundNew).toBe(false);
  });

  it('reads wall-clock dates in the configured zone', async () => {
    const fetcher = new StaticFetcher([item('w', 'Dzisiaj o 12:30')]);

    const warsaw = await scanSource(SOURCE, { fetcher, store }, options({ skipFirstN: 0 }));
    expect(warsaw.items.map((i) => [i.id, i.ageMs, i.tier])).toEqual([['w', 30 * MINUTE, 'fresh']]);

    store.clear();
    const utc = await scanSource(SOURCE, { fetcher, store }, options({ skipFirstN: 0, timeZone: 'UTC' }));
    expect(utc.items.map((i) => [i.id, i.ageMs, i.tier])).toEqual([['w', 0, 'very_fresh']]);
  });

  it('treats an empty page as an empty failure', async () => {
    const outcome = await scanSource(SOURCE, { fetcher: new StaticFetcher([]), store }, options());
    expect(outcome.status).toBe('failed');
    expect(outcome.failure).toBe('empty');
  });

  it('abandons results that arrive after the deadline', async () => {
    const controller = new AbortController();
    controller.abort();
    const fetcher = new StaticFetcher([item('a', '1 minut temu')]);

    const outcome = await scanSource(
      SOURCE,
      { fetcher, store },
      options({ skipFirstN: 0, signal: controller.signal }),
    );

    expect(outcome.failure).toBe('timeout');
    expect(store.count()).toBe(0);
  });
});

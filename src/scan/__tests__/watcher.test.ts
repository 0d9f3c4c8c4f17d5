import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import { addSource, getSource } from '../../source/sourceDb.js';
import { SqliteSeenStore } from '../seenStore.js';
import { Watcher } from '../watcher.js';
import { DeliveryQueue } from '../../push/queue.js';
import type { Delivery } from '../../push/delivery.js';
import type { ClassifiedItem } from '../freshness.js';
import type { FetchOptions, PageFetcher, RawItem, TrackedSource } from '../../source/adapter.js';
import { ConfigSchema, type Config } from '../../shared/config.js';
import { DbError, FetchEmptyError } from '../../shared/errors.js';

const NOW = new Date('2025-03-10T12:00:00.000Z');
const PHONES = 'https://www.olx.pl/elektronika/telefony/';
const BIKES = 'https://www.olx.pl/sport-hobby/rowery/';

class RecordingDelivery implements Delivery {
  readonly name = 'memory';
  sent: Array<{ id: string; source: string }> = [];

  async send(item: ClassifiedItem, source: TrackedSource): Promise<void> {
    this.sent.push({ id: item.id, source: source.url });
  }
}

class MapFetcher implements PageFetcher {
  calls = 0;
  onFetch: (() => void) | null = null;

  constructor(private readonly pages: Record<string, RawItem[]>) {}

  async fetch(source: TrackedSource, _options: FetchOptions): Promise<RawItem[]> {
    this.calls++;
    this.onFetch?.();
    const items = this.pages[source.url];
    if (!items) throw new FetchEmptyError(`No listings found on ${source.url}`);
    return items;
  }
}

function item(id: string): RawItem {
  return { id, url: `https://www.olx.pl/d/oferta/${id}.html`, title: id, postedText: '3 minut temu' };
}

function testConfig(overrides: Record<string, unknown> = {}): Config {
  return ConfigSchema.parse({
    scan: {
      skip_first_n: 0,
      quick_check_interval_sec: 0.01,
      min_interval_sec: 0.02,
      max_interval_sec: 0.05,
    },
    delivery: { send_delay_ms: 0 },
    ...overrides,
  });
}

let db: Database.Database;
let store: SqliteSeenStore;
let delivery: RecordingDelivery;
let queue: DeliveryQueue;

beforeEach(() => {
  db = new Database(':memory:');
  runMigrations(db);
  store = new SqliteSeenStore(db);
  delivery = new RecordingDelivery();
  queue = new DeliveryQueue([delivery]);
  addSource(db, { url: PHONES, hashtag: 'phones' });
});

afterEach(() => {
  db.close();
});

describe('Watcher.runCycle', () => {
  it('delivers new listings and speeds up, then backs off when nothing is new', async () => {
    const fetcher = new MapFetcher({ [PHONES]: [item('a'), item('b')] });
    const watcher = new Watcher({ db, config: testConfig(), fetcher, store, queue, now: () => NOW });

    const first = await watcher.runCycle();
    expect(first.itemsNew).toBe(2);
    expect(delivery.sent).toEqual([
      { id: 'a', source: PHONES },
      { id: 'b', source: PHONES },
    ]);
    expect(watcher.getState()).toMatchObject({ mode: 'fast', intervalMs: 10, cycle: 1 });

    const second = await watcher.runCycle();
    expect(second.itemsNew).toBe(0);
    expect(delivery.sent).toHaveLength(2);
    expect(watcher.getState()).toMatchObject({
      mode: 'slow',
      intervalMs: 20,
      cycle: 2,
      lastReason: 'quiet',
    });
  });

  it('records the scan result on each source row', async () => {
    addSource(db, { url: BIKES });
    const fetcher = new MapFetcher({ [PHONES]: [item('a')] });
    const watcher = new Watcher({ db, config: testConfig(), fetcher, store, queue, now: () => NOW });

    await watcher.runCycle();

    expect(getSource(db, PHONES)?.last_status).toBe('ok');
    expect(getSource(db, PHONES)?.last_scanned_at).toBe('2025-03-10T12:00:00.000Z');
    expect(getSource(db, BIKES)?.last_status).toBe('failed:empty');
  });

  it('skips disabled sources', async () => {
    db.prepare('UPDATE sources SET is_active = 0 WHERE url = ?').run(PHONES);
    const fetcher = new MapFetcher({ [PHONES]: [item('a')] });
    const watcher = new Watcher({ db, config: testConfig(), fetcher, store, queue, now: () => NOW });

    const summary = await watcher.runCycle();

    expect(fetcher.calls).toBe(0);
    expect(summary.outcomes).toEqual([]);
  });

  it('sweeps the seen store on its cycle cadence', async () => {
    store.record('old', PHONES, new Date('2025-03-01T00:00:00.000Z'));
    const fetcher = new MapFetcher({ [PHONES]: [item('a')] });
    const watcher = new Watcher({
      db,
      config: testConfig({ store: { retention_hours: 48, sweep_every_cycles: 1 } }),
      fetcher,
      store,
      queue,
      now: () => NOW,
    });

    await watcher.runCycle();

    expect(store.isNew('old')).toBe(true);
    expect(store.isNew('a')).toBe(false);
  });

  it('still delivers claimed listings when the status write fails', async () => {
    const fetcher = new MapFetcher({ [PHONES]: [item('a')] });
    const watcher = new Watcher({
      db,
      config: testConfig(),
      fetcher,
      store,
      queue,
      listSources: () => [{ url: PHONES, hashtag: '#phones', title: null }],
      now: () => NOW,
    });
    db.exec('DROP TABLE sources');

    await expect(watcher.runCycle()).rejects.toBeInstanceOf(DbError);

    expect(delivery.sent).toEqual([{ id: 'a', source: PHONES }]);
    expect(store.isNew('a')).toBe(false);
  });

  it('reports status after a cycle', async () => {
    const fetcher = new MapFetcher({ [PHONES]: [item('a')] });
    const watcher = new Watcher({ db, config: testConfig(), fetcher, store, queue, now: () => NOW });

    await watcher.runCycle();
    const status = watcher.getStatus();

    expect(status.running).toBe(false);
    expect(status.nextCycleAt).toBeNull();
    expect(status.seenCount).toBe(1);
    expect(status.delivery).toEqual({ queued: 1, sent: 1, failed: 0 });
    expect(status.lastCycle).toMatchObject({ foundNew: true, itemsNew: 1, failures: [] });
  });
});

describe('Watcher.start', () => {
  it('loops until stopped', async () => {
    const fetcher = new MapFetcher({ [PHONES]: [item('a')] });
    const watcher = new Watcher({ db, config: testConfig(), fetcher, store, queue, now: () => NOW });
    fetcher.onFetch = () => {
      if (fetcher.calls === 2) watcher.stop();
    };

    await watcher.start();

    expect(fetcher.calls).toBe(2);
    expect(watcher.getState().cycle).toBe(2);
    expect(watcher.getStatus().running).toBe(false);
  });
});

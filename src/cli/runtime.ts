import fs from 'node:fs';
import type Database from 'better-sqlite3';
import { loadConfig, type Config } from '../shared/config.js';
import { resolvePath } from '../shared/utils.js';
import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { initDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { syncConfigSources } from '../source/sourceDb.js';
import { OlxPageFetcher } from '../source/olx.js';
import { detailPreparer } from '../source/details.js';
import { SqliteSeenStore } from '../scan/seenStore.js';
import { Watcher } from '../scan/watcher.js';
import { DeliveryQueue } from '../push/queue.js';
import { createDeliveries } from '../push/delivery.js';

export interface Runtime {
  db: Database.Database;
  config: Config;
  store: SqliteSeenStore;
  queue: DeliveryQueue;
  watcher: Watcher;
  cleanup: () => void;
}

export async function openDb(): Promise<{ db: Database.Database; config: Config; cleanup: () => void }> {
  const config = await loadConfig();
  const dbPath = resolvePath(config.db.path);

  if (!fs.existsSync(dbPath)) {
    throw new ConfigError(`Database not found at ${dbPath}. Run listwatch init first.`, {
      path: dbPath,
    });
  }

  const db = initDb(dbPath);
  runMigrations(db);
  return { db, config, cleanup: closeDb };
}

/**
 * Wire the scan engine: db, seen store, fetcher, delivery queue and watcher.
 * Sources listed in the config file are added to the sources table first.
 */
export async function openRuntime(): Promise<Runtime> {
  const { db, config, cleanup } = await openDb();

  const added = syncConfigSources(db, config.sources);
  if (added > 0) {
    logger.info({ added }, 'Sources added from config');
  }

  const store = new SqliteSeenStore(db);
  const deliveries = createDeliveries(config.delivery);
  const fetcher = new OlxPageFetcher({
    userAgent: config.fetch.user_agent,
    acceptLanguage: config.fetch.accept_language,
  });
  const queue = new DeliveryQueue(deliveries, {
    sendDelayMs: config.delivery.send_delay_ms,
    prepare: config.fetch.detail_pages
      ? detailPreparer(fetcher, config.fetch.detail_timeout_ms)
      : undefined,
  });
  const watcher = new Watcher({ db, config, fetcher, store, queue });

  logger.debug({ channels: deliveries.map((d) => d.name) }, 'Delivery channels ready');
  return { db, config, store, queue, watcher, cleanup };
}

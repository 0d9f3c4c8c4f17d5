#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, writeDefaultConfig } from '../shared/config.js';
import { getListwatchDir, resolvePath } from '../shared/utils.js';
import { ListwatchError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { initDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { addSource, listSources, removeSource, updateSource } from '../source/sourceDb.js';
import { SqliteSeenStore } from '../scan/seenStore.js';
import { startServer } from '../api/server.js';
import { openDb, openRuntime } from './runtime.js';

const program = new Command();

program
  .name('listwatch')
  .description('Watch classifieds listing pages and forward fresh, unseen listings')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create config and database')
  .action(
    action(async () => {
      const configPath = path.join(getListwatchDir(), 'config.yaml');

      if (!fs.existsSync(configPath)) {
        writeDefaultConfig(configPath);
        log(`✓ ${configPath} created`);
      } else {
        log(`✓ ${configPath} already exists`);
      }

      const config = await loadConfig();
      const db = initDb(resolvePath(config.db.path));
      try {
        const { applied } = runMigrations(db);
        log(
          applied.length > 0
            ? `✓ ${config.db.path} created (${applied.length} migrations applied)`
            : `✓ ${config.db.path} already up to date`,
        );
      } finally {
        closeDb();
      }
    }),
  );

// === doctor ===
program
  .command('doctor')
  .description('Check config, database, sources and delivery channels')
  .action(
    action(async () => {
      const { db, config, cleanup } = await openDb();
      try {
        const sources = listSources(db);
        const active = sources.filter((s) => s.is_active).length;
        const store = new SqliteSeenStore(db);
        const channels = [
          config.delivery.telegram.enabled ? 'telegram' : null,
          config.delivery.email.enabled ? 'email' : null,
          config.delivery.log.enabled ? 'log' : null,
        ].filter((c): c is string => c !== null);

        log(
          `✓ Config: ok | DB: ok | Sources: ${active}/${sources.length} active | ` +
            `Seen: ${store.count()} | Delivery: ${channels.join(', ') || 'log (fallback)'}`,
        );
      } finally {
        cleanup();
      }
    }),
  );

// === source ===
const sourceCmd = program.command('source').description('Manage tracked listing pages');

sourceCmd
  .command('add <url>')
  .description('Track a listings page')
  .option('-t, --tag <hashtag>', 'Hashtag appended to messages from this page')
  .option('--title <title>', 'Display title')
  .action(
    action(async (url: string, opts: { tag?: string; title?: string }) => {
      const { db, cleanup } = await openDb();
      try {
        const added = addSource(db, { url, hashtag: opts.tag, title: opts.title });
        log(added ? `✓ Source added: ${url}` : `Source already exists: ${url}`);
      } finally {
        cleanup();
      }
    }),
  );

sourceCmd
  .command('remove <url>')
  .description('Stop tracking a listings page')
  .action(
    action(async (url: string) => {
      const { db, cleanup } = await openDb();
      try {
        if (removeSource(db, url)) {
          log(`✓ Source removed: ${url}`);
        } else {
          log(`Source not found: ${url}`);
          process.exitCode = 1;
        }
      } finally {
        cleanup();
      }
    }),
  );

sourceCmd
  .command('tag <url> <hashtag>')
  .description('Set the hashtag for a page')
  .action(
    action(async (url: string, hashtag: string) => {
      const { db, cleanup } = await openDb();
      try {
        if (updateSource(db, url, { hashtag })) {
          log(`✓ Tagged ${url}`);
        } else {
          log(`Source not found: ${url}`);
          process.exitCode = 1;
        }
      } finally {
        cleanup();
      }
    }),
  );

for (const [name, active] of [
  ['enable', 1],
  ['disable', 0],
] as const) {
  sourceCmd
    .command(`${name} <url>`)
    .description(`${name === 'enable' ? 'Resume' : 'Pause'} scanning a page`)
    .action(
      action(async (url: string) => {
        const { db, cleanup } = await openDb();
        try {
          if (updateSource(db, url, { is_active: active })) {
            log(`✓ Source ${name}d: ${url}`);
          } else {
            log(`Source not found: ${url}`);
            process.exitCode = 1;
          }
        } finally {
          cleanup();
        }
      }),
    );
}

sourceCmd
  .command('list')
  .description('List tracked pages')
  .action(
    action(async () => {
      const { db, cleanup } = await openDb();
      try {
        const sources = listSources(db);
        if (sources.length === 0) {
          log('No sources tracked. Use: listwatch source add <url>');
          return;
        }
        for (const s of sources) {
          const status = s.is_active ? '●' : '○';
          const tag = (s.hashtag ?? '').padEnd(16);
          const last = s.last_scanned_at ? `${s.last_scanned_at} ${s.last_status ?? ''}` : 'never';
          log(`${status} ${tag} ${s.url}  last: ${last}`);
        }
        log(`\n${sources.length} sources total`);
      } finally {
        cleanup();
      }
    }),
  );

// === scan ===
program
  .command('scan')
  .description('Run a single scan cycle and deliver what it finds')
  .action(
    action(async () => {
      const runtime = await openRuntime();
      try {
        const summary = await runtime.watcher.runCycle();
        log(`\nScan complete:`);
        log(`  Sources scanned: ${summary.sourcesScanned}`);
        log(`  Sources failed:  ${summary.sourcesFailed}`);
        log(`  New listings:    ${summary.itemsNew}`);
        log(`  Duration:        ${summary.durationMs}ms`);
        for (const o of summary.outcomes.filter((x) => x.status === 'failed')) {
          log(`  ✗ ${o.source.url}: ${o.failure} (${o.error ?? ''})`);
        }
      } finally {
        runtime.cleanup();
      }
    }),
  );

// === watch ===
program
  .command('watch')
  .description('Scan continuously with adaptive intervals')
  .option('--no-server', 'Do not start the admin API')
  .action(
    action(async (opts: { server: boolean }) => {
      const runtime = await openRuntime();
      const closeServer = opts.server
        ? await startServer({
            db: runtime.db,
            config: runtime.config,
            store: runtime.store,
            watcher: runtime.watcher,
          })
        : null;

      const shutdown = () => {
        logger.info('Shutting down...');
        runtime.watcher.stop();
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);

      try {
        await runtime.watcher.start();
      } finally {
        process.off('SIGINT', shutdown);
        process.off('SIGTERM', shutdown);
        await runtime.queue.drain();
        if (closeServer) await closeServer();
        runtime.cleanup();
      }
    }),
  );

// === seen ===
const seenCmd = program.command('seen').description('Inspect the seen-listings store');

seenCmd
  .command('stats')
  .description('Count recorded listings')
  .action(
    action(async () => {
      const { db, cleanup } = await openDb();
      try {
        log(`${new SqliteSeenStore(db).count()} listings recorded`);
      } finally {
        cleanup();
      }
    }),
  );

seenCmd
  .command('sweep')
  .description('Delete records older than the retention horizon')
  .option('--hours <h>', 'Retention horizon in hours (defaults to store.retention_hours)')
  .action(
    action(async (opts: { hours?: string }) => {
      const { db, config, cleanup } = await openDb();
      try {
        const hours = opts.hours ? Number(opts.hours) : config.store.retention_hours;
        if (!Number.isFinite(hours) || hours < 0) {
          log(`Invalid --hours: ${opts.hours ?? ''}`);
          process.exitCode = 1;
          return;
        }
        const removed = new SqliteSeenStore(db).sweep(hours * 3600 * 1000, new Date());
        log(`✓ ${removed} records older than ${hours}h removed`);
      } finally {
        cleanup();
      }
    }),
  );

seenCmd
  .command('clear')
  .description('Forget every recorded listing')
  .action(
    action(async () => {
      const { db, cleanup } = await openDb();
      try {
        log(`✓ ${new SqliteSeenStore(db).clear()} records removed`);
      } finally {
        cleanup();
      }
    }),
  );

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

/**
 * Report known failures as one line and a non-zero exit; anything else is
 * logged with its stack.
 */
function action<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err) {
      if (err instanceof ListwatchError) {
        log(`✗ ${err.message}`);
      } else {
        logger.error({ error: err instanceof Error ? err.stack : String(err) }, 'Command failed');
      }
      process.exitCode = 1;
    }
  };
}

program.parseAsync().catch((err: unknown) => {
  logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Fatal');
  process.exitCode = 1;
});

import { setTimeout as sleep } from 'node:timers/promises';
import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import type { PageFetcher, TrackedSource } from '../source/adapter.js';
import type { SeenStore } from './seenStore.js';
import type { DeliveryQueue, DeliveryStats } from '../push/queue.js';
import { listTrackedSources, markScanned } from '../source/sourceDb.js';
import { logger } from '../shared/logger.js';
import { runScanCycle, type CycleSummary } from './coordinator.js';
import {
  initialCycleState,
  intervalSettings,
  nextCycleState,
  type CycleState,
  type IntervalSettings,
} from './interval.js';

export interface WatcherDeps {
  db: Database.Database;
  config: Config;
  fetcher: PageFetcher;
  store: SeenStore;
  queue: DeliveryQueue;
  /** Defaults to the active rows of the sources table. */
  listSources?: () => TrackedSource[];
  now?: () => Date;
}

export interface WatcherStatus {
  running: boolean;
  state: CycleState;
  nextCycleAt: string | null;
  lastCycle: {
    foundNew: boolean;
    allFailed: boolean;
    sourcesScanned: number;
    sourcesFailed: number;
    itemsNew: number;
    durationMs: number;
    failures: Array<{ source: string; failure: string | undefined; error: string | undefined }>;
  } | null;
  seenCount: number;
  delivery: DeliveryStats;
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

/**
 * Drives scan cycles: scan all sources, deliver, pick the next delay, sleep.
 * Store failures end the loop and propagate out of `start()`.
 */
export class Watcher {
  private state: CycleState;
  private readonly settings: IntervalSettings;
  private lastSummary: CycleSummary | null = null;
  private controller: AbortController | null = null;
  private nextCycleAt: Date | null = null;

  constructor(private readonly deps: WatcherDeps) {
    this.settings = intervalSettings(deps.config.scan);
    this.state = initialCycleState(this.settings);
  }

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  private sources(): TrackedSource[] {
    return this.deps.listSources ? this.deps.listSources() : listTrackedSources(this.deps.db);
  }

  async runCycle(): Promise<CycleSummary> {
    const { db, config, fetcher, store, queue } = this.deps;
    const startedAt = this.now();
    const sources = this.sources();

    if (sources.length === 0) {
      logger.warn('No active sources to scan');
    }

    let summary: CycleSummary;
    try {
      summary = await runScanCycle(
        sources,
        { fetcher, store, now: () => this.now() },
        config.scan,
        {
          onOutcome: (outcome) => {
            // Claimed listings go out even if the status write below fails.
            queue.enqueue(outcome.items, outcome.source);
            const status = outcome.status === 'ok' ? 'ok' : `failed:${outcome.failure ?? 'error'}`;
            markScanned(db, outcome.source.url, status, this.now());
          },
        },
      );
    } finally {
      await queue.drain();
    }

    this.state = nextCycleState(this.state, summary, this.settings, startedAt);
    this.lastSummary = summary;

    if (this.state.cycle % config.store.sweep_every_cycles === 0) {
      this.sweep();
    }

    logger.info(
      {
        cycle: this.state.cycle,
        reason: this.state.lastReason,
        itemsNew: summary.itemsNew,
        sourcesScanned: summary.sourcesScanned,
        sourcesFailed: summary.sourcesFailed,
        nextIntervalSec: Math.round(this.state.intervalMs / 1000),
        durationMs: summary.durationMs,
      },
      summary.allFailed ? 'Cycle complete, every source failed' : 'Cycle complete',
    );

    return summary;
  }

  sweep(): number {
    const retentionMs = this.deps.config.store.retention_hours * 3600 * 1000;
    const removed = this.deps.store.sweep(retentionMs, this.now());
    logger.info({ removed, retentionHours: this.deps.config.store.retention_hours }, 'Seen items swept');
    return removed;
  }

  async start(): Promise<void> {
    if (this.controller) {
      logger.warn('Watcher already running');
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    logger.info({ interval: this.settings }, 'Watcher started');

    try {
      this.sweep();
      while (!controller.signal.aborted) {
        await this.runCycle();
        if (controller.signal.aborted) break;

        this.nextCycleAt = new Date(Date.now() + this.state.intervalMs);
        try {
          await sleep(this.state.intervalMs, undefined, { signal: controller.signal });
        } catch (err) {
          if (isAbortError(err)) break;
          throw err;
        }
      }
    } finally {
      this.controller = null;
      this.nextCycleAt = null;
      logger.info('Watcher stopped');
    }
  }

  stop(): void {
    this.controller?.abort();
  }

  getState(): CycleState {
    return { ...this.state };
  }

  getStatus(): WatcherStatus {
    const summary = this.lastSummary;
    return {
      running: this.controller !== null,
      state: this.getState(),
      nextCycleAt: this.nextCycleAt?.toISOString() ?? null,
      lastCycle: summary
        ? {
            foundNew: summary.foundNew,
            allFailed: summary.allFailed,
            sourcesScanned: summary.sourcesScanned,
            sourcesFailed: summary.sourcesFailed,
            itemsNew: summary.itemsNew,
            durationMs: summary.durationMs,
            failures: summary.outcomes
              .filter((o) => o.status === 'failed')
              .map((o) => ({ source: o.source.url, failure: o.failure, error: o.error })),
          }
        : null,
      seenCount: this.deps.store.count(),
      delivery: this.deps.queue.getStats(),
    };
  }
}

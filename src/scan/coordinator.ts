import PQueue from 'p-queue';
import type { TrackedSource } from '../source/adapter.js';
import type { ScanConfig } from '../shared/config.js';
import { DbError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { thresholdsFromConfig } from './freshness.js';
import { failedOutcome, scanSource, type ScanDeps, type ScanOptions, type ScanOutcome } from './scanner.js';

export interface CycleSummary {
  /** One outcome per source, in source order. */
  outcomes: ScanOutcome[];
  foundNew: boolean;
  /** At least one source was tracked and none of them scanned successfully. */
  allFailed: boolean;
  sourcesScanned: number;
  sourcesFailed: number;
  itemsNew: number;
  durationMs: number;
}

export interface CycleDeps extends ScanDeps {
  now?: () => Date;
}

export interface CycleHooks {
  /** Called as each source finishes, before slower siblings are done. */
  onOutcome?: (outcome: ScanOutcome) => void;
}

export function scanOptionsFromConfig(scan: ScanConfig, now: Date): ScanOptions {
  return {
    now,
    thresholds: thresholdsFromConfig(scan),
    skipFirstN: scan.skip_first_n,
    maxItemsPerScan: scan.max_items_per_scan,
    consecutiveStaleThreshold: scan.consecutive_stale_threshold,
    maxPages: scan.max_pages,
    timeZone: scan.timezone,
  };
}

export function summarize(outcomes: ScanOutcome[], durationMs: number): CycleSummary {
  const failed = outcomes.filter((o) => o.status === 'failed').length;
  return {
    outcomes,
    foundNew: outcomes.some((o) => o.foundNew),
    allFailed: outcomes.length > 0 && failed === outcomes.length,
    sourcesScanned: outcomes.length - failed,
    sourcesFailed: failed,
    itemsNew: outcomes.reduce((n, o) => n + o.items.length, 0),
    durationMs,
  };
}

function isTimeoutError(err: unknown): boolean {
  return err instanceof Error && err.name === 'TimeoutError';
}

/**
 * Scan every source once, `max_parallel_sources` at a time, each under the
 * `page_timeout_ms` budget. A source over budget is reported as a timeout and
 * its signal is aborted so a late fetch cannot claim listings. A store failure
 * stops sources that have not started and rejects once the running ones settle.
 */
export async function runScanCycle(
  sources: TrackedSource[],
  deps: CycleDeps,
  scan: ScanConfig,
  hooks: CycleHooks = {},
): Promise<CycleSummary> {
  const started = Date.now();
  const now = deps.now ?? (() => new Date());
  const queue = new PQueue({ concurrency: scan.max_parallel_sources, timeout: scan.page_timeout_ms });
  const halt = new AbortController();
  let fatal: unknown;

  const stop = (err: unknown): void => {
    if (halt.signal.aborted) return;
    fatal = err;
    halt.abort();
  };

  const scanWithDeadline = async (source: TrackedSource): Promise<ScanOutcome> => {
    const controller = new AbortController();
    try {
      return await queue.add(
        async () => {
          halt.signal.throwIfAborted();
          const options = scanOptionsFromConfig(scan, now());
          try {
            return await scanSource(source, deps, { ...options, signal: controller.signal });
          } catch (err) {
            // Must run before the queue frees this slot.
            stop(err);
            throw err;
          }
        },
        { throwOnTimeout: true },
      );
    } catch (err) {
      if (!isTimeoutError(err)) throw err;
      controller.abort();
      return failedOutcome(
        source,
        'timeout',
        `Scan of ${source.url} timed out after ${scan.page_timeout_ms}ms`,
        scan.page_timeout_ms,
      );
    }
  };

  const settled = await Promise.allSettled(
    sources.map(async (source) => {
      try {
        const outcome = await scanWithDeadline(source);

        if (outcome.status === 'failed') {
          logger.warn(
            { source: source.url, failure: outcome.failure, error: outcome.error },
            'Source scan failed',
          );
        }

        if (hooks.onOutcome) {
          try {
            hooks.onOutcome(outcome);
          } catch (err) {
            if (err instanceof DbError) throw err;
            logger.error(
              { source: source.url, error: err instanceof Error ? err.message : String(err) },
              'Outcome handler failed',
            );
          }
        }

        return outcome;
      } catch (err) {
        stop(err);
        throw err;
      }
    }),
  );

  if (halt.signal.aborted) throw fatal;

  const outcomes: ScanOutcome[] = [];
  for (const s of settled) {
    if (s.status === 'fulfilled') outcomes.push(s.value);
  }
  return summarize(outcomes, Date.now() - started);
}

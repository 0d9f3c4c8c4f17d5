import type { PageFetcher, RawItem, TrackedSource } from '../source/adapter.js';
import type { SeenStore } from './seenStore.js';
import { classifyItem, type ClassifiedItem, type FreshnessThresholds } from './freshness.js';
import { FetchEmptyError, FetchError, FetchTimeoutError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export type ScanFailure = 'timeout' | 'empty' | 'error';

export interface ScanOutcome {
  source: TrackedSource;
  status: 'ok' | 'failed';
  failure?: ScanFailure;
  error?: string;
  /** New, fresh listings in discovery order. */
  items: ClassifiedItem[];
  foundNew: boolean;
  examined: number;
  stale: number;
  duplicates: number;
  earlyExit: boolean;
  durationMs: number;
}

export interface ScanOptions {
  now: Date;
  thresholds: FreshnessThresholds;
  skipFirstN: number;
  maxItemsPerScan: number;
  consecutiveStaleThreshold: number;
  maxPages: number;
  /** IANA zone the page prints wall-clock times in. */
  timeZone: string;
  signal?: AbortSignal;
}

export interface ScanDeps {
  fetcher: PageFetcher;
  store: SeenStore;
}

export function failedOutcome(
  source: TrackedSource,
  failure: ScanFailure,
  error: string,
  durationMs = 0,
): ScanOutcome {
  return {
    source,
    status: 'failed',
    failure,
    error,
    items: [],
    foundNew: false,
    examined: 0,
    stale: 0,
    duplicates: 0,
    earlyExit: false,
    durationMs,
  };
}

function failureKind(err: unknown): ScanFailure {
  if (err instanceof FetchTimeoutError) return 'timeout';
  if (err instanceof FetchEmptyError) return 'empty';
  return 'error';
}

/**
 * Scan one tracked page. Sponsored slots at the top are dropped, the rest is
 * walked newest-first and the walk stops after a run of stale listings.
 * Fetch failures come back as a failed outcome; store failures propagate.
 */
export async function scanSource(
  source: TrackedSource,
  deps: ScanDeps,
  options: ScanOptions,
): Promise<ScanOutcome> {
  const started = Date.now();

  let raw: RawItem[];
  try {
    raw = await deps.fetcher.fetch(source, {
      maxItems: options.skipFirstN + options.maxItemsPerScan,
      maxPages: options.maxPages,
      signal: options.signal,
    });
  } catch (err) {
    const kind = options.signal?.aborted ? 'timeout' : failureKind(err);
    const message = err instanceof Error ? err.message : String(err);
    if (!(err instanceof FetchError) && !options.signal?.aborted) {
      logger.error({ source: source.url, error: message }, 'Unexpected fetcher failure');
    }
    return failedOutcome(source, kind, message, Date.now() - started);
  }

  // Past the deadline the coordinator has already written this source off.
  if (options.signal?.aborted) {
    return failedOutcome(source, 'timeout', 'Scan abandoned after deadline', Date.now() - started);
  }

  if (raw.length === 0) {
    return failedOutcome(source, 'empty', `No listings returned for ${source.url}`, Date.now() - started);
  }

  const candidates = raw.slice(options.skipFirstN, options.skipFirstN + options.maxItemsPerScan);
  const items: ClassifiedItem[] = [];
  let examined = 0;
  let stale = 0;
  let staleRun = 0;
  let duplicates = 0;
  let earlyExit = false;

  for (const candidate of candidates) {
    examined++;
    const item = classifyItem(candidate, options.now, options.thresholds, options.timeZone);

    if (item.tier === 'stale') {
      stale++;
      staleRun++;
      if (staleRun >= options.consecutiveStaleThreshold) {
        earlyExit = true;
        break;
      }
      continue;
    }

    staleRun = 0;
    if (deps.store.isNew(item.id) && deps.store.record(item.id, source.url, options.now)) {
      items.push(item);
    } else {
      duplicates++;
    }
  }

  const outcome: ScanOutcome = {
    source,
    status: 'ok',
    items,
    foundNew: items.length > 0,
    examined,
    stale,
    duplicates,
    earlyExit,
    durationMs: Date.now() - started,
  };

  logger.debug(
    {
      source: source.url,
      fetched: raw.length,
      examined,
      stale,
      duplicates,
      fresh: items.length,
      earlyExit,
    },
    'Source scanned',
  );

  return outcome;
}

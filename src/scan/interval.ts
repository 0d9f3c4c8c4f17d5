import type { ScanConfig } from '../shared/config.js';

export type CycleMode = 'fast' | 'slow';

/** Why the last interval was chosen; `all_failed` is kept apart from a quiet scan. */
export type IntervalReason = 'found_new' | 'quiet' | 'all_failed';

export interface CycleState {
  mode: CycleMode;
  intervalMs: number;
  /** Consecutive cycles without a new listing. */
  idleCycles: number;
  cycle: number;
  lastCycleStartedAt: Date | null;
  lastReason: IntervalReason | null;
}

export interface IntervalSettings {
  quickCheckMs: number;
  minMs: number;
  maxMs: number;
  backoffFactor: number;
}

export interface CycleSignal {
  foundNew: boolean;
  allFailed: boolean;
}

export function intervalSettings(scan: ScanConfig): IntervalSettings {
  return {
    quickCheckMs: scan.quick_check_interval_sec * 1000,
    minMs: scan.min_interval_sec * 1000,
    maxMs: scan.max_interval_sec * 1000,
    backoffFactor: scan.backoff_factor,
  };
}

export function initialCycleState(settings: IntervalSettings): CycleState {
  return {
    mode: 'slow',
    intervalMs: settings.minMs,
    idleCycles: 0,
    cycle: 0,
    lastCycleStartedAt: null,
    lastReason: null,
  };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Next delay after a cycle. New listings switch to the quick re-check delay;
 * otherwise the previous delay grows by the backoff factor within [min, max].
 */
export function nextCycleState(
  state: CycleState,
  signal: CycleSignal,
  settings: IntervalSettings,
  startedAt: Date,
): CycleState {
  if (signal.foundNew) {
    return {
      mode: 'fast',
      intervalMs: settings.quickCheckMs,
      idleCycles: 0,
      cycle: state.cycle + 1,
      lastCycleStartedAt: startedAt,
      lastReason: 'found_new',
    };
  }

  return {
    mode: 'slow',
    intervalMs: Math.round(
      clamp(state.intervalMs * settings.backoffFactor, settings.minMs, settings.maxMs),
    ),
    idleCycles: state.idleCycles + 1,
    cycle: state.cycle + 1,
    lastCycleStartedAt: startedAt,
    lastReason: signal.allFailed ? 'all_failed' : 'quiet',
  };
}

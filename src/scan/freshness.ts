import type { RawItem } from '../source/adapter.js';
import type { ScanConfig } from '../shared/config.js';

export type FreshnessTier = 'very_fresh' | 'fresh' | 'stale';

export type PostedAtShape = 'relative' | 'today' | 'yesterday' | 'iso' | 'numeric' | 'named';

export interface FreshnessThresholds {
  veryFreshMs: number;
  maxAgeMs: number;
}

export interface ClassifiedItem extends RawItem {
  postedAt: Date | null;
  /** null when the posted-at text could not be parsed */
  ageMs: number | null;
  tier: FreshnessTier;
}

export interface ParsedPostedAt {
  shape: PostedAtShape;
  postedAt: Date;
}

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

const UNIT_PREFIXES: Array<[string, number]> = [
  ['godz', HOUR],
  ['hour', HOUR],
  ['dzie', DAY],
  ['sek', SECOND],
  ['sec', SECOND],
  ['min', MINUTE],
  ['hr', HOUR],
  ['dni', DAY],
  ['day', DAY],
];

const POLISH_MONTHS = [
  'stycznia',
  'lutego',
  'marca',
  'kwietnia',
  'maja',
  'czerwca',
  'lipca',
  'sierpnia',
  'września',
  'października',
  'listopada',
  'grudnia',
];

const ENGLISH_MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

function unitMs(word: string): number | null {
  const w = word.toLowerCase();
  for (const [prefix, ms] of UNIT_PREFIXES) {
    if (w.startsWith(prefix)) return ms;
  }
  return null;
}

function monthIndex(word: string): number | null {
  const w = word.toLowerCase();
  const pl = POLISH_MONTHS.indexOf(w);
  if (pl >= 0) return pl;
  if (w.length < 3) return null;
  const en = ENGLISH_MONTHS.findIndex((m) => m.startsWith(w));
  return en >= 0 ? en : null;
}

/** Zone listing pages print their wall-clock times in, unless configured. */
export const DEFAULT_TIME_ZONE = 'Europe/Warsaw';

interface WallClock {
  year: number;
  /** 0-based */
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let dtf = formatters.get(timeZone);
  if (!dtf) {
    dtf = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: 'numeric',
      day: 'numeric',
      hour: 'numeric',
      minute: 'numeric',
      second: 'numeric',
    });
    formatters.set(timeZone, dtf);
  }
  return dtf;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
}

function wallClock(instant: number, timeZone: string): WallClock {
  const parts = formatterFor(timeZone).formatToParts(new Date(instant));
  const field = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((p) => p.type === type)?.value ?? 0);
  return {
    year: field('year'),
    month: field('month') - 1,
    day: field('day'),
    hour: field('hour'),
    minute: field('minute'),
    second: field('second'),
  };
}

/** Milliseconds the zone is ahead of UTC at `instant` (whole seconds). */
function zoneOffset(instant: number, timeZone: string): number {
  const w = wallClock(instant, timeZone);
  const wallAsUtc = Date.UTC(w.year, w.month, w.day, w.hour, w.minute, w.second);
  return wallAsUtc - (instant - (((instant % 1000) + 1000) % 1000));
}

/**
 * Instant at which the clock in `timeZone` reads the given fields; null when
 * the fields roll over (31/02, 25:00).
 */
function zonedDate(
  timeZone: string,
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
): Date | null {
  const wallAsUtc = Date.UTC(year, month, day, hour, minute, second);
  const check = new Date(wallAsUtc);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month ||
    check.getUTCDate() !== day ||
    check.getUTCHours() !== hour ||
    check.getUTCMinutes() !== minute ||
    check.getUTCSeconds() !== second
  ) {
    return null;
  }
  const first = wallAsUtc - zoneOffset(wallAsUtc, timeZone);
  // Second pass settles times near a DST switch.
  return new Date(wallAsUtc - zoneOffset(first, timeZone));
}

function timeOnDay(
  now: Date,
  timeZone: string,
  dayOffset: number,
  hour: number,
  minute: number,
): Date | null {
  const today = wallClock(now.getTime(), timeZone);
  const day = new Date(Date.UTC(today.year, today.month, today.day + dayOffset));
  return zonedDate(timeZone, day.getUTCFullYear(), day.getUTCMonth(), day.getUTCDate(), hour, minute);
}

function optionalInt(value: string | undefined): number {
  return value === undefined ? 0 : Number(value);
}

interface ShapeMatcher {
  shape: PostedAtShape;
  pattern: RegExp;
  resolve(match: RegExpExecArray, now: Date, timeZone: string): Date | null;
}

const MATCHERS: ShapeMatcher[] = [
  {
    shape: 'relative',
    pattern: /(\d+)\s*([a-ząćęłńóśźż]+)\s+(?:temu|ago)\b/i,
    resolve: (m, now) => {
      const ms = unitMs(m[2] ?? '');
      return ms === null ? null : new Date(now.getTime() - Number(m[1]) * ms);
    },
  },
  {
    shape: 'today',
    pattern: /(?:dzisiaj|dziś|today)\D*(\d{1,2}):(\d{2})/i,
    resolve: (m, now, tz) => timeOnDay(now, tz, 0, Number(m[1]), Number(m[2])),
  },
  {
    shape: 'yesterday',
    pattern: /(?:wczoraj|yesterday)\D*(\d{1,2}):(\d{2})/i,
    resolve: (m, now, tz) => timeOnDay(now, tz, -1, Number(m[1]), Number(m[2])),
  },
  {
    // Zone-less timestamps are wall-clock times in the configured zone.
    shape: 'iso',
    pattern:
      /^\s*(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?\s*$/,
    resolve: (m, _now, tz) => {
      if (m[7] !== undefined) {
        const d = new Date(m[0].trim());
        return Number.isNaN(d.getTime()) ? null : d;
      }
      return zonedDate(
        tz,
        Number(m[1]),
        Number(m[2]) - 1,
        Number(m[3]),
        Number(m[4]),
        Number(m[5]),
        optionalInt(m[6]),
      );
    },
  },
  {
    // "10/03/2025 | 09:22", "10.03.2025"
    shape: 'numeric',
    pattern: /(\d{1,2})[./](\d{1,2})[./](\d{4})(?:\D{0,5}(\d{1,2}):(\d{2}))?/,
    resolve: (m, _now, tz) =>
      zonedDate(tz, Number(m[3]), Number(m[2]) - 1, Number(m[1]), optionalInt(m[4]), optionalInt(m[5])),
  },
  {
    // "10 marca 2025", "Odświeżono dnia 10 marca 2025", "10 March 2025 12:00"
    shape: 'named',
    pattern: /(\d{1,2})\s+([a-ząćęłńóśźż]+)\s+(\d{4})(?:\D{0,5}(\d{1,2}):(\d{2}))?/i,
    resolve: (m, _now, tz) => {
      const month = monthIndex(m[2] ?? '');
      if (month === null) return null;
      return zonedDate(tz, Number(m[3]), month, Number(m[1]), optionalInt(m[4]), optionalInt(m[5]));
    },
  },
];

/**
 * Parse a listing's posted-at text. Shapes are tried in order; the first one
 * that both matches and resolves to a valid date wins. Wall-clock shapes are
 * read in `timeZone`, whatever the process zone is.
 */
export function parsePostedAt(
  text: string,
  now: Date,
  timeZone: string = DEFAULT_TIME_ZONE,
): ParsedPostedAt | null {
  if (!text) return null;
  for (const matcher of MATCHERS) {
    const match = matcher.pattern.exec(text);
    if (!match) continue;
    const postedAt = matcher.resolve(match, now, timeZone);
    if (postedAt) return { shape: matcher.shape, postedAt };
  }
  return null;
}

export function ageOf(text: string, now: Date, timeZone: string = DEFAULT_TIME_ZONE): number | null {
  const parsed = parsePostedAt(text, now, timeZone);
  if (!parsed) return null;
  return Math.max(0, now.getTime() - parsed.postedAt.getTime());
}

export function classifyAge(ageMs: number | null, thresholds: FreshnessThresholds): FreshnessTier {
  if (ageMs === null) return 'stale';
  if (ageMs <= thresholds.veryFreshMs) return 'very_fresh';
  if (ageMs <= thresholds.maxAgeMs) return 'fresh';
  return 'stale';
}

export function classifyItem(
  item: RawItem,
  now: Date,
  thresholds: FreshnessThresholds,
  timeZone: string = DEFAULT_TIME_ZONE,
): ClassifiedItem {
  const parsed = parsePostedAt(item.postedText, now, timeZone);
  const ageMs = parsed ? Math.max(0, now.getTime() - parsed.postedAt.getTime()) : null;
  return {
    ...item,
    postedAt: parsed?.postedAt ?? null,
    ageMs,
    tier: classifyAge(ageMs, thresholds),
  };
}

export function thresholdsFromConfig(scan: ScanConfig): FreshnessThresholds {
  return {
    veryFreshMs: scan.very_fresh_minutes * MINUTE,
    maxAgeMs: scan.max_age_minutes * MINUTE,
  };
}

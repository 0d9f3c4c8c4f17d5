import { fileURLToPath } from 'node:url';
import fs from 'node:fs';
import path from 'node:path';
import { homedir } from 'node:os';

export function resolvePath(p: string): string {
  if (p === '~') return homedir();
  if (p.startsWith('~/')) return path.join(homedir(), p.slice(2));
  return path.resolve(p);
}

/** UTC timestamp as SQLite's datetime('now') writes it. */
export function nowISO(): string {
  return new Date().toISOString().replace('T', ' ').slice(0, 19);
}

/**
 * Cut to `maxLength` code points and mark the cut with "...". Emoji and other
 * astral characters are never split.
 */
export function truncate(text: string, maxLength: number): string {
  const chars = Array.from(text);
  return chars.length > maxLength ? `${chars.slice(0, maxLength).join('')}...` : text;
}

/** Nearest directory at or above `from` that holds `fileName`. */
export function findUp(fileName: string, from: string): string | null {
  let dir = path.resolve(from);
  for (;;) {
    if (fs.existsSync(path.join(dir, fileName))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/** Holds package.json and the SQL migrations, from src/ or dist/ alike. */
export function getPackageRoot(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  return findUp('package.json', here) ?? path.resolve(here, '..', '..');
}

export function getListwatchDir(): string {
  return resolvePath('~/.listwatch');
}

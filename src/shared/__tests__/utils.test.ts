import { describe, it, expect } from 'vitest';
import { resolvePath, nowISO, truncate, getPackageRoot, findUp } from '../utils.js';
import { homedir } from 'node:os';
import fs from 'node:fs';
import path from 'node:path';

describe('resolvePath', () => {
  it('expands ~ to home directory', () => {
    const result = resolvePath('~/test');
    expect(result).toBe(path.join(homedir(), 'test'));
  });

  it('resolves relative paths', () => {
    const result = resolvePath('./foo/bar');
    expect(path.isAbsolute(result)).toBe(true);
  });

  it('returns absolute paths as-is', () => {
    const result = resolvePath('/absolute/path');
    expect(result).toBe('/absolute/path');
  });
});

describe('nowISO', () => {
  it('returns a sortable timestamp without T or zone', () => {
    expect(nowISO()).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
  });
});

describe('truncate', () => {
  it('keeps short text', () => {
    expect(truncate('abc', 5)).toBe('abc');
  });

  it('cuts long text and appends an ellipsis', () => {
    expect(truncate('abcdefgh', 5)).toBe('abcde...');
  });

  it('never splits an emoji', () => {
    expect(truncate('🚲🚲🚲', 2)).toBe('🚲🚲...');
    expect(truncate('🚲🚲', 2)).toBe('🚲🚲');
  });
});

describe('getPackageRoot', () => {
  it('finds the directory holding package.json and migrations', () => {
    const root = getPackageRoot();
    expect(fs.existsSync(path.join(root, 'package.json'))).toBe(true);
    expect(fs.existsSync(path.join(root, 'src', 'db', 'migrations', '001_init.sql'))).toBe(true);
  });
});

describe('findUp', () => {
  it('returns the nearest directory holding the file, or null', () => {
    const root = getPackageRoot();
    expect(findUp('package.json', path.join(root, 'src', 'shared'))).toBe(root);
    expect(findUp('no-such-file.listwatch', root)).toBeNull();
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  countLines,
  countWords,
  getContextStats,
  resolveContextSource,
} from './context-source.js';

describe('countLines', () => {
  it('ignores a trailing line break', () => {
    expect(countLines('')).toBe(0);
    expect(countLines('one')).toBe(1);
    expect(countLines('one\ntwo\n')).toBe(2);
    expect(countLines('one\r\ntwo\n\nfour')).toBe(4);
  });
});

describe('countWords', () => {
  it('splits on any whitespace', () => {
    expect(countWords('  the quick\tbrown\n\nfox ')).toBe(4);
    expect(countWords('   ')).toBe(0);
  });
});

describe('context sources', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'deepread-ctx-'));
    mkdirSync(join(dir, 'docs'));
    writeFileSync(join(dir, 'docs', 'a.md'), 'alpha beta\ngamma\n');
    writeFileSync(join(dir, 'docs', 'b.txt'), '12345');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('infers the kind from the file system', async () => {
    await expect(resolveContextSource(join(dir, 'docs'))).resolves.toEqual({
      kind: 'directory',
      path: join(dir, 'docs'),
    });
    await expect(resolveContextSource(join(dir, 'docs', 'a.md'))).resolves.toEqual({
      kind: 'file',
      path: join(dir, 'docs', 'a.md'),
    });
  });

  it('rejects missing paths and mismatched kinds', async () => {
    await expect(resolveContextSource(join(dir, 'nope'))).rejects.toThrow(
      `Context not found: ${join(dir, 'nope')}`
    );
    await expect(resolveContextSource(join(dir, 'docs'), 'file')).rejects.toThrow(
      `Not a file: ${join(dir, 'docs')}`
    );
  });

  it('measures a file', async () => {
    const stats = await getContextStats({ kind: 'file', path: join(dir, 'docs', 'a.md') });
    expect(stats).toEqual({ kind: 'file', chars: 17, words: 3, lines: 2 });
  });

  it('measures a directory', async () => {
    const stats = await getContextStats({ kind: 'directory', path: join(dir, 'docs') });
    expect(stats).toEqual({ kind: 'directory', files: 2, bytes: 22 });
  });
});

/**
 * File index for directory-mode sessions.
 *
 * Built once at startup and again on explicit reindex; executed code only
 * reads it. Paths are POSIX-style and relative to the indexed root.
 */

import { readFileSync } from 'node:fs';
import { stat } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { glob } from 'glob';
import { Minimatch } from 'minimatch';
import type { FileIndexEntry } from '@deepread/shared';

export const MAX_SEARCH_MATCHES = 100;

// Files above this size are skipped by search
const MAX_SEARCH_FILE_BYTES = 5 * 1024 * 1024;

const IGNORED = ['**/node_modules/**', '**/.git/**'];

export interface SearchMatch {
  path: string;
  line: number;
  text: string;
}

function fileType(path: string): string {
  const ext = extname(path).slice(1).toLowerCase();
  return ext || 'unknown';
}

function matchPath(path: string, pattern: string): boolean {
  const mm = new Minimatch(pattern, { dot: true, matchBase: true });
  return mm.match(path);
}

export class FileIndex {
  private entries = new Map<string, FileIndexEntry>();

  constructor(readonly root: string) {}

  /** Rebuild from disk. Returns the number of files indexed. */
  async build(): Promise<number> {
    const paths = await glob('**/*', {
      cwd: this.root,
      nodir: true,
      absolute: false,
      posix: true,
      dot: true,
      ignore: IGNORED,
    });
    paths.sort();

    const next = new Map<string, FileIndexEntry>();
    for (const path of paths) {
      const info = await stat(join(this.root, path));
      next.set(path, { path, size: info.size, type: fileType(path) });
    }
    this.entries = next;
    return next.size;
  }

  get size(): number {
    return this.entries.size;
  }

  list(): FileIndexEntry[] {
    return [...this.entries.values()].map((entry) => ({ ...entry }));
  }

  /** Paths matching a glob; a pattern without `/` matches against the base name. */
  listFiles(pattern = '*'): string[] {
    return [...this.entries.keys()].filter((path) => matchPath(path, pattern));
  }

  /** Only indexed files can be read. */
  readFile(path: string): string {
    const normalized = path.replace(/^\.\//, '');
    if (!this.entries.has(normalized)) {
      throw new Error(`File not found in index: ${path}`);
    }
    return readFileSync(join(this.root, normalized), 'utf-8');
  }

  searchFiles(regex: string | RegExp, pattern = '*'): SearchMatch[] {
    const re =
      typeof regex === 'string' ? new RegExp(regex) : new RegExp(regex.source, regex.flags.replace('g', ''));
    const matches: SearchMatch[] = [];

    for (const path of this.listFiles(pattern)) {
      const entry = this.entries.get(path);
      if (!entry || entry.size > MAX_SEARCH_FILE_BYTES) continue;

      const lines = this.readFile(path).split('\n');
      for (let i = 0; i < lines.length; i++) {
        const text = lines[i] ?? '';
        if (re.test(text)) {
          matches.push({ path, line: i + 1, text });
          if (matches.length >= MAX_SEARCH_MATCHES) return matches;
        }
      }
    }
    return matches;
  }

  /** Short listing prepended to sub-query prompts. */
  summary(maxChars = 2000, maxEntries = 50): string {
    // Room for the trailing "... and N more" line
    const budget = maxChars - 32;
    const lines = [`Available files (${this.entries.size}):`];
    let length = lines[0]?.length ?? 0;
    let shown = 0;

    for (const entry of this.entries.values()) {
      if (shown >= maxEntries) break;
      const line = `- ${entry.path} (${entry.size} bytes)`;
      if (length + 1 + line.length > budget) break;
      lines.push(line);
      length += 1 + line.length;
      shown++;
    }

    if (shown < this.entries.size) {
      lines.push(`... and ${this.entries.size - shown} more`);
    }
    return lines.join('\n');
  }
}

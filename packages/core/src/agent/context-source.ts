/**
 * What the agent analyzes: one text file or a directory of files.
 */

import { readFile, stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { ContextMode } from '@deepread/shared';
import { FileIndex } from '../sandbox/file-index.js';
import { ConfigurationError } from '../utils/errors.js';

export interface ContextSource {
  kind: ContextMode;
  path: string;
}

export type ContextStats =
  | { kind: 'file'; chars: number; words: number; lines: number }
  | { kind: 'directory'; files: number; bytes: number };

/** Line count ignoring a trailing line break. */
export function countLines(text: string): number {
  if (!text) return 0;
  const lines = text.split(/\r\n|\r|\n/);
  return lines.at(-1) === '' ? lines.length - 1 : lines.length;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/**
 * Resolve a path to a context source, inferring the kind from the file system.
 * Throws ConfigurationError when the path is missing or has the wrong kind.
 */
export async function resolveContextSource(path: string, kind?: ContextMode): Promise<ContextSource> {
  const absolute = resolve(path);
  const info = await stat(absolute).catch(() => null);
  if (!info) {
    throw new ConfigurationError(`Context not found: ${path}`);
  }

  const actual: ContextMode = info.isDirectory() ? 'directory' : 'file';
  if (kind && kind !== actual) {
    throw new ConfigurationError(`Not a ${kind}: ${path}`);
  }
  return { kind: actual, path: absolute };
}

export async function getContextStats(source: ContextSource): Promise<ContextStats> {
  if (source.kind === 'directory') {
    const index = new FileIndex(source.path);
    await index.build();
    const bytes = index.list().reduce((sum, entry) => sum + entry.size, 0);
    return { kind: 'directory', files: index.size, bytes };
  }

  const text = await readFile(source.path, 'utf-8');
  return { kind: 'file', chars: text.length, words: countWords(text), lines: countLines(text) };
}

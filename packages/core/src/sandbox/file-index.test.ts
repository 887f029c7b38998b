import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FileIndex, MAX_SEARCH_MATCHES } from './file-index.js';

describe('FileIndex', () => {
  let root: string;
  let index: FileIndex;

  beforeEach(async () => {
    root = mkdtempSync(join(tmpdir(), 'deepread-index-'));
    mkdirSync(join(root, 'src'));
    mkdirSync(join(root, 'node_modules', 'dep'), { recursive: true });
    writeFileSync(join(root, 'README.md'), '# Title\nTODO: write docs\n');
    writeFileSync(join(root, 'src', 'main.ts'), 'const a = 1;\n// TODO remove\nexport {};\n');
    writeFileSync(join(root, 'src', 'LICENSE'), 'MIT');
    writeFileSync(join(root, 'node_modules', 'dep', 'index.js'), 'ignored');
    index = new FileIndex(root);
    await index.build();
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('indexes files with size and type, skipping node_modules', () => {
    expect(index.size).toBe(3);
    expect(index.list()).toEqual([
      { path: 'README.md', size: 25, type: 'md' },
      { path: 'src/LICENSE', size: 3, type: 'unknown' },
      { path: 'src/main.ts', size: 39, type: 'ts' },
    ]);
  });

  it('matches base names for patterns without a slash', () => {
    expect(index.listFiles('*.ts')).toEqual(['src/main.ts']);
    expect(index.listFiles()).toEqual(['README.md', 'src/LICENSE', 'src/main.ts']);
  });

  it('matches full paths for patterns with a slash', () => {
    expect(index.listFiles('src/*')).toEqual(['src/LICENSE', 'src/main.ts']);
  });

  it('reads indexed files only', () => {
    expect(index.readFile('src/LICENSE')).toBe('MIT');
    expect(index.readFile('./src/LICENSE')).toBe('MIT');
    expect(() => index.readFile('../outside.txt')).toThrow('File not found in index: ../outside.txt');
  });

  it('searches lines with a string or RegExp', () => {
    expect(index.searchFiles('TODO')).toEqual([
      { path: 'README.md', line: 2, text: 'TODO: write docs' },
      { path: 'src/main.ts', line: 2, text: '// TODO remove' },
    ]);
    expect(index.searchFiles(/todo/gi, '*.ts')).toEqual([
      { path: 'src/main.ts', line: 2, text: '// TODO remove' },
    ]);
  });

  it('stops searching at the match limit', async () => {
    writeFileSync(join(root, 'many.txt'), 'hit\n'.repeat(MAX_SEARCH_MATCHES + 20));
    await index.build();
    expect(index.searchFiles('hit')).toHaveLength(MAX_SEARCH_MATCHES);
  });

  it('picks up new files on rebuild', async () => {
    writeFileSync(join(root, 'new.txt'), 'x');
    expect(await index.build()).toBe(4);
  });

  it('summarizes files within bounds', () => {
    expect(index.summary()).toBe(
      'Available files (3):\n- README.md (25 bytes)\n- src/LICENSE (3 bytes)\n- src/main.ts (39 bytes)'
    );
    expect(index.summary(2000, 1)).toBe('Available files (3):\n- README.md (25 bytes)\n... and 2 more');
  });
});

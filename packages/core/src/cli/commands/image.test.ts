import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import { resolve } from 'node:path';
import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockSpawn } = vi.hoisted(() => ({ mockSpawn: vi.fn() }));

vi.mock('node:child_process', () => ({ spawn: mockSpawn }));

import { imageCommand } from './image.js';

class FakeBuild extends EventEmitter {
  stdout = new PassThrough();
  stderr = new PassThrough();
}

function makeCtx(argv: string[] = []) {
  const out: string[] = [];
  const err: string[] = [];
  return {
    argv,
    stdout: { write: (s: string) => out.push(s) },
    stderr: { write: (s: string) => err.push(s) },
    out,
    err,
  };
}

function scriptBuild(code: number, output = ''): void {
  mockSpawn.mockImplementation(() => {
    const child = new FakeBuild();
    setImmediate(() => {
      if (output) child.stderr.write(output);
      setImmediate(() => child.emit('close', code));
    });
    return child;
  });
}

describe('imageCommand', () => {
  beforeEach(() => {
    mockSpawn.mockReset();
  });

  it('runs docker build with the given tag and directory', async () => {
    scriptBuild(0);
    const ctx = makeCtx(['--tag', 'sandbox:test', '--dir', 'docker']);

    expect(await imageCommand.run(ctx)).toBe(0);

    expect(mockSpawn).toHaveBeenCalledWith('docker', ['build', '-t', 'sandbox:test', resolve('docker')], {
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    expect(ctx.out.join('')).toBe('  ✓ Built sandbox:test\n');
  });

  it('falls back to the configured image name', async () => {
    scriptBuild(0);
    const ctx = makeCtx([]);

    expect(await imageCommand.run(ctx)).toBe(0);
    expect(mockSpawn.mock.calls[0]?.[1]).toEqual(['build', '-t', 'deepread-sandbox', resolve('.')]);
  });

  it('reports a failed build with its output', async () => {
    scriptBuild(2, 'step 1/4\nfailed to solve\n');
    const ctx = makeCtx(['--tag', 'sandbox:test']);

    expect(await imageCommand.run(ctx)).toBe(1);
    expect(ctx.out.join('')).toBe('  ✗ docker build exited with code 2\n');
    expect(ctx.err.join('')).toBe('step 1/4\nfailed to solve\n');
  });

  it('reports a missing docker binary', async () => {
    mockSpawn.mockImplementation(() => {
      const child = new FakeBuild();
      setImmediate(() => child.emit('error', new Error('spawn docker ENOENT')));
      return child;
    });
    const ctx = makeCtx(['--tag', 'sandbox:test']);

    expect(await imageCommand.run(ctx)).toBe(1);
    expect(ctx.err.join('')).toBe('Error: spawn docker ENOENT\n');
  });
});

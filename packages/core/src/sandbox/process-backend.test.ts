import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { resolve } from 'node:path';
import { SandboxConfigSchema } from '@deepread/shared';
import type { SecureLogger } from '../logging/logger.js';

// ─── Hoisted Mocks ────────────────────────────────────────────

const { mockSpawn, FakeChild, children, responder } = await vi.hoisted(async () => {
  const { EventEmitter } = await import('node:events');
  const { PassThrough } = await import('node:stream');
  const { createInterface } = await import('node:readline');

  type Reply = Record<string, unknown> | undefined;

  class FakeChild extends EventEmitter {
    readonly stdin = new PassThrough();
    readonly stdout = new PassThrough();
    readonly stderr = new PassThrough();
    exitCode: number | null = null;
    signalCode: NodeJS.Signals | null = null;
    readonly received: Array<Record<string, unknown>> = [];
    readonly kill = vi.fn((signal: NodeJS.Signals = 'SIGTERM') => {
      this.exit(null, signal);
      return true;
    });

    constructor(
      readonly command: string,
      readonly args: string[]
    ) {
      super();
      createInterface({ input: this.stdin }).on('line', (line) => {
        const parsed: Record<string, unknown> = JSON.parse(line);
        this.received.push(parsed);
        const reply = responder.handle(parsed);
        if (reply !== undefined) this.reply(reply);
        if (parsed.action === 'shutdown' && responder.exitOnShutdown) this.exit(0, null);
      });
    }

    reply(message: Record<string, unknown>): void {
      this.stdout.write(`${JSON.stringify(message)}\n`);
    }

    exit(code: number | null, signal: NodeJS.Signals | null): void {
      if (this.exitCode !== null || this.signalCode !== null) return;
      this.exitCode = code;
      this.signalCode = signal;
      this.emit('exit', code, signal);
      this.emit('close', code, signal);
    }
  }

  const responder = {
    handle: (_command: Record<string, unknown>): Reply => undefined,
    exitOnShutdown: true,
    onSpawn: (child: InstanceType<typeof FakeChild>): void => {
      child.reply({ status: 'ready', message: 'deepread sandbox initialized', context_info: 'ok' });
    },
  };

  const children: Array<InstanceType<typeof FakeChild>> = [];

  const mockSpawn = vi.fn((command: string, args: string[]) => {
    const child = new FakeChild(command, args);
    children.push(child);
    if (args[0] === 'rm') {
      setImmediate(() => child.exit(0, null));
    } else {
      responder.onSpawn(child);
    }
    return child;
  });

  return { mockSpawn, FakeChild, children, responder };
});

vi.mock('node:child_process', () => ({ spawn: mockSpawn }));

// ─── Tests ────────────────────────────────────────────────────

import { ProcessBackend, buildSpawnPlan, type ProcessBackendOptions } from './process-backend.js';

function makeLogger(): SecureLogger {
  const logger: SecureLogger = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: () => logger,
    level: 'debug',
  };
  return logger;
}

function makeOptions(overrides: Partial<ProcessBackendOptions> = {}): ProcessBackendOptions {
  return {
    mode: 'file',
    contextPath: 'ctx.txt',
    sandbox: SandboxConfigSchema.parse({
      process: { readyTimeoutMs: 200, shutdownGraceMs: 50 },
      pingTimeoutMs: 200,
      getVarTimeoutMs: 200,
    }),
    execTimeoutMs: 1000,
    recursion: { currentDepth: 1, maxDepth: 3 },
    apiKeyEnv: 'OPENROUTER_API_KEY',
    logger: makeLogger(),
    serverScript: '/srv/repl-server.ts',
    ...overrides,
  };
}

function lastChild(): InstanceType<typeof FakeChild> {
  const child = children.at(-1);
  if (!child) throw new Error('no child spawned');
  return child;
}

const defaultOnSpawn = responder.onSpawn;

beforeEach(() => {
  children.length = 0;
  mockSpawn.mockClear();
  responder.handle = () => undefined;
  responder.exitOnShutdown = true;
  responder.onSpawn = defaultOnSpawn;
});

describe('buildSpawnPlan', () => {
  it('runs a TypeScript server script through the tsx loader', () => {
    const plan = buildSpawnPlan(makeOptions());

    expect(plan.command).toBe(process.execPath);
    expect(plan.args).toEqual(['--import', 'tsx', '/srv/repl-server.ts']);
    expect(plan.env.DEEPREAD_CONTEXT_MODE).toBe('file');
    expect(plan.env.DEEPREAD_CONTEXT_PATH).toBe(resolve('ctx.txt'));
    expect(plan.env.DEEPREAD_RECURSION_DEPTH).toBe('1');
    expect(plan.env.DEEPREAD_MAX_RECURSION_DEPTH).toBe('3');
  });

  it('runs a compiled server script directly', () => {
    const plan = buildSpawnPlan(makeOptions({ serverScript: '/srv/repl-server.js' }));
    expect(plan.args).toEqual(['/srv/repl-server.js']);
  });

  it('mounts a directory read-only into the container', () => {
    const options = makeOptions({
      mode: 'directory',
      contextPath: '/data/project',
      sandbox: SandboxConfigSchema.parse({ process: { runtime: 'docker' } }),
    });

    const plan = buildSpawnPlan(options);

    expect(plan.command).toBe('docker');
    expect(plan.args).toEqual([
      'run', '-i', '--rm',
      '--name', 'deepread-sandbox-instance',
      '-v', '/data/project:/mnt/data:ro',
      '-e', 'OPENROUTER_API_KEY',
      '-e', 'DEEPREAD_CONTEXT_MODE=directory',
      '-e', 'DEEPREAD_CONTEXT_PATH=/mnt/data',
      '-e', 'DEEPREAD_RECURSION_DEPTH=1',
      '-e', 'DEEPREAD_MAX_RECURSION_DEPTH=3',
      'deepread-sandbox',
    ]);
  });

  it('mounts a single file at the default input path', () => {
    const options = makeOptions({
      contextPath: '/data/report.txt',
      sandbox: SandboxConfigSchema.parse({ process: { runtime: 'docker' } }),
    });

    expect(buildSpawnPlan(options).args).toContain('/data/report.txt:/mnt/data/input.txt:ro');
  });
});

describe('ProcessBackend', () => {
  let backend: ProcessBackend | null = null;

  afterEach(async () => {
    await backend?.stop();
    backend = null;
  });

  describe('start', () => {
    it('becomes ready after the ready message', async () => {
      backend = new ProcessBackend(makeOptions());

      expect(backend.state).toBe('stopped');
      await expect(backend.start()).resolves.toBe(true);
      expect(backend.state).toBe('ready');
      expect(mockSpawn).toHaveBeenCalledWith(
        process.execPath,
        ['--import', 'tsx', '/srv/repl-server.ts'],
        expect.objectContaining({ stdio: ['pipe', 'pipe', 'pipe'] })
      );
    });

    it('skips unrelated lines before the ready message', async () => {
      responder.onSpawn = (child) => {
        child.stdout.write('warming up\n');
        child.reply({ status: 'ready', message: 'm', context_info: 'c' });
      };
      backend = new ProcessBackend(makeOptions());

      await expect(backend.start()).resolves.toBe(true);
    });

    it('fails when the child exits before it is ready', async () => {
      responder.onSpawn = (child) => {
        setImmediate(() => child.exit(1, null));
      };
      backend = new ProcessBackend(makeOptions());

      await expect(backend.start()).resolves.toBe(false);
      expect(backend.state).toBe('stopped');
    });

    it('fails when no ready message arrives in time', async () => {
      responder.onSpawn = () => undefined;
      const logger = makeLogger();
      backend = new ProcessBackend(makeOptions({ logger }));

      await expect(backend.start()).resolves.toBe(false);
      expect(logger.error).toHaveBeenCalledWith('Sandbox failed to start', {
        error: 'no ready message within 200ms',
      });
    });

    it('fails when the command cannot be spawned', async () => {
      responder.onSpawn = (child) => {
        setImmediate(() => child.emit('error', new Error('spawn ENOENT')));
      };
      const logger = makeLogger();
      backend = new ProcessBackend(makeOptions({ logger }));

      await expect(backend.start()).resolves.toBe(false);
      expect(logger.error).toHaveBeenCalledWith('Sandbox failed to start', {
        error: `could not spawn ${process.execPath}: spawn ENOENT`,
      });
    });

    it('forwards child stderr lines to the debug log', async () => {
      responder.onSpawn = (child) => {
        child.stderr.write('warning: slow disk\n');
        child.reply({ status: 'ready' });
      };
      const logger = makeLogger();
      backend = new ProcessBackend(makeOptions({ logger }));
      await backend.start();

      await vi.waitFor(() => {
        expect(logger.debug).toHaveBeenCalledWith('warning: slow disk', { stream: 'sandbox-stderr' });
      });
    });
  });

  describe('execCode', () => {
    it('refuses when the sandbox is not running', async () => {
      backend = new ProcessBackend(makeOptions());

      await expect(backend.execCode('1 + 1')).resolves.toEqual({
        success: false,
        output: '',
        error: 'Sandbox is not running',
      });
    });

    it('sends the code with its timeout and returns the result', async () => {
      responder.handle = (command) =>
        command.action === 'execute'
          ? { success: true, output: `ran ${String(command.code)}`, error: null }
          : undefined;
      backend = new ProcessBackend(makeOptions());
      await backend.start();

      const result = await backend.execCode('print(1)', 500);

      expect(result).toEqual({ success: true, output: 'ran print(1)', error: null });
      expect(lastChild().received[0]).toEqual({ action: 'execute', code: 'print(1)', timeout_ms: 500 });
      expect(backend.state).toBe('ready');
    });

    it('discards a late reply to a request that timed out', async () => {
      responder.handle = (command) =>
        command.code === 'fast' ? { success: true, output: 'fast', error: null } : undefined;
      backend = new ProcessBackend(makeOptions());
      await backend.start();

      const slow = await backend.execCode('slow', 10);
      expect(slow.error).toBe('Timeout waiting for execution result');

      lastChild().reply({ success: true, output: 'late', error: null });
      const fast = await backend.execCode('fast');

      expect(fast.output).toBe('fast');
    });

    it('reports an invalid reply', async () => {
      responder.handle = () => ({ unexpected: true });
      backend = new ProcessBackend(makeOptions());
      await backend.start();

      const result = await backend.execCode('x');

      expect(result.error).toBe('Invalid response from sandbox');
    });

    it('reports a child that exits mid-execution', async () => {
      responder.handle = () => {
        setImmediate(() => lastChild().exit(1, null));
        return undefined;
      };
      backend = new ProcessBackend(makeOptions());
      await backend.start();

      const result = await backend.execCode('process.exit()');

      expect(result.error).toBe('Sandbox exited during execution');
      expect(backend.state).toBe('stopped');
    });
  });

  describe('queries', () => {
    beforeEach(() => {
      responder.handle = (command) => {
        switch (command.action) {
          case 'get_var':
            return command.name === 'answer'
              ? { success: true, value: null }
              : { success: false, error: `Variable '${String(command.name)}' not found` };
          case 'list_vars':
            return { success: true, variables: { answer: 'object' } };
          case 'reindex':
            return { success: true, files_indexed: 4 };
          case 'ping':
            return { success: true, message: 'pong' };
          default:
            return undefined;
        }
      };
    });

    it('distinguishes a bound null from a missing variable', async () => {
      backend = new ProcessBackend(makeOptions());
      await backend.start();

      await expect(backend.getVariable('answer')).resolves.toEqual({ found: true, value: null });
      await expect(backend.getVariable('missing')).resolves.toEqual({ found: false });
    });

    it('lists variables, reindexes and pings', async () => {
      backend = new ProcessBackend(makeOptions());
      await backend.start();

      await expect(backend.listVariables()).resolves.toEqual({ answer: 'object' });
      await expect(backend.reindex()).resolves.toBe(4);
      await expect(backend.ping()).resolves.toBe(true);
    });

    it('keeps concurrent requests in order', async () => {
      backend = new ProcessBackend(makeOptions());
      await backend.start();

      const [ping, count, missing] = await Promise.all([
        backend.ping(),
        backend.reindex(),
        backend.getVariable('missing'),
      ]);

      expect(ping).toBe(true);
      expect(count).toBe(4);
      expect(missing).toEqual({ found: false });
    });

    it('answers without a running sandbox', async () => {
      backend = new ProcessBackend(makeOptions());

      await expect(backend.ping()).resolves.toBe(false);
      await expect(backend.getVariable('answer')).resolves.toEqual({ found: false });
      await expect(backend.reindex()).resolves.toBe(0);
    });
  });

  describe('stop', () => {
    it('asks the child to shut down', async () => {
      backend = new ProcessBackend(makeOptions());
      await backend.start();
      const child = lastChild();

      await backend.stop();

      expect(child.received).toEqual([{ action: 'shutdown' }]);
      expect(child.kill).not.toHaveBeenCalled();
      expect(backend.state).toBe('stopped');
    });

    it('escalates to SIGTERM then SIGKILL', async () => {
      responder.exitOnShutdown = false;
      backend = new ProcessBackend(makeOptions());
      await backend.start();
      const child = lastChild();
      child.kill.mockImplementationOnce(() => true).mockImplementationOnce(() => {
        child.exit(null, 'SIGKILL');
        return true;
      });

      await backend.stop();

      expect(child.kill).toHaveBeenNthCalledWith(1, 'SIGTERM');
      expect(child.kill).toHaveBeenNthCalledWith(2, 'SIGKILL');
    });

    it('removes the container in the docker runtime', async () => {
      backend = new ProcessBackend(
        makeOptions({ sandbox: SandboxConfigSchema.parse({ process: { runtime: 'docker', shutdownGraceMs: 50 } }) })
      );
      await expect(backend.start()).resolves.toBe(true);

      expect(mockSpawn.mock.calls.map(([command, args]) => [command, args[0]])).toEqual([
        ['docker', 'rm'],
        ['docker', 'run'],
      ]);
      expect(mockSpawn).toHaveBeenNthCalledWith(
        1,
        'docker',
        ['rm', '-f', 'deepread-sandbox-instance'],
        { stdio: 'ignore' }
      );

      await backend.stop();

      expect(mockSpawn).toHaveBeenLastCalledWith(
        'docker',
        ['rm', '-f', 'deepread-sandbox-instance'],
        { stdio: 'ignore' }
      );
    });

    it('is safe before start', async () => {
      backend = new ProcessBackend(makeOptions());
      await expect(backend.stop()).resolves.toBeUndefined();
    });
  });
});

/**
 * Child-process execution backend.
 *
 * Spawns the REPL server (directly under node, or inside a container) and
 * speaks line-delimited JSON over its standard streams. Two listeners run
 * per session: stdout lines feed a bounded queue matched FIFO to the single
 * outstanding request, stderr lines pass through to the logger.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { createInterface, type Interface } from 'node:readline';
import { dirname, extname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  ExecutionResultSchema,
  GetVarResponseSchema,
  ListVarsResponseSchema,
  MessageResponseSchema,
  ReadyMessageSchema,
  ReindexResponseSchema,
  type ContextMode,
  type ExecutionResult,
  type ReplCommand,
  type SandboxConfig,
  type VariableLookup,
} from '@deepread/shared';
import type { SecureLogger } from '../logging/logger.js';
import { toErrorMessage } from '../utils/errors.js';
import { AsyncLineQueue } from './message-queue.js';
import { contextToEnv, type RecursionContext } from './recursion-gate.js';
import { DEFAULT_CONTEXT_PATH } from './repl-server.js';
import {
  SandboxStartupError,
  failedResult,
  type ExecutionBackend,
  type SessionState,
} from './types.js';

// Extra wait beyond the child's own execution timeout, so its timeout reply arrives first
const RESPONSE_MARGIN_MS = 2000;
const CONTAINER_DATA_DIR = '/mnt/data';

const EXEC_FAILURES = {
  timeout: 'Timeout waiting for execution result',
  closed: 'Sandbox exited during execution',
  invalid: 'Invalid response from sandbox',
} as const;

type ReadOutcome = { ok: true; value: unknown } | { ok: false; reason: 'timeout' | 'closed' | 'invalid' };

export interface ProcessBackendOptions {
  mode: ContextMode;
  contextPath: string;
  sandbox: SandboxConfig;
  execTimeoutMs: number;
  recursion: RecursionContext;
  /** Name of the API key variable forwarded into the sandbox. */
  apiKeyEnv: string;
  logger: SecureLogger;
  /** Overrides the bundled REPL server script (node runtime). */
  serverScript?: string;
}

export interface SpawnPlan {
  command: string;
  args: string[];
  env: NodeJS.ProcessEnv;
}

/** The REPL server beside this module, in whichever form (.ts or .js) is running. */
export function defaultServerScript(): string {
  const here = fileURLToPath(import.meta.url);
  return join(dirname(here), `repl-server${extname(here)}`);
}

/**
 * Command line for the child. Exported for inspection and tests.
 */
export function buildSpawnPlan(options: ProcessBackendOptions): SpawnPlan {
  const { sandbox, recursion, mode } = options;
  const contextPath = resolve(options.contextPath);
  const depthEnv = contextToEnv(recursion);

  if (sandbox.process.runtime === 'docker') {
    const target = mode === 'directory' ? CONTAINER_DATA_DIR : DEFAULT_CONTEXT_PATH;
    const args = [
      'run',
      '-i',
      '--rm',
      '--name',
      sandbox.process.containerName,
      '-v',
      `${contextPath}:${target}:ro`,
      // Forwarded by name so the key never appears in the process list
      '-e',
      options.apiKeyEnv,
      '-e',
      `DEEPREAD_CONTEXT_MODE=${mode}`,
      '-e',
      `DEEPREAD_CONTEXT_PATH=${target}`,
    ];
    for (const [key, value] of Object.entries(depthEnv)) {
      args.push('-e', `${key}=${value}`);
    }
    args.push(sandbox.process.image);
    return { command: 'docker', args, env: process.env };
  }

  const script = options.serverScript ?? defaultServerScript();
  const args = script.endsWith('.ts') ? ['--import', 'tsx', script] : [script];
  return {
    command: process.execPath,
    args,
    env: {
      ...process.env,
      ...depthEnv,
      DEEPREAD_CONTEXT_MODE: mode,
      DEEPREAD_CONTEXT_PATH: contextPath,
    },
  };
}

function waitForExit(child: ChildProcess, timeoutMs: number): Promise<boolean> {
  if (child.exitCode !== null || child.signalCode !== null) {
    return Promise.resolve(true);
  }
  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      child.off('exit', onExit);
      resolve(false);
    }, timeoutMs);
    const onExit = () => {
      clearTimeout(timer);
      resolve(true);
    };
    child.once('exit', onExit);
  });
}

export class ProcessBackend implements ExecutionBackend {
  private child: ChildProcess | null = null;
  private stdoutReader: Interface | null = null;
  private stderrReader: Interface | null = null;
  private queue: AsyncLineQueue;
  private sessionState: SessionState = 'stopped';
  private abandoned = 0;
  private pending: Promise<unknown> = Promise.resolve();
  private readonly logger: SecureLogger;

  constructor(private readonly options: ProcessBackendOptions) {
    this.logger = options.logger.child({ component: 'ProcessBackend' });
    this.queue = this.createQueue();
  }

  get state(): SessionState {
    return this.sessionState;
  }

  private get isRunning(): boolean {
    return this.child !== null && this.child.exitCode === null && this.child.signalCode === null;
  }

  private createQueue(): AsyncLineQueue {
    return new AsyncLineQueue(this.options.sandbox.process.queueCapacity, (line) =>
      this.logger.warn('Response queue full, dropping oldest line', { chars: line.length })
    );
  }

  async start(): Promise<boolean> {
    if (this.child) {
      await this.stop();
    } else if (this.options.sandbox.process.runtime === 'docker') {
      // A container left by an earlier run holds the fixed name
      await this.removeContainer();
    }

    this.sessionState = 'starting';
    try {
      await this.launch();
      this.sessionState = 'ready';
      return true;
    } catch (error) {
      this.logger.error('Sandbox failed to start', { error: toErrorMessage(error) });
      await this.stop();
      return false;
    }
  }

  private async launch(): Promise<void> {
    const plan = buildSpawnPlan(this.options);
    const queue = this.createQueue();
    this.queue = queue;
    this.abandoned = 0;

    this.logger.info('Starting sandbox', {
      runtime: this.options.sandbox.process.runtime,
      mode: this.options.mode,
    });

    const child = spawn(plan.command, plan.args, {
      env: plan.env,
      stdio: ['pipe', 'pipe', 'pipe'],
    });
    this.child = child;

    const failure: { error?: Error } = {};
    child.on('error', (err) => {
      failure.error = err;
      this.logger.error('Sandbox process error', { error: err.message });
      queue.close();
    });
    child.on('exit', (code, signal) => {
      this.logger.debug('Sandbox process exited', { code, signal });
      queue.close();
    });
    child.stdin?.on('error', (err) => {
      this.logger.debug('Sandbox stdin error', { error: err.message });
    });

    if (child.stdout) {
      this.stdoutReader = createInterface({ input: child.stdout, crlfDelay: Infinity });
      this.stdoutReader.on('line', (line) => {
        const trimmed = line.trim();
        if (trimmed) queue.push(trimmed);
      });
    }
    if (child.stderr) {
      this.stderrReader = createInterface({ input: child.stderr, crlfDelay: Infinity });
      this.stderrReader.on('line', (line) => {
        if (line.trim()) this.logger.debug(line, { stream: 'sandbox-stderr' });
      });
    }

    const deadline = Date.now() + this.options.sandbox.process.readyTimeoutMs;
    for (;;) {
      const remaining = deadline - Date.now();
      const line = remaining > 0 ? await queue.next(remaining) : null;
      if (line === null) {
        const reason = failure.error
          ? `could not spawn ${plan.command}: ${failure.error.message}`
          : queue.closed
            ? 'sandbox exited before it was ready'
            : `no ready message within ${this.options.sandbox.process.readyTimeoutMs}ms`;
        throw new SandboxStartupError(reason, { cause: failure.error });
      }

      const ready = ReadyMessageSchema.safeParse(this.parseLine(line));
      if (ready.success) {
        this.logger.info('Sandbox ready', {
          message: ready.data.message,
          contextInfo: ready.data.context_info,
        });
        return;
      }
      this.logger.warn('Ignoring unexpected line before ready', { line: line.slice(0, 100) });
    }
  }

  private parseLine(line: string): unknown {
    try {
      return JSON.parse(line);
    } catch (error) {
      this.logger.warn('Invalid JSON from sandbox', {
        error: toErrorMessage(error),
        line: line.slice(0, 100),
      });
      return undefined;
    }
  }

  /** Run `fn` after every earlier request has finished. */
  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.pending.then(fn, fn);
    this.pending = run.catch(() => undefined);
    return run;
  }

  private send(command: ReplCommand): boolean {
    const stdin = this.child?.stdin;
    if (!this.isRunning || !stdin || stdin.destroyed) {
      return false;
    }
    stdin.write(`${JSON.stringify(command)}\n`);
    return true;
  }

  /**
   * Read the reply to the request just sent. Replies to requests that timed
   * out earlier are skipped first.
   */
  private async readResponse(timeoutMs: number): Promise<ReadOutcome> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      const remaining = deadline - Date.now();
      const line = remaining > 0 ? await this.queue.next(remaining) : null;
      if (line === null) {
        if (this.queue.closed) {
          return { ok: false, reason: 'closed' };
        }
        this.abandoned++;
        return { ok: false, reason: 'timeout' };
      }
      if (this.abandoned > 0) {
        this.abandoned--;
        this.logger.debug('Discarding late response', { remaining: this.abandoned });
        continue;
      }
      const value = this.parseLine(line);
      return value === undefined ? { ok: false, reason: 'invalid' } : { ok: true, value };
    }
  }

  private request(command: ReplCommand, timeoutMs: number): Promise<ReadOutcome> {
    return this.exclusive(async () => {
      if (!this.send(command)) {
        return { ok: false, reason: 'closed' };
      }
      return this.readResponse(timeoutMs);
    });
  }

  async execCode(code: string, timeoutMs = this.options.execTimeoutMs): Promise<ExecutionResult> {
    if (!this.isRunning) {
      return failedResult('Sandbox is not running');
    }

    this.sessionState = 'executing';
    try {
      const outcome = await this.request(
        { action: 'execute', code, timeout_ms: timeoutMs },
        timeoutMs + RESPONSE_MARGIN_MS
      );
      if (!outcome.ok) {
        return failedResult(EXEC_FAILURES[outcome.reason]);
      }
      const result = ExecutionResultSchema.safeParse(outcome.value);
      return result.success ? result.data : failedResult('Invalid response from sandbox');
    } finally {
      if (this.sessionState === 'executing') {
        this.sessionState = this.isRunning ? 'ready' : 'stopped';
      }
    }
  }

  async getVariable(name: string): Promise<VariableLookup> {
    if (!this.isRunning) return { found: false };

    const outcome = await this.request({ action: 'get_var', name }, this.options.sandbox.getVarTimeoutMs);
    if (!outcome.ok) return { found: false };

    const parsed = GetVarResponseSchema.safeParse(outcome.value);
    if (parsed.success && parsed.data.success) {
      return { found: true, value: parsed.data.value };
    }
    return { found: false };
  }

  async listVariables(): Promise<Record<string, string>> {
    if (!this.isRunning) return {};

    const outcome = await this.request({ action: 'list_vars' }, this.options.sandbox.getVarTimeoutMs);
    if (!outcome.ok) return {};

    const parsed = ListVarsResponseSchema.safeParse(outcome.value);
    return parsed.success ? parsed.data.variables : {};
  }

  async reindex(): Promise<number> {
    if (!this.isRunning) return 0;

    const outcome = await this.request(
      { action: 'reindex' },
      this.options.sandbox.process.readyTimeoutMs
    );
    if (!outcome.ok) return 0;

    const parsed = ReindexResponseSchema.safeParse(outcome.value);
    return parsed.success ? parsed.data.files_indexed : 0;
  }

  async ping(): Promise<boolean> {
    if (!this.isRunning) return false;

    const outcome = await this.request({ action: 'ping' }, this.options.sandbox.pingTimeoutMs);
    if (!outcome.ok) return false;

    const parsed = MessageResponseSchema.safeParse(outcome.value);
    return parsed.success && parsed.data.success;
  }

  /**
   * Graceful shutdown message, then SIGTERM, then SIGKILL. In the docker
   * runtime the container is also removed by name.
   */
  async stop(): Promise<void> {
    const child = this.child;
    const grace = this.options.sandbox.process.shutdownGraceMs;

    if (child) {
      this.logger.info('Stopping sandbox');
      if (this.send({ action: 'shutdown' })) {
        child.stdin?.end();
      }

      if (!(await waitForExit(child, grace))) {
        child.kill('SIGTERM');
        if (!(await waitForExit(child, grace))) {
          this.logger.warn('Sandbox ignored SIGTERM, killing');
          child.kill('SIGKILL');
        }
      }
    }

    this.child = null;
    this.stdoutReader?.close();
    this.stderrReader?.close();
    this.stdoutReader = null;
    this.stderrReader = null;
    this.queue.close();
    this.sessionState = 'stopped';

    if (this.options.sandbox.process.runtime === 'docker') {
      await this.removeContainer();
    }
  }

  private removeContainer(): Promise<void> {
    const name = this.options.sandbox.process.containerName;
    return new Promise((resolve) => {
      const cleanup = spawn('docker', ['rm', '-f', name], { stdio: 'ignore' });
      const timer = setTimeout(() => {
        cleanup.kill('SIGKILL');
        resolve();
      }, 10000);
      cleanup.on('error', (err) => {
        this.logger.debug('Container cleanup failed', { container: name, error: err.message });
        clearTimeout(timer);
        resolve();
      });
      cleanup.on('close', () => {
        clearTimeout(timer);
        resolve();
      });
    });
  }
}

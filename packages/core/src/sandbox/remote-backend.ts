/**
 * Remote execution backend: the same capabilities over the HTTP sandbox
 * server. The server outlives this client, so stop() only ends the session.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';
import {
  ExecutionResultSchema,
  GetVarResponseSchema,
  type ExecutionResult,
  type SandboxConfig,
  type VariableLookup,
} from '@deepread/shared';
import type { SecureLogger } from '../logging/logger.js';
import { toErrorMessage } from '../utils/errors.js';
import { failedResult, type ExecutionBackend, type SessionState } from './types.js';

export const RemoteStatusSchema = z.object({
  status: z.string(),
  mode: z.enum(['file', 'directory']).optional(),
  context_info: z.string().optional(),
  files_indexed: z.number().int().nonnegative().default(0),
  recursion_depth: z.number().int().nonnegative().optional(),
  max_recursion_depth: z.number().int().nonnegative().optional(),
});

export type RemoteStatus = z.infer<typeof RemoteStatusSchema>;

const FilesResponseSchema = z.object({ files: z.array(z.string()) });
const FileResponseSchema = z.object({ path: z.string(), content: z.string() });
const FilesIndexedSchema = z.object({ files_indexed: z.number().int().nonnegative() });
const ResetResponseSchema = z.object({ status: z.string() });

export interface RemoteBackendOptions {
  remote: SandboxConfig['remote'];
  pingTimeoutMs: number;
  getVarTimeoutMs: number;
  execTimeoutMs: number;
  logger: SecureLogger;
  /** Sent as `X-API-Key` when set. */
  apiKey?: string;
}

export class RemoteBackend implements ExecutionBackend {
  private readonly baseUrl: string;
  private readonly logger: SecureLogger;
  private sessionState: SessionState = 'stopped';

  constructor(private readonly options: RemoteBackendOptions) {
    this.baseUrl = options.remote.url.replace(/\/+$/, '');
    this.logger = options.logger.child({ component: 'RemoteBackend' });
  }

  get state(): SessionState {
    return this.sessionState;
  }

  /** Session calls reach the server only between a successful start and stop. */
  private get isRunning(): boolean {
    return this.sessionState === 'ready' || this.sessionState === 'executing';
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    timeoutMs: number,
    body?: unknown
  ): Promise<unknown> {
    const headers: Record<string, string> = {};
    if (body !== undefined) headers['Content-Type'] = 'application/json';
    if (this.options.apiKey) headers['X-API-Key'] = this.options.apiKey;

    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} from ${path}`);
    }
    return response.json();
  }

  async start(): Promise<boolean> {
    const { readyRetries, pollIntervalMs } = this.options.remote;
    this.sessionState = 'starting';

    for (let attempt = 1; attempt <= readyRetries; attempt++) {
      if (await this.probe()) {
        this.sessionState = 'ready';
        this.logger.info('Remote sandbox ready', { url: this.baseUrl, attempt });
        return true;
      }
      if (attempt < readyRetries) {
        await sleep(pollIntervalMs);
      }
    }

    this.sessionState = 'stopped';
    this.logger.error('Remote sandbox not reachable', { url: this.baseUrl, attempts: readyRetries });
    return false;
  }

  async stop(): Promise<void> {
    if (this.sessionState === 'stopped') return;
    this.sessionState = 'stopped';
    this.logger.info('Remote sandbox session closed', { url: this.baseUrl });
  }

  async ping(): Promise<boolean> {
    if (!this.isRunning) return false;
    return this.probe();
  }

  private async probe(): Promise<boolean> {
    try {
      const status = await this.getStatus(this.options.pingTimeoutMs);
      return status.status === 'ready';
    } catch (error) {
      this.logger.debug('Ping failed', { error: toErrorMessage(error) });
      return false;
    }
  }

  /** Server status and file index info. Throws when unreachable. */
  async getStatus(timeoutMs = this.options.remote.requestTimeoutMs): Promise<RemoteStatus> {
    return RemoteStatusSchema.parse(await this.request('GET', '/status', timeoutMs));
  }

  async execCode(code: string, timeoutMs = this.options.execTimeoutMs): Promise<ExecutionResult> {
    if (!this.isRunning) {
      return failedResult('Sandbox is not running');
    }
    const previous = this.sessionState;
    this.sessionState = 'executing';
    try {
      const data = await this.request('POST', '/execute', this.options.remote.requestTimeoutMs, {
        code,
        timeout_ms: timeoutMs,
      });
      const result = ExecutionResultSchema.safeParse(data);
      return result.success ? result.data : failedResult('Invalid response from sandbox');
    } catch (error) {
      this.logger.warn('Remote execution failed', { error: toErrorMessage(error) });
      return failedResult(`Request failed: ${toErrorMessage(error)}`);
    } finally {
      this.sessionState = previous;
    }
  }

  async getVariable(name: string): Promise<VariableLookup> {
    if (!this.isRunning) return { found: false };
    try {
      const data = await this.request('POST', '/get_var', this.options.getVarTimeoutMs, { name });
      const parsed = GetVarResponseSchema.safeParse(data);
      if (parsed.success && parsed.data.success) {
        return { found: true, value: parsed.data.value };
      }
    } catch (error) {
      this.logger.debug('Variable lookup failed', { name, error: toErrorMessage(error) });
    }
    return { found: false };
  }

  async listFiles(pattern = '*'): Promise<string[]> {
    if (!this.isRunning) return [];
    try {
      const data = await this.request(
        'GET',
        `/files?pattern=${encodeURIComponent(pattern)}`,
        this.options.remote.requestTimeoutMs
      );
      return FilesResponseSchema.parse(data).files;
    } catch (error) {
      this.logger.debug('File listing failed', { pattern, error: toErrorMessage(error) });
      return [];
    }
  }

  async readFile(path: string): Promise<string | null> {
    if (!this.isRunning) return null;
    const encoded = path.split('/').map(encodeURIComponent).join('/');
    try {
      const data = await this.request('GET', `/file/${encoded}`, this.options.remote.requestTimeoutMs);
      return FileResponseSchema.parse(data).content;
    } catch (error) {
      this.logger.debug('File read failed', { path, error: toErrorMessage(error) });
      return null;
    }
  }

  async reindex(): Promise<number> {
    if (!this.isRunning) return 0;
    try {
      const data = await this.request('POST', '/reindex', this.options.remote.requestTimeoutMs);
      return FilesIndexedSchema.parse(data).files_indexed;
    } catch (error) {
      this.logger.warn('Reindex failed', { error: toErrorMessage(error) });
      return 0;
    }
  }

  /** Clear the server's namespace. */
  async reset(): Promise<boolean> {
    if (!this.isRunning) return false;
    try {
      const data = await this.request('POST', '/reset', this.options.remote.requestTimeoutMs);
      return ResetResponseSchema.parse(data).status === 'reset';
    } catch (error) {
      this.logger.warn('Reset failed', { error: toErrorMessage(error) });
      return false;
    }
  }
}

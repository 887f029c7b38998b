/**
 * In-process execution backend.
 *
 * Runs code straight against an ExecutionEnvironment living in this process:
 * no subprocess, no isolation. For trusted input and debugging only.
 */

import type { ExecutionResult, VariableLookup } from '@deepread/shared';
import type { SecureLogger } from '../logging/logger.js';
import { ExecutionEnvironment, type EnvironmentOptions } from './environment.js';
import type { ExecutionBackend, SessionState } from './types.js';

export class InProcessBackend implements ExecutionBackend {
  private sessionState: SessionState = 'ready';
  private readonly logger?: SecureLogger;

  constructor(
    private readonly environment: ExecutionEnvironment,
    private readonly execTimeoutMs: number,
    logger?: SecureLogger
  ) {
    this.logger = logger?.child({ component: 'InProcessBackend' });
  }

  /** Build a fresh environment and wrap it. */
  static async create(
    options: EnvironmentOptions,
    execTimeoutMs: number
  ): Promise<InProcessBackend> {
    const environment = await ExecutionEnvironment.create(options);
    return new InProcessBackend(environment, execTimeoutMs, options.logger);
  }

  get state(): SessionState {
    return this.sessionState;
  }

  async start(): Promise<boolean> {
    this.logger?.warn('Running model code in-process without isolation', {
      context: this.environment.contextInfo,
    });
    return true;
  }

  async stop(): Promise<void> {
    // The environment belongs to whoever created it
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async execCode(code: string, timeoutMs = this.execTimeoutMs): Promise<ExecutionResult> {
    this.sessionState = 'executing';
    try {
      return await this.environment.execute(code, timeoutMs);
    } finally {
      this.sessionState = 'ready';
    }
  }

  async getVariable(name: string): Promise<VariableLookup> {
    return this.environment.getVariable(name);
  }

  async listVariables(): Promise<Record<string, string>> {
    return this.environment.listVariables();
  }

  /** Indexing is owned by the enclosing session; reports the current count. */
  async reindex(): Promise<number> {
    return this.environment.filesIndexed;
  }
}

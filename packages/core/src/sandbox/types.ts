/**
 * Execution backend contract.
 *
 * Three implementations share it: a child process speaking line-delimited
 * JSON, a remote HTTP sandbox server, and an in-process environment. The
 * agent loop depends on this interface only.
 */

import type { ExecutionResult, VariableLookup } from '@deepread/shared';

export type SessionState = 'stopped' | 'starting' | 'ready' | 'executing';

export interface ExecutionBackend {
  readonly state: SessionState;

  /** Resolves true once the sandbox is ready for commands. */
  start(): Promise<boolean>;
  /** Always safe to call, including when never started. */
  stop(): Promise<void>;
  ping(): Promise<boolean>;
  execCode(code: string, timeoutMs?: number): Promise<ExecutionResult>;
  getVariable(name: string): Promise<VariableLookup>;
  /** Rebuild the directory file index; resolves to the number of files. */
  reindex(): Promise<number>;
}

export class SandboxStartupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SandboxStartupError';
  }
}

export function failedResult(error: string): ExecutionResult {
  return { success: false, output: '', error };
}

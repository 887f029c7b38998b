/**
 * Persistent Execution Environment
 *
 * One JavaScript namespace (a `node:vm` context) that survives across cells.
 * A cell runs as a script; a cell that only compiles with top-level `await`
 * runs as the body of an async function in the same context. Each cell's
 * console output is captured per stream and capped at MAX_OUTPUT_CHARS.
 *
 * Not a security boundary: code runs with the host process's privileges.
 */

import { existsSync, readFileSync, statSync } from 'node:fs';
import vm from 'node:vm';
import { inspect, types } from 'node:util';
import type { ContextMode, ExecutionResult, FileIndexEntry, VariableLookup } from '@deepread/shared';
import type { SecureLogger } from '../logging/logger.js';
import { rewriteCell } from './cell-rewrite.js';
import { FileIndex, type SearchMatch } from './file-index.js';
import { createLlmQuery, type RecursionContext, type SubQuery } from './recursion-gate.js';

export const MAX_OUTPUT_CHARS = 50000;
export const DEFAULT_EXEC_TIMEOUT_MS = 120000;

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

export const HELPER_NAMES: ReadonlySet<string> = new Set([
  'context',
  'file_index',
  'list_files',
  'read_file',
  'search_files',
  'llm_query',
  'print',
  'console',
  'setTimeout',
  'clearTimeout',
]);

/** Text sink that stops buffering at a fixed ceiling. */
export class OutputBuffer {
  private text = '';
  private truncated = false;

  constructor(private readonly limit = MAX_OUTPUT_CHARS) {}

  write(chunk: string): void {
    if (this.truncated) return;
    const room = this.limit - this.text.length;
    if (chunk.length > room) {
      this.text += chunk.slice(0, room);
      this.truncated = true;
    } else {
      this.text += chunk;
    }
  }

  toString(): string {
    return this.truncated ? `${this.text}\n... [Output truncated at ${this.limit} chars]` : this.text;
  }
}

function formatArgs(args: unknown[]): string {
  return args.map((arg) => (typeof arg === 'string' ? arg : inspect(arg, { depth: 4 }))).join(' ');
}

function describeError(error: unknown): string {
  if (types.isNativeError(error)) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return `Uncaught ${inspect(error)}`;
}

function isTimeoutError(error: unknown): boolean {
  return (
    types.isNativeError(error) &&
    'code' in error &&
    error.code === 'ERR_SCRIPT_EXECUTION_TIMEOUT'
  );
}

function typeName(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * JSON value when the value survives a JSON round trip, otherwise its
 * inspected text.
 */
export function serializeValue(value: unknown): unknown {
  let json: string | undefined;
  try {
    json = JSON.stringify(value);
  } catch {
    // Circular structures and BigInt
    return inspect(value, { depth: 4 });
  }
  return json === undefined ? inspect(value, { depth: 4 }) : JSON.parse(json);
}

class CellTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Execution timed out after ${timeoutMs}ms`);
    this.name = 'CellTimeoutError';
  }
}

function awaitWithTimeout(value: unknown, timeoutMs: number): Promise<unknown> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new CellTimeoutError(timeoutMs)), timeoutMs);
  });
  return Promise.race([Promise.resolve(value), timeout]).finally(() => clearTimeout(timer));
}

export interface EnvironmentOptions {
  mode: ContextMode;
  /** File to load as `context`, or directory to index. */
  contextPath: string;
  recursion: RecursionContext;
  subQuery: SubQuery;
  subQueryTimeoutMs?: number;
  maxOutputChars?: number;
  logger?: SecureLogger;
}

export class ExecutionEnvironment {
  readonly mode: ContextMode;
  readonly recursion: RecursionContext;
  private readonly index: FileIndex | null;
  private readonly maxOutputChars: number;
  private readonly logger?: SecureLogger;
  private contextText = '';
  private info = '';
  private namespace: Record<string, unknown> = {};
  private vmContext: vm.Context = vm.createContext({});
  private stdout: OutputBuffer;
  private stderr: OutputBuffer;

  private constructor(private readonly options: EnvironmentOptions) {
    this.mode = options.mode;
    this.recursion = options.recursion;
    this.maxOutputChars = options.maxOutputChars ?? MAX_OUTPUT_CHARS;
    this.logger = options.logger;
    this.index = options.mode === 'directory' ? new FileIndex(options.contextPath) : null;
    this.stdout = new OutputBuffer(this.maxOutputChars);
    this.stderr = new OutputBuffer(this.maxOutputChars);
  }

  static async create(options: EnvironmentOptions): Promise<ExecutionEnvironment> {
    const env = new ExecutionEnvironment(options);
    await env.load();
    env.bootstrap();
    return env;
  }

  /** One-line description of what was loaded, sent with the ready message. */
  get contextInfo(): string {
    return this.info;
  }

  get filesIndexed(): number {
    return this.index?.size ?? 0;
  }

  private async load(): Promise<void> {
    const path = this.options.contextPath;

    if (this.index) {
      if (!existsSync(path) || !statSync(path).isDirectory()) {
        this.info = `No context directory found at ${path}`;
        this.logger?.warn(this.info);
        return;
      }
      const count = await this.index.build();
      this.info = `Indexed ${count} files`;
      this.logger?.info(this.info);
      return;
    }

    if (!existsSync(path)) {
      this.info = 'No context file found';
      this.logger?.warn(this.info, { path });
      return;
    }
    this.contextText = readFileSync(path, 'utf-8');
    const words = this.contextText.split(/\s+/).filter(Boolean).length;
    this.info = `Loaded context with ${this.contextText.length} characters (${words} words)`;
    this.logger?.info(this.info);
  }

  private bootstrap(): void {
    const write = (target: () => OutputBuffer) => (...args: unknown[]) => {
      target().write(`${formatArgs(args)}\n`);
    };
    const out = write(() => this.stdout);
    const err = write(() => this.stderr);

    const index = this.index;
    const namespace: Record<string, unknown> = {
      print: out,
      console: { log: out, info: out, debug: out, warn: err, error: err },
      setTimeout,
      clearTimeout,
      llm_query: createLlmQuery({
        context: this.recursion,
        subQuery: this.options.subQuery,
        fileSummary: index ? () => index.summary() : undefined,
        timeoutMs: this.options.subQueryTimeoutMs,
        logger: this.logger?.child({ component: 'RecursionGate' }),
      }),
    };

    if (index) {
      namespace.file_index = index.list();
      namespace.list_files = (pattern?: string) => index.listFiles(pattern);
      namespace.read_file = (path: string) => index.readFile(path);
      namespace.search_files = (regex: string | RegExp, pattern?: string) =>
        index.searchFiles(regex, pattern);
    } else {
      namespace.context = this.contextText;
    }

    this.namespace = namespace;
    this.vmContext = vm.createContext(namespace);
  }

  async execute(code: string, timeoutMs = DEFAULT_EXEC_TIMEOUT_MS): Promise<ExecutionResult> {
    this.stdout = new OutputBuffer(this.maxOutputChars);
    this.stderr = new OutputBuffer(this.maxOutputChars);
    const stdout = this.stdout;
    const stderr = this.stderr;

    this.logger?.debug('Executing code', { chars: code.length });

    try {
      const script = this.compile(code);
      const value: unknown = script.runInContext(this.vmContext, { timeout: timeoutMs });
      if (types.isPromise(value)) {
        await awaitWithTimeout(value, timeoutMs);
      }
    } catch (error) {
      const trace = isTimeoutError(error)
        ? new CellTimeoutError(timeoutMs).message
        : error instanceof CellTimeoutError
          ? error.message
          : describeError(error);
      const captured = stderr.toString();
      return {
        success: false,
        output: stdout.toString(),
        error: captured ? `${captured}${trace}` : trace,
      };
    }

    const errText = stderr.toString();
    return { success: true, output: stdout.toString(), error: errText || null };
  }

  private compile(cell: string): vm.Script {
    const code = rewriteCell(cell);
    try {
      return new vm.Script(code, { filename: 'cell.js' });
    } catch (error) {
      const isSyntax = types.isNativeError(error) && error.name === 'SyntaxError';
      if (!isSyntax || !/\bawait\b/.test(code)) {
        throw error;
      }
      return new vm.Script(`(async () => {\n${code}\n})()`, { filename: 'cell.js', lineOffset: -1 });
    }
  }

  getVariable(name: string): VariableLookup {
    if (!IDENTIFIER.test(name)) {
      return { found: false };
    }

    if (Object.prototype.hasOwnProperty.call(this.namespace, name)) {
      return { found: true, value: serializeValue(this.namespace[name]) };
    }

    return { found: false };
  }

  /** User bindings on the global object with their types; helpers and `_` names excluded. */
  listVariables(): Record<string, string> {
    const variables: Record<string, string> = {};
    for (const [name, value] of Object.entries(this.namespace)) {
      if (name.startsWith('_') || HELPER_NAMES.has(name)) continue;
      variables[name] = typeName(value);
    }
    return variables;
  }

  async reindex(): Promise<number> {
    if (!this.index) return 0;
    const count = await this.index.build();
    this.namespace.file_index = this.index.list();
    this.logger?.info('Reindexed files', { count });
    return count;
  }

  /** Discard every binding and inject the helpers again. */
  reset(): void {
    this.bootstrap();
    this.logger?.info('Namespace reset');
  }

  listFiles(pattern = '*'): string[] {
    return this.index?.listFiles(pattern) ?? [];
  }

  /** Contents of an indexed file, or null. */
  readFile(path: string): string | null {
    if (!this.index) return null;
    try {
      return this.index.readFile(path);
    } catch (error) {
      this.logger?.debug('File read refused', { path, error: describeError(error) });
      return null;
    }
  }

  fileEntries(): FileIndexEntry[] {
    return this.index?.list() ?? [];
  }

  searchFiles(regex: string, pattern = '*'): SearchMatch[] {
    return this.index?.searchFiles(regex, pattern) ?? [];
  }
}

/**
 * REPL server: the child-process end of the process backend.
 *
 * Reads one JSON command per line on stdin and writes one JSON response per
 * line on stdout. Logs go to stderr so stdout carries protocol only.
 *
 * Environment:
 *   DEEPREAD_CONTEXT_MODE  'file' (default) or 'directory'
 *   DEEPREAD_CONTEXT_PATH  defaults to /mnt/data/input.txt
 *   DEEPREAD_RECURSION_DEPTH / DEEPREAD_MAX_RECURSION_DEPTH
 */

import { createInterface } from 'node:readline';
import { pathToFileURL } from 'node:url';
import {
  ReplCommandSchema,
  type ContextMode,
  type ReadyMessage,
  type ReplResponse,
} from '@deepread/shared';
import { loadConfig } from '../config/loader.js';
import { createLogger } from '../logging/logger.js';
import { toErrorMessage } from '../utils/errors.js';
import { ExecutionEnvironment } from './environment.js';
import { configuredSubQuery, contextFromEnv } from './recursion-gate.js';

export const DEFAULT_CONTEXT_PATH = '/mnt/data/input.txt';

const KNOWN_ACTIONS = ['execute', 'get_var', 'list_vars', 'reindex', 'ping', 'shutdown'];

export interface CommandOutcome {
  response: ReplResponse;
  shutdown: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function reply(response: ReplResponse, shutdown = false): CommandOutcome {
  return { response, shutdown };
}

/**
 * Apply one protocol line to the environment. A command without an action
 * is an execute.
 */
export async function handleCommand(
  env: ExecutionEnvironment,
  line: string,
  execTimeoutMs: number
): Promise<CommandOutcome> {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (error) {
    return reply({ success: false, error: `Invalid JSON: ${toErrorMessage(error)}` });
  }

  const candidate = isRecord(raw) && raw.action === undefined ? { ...raw, action: 'execute' } : raw;
  const parsed = ReplCommandSchema.safeParse(candidate);
  if (!parsed.success) {
    const action = isRecord(candidate) ? candidate.action : undefined;
    if (typeof action === 'string' && !KNOWN_ACTIONS.includes(action)) {
      return reply({ success: false, error: `Unknown action: ${action}` });
    }
    const issue = parsed.error.errors[0];
    const detail = issue ? `${issue.path.join('.') || 'command'}: ${issue.message}` : 'malformed';
    return reply({ success: false, error: `Invalid command: ${detail}` });
  }

  const command = parsed.data;
  switch (command.action) {
    case 'execute':
      return reply(await env.execute(command.code, command.timeout_ms ?? execTimeoutMs));
    case 'get_var': {
      const lookup = env.getVariable(command.name);
      return reply(
        lookup.found
          ? { success: true, value: lookup.value }
          : { success: false, error: `Variable '${command.name}' not found` }
      );
    }
    case 'list_vars':
      return reply({ success: true, variables: env.listVariables() });
    case 'reindex':
      return reply({ success: true, files_indexed: await env.reindex() });
    case 'ping':
      return reply({ success: true, message: 'pong' });
    case 'shutdown':
      return reply({ success: true, message: 'Shutting down' }, true);
  }
}

function send(message: ReplResponse | ReadyMessage): void {
  process.stdout.write(`${JSON.stringify(message)}\n`);
}

export async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logging.level, output: [{ type: 'stderr' }] }).child({
    component: 'ReplServer',
  });

  const mode: ContextMode = process.env.DEEPREAD_CONTEXT_MODE === 'directory' ? 'directory' : 'file';
  const contextPath = process.env.DEEPREAD_CONTEXT_PATH || DEFAULT_CONTEXT_PATH;
  const recursion = contextFromEnv(process.env, config.agent.maxRecursionDepth);

  const env = await ExecutionEnvironment.create({
    mode,
    contextPath,
    recursion,
    subQuery: configuredSubQuery(config.model, logger),
    subQueryTimeoutMs: config.model.requestTimeoutMs,
    logger,
  });

  send({ status: 'ready', message: 'deepread sandbox initialized', context_info: env.contextInfo });
  logger.info('Ready', { mode, depth: recursion.currentDepth, maxDepth: recursion.maxDepth });

  const input = createInterface({ input: process.stdin, crlfDelay: Infinity });
  for await (const line of input) {
    if (!line.trim()) continue;
    const { response, shutdown } = await handleCommand(env, line, config.agent.execTimeoutMs);
    send(response);
    if (shutdown) break;
  }
  input.close();
  logger.info('Shutting down');
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      process.stderr.write(`Fatal error: ${toErrorMessage(err)}\n`);
      process.exit(1);
    });
}

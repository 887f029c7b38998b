/**
 * Run Command: answer a query about a file or directory.
 */

import type { Config, ContextMode } from '@deepread/shared';
import { OpenAICompatibleClient } from '../../ai/client.js';
import { AgentLoop, type RunResult } from '../../agent/loop.js';
import { resolveContextSource } from '../../agent/context-source.js';
import { loadConfig, requireSecret, validateSecrets } from '../../config/loader.js';
import { initializeLogger } from '../../logging/logger.js';
import { createBackend } from '../../sandbox/factory.js';
import { rootContext } from '../../sandbox/recursion-gate.js';
import { toErrorMessage } from '../../utils/errors.js';
import type { Command, CommandContext, Output } from '../router.js';
import {
  colorContext,
  extractBoolFlag,
  extractFlag,
  extractIntFlag,
  positionals,
  unknownFlag,
} from '../utils.js';

type BackendKind = Config['sandbox']['backend'];

const BACKENDS: readonly BackendKind[] = ['process', 'remote', 'inprocess'];
const KINDS: readonly ContextMode[] = ['file', 'directory'];

const RULE = '='.repeat(60);

function isBackend(value: string): value is BackendKind {
  return BACKENDS.some((b) => b === value);
}

function isKind(value: string): value is ContextMode {
  return KINDS.some((k) => k === value);
}

function printHelp(stream: Output): void {
  stream.write(`
Usage: deepread [run] <query> <path> [options]

Answer a query about a text file or a directory of files. The model explores
the content by running JavaScript in a persistent sandbox.

Options:
  -t, --type <text>        What the content is, e.g. "research paper" (shown to the model)
  -k, --kind <kind>        Require the path to be a file or a directory
  -m, --model <id>         Model for the root agent
      --max-turns <n>      Turn budget (default: 15)
  -b, --backend <name>     Sandbox backend: process|remote|inprocess (default: process)
  -c, --config <path>      Config file path (YAML)
  -q, --quiet              Only print the answer
      --json               Print the result as JSON
  -h, --help               Show this help

Environment Variables:
  OPENROUTER_API_KEY       API key for the model endpoint (required)
  DEEPREAD_SANDBOX_URL     Sandbox server URL for --backend remote
\n`);
}

function printAnswer(stream: Output, result: RunResult, quiet: boolean): void {
  const c = colorContext(stream);
  stream.write(`\n${RULE}\n${c.bold('FINAL ANSWER:')}\n${RULE}\n${result.answer}\n${RULE}\n`);
  if (!quiet) {
    stream.write(`\n${c.dim(`Completed in ${result.turns} turns (${result.status})`)}\n`);
  }
}

export const runCommand: Command = {
  name: 'run',
  aliases: ['ask'],
  description: 'Answer a query about a file or directory',
  usage: 'deepread run <query> <path> [options]',

  async run(ctx: CommandContext): Promise<number> {
    let argv = ctx.argv;

    const helpResult = extractBoolFlag(argv, 'help', 'h');
    if (helpResult.value) {
      printHelp(ctx.stdout);
      return 0;
    }
    argv = helpResult.rest;

    const typeResult = extractFlag(argv, 'type', 't');
    argv = typeResult.rest;
    const kindResult = extractFlag(argv, 'kind', 'k');
    argv = kindResult.rest;
    const modelResult = extractFlag(argv, 'model', 'm');
    argv = modelResult.rest;
    const turnsResult = extractIntFlag(argv, 'max-turns');
    argv = turnsResult.rest;
    const backendResult = extractFlag(argv, 'backend', 'b');
    argv = backendResult.rest;
    const configResult = extractFlag(argv, 'config', 'c');
    argv = configResult.rest;
    const quietResult = extractBoolFlag(argv, 'quiet', 'q');
    argv = quietResult.rest;
    const jsonResult = extractBoolFlag(argv, 'json');
    argv = jsonResult.rest;

    if (turnsResult.error) {
      ctx.stderr.write(`Error: ${turnsResult.error}\n`);
      return 1;
    }
    const backend = backendResult.value;
    if (backend !== undefined && !isBackend(backend)) {
      ctx.stderr.write(`Error: Unknown backend "${backend}" (expected ${BACKENDS.join(', ')})\n`);
      return 1;
    }
    const kind = kindResult.value;
    if (kind !== undefined && !isKind(kind)) {
      ctx.stderr.write(`Error: Unknown kind "${kind}" (expected file or directory)\n`);
      return 1;
    }
    const flag = unknownFlag(argv);
    if (flag) {
      ctx.stderr.write(`Error: Unknown option ${flag}\n`);
      return 1;
    }

    const [query, path, ...extra] = positionals(argv);
    if (!query || !path || extra.length > 0) {
      ctx.stderr.write(`Usage: ${this.usage}\n`);
      return 1;
    }

    try {
      const config = loadConfig({
        configPath: configResult.value,
        overrides: {
          model: { model: modelResult.value },
          agent: { maxTurns: turnsResult.value },
          sandbox: { backend },
        },
      });
      validateSecrets(config);

      const logger = initializeLogger({
        ...config.logging,
        level: quietResult.value ? 'warn' : config.logging.level,
      });
      const source = await resolveContextSource(path, kind);
      const llm = new OpenAICompatibleClient(config.model, requireSecret(config.model.apiKeyEnv), logger);

      const loop = new AgentLoop({
        llm,
        logger,
        maxTurns: config.agent.maxTurns,
        truncationLimit: config.agent.truncationLimit,
        createBackend: (context) =>
          createBackend(
            config,
            {
              mode: context.kind,
              contextPath: context.path,
              recursion: rootContext(config.agent.maxRecursionDepth),
            },
            logger
          ),
      });

      const result = await loop.run({ query, context: source, contextType: typeResult.value });

      if (jsonResult.value) {
        ctx.stdout.write(JSON.stringify(result, null, 2) + '\n');
      } else {
        printAnswer(ctx.stdout, result, quietResult.value);
      }
      return result.status === 'final' || result.status === 'final_var' ? 0 : 1;
    } catch (err) {
      ctx.stderr.write(`Error: ${toErrorMessage(err)}\n`);
      return 1;
    }
  },
};

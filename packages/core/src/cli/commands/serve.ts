/**
 * Serve Command: run the HTTP sandbox server over a file or directory.
 */

import { resolveContextSource } from '../../agent/context-source.js';
import { getSecret, loadConfig } from '../../config/loader.js';
import { initializeLogger } from '../../logging/logger.js';
import { ExecutionEnvironment } from '../../sandbox/environment.js';
import { SandboxServer } from '../../sandbox/http-server.js';
import { configuredSubQuery, contextFromEnv } from '../../sandbox/recursion-gate.js';
import { toErrorMessage } from '../../utils/errors.js';
import type { Command, CommandContext, Output } from '../router.js';
import { extractBoolFlag, extractFlag, extractIntFlag, positionals, unknownFlag } from '../utils.js';

function printHelp(stream: Output): void {
  stream.write(`
Usage: deepread serve <path> [options]

Serve a persistent sandbox over HTTP for "--backend remote" clients.

Options:
  -p, --port <number>      Port (default: 8080)
  -H, --host <string>      Host (default: 127.0.0.1)
  -c, --config <path>      Config file path (YAML)
  -h, --help               Show this help

Environment Variables:
  DEEPREAD_SANDBOX_KEY     Shared secret required in X-API-Key (optional)
  OPENROUTER_API_KEY       API key for llm_query sub-queries
\n`);
}

/** Resolves once SIGINT or SIGTERM arrives. */
function waitForSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

export const serveCommand: Command = {
  name: 'serve',
  description: 'Serve a sandbox over HTTP',
  usage: 'deepread serve <path> [--port N] [--host H] [--config PATH]',

  async run(ctx: CommandContext): Promise<number> {
    let argv = ctx.argv;

    const helpResult = extractBoolFlag(argv, 'help', 'h');
    if (helpResult.value) {
      printHelp(ctx.stdout);
      return 0;
    }
    argv = helpResult.rest;

    const portResult = extractIntFlag(argv, 'port', 'p');
    argv = portResult.rest;
    const hostResult = extractFlag(argv, 'host', 'H');
    argv = hostResult.rest;
    const configResult = extractFlag(argv, 'config', 'c');
    argv = configResult.rest;

    if (portResult.error) {
      ctx.stderr.write(`Error: ${portResult.error}\n`);
      return 1;
    }
    const flag = unknownFlag(argv);
    if (flag) {
      ctx.stderr.write(`Error: Unknown option ${flag}\n`);
      return 1;
    }
    const [path, ...extra] = positionals(argv);
    if (!path || extra.length > 0) {
      ctx.stderr.write(`Usage: ${this.usage}\n`);
      return 1;
    }

    let server: SandboxServer;
    try {
      const config = loadConfig({
        configPath: configResult.value,
        overrides: { server: { port: portResult.value, host: hostResult.value } },
      });
      const logger = initializeLogger(config.logging);
      const source = await resolveContextSource(path);

      const environment = await ExecutionEnvironment.create({
        mode: source.kind,
        contextPath: source.path,
        recursion: contextFromEnv(process.env, config.agent.maxRecursionDepth),
        subQuery: configuredSubQuery(config.model, logger),
        subQueryTimeoutMs: config.model.requestTimeoutMs,
        logger,
      });

      const apiKey = getSecret(config.server.apiKeyEnv);
      if (!apiKey) {
        logger.warn('No API key set, the server accepts unauthenticated requests', {
          env: config.server.apiKeyEnv,
        });
      }

      server = new SandboxServer({
        environment,
        logger,
        apiKey,
        execTimeoutMs: config.agent.execTimeoutMs,
        bodyLimitBytes: config.server.bodyLimitBytes,
      });
      const address = await server.start(config.server.host, config.server.port);
      ctx.stdout.write(`Sandbox server listening on ${address} (${environment.contextInfo})\n`);
    } catch (err) {
      ctx.stderr.write(`Error: ${toErrorMessage(err)}\n`);
      return 1;
    }

    const signal = await waitForSignal();
    ctx.stdout.write(`Received ${signal}, shutting down\n`);
    await server.stop();
    return 0;
  },
};

/**
 * Status Command: show the state of a running sandbox server.
 */

import { getSecret, loadConfig } from '../../config/loader.js';
import { createNoopLogger } from '../../logging/logger.js';
import { RemoteBackend } from '../../sandbox/remote-backend.js';
import { toErrorMessage } from '../../utils/errors.js';
import type { Command, CommandContext } from '../router.js';
import { colorContext, extractBoolFlag, extractFlag, formatTable, unknownFlag } from '../utils.js';

export const statusCommand: Command = {
  name: 'status',
  description: 'Show the status of a sandbox server',
  usage: 'deepread status [--url URL] [--json]',

  async run(ctx: CommandContext): Promise<number> {
    let argv = ctx.argv;

    const helpResult = extractBoolFlag(argv, 'help', 'h');
    if (helpResult.value) {
      ctx.stdout.write(`
Usage: ${this.usage}

Options:
      --url <url>          Server URL (default: sandbox.remote.url, http://127.0.0.1:8080)
  -c, --config <path>      Config file path (YAML)
      --json               Output raw JSON
  -h, --help               Show this help
\n`);
      return 0;
    }
    argv = helpResult.rest;

    const urlResult = extractFlag(argv, 'url');
    argv = urlResult.rest;
    const configResult = extractFlag(argv, 'config', 'c');
    argv = configResult.rest;
    const jsonResult = extractBoolFlag(argv, 'json');
    argv = jsonResult.rest;

    const flag = argv[0];
    if (flag !== undefined) {
      ctx.stderr.write(`Error: Unknown ${unknownFlag(argv) ? 'option' : 'argument'} ${flag}\n`);
      return 1;
    }

    try {
      const config = loadConfig({
        configPath: configResult.value,
        overrides: { sandbox: { remote: { url: urlResult.value } } },
      });
      const backend = new RemoteBackend({
        remote: config.sandbox.remote,
        pingTimeoutMs: config.sandbox.pingTimeoutMs,
        getVarTimeoutMs: config.sandbox.getVarTimeoutMs,
        execTimeoutMs: config.agent.execTimeoutMs,
        apiKey: getSecret(config.sandbox.remote.apiKeyEnv),
        logger: createNoopLogger(),
      });

      const status = await backend.getStatus(config.sandbox.pingTimeoutMs);

      if (jsonResult.value) {
        ctx.stdout.write(JSON.stringify(status, null, 2) + '\n');
        return status.status === 'ready' ? 0 : 1;
      }

      const c = colorContext(ctx.stdout);
      const depth =
        status.recursion_depth === undefined
          ? 'unknown'
          : `${status.recursion_depth} of ${status.max_recursion_depth ?? '?'}`;
      const rows = [
        { field: 'server', value: config.sandbox.remote.url },
        { field: 'status', value: status.status === 'ready' ? c.green(status.status) : c.red(status.status) },
        { field: 'mode', value: status.mode ?? 'unknown' },
        { field: 'context', value: status.context_info ?? '' },
        { field: 'files', value: String(status.files_indexed) },
        { field: 'depth', value: depth },
      ];
      ctx.stdout.write(`\n${formatTable(rows)}\n\n`);
      return status.status === 'ready' ? 0 : 1;
    } catch (err) {
      ctx.stderr.write(`Error: ${toErrorMessage(err)}\n`);
      return 1;
    }
  },
};

#!/usr/bin/env node
/**
 * deepread CLI: command router entry point.
 *
 * Usage:
 *   deepread "What does this do?" ./src      # Analyze a codebase (run)
 *   deepread run <query> <path> --json       # Same, machine-readable
 *   deepread serve ./docs --port 8080        # Host a sandbox over HTTP
 *   deepread status --url http://host:8080   # Inspect a sandbox server
 *   deepread image --tag deepread-sandbox    # Build the docker sandbox image
 */

import { createRouter } from './cli/router.js';
import { runCommand } from './cli/commands/run.js';
import { serveCommand } from './cli/commands/serve.js';
import { statusCommand } from './cli/commands/status.js';
import { imageCommand } from './cli/commands/image.js';

const router = createRouter('run');

router.register(runCommand);
router.register(serveCommand);
router.register(statusCommand);
router.register(imageCommand);

router.register({
  name: 'help',
  description: 'Show available commands',
  usage: 'deepread help',
  async run() {
    router.printHelp(process.stdout);
    return 0;
  },
});

const { command, rest } = router.resolve(process.argv);

command
  .run({ argv: rest, stdout: process.stdout, stderr: process.stderr })
  .then((code) => {
    if (code !== 0) process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });

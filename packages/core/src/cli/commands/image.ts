/**
 * Image Command: build the container image used by the docker sandbox runtime.
 */

import { spawn } from 'node:child_process';
import { resolve } from 'node:path';
import { loadConfig } from '../../config/loader.js';
import { toErrorMessage } from '../../utils/errors.js';
import type { Command, CommandContext } from '../router.js';
import { Spinner, extractBoolFlag, extractFlag, unknownFlag } from '../utils.js';

const OUTPUT_TAIL_LINES = 20;

interface BuildOutcome {
  code: number;
  output: string[];
}

function dockerBuild(tag: string, dir: string): Promise<BuildOutcome> {
  return new Promise((resolvePromise, reject) => {
    const output: string[] = [];
    const child = spawn('docker', ['build', '-t', tag, dir], { stdio: ['ignore', 'pipe', 'pipe'] });
    const collect = (chunk: Buffer) => {
      output.push(...chunk.toString('utf-8').split('\n').filter((line) => line.trim() !== ''));
      if (output.length > OUTPUT_TAIL_LINES) output.splice(0, output.length - OUTPUT_TAIL_LINES);
    };
    child.stdout?.on('data', collect);
    child.stderr?.on('data', collect);
    child.on('error', reject);
    child.on('close', (code) => {
      resolvePromise({ code: code ?? 1, output });
    });
  });
}

export const imageCommand: Command = {
  name: 'image',
  description: 'Build the docker sandbox image',
  usage: 'deepread image [--dir PATH] [--tag NAME]',

  async run(ctx: CommandContext): Promise<number> {
    let argv = ctx.argv;

    const helpResult = extractBoolFlag(argv, 'help', 'h');
    if (helpResult.value) {
      ctx.stdout.write(`
Usage: ${this.usage}

Options:
      --dir <path>         Directory holding the Dockerfile (default: .)
      --tag <name>         Image tag (default: sandbox.process.image)
  -c, --config <path>      Config file path (YAML)
  -h, --help               Show this help
\n`);
      return 0;
    }
    argv = helpResult.rest;

    const dirResult = extractFlag(argv, 'dir');
    argv = dirResult.rest;
    const tagResult = extractFlag(argv, 'tag');
    argv = tagResult.rest;
    const configResult = extractFlag(argv, 'config', 'c');
    argv = configResult.rest;

    const flag = argv[0];
    if (flag !== undefined) {
      ctx.stderr.write(`Error: Unknown ${unknownFlag(argv) ? 'option' : 'argument'} ${flag}\n`);
      return 1;
    }

    try {
      const config = loadConfig({ configPath: configResult.value });
      const tag = tagResult.value ?? config.sandbox.process.image;
      const dir = resolve(dirResult.value ?? '.');

      const spinner = new Spinner(ctx.stdout);
      spinner.start(`Building ${tag}`);
      const outcome = await dockerBuild(tag, dir);

      if (outcome.code !== 0) {
        spinner.stop(`docker build exited with code ${outcome.code}`, false);
        if (outcome.output.length > 0) ctx.stderr.write(outcome.output.join('\n') + '\n');
        return 1;
      }
      spinner.stop(`Built ${tag}`);
      return 0;
    } catch (err) {
      ctx.stderr.write(`Error: ${toErrorMessage(err)}\n`);
      return 1;
    }
  },
};

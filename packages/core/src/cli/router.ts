/**
 * CLI Router: maps `argv[2]` to a registered command.
 *
 * Anything that is not a known command name or alias (including flags and
 * free text) goes to the default command with the full argument list.
 */

/** Minimal writable sink; process.stdout and test buffers both fit. */
export interface Output {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface CommandContext {
  argv: string[];
  stdout: Output;
  stderr: Output;
}

export interface Command {
  name: string;
  aliases?: string[];
  description: string;
  usage: string;
  run(ctx: CommandContext): Promise<number>;
}

export interface ResolvedCommand {
  command: Command;
  rest: string[];
}

export interface Router {
  register(command: Command): void;
  resolve(argv: string[]): ResolvedCommand;
  getCommands(): Command[];
  printHelp(stream: Output): void;
}

export function createRouter(defaultCommand = 'help'): Router {
  const commands: Command[] = [];
  const byName = new Map<string, Command>();

  return {
    register(command) {
      commands.push(command);
      byName.set(command.name, command);
      for (const alias of command.aliases ?? []) {
        byName.set(alias, command);
      }
    },

    resolve(argv) {
      const args = argv.slice(2);
      const first = args[0];
      const named = first !== undefined && !first.startsWith('-') ? byName.get(first) : undefined;
      if (named) {
        return { command: named, rest: args.slice(1) };
      }

      const fallback = byName.get(defaultCommand);
      if (!fallback) {
        throw new Error(`Default command "${defaultCommand}" not registered`);
      }
      return { command: fallback, rest: args };
    },

    getCommands() {
      return [...commands];
    },

    printHelp(stream) {
      const width = Math.max(...commands.map((c) => c.name.length), 4);
      const lines = commands.map((c) => {
        const aliases = c.aliases?.length ? ` (${c.aliases.join(', ')})` : '';
        return `  ${c.name.padEnd(width)}  ${c.description}${aliases}`;
      });
      stream.write(`
deepread - recursive document and codebase analysis

Usage: deepread <command> [options]

Commands:
${lines.join('\n')}

Run "deepread <command> --help" for command options.
\n`);
    },
  };
}

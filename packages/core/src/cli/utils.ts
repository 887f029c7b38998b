/**
 * CLI Utilities: flag parsing, color output, progress and tables.
 */

import type { Output } from './router.js';

// ─── ANSI Color Support ──────────────────────────────────────────────────────

const ANSI_RESET = '\x1b[0m';
const ANSI_BOLD = '\x1b[1m';
const ANSI_DIM = '\x1b[2m';
const ANSI_RED = '\x1b[31m';
const ANSI_GREEN = '\x1b[32m';
const ANSI_YELLOW = '\x1b[33m';
const ANSI_CYAN = '\x1b[36m';

/** True when the stream is a TTY and NO_COLOR is unset. */
function isColorStream(stream: Output): boolean {
  return !process.env.NO_COLOR && stream.isTTY === true;
}

/**
 * Color helpers bound to the given stream. Plain text when the stream is not
 * a TTY or `NO_COLOR` is set.
 */
export function colorContext(stream: Output) {
  const enabled = isColorStream(stream);
  const wrap = (code: string) => (text: string) => (enabled ? `${code}${text}${ANSI_RESET}` : text);
  return {
    green: wrap(ANSI_GREEN),
    red: wrap(ANSI_RED),
    yellow: wrap(ANSI_YELLOW),
    dim: wrap(ANSI_DIM),
    bold: wrap(ANSI_BOLD),
    cyan: wrap(ANSI_CYAN),
  };
}

// ─── Progress Spinner ────────────────────────────────────────────────────────

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

/**
 * Minimal TTY spinner for long-running commands.
 *
 * On non-TTY streams `start()` is silent and `stop()` prints one summary
 * line, so pipes and CI logs never receive control characters.
 */
export class Spinner {
  private frame = 0;
  private timer: ReturnType<typeof setInterval> | undefined;
  private readonly tty: boolean;
  private running = false;

  constructor(private readonly stream: Output) {
    this.tty = isColorStream(stream);
  }

  start(message: string): void {
    if (!this.tty) return;
    this.running = true;
    this.frame = 0;
    this.stream.write(`  ${SPINNER_FRAMES[0] ?? ''} ${message}`);
    this.timer = setInterval(() => {
      this.frame = (this.frame + 1) % SPINNER_FRAMES.length;
      this.stream.write(`\r  ${SPINNER_FRAMES[this.frame] ?? ''} ${message}`);
    }, 80);
  }

  stop(finalMessage: string, success = true): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    const mark = success ? '✓' : '✗';
    if (this.tty && this.running) {
      const color = success ? ANSI_GREEN : ANSI_RED;
      this.stream.write(`\r  ${color}${mark}${ANSI_RESET} ${finalMessage}\n`);
    } else {
      this.stream.write(`  ${mark} ${finalMessage}\n`);
    }
    this.running = false;
  }
}

// ─── Flags ───────────────────────────────────────────────────────────────────

/** Extract a --flag value pair from argv, returning value and remaining args. */
export function extractFlag(
  argv: string[],
  flag: string,
  alias?: string
): { value: string | undefined; rest: string[] } {
  const rest: string[] = [];
  let value: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if ((arg === `--${flag}` || (alias && arg === `-${alias}`)) && i + 1 < argv.length) {
      value = argv[++i];
    } else if (arg !== undefined) {
      rest.push(arg);
    }
  }
  return { value, rest };
}

/** Extract a boolean --flag from argv. */
export function extractBoolFlag(
  argv: string[],
  flag: string,
  alias?: string
): { value: boolean; rest: string[] } {
  const rest: string[] = [];
  let value = false;
  for (const arg of argv) {
    if (arg === `--${flag}` || (alias && arg === `-${alias}`)) {
      value = true;
    } else {
      rest.push(arg);
    }
  }
  return { value, rest };
}

/**
 * Extract a positive integer --flag. `value` is undefined when absent;
 * a present but invalid value is reported through `error`.
 */
export function extractIntFlag(
  argv: string[],
  flag: string,
  alias?: string
): { value: number | undefined; rest: string[]; error?: string } {
  const { value: raw, rest } = extractFlag(argv, flag, alias);
  if (raw === undefined) return { value: undefined, rest };

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    return { value: undefined, rest, error: `--${flag} must be a positive integer, got "${raw}"` };
  }
  return { value, rest };
}

/** Arguments that are not flags, in order. */
export function positionals(argv: string[]): string[] {
  return argv.filter((arg) => !arg.startsWith('-'));
}

/** The first leftover flag, if any. */
export function unknownFlag(argv: string[]): string | undefined {
  return argv.find((arg) => arg.startsWith('-'));
}

// ─── Tables ──────────────────────────────────────────────────────────────────

/** Format rows as aligned columns. */
export function formatTable(rows: Record<string, string>[], columns?: string[]): string {
  const first = rows[0];
  if (!first) return '(no results)';

  const cols = columns ?? Object.keys(first);
  const widths = cols.map((col) => Math.max(col.length, ...rows.map((r) => (r[col] ?? '').length)));
  const pad = (text: string, i: number) => text.padEnd(widths[i] ?? 0);

  const header = cols.map((col, i) => pad(col.toUpperCase(), i)).join('  ');
  const separator = widths.map((width) => '─'.repeat(width)).join('  ');
  const body = rows.map((row) => cols.map((col, i) => pad(row[col] ?? '', i)).join('  '));

  return [header, separator, ...body].join('\n');
}

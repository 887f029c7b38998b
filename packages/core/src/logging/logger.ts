/**
 * Logger for deepread
 *
 * - Automatic secret redaction in log output
 * - Structured JSON format for machine parsing
 * - Correlation ID propagation across a run and its sub-queries
 * - No console.log in library code: all output through pino
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';
import { sanitizeForLogging } from '../utils/crypto.js';
import type { LoggingConfig } from '@deepread/shared';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

export interface LogContext {
  correlationId?: string;
  component?: string;
  depth?: number;
  [key: string]: unknown;
}

export interface SecureLogger {
  trace(msg: string, context?: LogContext): void;
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(context: LogContext): SecureLogger;
  level: LogLevel;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function createPinoOptions(config: LoggingConfig): LoggerOptions {
  return {
    level: config.level,

    serializers: {
      err: pino.stdSerializers.err,
    },

    timestamp: pino.stdTimeFunctions.isoTime,

    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        hostname: bindings.hostname,
        name: 'deepread',
      }),
    },

    redact: {
      paths: [
        'password',
        'secret',
        'token',
        'apiKey',
        'api_key',
        'authorization',
        'Authorization',
        '*.password',
        '*.secret',
        '*.token',
        '*.apiKey',
        '*.api_key',
        'headers.authorization',
        'headers["x-api-key"]',
      ],
      censor: '[REDACTED]',
    },
  };
}

/**
 * Transport targets for the configured outputs.
 *
 * A lone json-stdout or stderr output is written by pino directly without a
 * worker thread; see createLogger.
 */
function createTransport(
  config: LoggingConfig
): pino.TransportMultiOptions | pino.TransportSingleOptions | undefined {
  const targets: pino.TransportTargetOptions[] = [];

  for (const output of config.output) {
    if (output.type === 'stdout') {
      if (output.format === 'pretty') {
        targets.push({
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
          level: config.level,
        });
      } else {
        targets.push({ target: 'pino/file', options: { destination: 1 }, level: config.level });
      }
    } else if (output.type === 'stderr') {
      targets.push({ target: 'pino/file', options: { destination: 2 }, level: config.level });
    } else {
      targets.push({
        target: 'pino/file',
        options: {
          destination: output.path,
          mkdir: true,
        },
        level: config.level,
      });
    }
  }

  if (targets.length === 0) {
    return undefined;
  }

  if (targets.length === 1) {
    return targets[0];
  }

  return { targets };
}

function toLogFields(value: unknown): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    for (const [key, entry] of Object.entries(value)) {
      fields[key] = entry;
    }
  }
  return fields;
}

/**
 * Wrapper around pino that scrubs context before it is written.
 */
class SecureLoggerImpl implements SecureLogger {
  private readonly pino: PinoLogger;
  private readonly defaultContext: LogContext;

  constructor(pino: PinoLogger, defaultContext: LogContext = {}) {
    this.pino = pino;
    this.defaultContext = defaultContext;
  }

  get level(): LogLevel {
    return isLogLevel(this.pino.level) ? this.pino.level : 'info';
  }

  private sanitizeContext(context?: LogContext): Record<string, unknown> {
    return toLogFields(sanitizeForLogging({ ...this.defaultContext, ...context }));
  }

  trace(msg: string, context?: LogContext): void {
    this.pino.trace(this.sanitizeContext(context), msg);
  }

  debug(msg: string, context?: LogContext): void {
    this.pino.debug(this.sanitizeContext(context), msg);
  }

  info(msg: string, context?: LogContext): void {
    this.pino.info(this.sanitizeContext(context), msg);
  }

  warn(msg: string, context?: LogContext): void {
    this.pino.warn(this.sanitizeContext(context), msg);
  }

  error(msg: string, context?: LogContext): void {
    this.pino.error(this.sanitizeContext(context), msg);
  }

  fatal(msg: string, context?: LogContext): void {
    this.pino.fatal(this.sanitizeContext(context), msg);
  }

  child(context: LogContext): SecureLogger {
    return new SecureLoggerImpl(this.pino, { ...this.defaultContext, ...context });
  }
}

/**
 * Create a logger instance.
 *
 * When `destination` is given every line is written to it as JSON and the
 * configured outputs are ignored.
 */
export function createLogger(
  config: LoggingConfig,
  destination?: pino.DestinationStream
): SecureLogger {
  const options = createPinoOptions(config);

  if (destination) {
    return new SecureLoggerImpl(pino(options, destination));
  }

  const [only] = config.output;
  if (config.output.length === 1 && only) {
    if (only.type === 'stdout' && only.format === 'json') {
      return new SecureLoggerImpl(pino(options));
    }
    if (only.type === 'stderr') {
      return new SecureLoggerImpl(pino(options, pino.destination(2)));
    }
  }

  const transport = createTransport(config);
  const pinoLogger = transport ? pino(options, pino.transport(transport)) : pino(options);
  return new SecureLoggerImpl(pinoLogger);
}

let globalLogger: SecureLogger | null = null;

export function initializeLogger(config: LoggingConfig): SecureLogger {
  globalLogger = createLogger(config);
  return globalLogger;
}

/**
 * Get the global logger instance
 * Throws if not initialized
 */
export function getLogger(): SecureLogger {
  if (!globalLogger) {
    throw new Error('Logger not initialized. Call initializeLogger() first.');
  }
  return globalLogger;
}

export function isLoggerInitialized(): boolean {
  return globalLogger !== null;
}

/**
 * Create a no-op logger that silently discards all messages.
 */
export function createNoopLogger(): SecureLogger {
  const noop: SecureLogger = {
    trace: () => {},
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    fatal: () => {},
    child: () => noop,
    level: 'info',
  };
  return noop;
}

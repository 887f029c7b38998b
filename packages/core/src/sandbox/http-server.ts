/**
 * HTTP Sandbox Server
 *
 * Serves one ExecutionEnvironment over HTTP for the remote backend.
 * State-changing calls are serialized so at most one cell runs at a time.
 */

import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { SecureLogger } from '../logging/logger.js';
import { secureCompare } from '../utils/crypto.js';
import { sendError, toErrorMessage } from '../utils/errors.js';
import { DEFAULT_EXEC_TIMEOUT_MS, type ExecutionEnvironment } from './environment.js';

const ExecuteBodySchema = z.object({
  code: z.string(),
  timeout_ms: z.number().int().positive().optional(),
});

const GetVarBodySchema = z.object({
  name: z.string().min(1),
});

export interface SandboxServerOptions {
  environment: ExecutionEnvironment;
  logger: SecureLogger;
  /** When set, every request must carry it in `X-API-Key`. */
  apiKey?: string;
  execTimeoutMs?: number;
  bodyLimitBytes?: number;
}

function validationMessage(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.') || 'body'}: ${e.message}`).join('; ');
}

export class SandboxServer {
  private readonly app: FastifyInstance;
  private readonly environment: ExecutionEnvironment;
  private readonly logger: SecureLogger;
  private readonly execTimeoutMs: number;
  private pending: Promise<unknown> = Promise.resolve();
  private initialized = false;

  constructor(private readonly options: SandboxServerOptions) {
    this.environment = options.environment;
    this.logger = options.logger.child({ component: 'SandboxServer' });
    this.execTimeoutMs = options.execTimeoutMs ?? DEFAULT_EXEC_TIMEOUT_MS;

    this.app = Fastify({
      logger: false,
      trustProxy: false,
      bodyLimit: options.bodyLimitBytes ?? 10 * 1024 * 1024,
    });
  }

  /** Fastify instance, for `inject` in tests. */
  getApp(): FastifyInstance {
    return this.app;
  }

  init(): void {
    if (this.initialized) return;
    this.initialized = true;

    const apiKey = this.options.apiKey;
    if (apiKey) {
      this.app.addHook('onRequest', async (request, reply) => {
        const provided = request.headers['x-api-key'];
        if (typeof provided !== 'string' || !secureCompare(provided, apiKey)) {
          this.logger.warn('Rejected request with invalid API key', {
            url: request.url,
            ip: request.ip,
          });
          return sendError(reply, 401, 'Invalid or missing API key');
        }
      });
    }

    this.app.addHook('onResponse', async (request, reply) => {
      this.logger.debug('Request completed', {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTimeMs: Math.round(reply.elapsedTime),
      });
    });

    this.registerRoutes();
  }

  /** Run `fn` after every earlier state-changing request has finished. */
  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.pending.then(fn, fn);
    this.pending = run.catch(() => undefined);
    return run;
  }

  private registerRoutes(): void {
    const env = this.environment;

    this.app.get('/status', async () => ({
      status: 'ready',
      mode: env.mode,
      context_info: env.contextInfo,
      files_indexed: env.filesIndexed,
      recursion_depth: env.recursion.currentDepth,
      max_recursion_depth: env.recursion.maxDepth,
    }));

    this.app.post('/execute', async (request: FastifyRequest, reply: FastifyReply) => {
      const body = ExecuteBodySchema.safeParse(request.body);
      if (!body.success) {
        return sendError(reply, 400, validationMessage(body.error));
      }
      const { code, timeout_ms: timeoutMs = this.execTimeoutMs } = body.data;
      return this.exclusive(() => env.execute(code, timeoutMs));
    });

    this.app.get(
      '/files',
      async (request: FastifyRequest<{ Querystring: { pattern?: string } }>) => ({
        files: env.listFiles(request.query.pattern || '*'),
      })
    );

    this.app.get(
      '/file/*',
      async (request: FastifyRequest<{ Params: { '*': string } }>, reply: FastifyReply) => {
        const path = request.params['*'];
        const content = env.readFile(path);
        if (content === null) {
          return sendError(reply, 404, `File not found: ${path}`);
        }
        return { path, content };
      }
    );

    this.app.post('/reindex', async () => ({
      files_indexed: await this.exclusive(() => env.reindex()),
    }));

    this.app.post('/get_var', async (request: FastifyRequest, reply: FastifyReply) => {
      const body = GetVarBodySchema.safeParse(request.body);
      if (!body.success) {
        return sendError(reply, 400, validationMessage(body.error));
      }
      const { name } = body.data;
      const lookup = await this.exclusive(async () => env.getVariable(name));
      return lookup.found
        ? { success: true, value: lookup.value }
        : { success: false, error: `Variable '${name}' not found` };
    });

    this.app.post('/reset', async () => {
      await this.exclusive(async () => env.reset());
      return { status: 'reset' };
    });

    this.app.setErrorHandler((error, _request, reply) => {
      this.logger.error('Request failed', { error: toErrorMessage(error) });
      const statusCode = error.statusCode ?? 500;
      return sendError(reply, statusCode, statusCode < 500 ? error.message : 'Internal server error');
    });
  }

  async start(host: string, port: number): Promise<string> {
    this.init();
    const address = await this.app.listen({ host, port });
    this.logger.info('Sandbox server started', {
      url: address,
      mode: this.environment.mode,
      auth: Boolean(this.options.apiKey),
      context: this.environment.contextInfo,
    });
    return address;
  }

  async stop(): Promise<void> {
    await this.app.close();
    this.logger.info('Sandbox server stopped');
  }
}

/**
 * Configuration Types for deepread
 *
 * Security considerations:
 * - Secret values are never stored in config, only references (env vars)
 * - All paths are validated to prevent path traversal
 * - Timeouts and limits have maximum bounds
 */

import { z } from 'zod';

// Safe path validation (no path traversal)
const SafePathSchema = z.string()
  .min(1)
  .max(4096)
  .refine(
    (path) => !path.includes('..') && !path.includes('\0'),
    { message: 'Path contains forbidden characters' }
  );

// Environment variable reference (for secrets)
const EnvVarRefSchema = z.string()
  .regex(/^[A-Z][A-Z0-9_]*$/, 'Must be a valid environment variable name');

// Logging configuration
export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  output: z.array(z.discriminatedUnion('type', [
    z.object({
      type: z.literal('file'),
      path: SafePathSchema,
    }),
    z.object({
      type: z.literal('stdout'),
      format: z.enum(['json', 'pretty']).default('pretty'),
    }),
    // Used by the REPL child: stdout carries the wire protocol only
    z.object({
      type: z.literal('stderr'),
    }),
  ])).default([{ type: 'stdout', format: 'pretty' }]),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// Model/LLM configuration (any OpenAI-compatible chat-completions endpoint)
export const ModelConfigSchema = z.object({
  model: z.string().min(1).default('openai/gpt-4o-mini'),
  baseUrl: z.string().url().default('https://openrouter.ai/api/v1'),
  apiKeyEnv: EnvVarRefSchema.default('OPENROUTER_API_KEY'),

  temperature: z.number().min(0).max(2).default(0.7),
  maxTokens: z.number().int().positive().max(200000).optional(),

  // Generous: a completion for a large prompt can take minutes
  requestTimeoutMs: z.number().int().positive().max(600000).default(180000),
});

export type ModelConfig = z.infer<typeof ModelConfigSchema>;

// Agent loop configuration
export const AgentConfigSchema = z.object({
  maxTurns: z.number().int().positive().max(200).default(15),
  truncationLimit: z.number().int().positive().max(1000000).default(2000),
  maxRecursionDepth: z.number().int().min(0).max(10).default(3),
  execTimeoutMs: z.number().int().positive().max(3600000).default(120000),
});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;

const ProcessSandboxConfigSchema = z.object({
  runtime: z.enum(['node', 'docker']).default('node'),
  image: z.string().min(1).default('deepread-sandbox'),
  containerName: z.string().regex(/^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/).default('deepread-sandbox-instance'),
  readyTimeoutMs: z.number().int().positive().max(600000).default(30000),
  shutdownGraceMs: z.number().int().positive().max(60000).default(5000),
  queueCapacity: z.number().int().positive().max(100000).default(1000),
}).default({});

const RemoteSandboxConfigSchema = z.object({
  url: z.string().url().default('http://127.0.0.1:8080'),
  apiKeyEnv: EnvVarRefSchema.default('DEEPREAD_SANDBOX_KEY'),
  readyRetries: z.number().int().positive().max(1000).default(30),
  pollIntervalMs: z.number().int().positive().max(60000).default(1000),
  // Any call may fan out into nested LLM sub-queries on the server
  requestTimeoutMs: z.number().int().positive().max(3600000).default(300000),
}).default({});

// Sandbox (execution backend) configuration
export const SandboxConfigSchema = z.object({
  // 'inprocess' runs model-written code inside the orchestrator: trusted input only
  backend: z.enum(['process', 'remote', 'inprocess']).default('process'),
  pingTimeoutMs: z.number().int().positive().max(60000).default(5000),
  getVarTimeoutMs: z.number().int().positive().max(60000).default(10000),
  process: ProcessSandboxConfigSchema,
  remote: RemoteSandboxConfigSchema,
});

export type SandboxConfig = z.infer<typeof SandboxConfigSchema>;

// HTTP sandbox server configuration
export const ServerConfigSchema = z.object({
  host: z.string().default('127.0.0.1'),
  port: z.number().int().min(1).max(65535).default(8080),
  apiKeyEnv: EnvVarRefSchema.default('DEEPREAD_SANDBOX_KEY'),
  bodyLimitBytes: z.number().int().positive().max(100 * 1024 * 1024).default(10 * 1024 * 1024),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

// Complete configuration schema
export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  logging: LoggingConfigSchema.default({}),
  model: ModelConfigSchema.default({}),
  agent: AgentConfigSchema.default({}),
  sandbox: SandboxConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

// Partial config for merging (all fields optional)
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.input<typeof PartialConfigSchema>;

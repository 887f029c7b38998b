/**
 * Shared Types - Main Export
 *
 * Re-exports all shared types for convenient importing
 */

// Configuration types
export {
  LoggingConfigSchema,
  ModelConfigSchema,
  AgentConfigSchema,
  SandboxConfigSchema,
  ServerConfigSchema,
  ConfigSchema,
  PartialConfigSchema,
  type LoggingConfig,
  type ModelConfig,
  type AgentConfig,
  type SandboxConfig,
  type ServerConfig,
  type Config,
  type PartialConfig,
} from './config.js';

// LLM types
export {
  ChatRoleSchema,
  ChatMessageSchema,
  type ChatRole,
  type ChatMessage,
  type ChatOptions,
} from './ai.js';

// Sandbox types
export {
  ExecutionResultSchema,
  FileIndexEntrySchema,
  ReadyMessageSchema,
  ReplCommandSchema,
  FailureResponseSchema,
  GetVarResponseSchema,
  ListVarsResponseSchema,
  ReindexResponseSchema,
  MessageResponseSchema,
  type ExecutionResult,
  type FileIndexEntry,
  type ContextMode,
  type VariableLookup,
  type ReadyMessage,
  type ReplCommand,
  type GetVarResponse,
  type ReplResponse,
} from './sandbox.js';

/**
 * @deepread/core
 *
 * Recursive analysis of large documents and codebases: an LLM writes
 * JavaScript that runs in a persistent sandbox holding the context, and may
 * delegate sub-questions to nested analyses.
 */

// Agent
export {
  AgentLoop,
  DEFAULT_MAX_TURNS,
  DEFAULT_TRUNCATION_LIMIT,
  STARTUP_FAILED_ANSWER,
  stringifyValue,
  type AgentLoopOptions,
  type BackendFactory,
  type RunRequest,
  type RunResult,
  type RunStatus,
} from './agent/loop.js';

export {
  resolveContextSource,
  getContextStats,
  countLines,
  countWords,
  type ContextSource,
  type ContextStats,
} from './agent/context-source.js';

export {
  extractCodeBlock,
  extractCodeBlocks,
  detectFinal,
  truncate,
  formatResult,
  previewText,
  type FinalKind,
  type FinalMarker,
} from './agent/parser.js';

export { buildSystemPrompt, CONTINUE_NUDGE } from './agent/prompts.js';

// LLM
export { OpenAICompatibleClient, type LLMClient } from './ai/client.js';
export {
  LLMTransportError,
  RateLimitError,
  InvalidResponseError,
  ProviderUnavailableError,
  AuthenticationError,
} from './ai/errors.js';

// Sandbox
export * from './sandbox/index.js';

// Configuration
export {
  loadConfig,
  loadEnvConfig,
  mergeConfigs,
  getSecret,
  requireSecret,
  validateSecrets,
  DEFAULT_CONFIG_PATHS,
  type LoadConfigOptions,
} from './config/loader.js';

// Logging
export {
  createLogger,
  createNoopLogger,
  initializeLogger,
  getLogger,
  isLoggerInitialized,
  type SecureLogger,
  type LogContext,
  type LogLevel,
} from './logging/logger.js';

// Utilities
export { secureCompare, uuidv7, sanitizeForLogging } from './utils/crypto.js';
export { toErrorMessage, ConfigurationError, sendError } from './utils/errors.js';

export * from '@deepread/shared';

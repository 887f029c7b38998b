export {
  SandboxStartupError,
  failedResult,
  type ExecutionBackend,
  type SessionState,
} from './types.js';

export {
  ExecutionEnvironment,
  OutputBuffer,
  serializeValue,
  MAX_OUTPUT_CHARS,
  DEFAULT_EXEC_TIMEOUT_MS,
  HELPER_NAMES,
  type EnvironmentOptions,
} from './environment.js';

export { FileIndex, MAX_SEARCH_MATCHES, type SearchMatch } from './file-index.js';

export {
  rootContext,
  nestedContext,
  canDescend,
  contextFromEnv,
  contextToEnv,
  createLlmQuery,
  llmSubQuery,
  configuredSubQuery,
  depthExhaustedMessage,
  DEPTH_ENV,
  MAX_DEPTH_ENV,
  type RecursionContext,
  type SubQuery,
  type LlmQuery,
  type RecursionGateOptions,
} from './recursion-gate.js';

export { AsyncLineQueue } from './message-queue.js';
export { rewriteCell } from './cell-rewrite.js';
export { ProcessBackend, buildSpawnPlan, type ProcessBackendOptions, type SpawnPlan } from './process-backend.js';
export { RemoteBackend, RemoteStatusSchema, type RemoteBackendOptions, type RemoteStatus } from './remote-backend.js';
export { InProcessBackend } from './inprocess-backend.js';
export { SandboxServer, type SandboxServerOptions } from './http-server.js';
export { createBackend, type BackendTarget } from './factory.js';
export { handleCommand, DEFAULT_CONTEXT_PATH } from './repl-server.js';

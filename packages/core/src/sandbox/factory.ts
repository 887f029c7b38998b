/**
 * Picks the execution backend named by `sandbox.backend`.
 */

import type { Config, ContextMode } from '@deepread/shared';
import { getSecret } from '../config/loader.js';
import type { SecureLogger } from '../logging/logger.js';
import { InProcessBackend } from './inprocess-backend.js';
import { ProcessBackend } from './process-backend.js';
import { configuredSubQuery, type RecursionContext } from './recursion-gate.js';
import { RemoteBackend } from './remote-backend.js';
import type { ExecutionBackend } from './types.js';

export interface BackendTarget {
  mode: ContextMode;
  contextPath: string;
  recursion: RecursionContext;
}

export async function createBackend(
  config: Config,
  target: BackendTarget,
  logger: SecureLogger
): Promise<ExecutionBackend> {
  const { sandbox, agent, model } = config;

  switch (sandbox.backend) {
    case 'process':
      return new ProcessBackend({
        ...target,
        sandbox,
        execTimeoutMs: agent.execTimeoutMs,
        apiKeyEnv: model.apiKeyEnv,
        logger,
      });

    case 'remote':
      return new RemoteBackend({
        remote: sandbox.remote,
        pingTimeoutMs: sandbox.pingTimeoutMs,
        getVarTimeoutMs: sandbox.getVarTimeoutMs,
        execTimeoutMs: agent.execTimeoutMs,
        apiKey: getSecret(sandbox.remote.apiKeyEnv),
        logger,
      });

    case 'inprocess':
      return InProcessBackend.create(
        {
          ...target,
          subQuery: configuredSubQuery(model, logger),
          subQueryTimeoutMs: model.requestTimeoutMs,
          logger,
        },
        agent.execTimeoutMs
      );
  }
}

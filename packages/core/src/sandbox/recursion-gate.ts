/**
 * Recursion Gate
 *
 * Bounds nested `llm_query` sub-queries. Depth travels as an immutable
 * RecursionContext: every environment is bound to one, and each sub-query
 * is issued with the nested context. Nothing is shared between runs, so
 * there is nothing to restore when a call fails.
 *
 * Refusals and failures are returned as text starting with "Error", never
 * thrown, so the executed code can inspect them.
 */

import type { ModelConfig } from '@deepread/shared';
import { OpenAICompatibleClient, type LLMClient } from '../ai/client.js';
import { getSecret } from '../config/loader.js';
import type { SecureLogger } from '../logging/logger.js';
import { toErrorMessage } from '../utils/errors.js';

export interface RecursionContext {
  readonly currentDepth: number;
  readonly maxDepth: number;
}

export const DEPTH_ENV = 'DEEPREAD_RECURSION_DEPTH';
export const MAX_DEPTH_ENV = 'DEEPREAD_MAX_RECURSION_DEPTH';

export function rootContext(maxDepth: number): RecursionContext {
  return { currentDepth: 0, maxDepth };
}

export function nestedContext(context: RecursionContext): RecursionContext {
  return { currentDepth: context.currentDepth + 1, maxDepth: context.maxDepth };
}

export function canDescend(context: RecursionContext): boolean {
  return context.currentDepth < context.maxDepth;
}

function parseDepth(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = parseInt(raw, 10);
  return Number.isInteger(value) && value >= 0 ? value : undefined;
}

/** Read the starting context handed to a sandbox process. */
export function contextFromEnv(
  env: NodeJS.ProcessEnv,
  defaultMaxDepth: number
): RecursionContext {
  return {
    currentDepth: parseDepth(env[DEPTH_ENV]) ?? 0,
    maxDepth: parseDepth(env[MAX_DEPTH_ENV]) ?? defaultMaxDepth,
  };
}

export function contextToEnv(context: RecursionContext): Record<string, string> {
  return {
    [DEPTH_ENV]: String(context.currentDepth),
    [MAX_DEPTH_ENV]: String(context.maxDepth),
  };
}

/** Performs one sub-query at the given (already nested) depth. */
export type SubQuery = (prompt: string, context: RecursionContext, model?: string) => Promise<string>;

/** A sub-query that is one chat completion with the prompt as the only message. */
export function llmSubQuery(llm: LLMClient): SubQuery {
  return (prompt, _context, model) =>
    llm.chat([{ role: 'user', content: prompt }], model ? { model } : {});
}

/**
 * Sub-query against the configured model. Without an API key every call
 * answers with an error string.
 */
export function configuredSubQuery(model: ModelConfig, logger?: SecureLogger): SubQuery {
  const apiKey = getSecret(model.apiKeyEnv);
  if (!apiKey) {
    return async () => `Error: ${model.apiKeyEnv} not set in environment`;
  }
  return llmSubQuery(new OpenAICompatibleClient(model, apiKey, logger));
}

export type LlmQuery = (prompt: string, model?: string) => Promise<string>;

export interface RecursionGateOptions {
  context: RecursionContext;
  subQuery: SubQuery;
  /** Listing of available files, prepended to every prompt in directory mode. */
  fileSummary?: () => string;
  timeoutMs?: number;
  logger?: SecureLogger;
}

export function depthExhaustedMessage(maxDepth: number): string {
  return `Error: Maximum recursion depth (${maxDepth}) reached. Cannot make more llm_query calls.`;
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number | undefined): Promise<T> {
  if (timeoutMs === undefined) return promise;
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Build the `llm_query` callable injected into an environment.
 */
export function createLlmQuery(options: RecursionGateOptions): LlmQuery {
  const { context, subQuery, fileSummary, timeoutMs, logger } = options;

  return async (prompt: string, model?: string): Promise<string> => {
    if (!canDescend(context)) {
      logger?.warn('Sub-query refused at maximum depth', { depth: context.currentDepth });
      return depthExhaustedMessage(context.maxDepth);
    }

    const nested = nestedContext(context);
    const fullPrompt = fileSummary ? `${fileSummary()}\n\n${String(prompt)}` : String(prompt);

    logger?.debug('Issuing sub-query', { depth: nested.currentDepth, model });
    try {
      return await withTimeout(subQuery(fullPrompt, nested, model), timeoutMs);
    } catch (error) {
      logger?.warn('Sub-query failed', { depth: nested.currentDepth, error: toErrorMessage(error) });
      return `Error making LLM request: ${toErrorMessage(error)}`;
    }
  };
}

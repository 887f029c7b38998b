/**
 * Agent Loop
 *
 * Drives one analysis run: the model reasons, writes code, sees the result,
 * and repeats until it emits a final marker or the turn budget runs out.
 *
 * Code in a response runs before its final marker is evaluated, because a
 * FINAL_VAR may name a variable that code just created. The backend session
 * is stopped on every exit path.
 */

import type { ChatMessage, ChatOptions } from '@deepread/shared';
import type { LLMClient } from '../ai/client.js';
import type { SecureLogger } from '../logging/logger.js';
import type { ExecutionBackend } from '../sandbox/types.js';
import { uuidv7 } from '../utils/crypto.js';
import { toErrorMessage } from '../utils/errors.js';
import { getContextStats, type ContextSource } from './context-source.js';
import { detectFinal, extractCodeBlock, formatResult, previewText, truncate } from './parser.js';
import { CONTINUE_NUDGE, buildSystemPrompt } from './prompts.js';

export type RunStatus = 'final' | 'final_var' | 'exhausted' | 'startup_failed';

export interface RunResult {
  answer: string;
  status: RunStatus;
  /** Turns completed, including the one that produced the answer. */
  turns: number;
}

export interface RunRequest {
  query: string;
  context: ContextSource;
  /** Free-form description shown to the model, e.g. "research paper". */
  contextType?: string;
}

export type BackendFactory = (context: ContextSource) => Promise<ExecutionBackend>;

export interface AgentLoopOptions {
  llm: LLMClient;
  createBackend: BackendFactory;
  logger: SecureLogger;
  maxTurns?: number;
  truncationLimit?: number;
  /** Forwarded to every root chat call. */
  chatOptions?: ChatOptions;
}

export const DEFAULT_MAX_TURNS = 15;
export const DEFAULT_TRUNCATION_LIMIT = 2000;
export const STARTUP_FAILED_ANSWER = 'Error: Failed to start sandbox';

const CODE_PREVIEW_CHARS = 300;

/** Text form of a variable's value: strings as-is, everything else as JSON. */
export function stringifyValue(value: unknown): string {
  if (typeof value === 'string') return value;
  return JSON.stringify(value) ?? String(value);
}

export class AgentLoop {
  private readonly llm: LLMClient;
  private readonly createBackend: BackendFactory;
  private readonly maxTurns: number;
  private readonly truncationLimit: number;
  private readonly chatOptions: ChatOptions;
  private readonly logger: SecureLogger;
  private history: ChatMessage[] = [];
  private turnCount = 0;

  constructor(options: AgentLoopOptions) {
    this.llm = options.llm;
    this.createBackend = options.createBackend;
    this.maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
    this.truncationLimit = options.truncationLimit ?? DEFAULT_TRUNCATION_LIMIT;
    this.chatOptions = options.chatOptions ?? {};
    this.logger = options.logger.child({ component: 'AgentLoop' });
  }

  /** Copy of the conversation from the latest run. */
  getHistory(): ChatMessage[] {
    return this.history.map((message) => ({ ...message }));
  }

  getTurnCount(): number {
    return this.turnCount;
  }

  /**
   * Run one query to completion. Model transport failures propagate to the
   * caller; everything that happens inside the sandbox is fed back as data.
   */
  async run(request: RunRequest): Promise<RunResult> {
    const contextType = request.contextType ?? (request.context.kind === 'directory' ? 'codebase' : 'text document');
    const logger = this.logger.child({ correlationId: uuidv7() });
    this.history = [];
    this.turnCount = 0;

    logger.info('Run starting', {
      query: previewText(request.query, 200),
      context: request.context.path,
      kind: request.context.kind,
      maxTurns: this.maxTurns,
    });

    const stats = await getContextStats(request.context);
    logger.info('Context stats', { ...stats });

    const backend = await this.createBackend(request.context);
    try {
      if (!(await backend.start())) {
        logger.error('Sandbox did not become ready');
        return { answer: STARTUP_FAILED_ANSWER, status: 'startup_failed', turns: 0 };
      }

      this.history = [
        { role: 'system', content: buildSystemPrompt(stats, contextType) },
        { role: 'user', content: `Query: ${request.query}` },
      ];

      return await this.turns(backend, logger);
    } finally {
      logger.info('Stopping sandbox');
      await backend.stop().catch((error: unknown) => {
        logger.warn('Sandbox stop failed', { error: toErrorMessage(error) });
      });
    }
  }

  private async turns(backend: ExecutionBackend, logger: SecureLogger): Promise<RunResult> {
    let response = '';

    for (let turn = 1; turn <= this.maxTurns; turn++) {
      this.turnCount = turn;
      logger.info('Turn starting', { turn, maxTurns: this.maxTurns });

      response = await this.llm.chat([...this.history], this.chatOptions);
      logger.debug('Model response', { turn, preview: previewText(response) });

      const code = extractCodeBlock(response);
      const marker = detectFinal(response);

      if (code) {
        logger.debug('Executing code', { turn, preview: previewText(code, CODE_PREVIEW_CHARS) });
        const result = await backend.execCode(code);
        const formatted = formatResult(result);
        const truncated = truncate(formatted, this.truncationLimit);
        logger.info('Execution finished', {
          turn,
          success: result.success,
          chars: formatted.length,
        });

        if (marker.isFinal) {
          if (marker.kind === 'FINAL_VAR') {
            const lookup = await backend.getVariable(marker.content);
            if (lookup.found) {
              return this.finish(logger, stringifyValue(lookup.value), 'final_var');
            }
            return this.finish(
              logger,
              `Variable '${marker.content}' not found. Last execution output:\n${truncated}`,
              'final_var'
            );
          }
          return this.finish(logger, marker.content, 'final');
        }

        this.history.push(
          { role: 'assistant', content: response },
          { role: 'user', content: `Execution Result:\n${truncated}` }
        );
        continue;
      }

      if (marker.isFinal) {
        if (marker.kind === 'FINAL_VAR') {
          const lookup = await backend.getVariable(marker.content);
          return this.finish(
            logger,
            lookup.found
              ? stringifyValue(lookup.value)
              : `Error: Variable '${marker.content}' not found`,
            'final_var'
          );
        }
        return this.finish(logger, marker.content, 'final');
      }

      logger.debug('No code block, treating as reasoning step', { turn });
      this.history.push(
        { role: 'assistant', content: response },
        { role: 'user', content: CONTINUE_NUDGE }
      );
    }

    logger.warn('Turn budget exhausted', { maxTurns: this.maxTurns });
    return {
      answer: `Error: Maximum turns reached without final answer. Last response:\n${response}`,
      status: 'exhausted',
      turns: this.turnCount,
    };
  }

  private finish(logger: SecureLogger, answer: string, status: RunStatus): RunResult {
    logger.info('Final answer detected', { status, turns: this.turnCount, chars: answer.length });
    return { answer, status, turns: this.turnCount };
  }
}

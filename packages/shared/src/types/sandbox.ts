/**
 * Sandbox Types
 *
 * Execution results, the directory file index, and the newline-delimited JSON
 * protocol spoken between the orchestrator and a REPL child process.
 */

import { z } from 'zod';

// ─── Execution ────────────────────────────────────────────────

export const ExecutionResultSchema = z.object({
  success: z.boolean(),
  output: z.string().default(''),
  error: z.string().nullable().default(null),
});

export type ExecutionResult = z.infer<typeof ExecutionResultSchema>;

export const FileIndexEntrySchema = z.object({
  path: z.string(),
  size: z.number().int().nonnegative(),
  type: z.string(),
});

export type FileIndexEntry = z.infer<typeof FileIndexEntrySchema>;

export type ContextMode = 'file' | 'directory';

/**
 * Result of a namespace lookup. A bound `null` and an unbound name are
 * different outcomes.
 */
export type VariableLookup = { found: true; value: unknown } | { found: false };

// ─── REPL wire protocol (one JSON object per line) ────────────

export const ReadyMessageSchema = z.object({
  status: z.literal('ready'),
  message: z.string().default(''),
  context_info: z.string().default(''),
});

export type ReadyMessage = z.infer<typeof ReadyMessageSchema>;

export const ReplCommandSchema = z.discriminatedUnion('action', [
  z.object({
    action: z.literal('execute'),
    code: z.string(),
    timeout_ms: z.number().int().positive().optional(),
  }),
  z.object({ action: z.literal('get_var'), name: z.string() }),
  z.object({ action: z.literal('list_vars') }),
  z.object({ action: z.literal('reindex') }),
  z.object({ action: z.literal('ping') }),
  z.object({ action: z.literal('shutdown') }),
]);

export type ReplCommand = z.infer<typeof ReplCommandSchema>;

export const FailureResponseSchema = z.object({
  success: z.literal(false),
  error: z.string(),
});

export const GetVarResponseSchema = z.union([
  z.object({ success: z.literal(true), value: z.unknown() }),
  FailureResponseSchema,
]);

export type GetVarResponse = z.infer<typeof GetVarResponseSchema>;

export const ListVarsResponseSchema = z.object({
  success: z.literal(true),
  variables: z.record(z.string(), z.string()),
});

export const ReindexResponseSchema = z.object({
  success: z.literal(true),
  files_indexed: z.number().int().nonnegative(),
});

export const MessageResponseSchema = z.object({
  success: z.boolean(),
  message: z.string().optional(),
});

export type ReplResponse =
  | ExecutionResult
  | GetVarResponse
  | z.infer<typeof ListVarsResponseSchema>
  | z.infer<typeof ReindexResponseSchema>
  | z.infer<typeof MessageResponseSchema>
  | z.infer<typeof FailureResponseSchema>;

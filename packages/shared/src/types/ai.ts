/**
 * LLM conversation types.
 */

import { z } from 'zod';

export const ChatRoleSchema = z.enum(['system', 'user', 'assistant']);

export type ChatRole = z.infer<typeof ChatRoleSchema>;

export const ChatMessageSchema = z.object({
  role: ChatRoleSchema,
  content: z.string(),
});

export type ChatMessage = z.infer<typeof ChatMessageSchema>;

/** Per-call overrides for a chat completion. */
export interface ChatOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

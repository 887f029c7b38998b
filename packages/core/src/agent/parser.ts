/**
 * Response Parser
 *
 * Extracts executable code and termination markers from raw model text,
 * and bounds execution output before it is fed back into the conversation.
 *
 * Marker grammar:
 *   FINAL(<text>)           text answer, content ends at the first `)`
 *   FINAL_VAR(<identifier>) answer held in a sandbox variable
 *
 * A marker counts only at the start of a line or after whitespace, with the
 * `(` directly after the keyword, so "FINALLY" and "FINAL ANSWER:" never
 * match. FINAL_VAR wins when both are present. A FINAL whose content is
 * blank is ignored.
 */

import type { ExecutionResult } from '@deepread/shared';

export type FinalKind = 'FINAL' | 'FINAL_VAR';

export type FinalMarker =
  | { isFinal: true; kind: FinalKind; content: string }
  | { isFinal: false };

const TAGGED_FENCE = /```(?:javascript|js)\s*\n([\s\S]*?)```/g;
const UNTAGGED_FENCE = /```\s*\n([\s\S]*?)```/g;

const FINAL_VAR_PATTERN = /(?:^|\s)FINAL_VAR\(([A-Za-z_$][\w$]*)\)/m;
// Content stops at the first `)`, so answers containing parentheses are cut short
const FINAL_PATTERN = /(?:^|\s)FINAL\(([^)]+)\)/m;

const TRUNCATION_NOTICE = /\n\n\.\.\. \[Output truncated\. Total length: \d+ chars\]$/;

/**
 * All fenced code fragments, trimmed. JavaScript-tagged fences are used when
 * any exist; otherwise untagged fences.
 */
export function extractCodeBlocks(text: string): string[] {
  let blocks = [...text.matchAll(TAGGED_FENCE)].map((m) => m[1] ?? '');
  if (blocks.length === 0) {
    blocks = [...text.matchAll(UNTAGGED_FENCE)].map((m) => m[1] ?? '');
  }
  return blocks.map((block) => block.trim());
}

export function extractCodeBlock(text: string): string | null {
  return extractCodeBlocks(text)[0] ?? null;
}

export function detectFinal(text: string): FinalMarker {
  const finalVar = FINAL_VAR_PATTERN.exec(text);
  if (finalVar?.[1]) {
    return { isFinal: true, kind: 'FINAL_VAR', content: finalVar[1] };
  }

  const content = FINAL_PATTERN.exec(text)?.[1]?.trim();
  if (content) {
    return { isFinal: true, kind: 'FINAL', content };
  }

  return { isFinal: false };
}

/**
 * Bound `text` to `limit` characters plus a trailing notice carrying the
 * original length. The cut backs up to a newline when one falls in the last
 * 30% of the kept prefix. Already-truncated text is returned unchanged.
 */
export function truncate(text: string, limit: number): string {
  if (text.length <= limit) {
    return text;
  }

  const notice = TRUNCATION_NOTICE.exec(text);
  if (notice && notice.index <= limit) {
    return text;
  }

  let kept = text.slice(0, limit);
  const lastNewline = kept.lastIndexOf('\n');
  if (lastNewline > limit * 0.7) {
    kept = kept.slice(0, lastNewline);
  }

  return `${kept}\n\n... [Output truncated. Total length: ${text.length} chars]`;
}

/**
 * Render an execution result as markdown for the conversation history.
 */
export function formatResult(result: ExecutionResult): string {
  const parts: string[] = [];

  if (result.output) {
    parts.push(`**Output:**\n\`\`\`\n${result.output}\n\`\`\``);
  }

  if (result.error) {
    const heading = result.success ? 'Stderr' : 'Error';
    parts.push(`**${heading}:**\n\`\`\`\n${result.error}\n\`\`\``);
  }

  if (parts.length === 0) {
    parts.push(
      result.success
        ? '*(Code executed successfully with no output)*'
        : '*(Execution failed with no output)*'
    );
  }

  return parts.join('\n\n');
}

/** Response text for log lines: blank runs collapsed, cut at `maxLength`. */
export function previewText(text: string, maxLength = 500): string {
  const cleaned = text.replace(/\n{3,}/g, '\n\n').trim();
  if (cleaned.length <= maxLength) {
    return cleaned;
  }
  return `${cleaned.slice(0, maxLength)}...`;
}

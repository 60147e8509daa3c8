/**
 * Rendering and token costing of log messages
 */

import type { ChatMessage, MessageRole } from "./types.js";

// Fixed estimator: ~4 characters per token
export const CHARS_PER_TOKEN = 4;

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/** UTC "YYYY-MM-DD HH:mm" */
export function formatTimestamp(ms: number): string {
  return new Date(ms).toISOString().slice(0, 16).replace("T", " ");
}

export function roleLabel(role: MessageRole): string {
  switch (role) {
    case "user":
      return "User";
    case "assistant":
      return "Assistant";
    case "system":
      return "System";
  }
}

/**
 * Line a message occupies in the live context window. Its length is what the
 * window selector pays for, so metadata counts against the budget too.
 */
export function renderMessageLine(message: ChatMessage): string {
  let header = `[${formatTimestamp(message.createdAt)}] ${roleLabel(message.role)}`;
  if (message.kind !== "text") {
    header += ` (${message.kind})`;
  }
  if (message.replyToSnippet) {
    header += ` [reply to: "${message.replyToSnippet}"]`;
  }
  return `${header}: ${message.content}`;
}

export function messageCost(message: ChatMessage): number {
  return estimateTokens(renderMessageLine(message));
}

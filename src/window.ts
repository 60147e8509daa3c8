/**
 * Active window selection: the longest tail of a chat's log that fits a
 * token budget, plus the buffer statistics that drive archiving.
 */

import { messageCost } from "./format.js";
import { truncateContent } from "./sanitize.js";
import type { MessageLog } from "./storage/message-log.js";
import type { ChatMessage, ContextMemoryConfig } from "./types.js";

export interface WindowSelection {
  /** Chronological; content already truncated */
  messages: ChatMessage[];
  totalTokens: number;
  startId: number | null;
}

export interface WindowStats {
  windowTokens: number;
  windowCount: number;
  windowStartId: number | null;
  bufferTokens: number;
  bufferCount: number;
  bufferFirstId: number | null;
  bufferLastId: number | null;
  lastArchivedId: number;
  newestMessageAt: number | null;
}

interface CostedMessage {
  message: ChatMessage;
  tokens: number;
}

/**
 * Walk newest → oldest and keep messages while they fit. The newest message
 * is kept even when it alone exceeds the budget. Returns how many of the
 * candidates were taken and their total cost.
 */
export function fitWindow(newestFirst: readonly CostedMessage[], targetTokens: number): { count: number; tokens: number } {
  let count = 0;
  let tokens = 0;
  for (const candidate of newestFirst) {
    if (count > 0 && tokens + candidate.tokens > targetTokens) break;
    tokens += candidate.tokens;
    count++;
  }
  return { count, tokens };
}

export class WindowSelector {
  constructor(
    private readonly messages: MessageLog,
    private readonly options: ContextMemoryConfig["window"],
  ) {}

  /** Message with oversized content cut down, and its rendered token cost. */
  cost(message: ChatMessage): CostedMessage {
    const content = truncateContent(message.content, {
      maxChars: this.options.maxMessageChars,
      headRatio: this.options.headRatio,
      tailRatio: this.options.tailRatio,
    });
    const truncated = content === message.content ? message : { ...message, content };
    return { message: truncated, tokens: messageCost(truncated) };
  }

  /**
   * `afterId` is an exclusive floor, normally the chat's last folded id, so
   * messages already compacted into the profile never re-enter the window.
   */
  async select(chatId: string, targetTokens: number, opts: { afterId?: number } = {}): Promise<WindowSelection> {
    const recent = await this.messages.listRecent(chatId, this.options.candidateCap, opts.afterId ?? 0);
    const costed = recent.map((message) => this.cost(message));
    const { count, tokens } = fitWindow(costed, targetTokens);

    const selected = costed
      .slice(0, count)
      .map((c) => c.message)
      .reverse();
    return { messages: selected, totalTokens: tokens, startId: selected[0]?.id ?? null };
  }

  async selectWindow(chatId: string, targetTokens: number, opts: { afterId?: number } = {}): Promise<ChatMessage[]> {
    return (await this.select(chatId, targetTokens, opts)).messages;
  }

  /**
   * Window and buffer totals from a single scan of the unarchived log.
   * Everything newer than `lastArchivedId` is either in the window or in the
   * buffer; everything at or below it is already folded.
   */
  async computeStats(chatId: string, targetTokens: number, lastArchivedId: number): Promise<WindowStats> {
    const unarchived = await this.messages.listNewestFirst(chatId, lastArchivedId);
    const costed = unarchived.map((message) => this.cost(message));

    const candidates = costed.slice(0, this.options.candidateCap);
    const { count, tokens } = fitWindow(candidates, targetTokens);

    const buffer = costed.slice(count);
    const bufferTokens = buffer.reduce((sum, c) => sum + c.tokens, 0);

    return {
      windowTokens: tokens,
      windowCount: count,
      windowStartId: count > 0 ? costed[count - 1].message.id : null,
      bufferTokens,
      bufferCount: buffer.length,
      bufferFirstId: buffer.length > 0 ? buffer[buffer.length - 1].message.id : null,
      bufferLastId: buffer.length > 0 ? buffer[0].message.id : null,
      lastArchivedId,
      newestMessageAt: costed[0]?.message.createdAt ?? null,
    };
  }
}

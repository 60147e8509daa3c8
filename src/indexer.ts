/**
 * Semantic indexer: embeds assistant replies, fused with the user turns that
 * prompted them, into the per-chat vector store.
 *
 * Each sync takes one bounded batch of anchors that have neither a vector nor
 * a skip record, so repeated syncs converge and never redo work.
 */

import type { ChatLockRegistry } from "./chat-locks.js";
import { projectEmbedding } from "./embeddings.js";
import { EmbeddingUnavailableError, type EmbeddingFailure, toEmbeddingFailure } from "./errors.js";
import { roleLabel } from "./format.js";
import { createLogger } from "./logger.js";
import { sanitizeContent, truncateContent, type TruncateOptions } from "./sanitize.js";
import type { MessageLog } from "./storage/message-log.js";
import type { SettingsStore } from "./storage/settings-store.js";
import type { VectorStore } from "./storage/vector-store.js";
import type { ChatMessage, ContextMemoryConfig, EmbeddingProvider } from "./types.js";

const log = createLogger("indexer");

export type IndexOutcome =
  | { status: "indexed"; indexed: number; skipped: number; remaining: boolean }
  | { status: "up_to_date" }
  | { status: "cooldown"; retryAt: number }
  | { status: "in_flight" }
  | { status: "stale" }
  | { status: "failed"; error: EmbeddingFailure };

export interface SemanticIndexerDeps {
  messages: MessageLog;
  vectors: VectorStore;
  settings: SettingsStore;
  locks: ChatLockRegistry;
  embedder: EmbeddingProvider;
  config: Pick<ContextMemoryConfig, "embedding" | "indexing" | "window">;
  now?: () => number;
}

interface PreparedAnchor {
  id: number;
  text: string;
}

export class SemanticIndexer {
  private readonly failedAt = new Map<string, number>();
  private readonly inFlight = new Map<string, Promise<IndexOutcome>>();
  private readonly now: () => number;

  constructor(private readonly deps: SemanticIndexerDeps) {
    this.now = deps.now ?? Date.now;
  }

  /**
   * Text embedded for an anchor: the contiguous run of user messages right
   * before it (up to the fusion depth), then the reply itself. Each part is
   * cut to the per-message ceiling. Empty when the reply has nothing left
   * after sanitization.
   */
  async fuse(anchor: ChatMessage): Promise<string> {
    const reply = this.clean(anchor.content);
    if (!reply) return "";

    const preceding = await this.deps.messages.listBefore(
      anchor.chatId,
      anchor.id,
      this.deps.config.indexing.fusionDepth,
    );
    const prompts: string[] = [];
    for (const message of preceding) {
      if (message.role !== "user") break;
      const text = this.clean(message.content);
      if (text) prompts.push(`${roleLabel("user")}: ${text}`);
    }

    return [...prompts.reverse(), `${roleLabel("assistant")}: ${reply}`].join("\n");
  }

  private clean(content: string): string {
    const { maxMessageChars, headRatio, tailRatio } = this.deps.config.window;
    const truncate: TruncateOptions = { maxChars: maxMessageChars, headRatio, tailRatio };
    return truncateContent(sanitizeContent(content), truncate);
  }

  /** Milliseconds left in the chat's failure cooldown, 0 when not cooling down. */
  async cooldownRemaining(chatId: string): Promise<number> {
    const failed = this.failedAt.get(chatId);
    if (failed === undefined) return 0;
    const { indexCooldownSeconds } = await this.deps.settings.load();
    return Math.max(0, failed + indexCooldownSeconds * 1000 - this.now());
  }

  async syncChat(chatId: string): Promise<IndexOutcome> {
    if (this.inFlight.has(chatId)) return { status: "in_flight" };

    const run = this.runSync(chatId);
    this.inFlight.set(chatId, run);
    try {
      return await run;
    } finally {
      this.inFlight.delete(chatId);
    }
  }

  /** Sync every chat with pending anchors, a few chats at a time. */
  async syncPending(maxChats = 100): Promise<Map<string, IndexOutcome>> {
    const chatIds = await this.deps.messages.listChatsWithUnindexedAnchors(maxChats);
    const outcomes = new Map<string, IndexOutcome>();
    const concurrency = this.deps.config.indexing.concurrency;

    for (let i = 0; i < chatIds.length; i += concurrency) {
      const group = chatIds.slice(i, i + concurrency);
      const results = await Promise.all(group.map((chatId) => this.syncChat(chatId)));
      group.forEach((chatId, j) => outcomes.set(chatId, results[j]));
    }
    return outcomes;
  }

  /** Drop vectors and skips for a message and the reply whose fused text may contain it. */
  async invalidateMessage(chatId: string, messageId: number): Promise<void> {
    const ids = [messageId];
    const nextReply = await this.deps.messages.nextAssistantAfter(chatId, messageId);
    if (nextReply) ids.push(nextReply.id);
    await this.deps.vectors.forget(chatId, ids);
  }

  async clearChat(chatId: string): Promise<number> {
    const removed = await this.deps.vectors.clearChat(chatId);
    this.failedAt.delete(chatId);
    log.info(`Cleared ${removed} vectors for chat ${chatId}`);
    return removed;
  }

  async clearAll(): Promise<number> {
    const removed = await this.deps.vectors.clearAll();
    this.failedAt.clear();
    log.info(`Cleared ${removed} vectors across all chats`);
    return removed;
  }

  /**
   * Clear a chat's vectors and index it again from scratch. A sync already
   * running for the chat is waited out, both before the clear and whenever a
   * batch here collides with one.
   */
  async rebuildChat(chatId: string): Promise<IndexOutcome> {
    await this.settle(chatId);
    await this.deps.locks.runExclusive(chatId, () => this.clearChat(chatId));
    let indexed = 0;
    let skipped = 0;
    for (;;) {
      const outcome = await this.syncChat(chatId);
      if (outcome.status === "in_flight") {
        await this.settle(chatId);
        continue;
      }
      if (outcome.status !== "indexed") {
        return outcome.status === "up_to_date" && indexed + skipped > 0
          ? { status: "indexed", indexed, skipped, remaining: false }
          : outcome;
      }
      indexed += outcome.indexed;
      skipped += outcome.skipped;
      if (!outcome.remaining) return { status: "indexed", indexed, skipped, remaining: false };
    }
  }

  private async runSync(chatId: string): Promise<IndexOutcome> {
    const remainingMs = await this.cooldownRemaining(chatId);
    if (remainingMs > 0) return { status: "cooldown", retryAt: this.now() + remainingMs };

    return this.deps.locks.withLease(chatId, (epoch) => this.runBatch(chatId, epoch));
  }

  private async settle(chatId: string): Promise<void> {
    let awaited: Promise<IndexOutcome> | undefined;
    for (let run = this.inFlight.get(chatId); run !== undefined && run !== awaited; run = this.inFlight.get(chatId)) {
      awaited = run;
      await run;
    }
  }

  private async runBatch(chatId: string, epoch: number): Promise<IndexOutcome> {
    const { batchSize } = this.deps.config.indexing;
    const anchors = await this.deps.messages.listUnindexedAnchors(chatId, batchSize);
    if (anchors.length === 0) return { status: "up_to_date" };

    const prepared: PreparedAnchor[] = [];
    const empty: number[] = [];
    for (const anchor of anchors) {
      const text = await this.fuse(anchor);
      if (text) prepared.push({ id: anchor.id, text });
      else empty.push(anchor.id);
    }

    let entries: Array<{ messageId: number; embedding: number[] }>;
    try {
      entries = await this.embed(prepared);
    } catch (err) {
      const error = toEmbeddingFailure(err);
      this.failedAt.set(chatId, this.now());
      log.warn(`Indexing chat ${chatId} failed, cooling down: ${error.message}`);
      return { status: "failed", error };
    }

    const committed = await this.deps.locks.runExclusive(chatId, async () => {
      if (!this.deps.locks.isCurrent(chatId, epoch)) return false;
      await this.deps.vectors.insertMany(chatId, entries);
      await this.deps.vectors.markSkipped(chatId, empty, "empty", this.now());
      return true;
    });
    if (!committed) {
      log.info(`Discarded index batch for reset chat ${chatId}`);
      return { status: "stale" };
    }

    this.failedAt.delete(chatId);
    log.debug(`Indexed chat ${chatId}: ${entries.length} vectors, ${empty.length} skipped`);
    return {
      status: "indexed",
      indexed: entries.length,
      skipped: empty.length,
      remaining: anchors.length === batchSize,
    };
  }

  private async embed(prepared: PreparedAnchor[]): Promise<Array<{ messageId: number; embedding: number[] }>> {
    if (prepared.length === 0) return [];

    const { embedder } = this.deps;
    const raw = await embedder.embedBatch(prepared.map((p) => p.text));
    if (raw.length !== prepared.length) {
      throw new EmbeddingUnavailableError(`${embedder.id} returned ${raw.length} vectors for ${prepared.length} texts`);
    }

    const { dimensions, allowTruncation } = this.deps.config.embedding;
    return prepared.map((anchor, i) => {
      const projected = projectEmbedding(raw[i], dimensions, embedder.truncatable || allowTruncation);
      if (!projected.ok) throw projected.error;
      return { messageId: anchor.id, embedding: projected.value };
    });
  }
}

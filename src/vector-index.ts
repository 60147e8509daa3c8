/**
 * Per-chat HNSW candidate index (usearch)
 *
 * SQLite stays the source of truth for vectors. Large chats get an in-memory
 * HNSW graph built from their stored vectors on first search and dropped on
 * any write, so it never serves stale candidates.
 */

import { Index, MetricKind, ScalarKind } from "usearch";
import { createLogger } from "./logger.js";

const log = createLogger("vector-index");

export interface StoredVector {
  messageId: number;
  embedding: Float32Array;
}

interface ChatAnnEntry {
  index: Index;
  vectors: Map<number, Float32Array>;
  lastUsedAt: number;
}

export class ChatAnnIndexCache {
  private readonly entries = new Map<string, ChatAnnEntry>();

  constructor(
    private readonly dimensions: number,
    private readonly maxChats = 32,
  ) {}

  /**
   * Approximate nearest message ids for `query`, together with the exact
   * stored vectors of every indexed message of the chat.
   */
  candidates(
    chatId: string,
    load: () => StoredVector[],
    query: Float32Array,
    k: number,
  ): { ids: number[]; vectors: Map<number, Float32Array> } {
    const entry = this.entries.get(chatId) ?? this.build(chatId, load());
    entry.lastUsedAt = Date.now();

    if (entry.vectors.size === 0) return { ids: [], vectors: entry.vectors };

    const limit = Math.max(1, Math.min(Math.floor(k), entry.vectors.size));
    const t0 = performance.now();
    const results = entry.index.search(query, limit, 0);
    const ids: number[] = [];
    for (let i = 0; i < results.keys.length; i++) {
      ids.push(Number(results.keys[i]));
    }
    log.debug(`HNSW search chat=${chatId}: k=${limit}, returned=${ids.length}, took=${(performance.now() - t0).toFixed(2)}ms`);
    return { ids, vectors: entry.vectors };
  }

  invalidate(chatId: string): void {
    this.entries.delete(chatId);
  }

  clear(): void {
    this.entries.clear();
  }

  size(): number {
    return this.entries.size;
  }

  private build(chatId: string, stored: StoredVector[]): ChatAnnEntry {
    const index = new Index({
      metric: MetricKind.Cos,
      dimensions: this.dimensions,
      connectivity: 16,
      quantization: ScalarKind.F32,
      expansion_add: 128,
      expansion_search: 64,
      multi: false,
    });
    const vectors = new Map<number, Float32Array>();

    const t0 = performance.now();
    for (const { messageId, embedding } of stored) {
      if (embedding.length !== this.dimensions) {
        log.warn(`Skipping vector for message ${messageId}: expected ${this.dimensions} dims, got ${embedding.length}`);
        continue;
      }
      index.add(BigInt(messageId), embedding);
      vectors.set(messageId, embedding);
    }
    log.info(`Built HNSW for chat ${chatId}: ${vectors.size} vectors in ${(performance.now() - t0).toFixed(1)}ms`);

    const entry: ChatAnnEntry = { index, vectors, lastUsedAt: Date.now() };
    this.entries.set(chatId, entry);
    this.evictOverflow();
    return entry;
  }

  private evictOverflow(): void {
    while (this.entries.size > this.maxChats) {
      let oldestKey: string | undefined;
      let oldestAt = Infinity;
      for (const [key, entry] of this.entries) {
        if (entry.lastUsedAt < oldestAt) {
          oldestAt = entry.lastUsedAt;
          oldestKey = key;
        }
      }
      if (oldestKey === undefined) return;
      this.entries.delete(oldestKey);
    }
  }
}

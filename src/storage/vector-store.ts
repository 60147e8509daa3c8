/**
 * Vector entries keyed by anchor message id, stored as float32 BLOBs.
 */

import type { MemoryDatabase } from "./database.js";
import { countRowSchema, vectorRowSchema } from "./schema.js";
import type { ChatAnnIndexCache, StoredVector } from "../vector-index.js";

export interface VectorMatch {
  messageId: number;
  /** Cosine distance: 0 identical, 1 orthogonal, 2 opposite */
  distance: number;
}

export interface VectorSearchOptions {
  topK: number;
  maxDistance: number;
  excludeIds?: ReadonlySet<number>;
}

export function embeddingToBuffer(embedding: ArrayLike<number>): Buffer {
  const floats = Float32Array.from(embedding);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

export function bufferToEmbedding(buffer: Buffer): Float32Array {
  // Copy so the view is 4-byte aligned regardless of the Buffer's pool offset
  return new Float32Array(new Uint8Array(buffer).buffer);
}

export function cosineDistance(a: ArrayLike<number>, b: ArrayLike<number>): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 1;
  return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export class VectorStore {
  constructor(
    private readonly db: MemoryDatabase,
    private readonly dimensions: number,
    private readonly ann?: {
      cache: ChatAnnIndexCache;
      threshold: number;
      candidateMultiplier: number;
    },
  ) {}

  /** Insert vectors; ids that already have one are left untouched. Returns the number inserted. */
  async insertMany(chatId: string, entries: Array<{ messageId: number; embedding: number[] }>): Promise<number> {
    for (const entry of entries) {
      if (entry.embedding.length !== this.dimensions) {
        throw new RangeError(
          `Vector for message ${entry.messageId} has ${entry.embedding.length} dims, store expects ${this.dimensions}`,
        );
      }
    }

    const insert = this.db.prepare(`INSERT OR IGNORE INTO vector_index (message_id, embedding) VALUES (?, ?)`);
    const insertAll = this.db.transaction((rows: Array<{ messageId: number; embedding: number[] }>) => {
      let inserted = 0;
      for (const row of rows) {
        inserted += insert.run(row.messageId, embeddingToBuffer(row.embedding)).changes;
      }
      return inserted;
    });

    const inserted = insertAll(entries);
    if (inserted > 0) this.ann?.cache.invalidate(chatId);
    return inserted;
  }

  async markSkipped(chatId: string, messageIds: number[], reason: string, now = Date.now()): Promise<number> {
    const insert = this.db.prepare(
      `INSERT OR IGNORE INTO vector_skip (message_id, chat_id, reason, skipped_at) VALUES (?, ?, ?, ?)`,
    );
    const insertAll = this.db.transaction((ids: number[]) => {
      let inserted = 0;
      for (const id of ids) inserted += insert.run(id, chatId, reason, now).changes;
      return inserted;
    });
    return insertAll(messageIds);
  }

  /** Drop vectors and skip records for specific messages so they get re-indexed. */
  async forget(chatId: string, messageIds: number[]): Promise<number> {
    if (messageIds.length === 0) return 0;
    const deleteVector = this.db.prepare(`DELETE FROM vector_index WHERE message_id = ?`);
    const deleteSkip = this.db.prepare(`DELETE FROM vector_skip WHERE message_id = ?`);
    const forgetAll = this.db.transaction((ids: number[]) => {
      let removed = 0;
      for (const id of ids) {
        removed += deleteVector.run(id).changes;
        deleteSkip.run(id);
      }
      return removed;
    });
    const removed = forgetAll(messageIds);
    this.ann?.cache.invalidate(chatId);
    return removed;
  }

  async has(messageId: number): Promise<boolean> {
    return this.db.prepare(`SELECT 1 FROM vector_index WHERE message_id = ?`).get(messageId) !== undefined;
  }

  async countForChat(chatId: string): Promise<number> {
    return this.countChat(chatId);
  }

  async clearChat(chatId: string): Promise<number> {
    const clear = this.db.transaction((id: string) => {
      const removed = this.db
        .prepare(`DELETE FROM vector_index WHERE message_id IN (SELECT id FROM messages WHERE chat_id = ?)`)
        .run(id).changes;
      this.db.prepare(`DELETE FROM vector_skip WHERE chat_id = ?`).run(id);
      return removed;
    });
    const removed = clear(chatId);
    this.ann?.cache.invalidate(chatId);
    return removed;
  }

  async clearAll(): Promise<number> {
    const clear = this.db.transaction(() => {
      const removed = this.db.prepare(`DELETE FROM vector_index`).run().changes;
      this.db.prepare(`DELETE FROM vector_skip`).run();
      return removed;
    });
    const removed = clear();
    this.ann?.cache.clear();
    return removed;
  }

  /**
   * Nearest anchors of a chat with distance < maxDistance, ordered by
   * (distance, message id). Distances are always computed exactly; the HNSW
   * index, when a chat is large enough to use it, only narrows the candidates.
   */
  async search(chatId: string, query: number[], options: VectorSearchOptions): Promise<VectorMatch[]> {
    if (options.topK <= 0) return [];
    const excluded = options.excludeIds ?? new Set<number>();
    const queryVector = Float32Array.from(query);

    let candidates: Iterable<[number, Float32Array]>;
    const total = this.countChat(chatId);
    if (total === 0) return [];

    if (this.ann && total > this.ann.threshold) {
      const k = (options.topK + excluded.size) * this.ann.candidateMultiplier;
      const { ids, vectors } = this.ann.cache.candidates(chatId, () => this.loadChat(chatId), queryVector, k);
      candidates = ids.flatMap((id): Array<[number, Float32Array]> => {
        const vector = vectors.get(id);
        return vector ? [[id, vector]] : [];
      });
    } else {
      candidates = this.loadChat(chatId).map((row): [number, Float32Array] => [row.messageId, row.embedding]);
    }

    const matches: VectorMatch[] = [];
    for (const [messageId, embedding] of candidates) {
      if (excluded.has(messageId)) continue;
      const distance = cosineDistance(queryVector, embedding);
      if (distance < options.maxDistance) {
        matches.push({ messageId, distance });
      }
    }

    matches.sort((a, b) => a.distance - b.distance || a.messageId - b.messageId);
    return matches.slice(0, options.topK);
  }

  private countChat(chatId: string): number {
    const row = this.db
      .prepare(
        `SELECT COUNT(*) AS n FROM vector_index v
         JOIN messages m ON m.id = v.message_id
         WHERE m.chat_id = ?`,
      )
      .get(chatId);
    return countRowSchema.parse(row).n;
  }

  private loadChat(chatId: string): StoredVector[] {
    const rows = this.db
      .prepare(
        `SELECT v.message_id, v.embedding FROM vector_index v
         JOIN messages m ON m.id = v.message_id
         WHERE m.chat_id = ?
         ORDER BY v.message_id ASC`,
      )
      .all(chatId);
    return rows.map((row) => {
      const r = vectorRowSchema.parse(row);
      return { messageId: r.message_id, embedding: bufferToEmbedding(r.embedding) };
    });
  }
}

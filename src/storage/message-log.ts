/**
 * Append-only, per-chat ordered message log
 *
 * Message ids are global SQLite rowids: increasing, but not contiguous within
 * a chat. Every neighbor lookup therefore goes by log order, never id math.
 */

import type { MemoryDatabase } from "./database.js";
import {
  chatIdRowSchema,
  countRowSchema,
  idRowSchema,
  type MessageRow,
  maxTimestampRowSchema,
  messageRowSchema,
} from "./schema.js";
import type { ChatMessage, NewChatMessage } from "../types.js";

const MESSAGE_COLUMNS =
  "id, chat_id, role, kind, content, platform_message_id, reply_to_id, reply_to_snippet, created_at";

function toMessage(row: unknown): ChatMessage {
  const r: MessageRow = messageRowSchema.parse(row);
  return {
    id: r.id,
    chatId: r.chat_id,
    role: r.role,
    kind: r.kind,
    content: r.content,
    platformMessageId: r.platform_message_id,
    replyToId: r.reply_to_id,
    replyToSnippet: r.reply_to_snippet,
    createdAt: r.created_at,
  };
}

export class MessageLog {
  constructor(private readonly db: MemoryDatabase) {}

  async append(input: NewChatMessage): Promise<ChatMessage> {
    // Keep created_at non-decreasing per chat even if the caller's clock goes backwards
    const newest = maxTimestampRowSchema.parse(
      this.db.prepare(`SELECT MAX(created_at) AS ts FROM messages WHERE chat_id = ?`).get(input.chatId),
    );
    const requested = input.createdAt ?? Date.now();
    const createdAt = Math.max(requested, newest.ts ?? 0);

    const info = this.db
      .prepare(
        `INSERT INTO messages (chat_id, role, kind, content, platform_message_id, reply_to_id, reply_to_snippet, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        input.chatId,
        input.role,
        input.kind ?? "text",
        input.content,
        input.platformMessageId ?? null,
        input.replyToId ?? null,
        input.replyToSnippet ?? null,
        createdAt,
      );

    return {
      id: Number(info.lastInsertRowid),
      chatId: input.chatId,
      role: input.role,
      kind: input.kind ?? "text",
      content: input.content,
      platformMessageId: input.platformMessageId ?? null,
      replyToId: input.replyToId ?? null,
      replyToSnippet: input.replyToSnippet ?? null,
      createdAt,
    };
  }

  async get(id: number): Promise<ChatMessage | undefined> {
    const row = this.db.prepare(`SELECT ${MESSAGE_COLUMNS} FROM messages WHERE id = ?`).get(id);
    return row === undefined ? undefined : toMessage(row);
  }

  /** Batch fetch scoped to a chat, ordered by id. Unknown ids are ignored. */
  async getMany(chatId: string, ids: number[]): Promise<ChatMessage[]> {
    if (ids.length === 0) return [];
    const unique = Array.from(new Set(ids));
    const placeholders = unique.map(() => "?").join(", ");
    const rows = this.db
      .prepare(
        `SELECT ${MESSAGE_COLUMNS} FROM messages
         WHERE chat_id = ? AND id IN (${placeholders})
         ORDER BY id ASC`,
      )
      .all(chatId, ...unique);
    return rows.map(toMessage);
  }

  /** Most recent messages, newest first, optionally above an exclusive id floor. */
  async listRecent(chatId: string, limit: number, afterId = 0): Promise<ChatMessage[]> {
    const rows = this.db
      .prepare(
        `SELECT ${MESSAGE_COLUMNS} FROM messages
         WHERE chat_id = ? AND id > ?
         ORDER BY id DESC
         LIMIT ?`,
      )
      .all(chatId, afterId, limit);
    return rows.map(toMessage);
  }

  /** Every message above the floor, newest first. */
  async listNewestFirst(chatId: string, afterId = 0): Promise<ChatMessage[]> {
    const rows = this.db
      .prepare(
        `SELECT ${MESSAGE_COLUMNS} FROM messages
         WHERE chat_id = ? AND id > ?
         ORDER BY id DESC`,
      )
      .all(chatId, afterId);
    return rows.map(toMessage);
  }

  /** Messages with afterId < id < beforeId, oldest first. */
  async listBetween(chatId: string, afterId: number, beforeId: number): Promise<ChatMessage[]> {
    const rows = this.db
      .prepare(
        `SELECT ${MESSAGE_COLUMNS} FROM messages
         WHERE chat_id = ? AND id > ? AND id < ?
         ORDER BY id ASC`,
      )
      .all(chatId, afterId, beforeId);
    return rows.map(toMessage);
  }

  /** Up to `limit` messages immediately preceding `id`, nearest first. */
  async listBefore(chatId: string, id: number, limit: number): Promise<ChatMessage[]> {
    if (limit <= 0) return [];
    const rows = this.db
      .prepare(
        `SELECT ${MESSAGE_COLUMNS} FROM messages
         WHERE chat_id = ? AND id < ?
         ORDER BY id DESC
         LIMIT ?`,
      )
      .all(chatId, id, limit);
    return rows.map(toMessage);
  }

  /** Ids of up to `padding` messages on each side of `id` (by log order), plus `id` itself. */
  async neighborIds(chatId: string, id: number, padding: number): Promise<number[]> {
    if (padding <= 0) return [id];
    const before = this.db
      .prepare(`SELECT id FROM messages WHERE chat_id = ? AND id < ? ORDER BY id DESC LIMIT ?`)
      .all(chatId, id, padding)
      .map((row) => idRowSchema.parse(row).id);
    const after = this.db
      .prepare(`SELECT id FROM messages WHERE chat_id = ? AND id > ? ORDER BY id ASC LIMIT ?`)
      .all(chatId, id, padding)
      .map((row) => idRowSchema.parse(row).id);
    return [...before.reverse(), id, ...after];
  }

  /** Assistant messages with neither a vector entry nor a skip record, oldest first. */
  async listUnindexedAnchors(chatId: string, limit: number): Promise<ChatMessage[]> {
    const rows = this.db
      .prepare(
        `SELECT m.id, m.chat_id, m.role, m.kind, m.content, m.platform_message_id,
                m.reply_to_id, m.reply_to_snippet, m.created_at
         FROM messages m
         LEFT JOIN vector_index v ON v.message_id = m.id
         LEFT JOIN vector_skip s ON s.message_id = m.id
         WHERE m.chat_id = ? AND m.role = 'assistant'
           AND v.message_id IS NULL AND s.message_id IS NULL
         ORDER BY m.id ASC
         LIMIT ?`,
      )
      .all(chatId, limit);
    return rows.map(toMessage);
  }

  /** Chats that have at least one assistant message awaiting indexing. */
  async listChatsWithUnindexedAnchors(limit: number): Promise<string[]> {
    const rows = this.db
      .prepare(
        `SELECT DISTINCT m.chat_id AS chat_id
         FROM messages m
         LEFT JOIN vector_index v ON v.message_id = m.id
         LEFT JOIN vector_skip s ON s.message_id = m.id
         WHERE m.role = 'assistant' AND v.message_id IS NULL AND s.message_id IS NULL
         LIMIT ?`,
      )
      .all(limit);
    return rows.map((row) => chatIdRowSchema.parse(row).chat_id);
  }

  /** Chats with any message newer than `sinceMs`, most recently active first. */
  async listActiveChats(sinceMs: number, limit: number): Promise<string[]> {
    const rows = this.db
      .prepare(
        `SELECT chat_id FROM messages
         WHERE created_at >= ?
         GROUP BY chat_id
         ORDER BY MAX(created_at) DESC
         LIMIT ?`,
      )
      .all(sinceMs, limit);
    return rows.map((row) => chatIdRowSchema.parse(row).chat_id);
  }

  /** First assistant message after `id` in the same chat. */
  async nextAssistantAfter(chatId: string, id: number): Promise<ChatMessage | undefined> {
    const row = this.db
      .prepare(
        `SELECT ${MESSAGE_COLUMNS} FROM messages
         WHERE chat_id = ? AND id > ? AND role = 'assistant'
         ORDER BY id ASC
         LIMIT 1`,
      )
      .get(chatId, id);
    return row === undefined ? undefined : toMessage(row);
  }

  /** Back-fill content (e.g. a transcript replacing a placeholder). Returns false for unknown ids. */
  async patchContent(id: number, content: string): Promise<boolean> {
    const info = this.db.prepare(`UPDATE messages SET content = ? WHERE id = ?`).run(content, id);
    return info.changes > 0;
  }

  async count(chatId: string): Promise<number> {
    return countRowSchema.parse(this.db.prepare(`SELECT COUNT(*) AS n FROM messages WHERE chat_id = ?`).get(chatId)).n;
  }

  /** Remove a chat's log; derived vector rows cascade through their foreign keys. */
  async deleteChat(chatId: string): Promise<number> {
    return this.db.prepare(`DELETE FROM messages WHERE chat_id = ?`).run(chatId).changes;
  }
}

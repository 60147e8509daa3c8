/**
 * Archive pointer: the compressed long-term profile of each chat and the id
 * of the last message folded into it.
 */

import type { MemoryDatabase } from "./database.js";
import { profileRowSchema } from "./schema.js";
import type { ArchivePointer } from "../types.js";

export class ProfileStore {
  constructor(private readonly db: MemoryDatabase) {}

  async get(chatId: string): Promise<ArchivePointer | undefined> {
    const row = this.db
      .prepare(`SELECT chat_id, profile_text, last_folded_id, updated_at FROM chat_profile WHERE chat_id = ?`)
      .get(chatId);
    if (row === undefined) return undefined;
    const r = profileRowSchema.parse(row);
    return { chatId: r.chat_id, profile: r.profile_text, lastFoldedId: r.last_folded_id, updatedAt: r.updated_at };
  }

  /**
   * Upsert the profile and move the pointer forward. The WHERE guard keeps
   * last_folded_id strictly increasing; a stale write changes nothing and
   * returns false.
   */
  async advance(chatId: string, profile: string, lastFoldedId: number, now = Date.now()): Promise<boolean> {
    const info = this.db
      .prepare(
        `INSERT INTO chat_profile (chat_id, profile_text, last_folded_id, updated_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(chat_id) DO UPDATE SET
           profile_text = excluded.profile_text,
           last_folded_id = excluded.last_folded_id,
           updated_at = excluded.updated_at
         WHERE excluded.last_folded_id > chat_profile.last_folded_id`,
      )
      .run(chatId, profile, lastFoldedId, now);
    return info.changes > 0;
  }

  async delete(chatId: string): Promise<boolean> {
    return this.db.prepare(`DELETE FROM chat_profile WHERE chat_id = ?`).run(chatId).changes > 0;
  }
}

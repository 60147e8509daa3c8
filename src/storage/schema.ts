/**
 * Storage schema: DDL for the message log and its derived tables,
 * plus zod schemas that validate rows on the way out of SQLite.
 */

import { z } from "zod";
import { MESSAGE_KINDS, MESSAGE_ROLES } from "../types.js";

export const SCHEMA_VERSION = 1;

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS messages (
    id                  INTEGER PRIMARY KEY AUTOINCREMENT,
    chat_id             TEXT NOT NULL,
    role                TEXT NOT NULL CHECK(role IN ('user','assistant','system')),
    kind                TEXT NOT NULL DEFAULT 'text' CHECK(kind IN ('text','voice','image')),
    content             TEXT NOT NULL,
    platform_message_id TEXT,
    reply_to_id         TEXT,
    reply_to_snippet    TEXT,
    created_at          INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_messages_chat_created ON messages(chat_id, created_at);
  CREATE INDEX IF NOT EXISTS idx_messages_chat_id ON messages(chat_id, id);

  CREATE TABLE IF NOT EXISTS chat_profile (
    chat_id        TEXT PRIMARY KEY,
    profile_text   TEXT NOT NULL DEFAULT '',
    last_folded_id INTEGER NOT NULL DEFAULT 0,
    updated_at     INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS vector_index (
    message_id INTEGER PRIMARY KEY REFERENCES messages(id) ON DELETE CASCADE,
    embedding  BLOB NOT NULL
  );

  CREATE TABLE IF NOT EXISTS vector_skip (
    message_id INTEGER PRIMARY KEY REFERENCES messages(id) ON DELETE CASCADE,
    chat_id    TEXT NOT NULL,
    reason     TEXT NOT NULL,
    skipped_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_vector_skip_chat ON vector_skip(chat_id);

  CREATE TABLE IF NOT EXISTS settings (
    key   TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS schema_meta (
    key   TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );
`;

export const messageRowSchema = z.object({
  id: z.number().int(),
  chat_id: z.string(),
  role: z.enum(MESSAGE_ROLES),
  kind: z.enum(MESSAGE_KINDS),
  content: z.string(),
  platform_message_id: z.string().nullable(),
  reply_to_id: z.string().nullable(),
  reply_to_snippet: z.string().nullable(),
  created_at: z.number().int(),
});

export type MessageRow = z.infer<typeof messageRowSchema>;

export const profileRowSchema = z.object({
  chat_id: z.string(),
  profile_text: z.string(),
  last_folded_id: z.number().int(),
  updated_at: z.number().int(),
});

export const vectorRowSchema = z.object({
  message_id: z.number().int(),
  embedding: z.instanceof(Buffer),
});

export const settingRowSchema = z.object({
  key: z.string(),
  value: z.string(),
});

export const idRowSchema = z.object({ id: z.number().int() });
export const chatIdRowSchema = z.object({ chat_id: z.string() });
export const countRowSchema = z.object({ n: z.number().int() });
export const maxTimestampRowSchema = z.object({ ts: z.number().int().nullable() });

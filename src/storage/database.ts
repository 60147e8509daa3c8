/**
 * SQLite bootstrap for the memory store
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { createLogger } from "../logger.js";
import { SCHEMA_SQL, SCHEMA_VERSION } from "./schema.js";

const log = createLogger("database");

export type MemoryDatabase = Database.Database;

export function openMemoryDatabase(path: string): MemoryDatabase {
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);
  if (path !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");
  db.exec(SCHEMA_SQL);

  db.prepare(
    `INSERT INTO schema_meta (key, value) VALUES ('version', ?)
     ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
  ).run(String(SCHEMA_VERSION));

  log.info(`Opened memory store at ${path} (schema v${SCHEMA_VERSION})`);
  return db;
}

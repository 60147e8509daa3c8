/**
 * Persisted key-value settings, read through with defaults.
 *
 * Values are edited elsewhere (dashboard, admin commands); this store only
 * parses them. A missing or malformed value falls back to its default.
 */

import { z } from "zod";
import type { MemoryDatabase } from "./database.js";
import { settingRowSchema } from "./schema.js";
import { createLogger } from "../logger.js";
import type { MemorySettings } from "../types.js";

const log = createLogger("settings");

export const SETTING_KEYS = {
  historyTokens: "history_tokens",
  archiveTriggerTokens: "archive_trigger_tokens",
  summaryIdleSeconds: "summary_idle_seconds",
  maxDistance: "max_distance",
  neighborhoodPadding: "neighborhood_padding",
  retrievalTopK: "retrieval_top_k",
  indexCooldownSeconds: "index_cooldown_seconds",
} as const satisfies Record<keyof MemorySettings, string>;

export type SettingKey = (typeof SETTING_KEYS)[keyof MemorySettings];

const positiveInt = z.coerce.number().int().positive();

type SettingSchemas = {
  [K in keyof MemorySettings]: z.ZodType<MemorySettings[K], z.ZodTypeDef, unknown>;
};

const valueSchemas: SettingSchemas = {
  historyTokens: positiveInt,
  archiveTriggerTokens: z.union([
    z
      .string()
      .trim()
      .toLowerCase()
      .refine((value) => value === "" || value === "auto")
      .transform(() => null),
    positiveInt,
  ]),
  summaryIdleSeconds: z.coerce.number().int().nonnegative(),
  maxDistance: z.coerce.number().gt(0).max(2),
  neighborhoodPadding: z.coerce.number().int().nonnegative().max(50),
  retrievalTopK: positiveInt.max(100),
  indexCooldownSeconds: z.coerce.number().int().nonnegative(),
};

export class SettingsStore {
  constructor(
    private readonly db: MemoryDatabase,
    private readonly defaults: MemorySettings,
  ) {}

  async getValue(key: string): Promise<string | undefined> {
    const row = this.db.prepare(`SELECT key, value FROM settings WHERE key = ?`).get(key);
    return row === undefined ? undefined : settingRowSchema.parse(row).value;
  }

  async setValue(key: string, value: string): Promise<void> {
    this.db
      .prepare(`INSERT INTO settings (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value`)
      .run(key, value);
  }

  async getAll(): Promise<Record<string, string>> {
    const rows = this.db.prepare(`SELECT key, value FROM settings`).all();
    const result: Record<string, string> = {};
    for (const row of rows) {
      const r = settingRowSchema.parse(row);
      result[r.key] = r.value;
    }
    return result;
  }

  /** Current settings, one read of the table, every field defaulted independently. */
  async load(): Promise<MemorySettings> {
    const raw = await this.getAll();
    return {
      historyTokens: this.read(raw, "historyTokens"),
      archiveTriggerTokens: this.read(raw, "archiveTriggerTokens"),
      summaryIdleSeconds: this.read(raw, "summaryIdleSeconds"),
      maxDistance: this.read(raw, "maxDistance"),
      neighborhoodPadding: this.read(raw, "neighborhoodPadding"),
      retrievalTopK: this.read(raw, "retrievalTopK"),
      indexCooldownSeconds: this.read(raw, "indexCooldownSeconds"),
    };
  }

  private read<K extends keyof MemorySettings>(raw: Record<string, string>, field: K): MemorySettings[K] {
    const key = SETTING_KEYS[field];
    const value = raw[key];
    if (value === undefined) return this.defaults[field];

    const parsed = valueSchemas[field].safeParse(value);
    if (!parsed.success) {
      log.warn(`Ignoring invalid setting ${key}=${JSON.stringify(value)}, using default ${this.defaults[field]}`);
      return this.defaults[field];
    }
    return parsed.data;
  }
}

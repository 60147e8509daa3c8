/**
 * Static configuration: merge caller overrides over DEFAULT_CONFIG and validate
 */

import { z } from "zod";
import { ConfigValidationError } from "./errors.js";
import { type ContextMemoryConfig, type ContextMemoryUserConfig, DEFAULT_CONFIG } from "./types.js";

const ratio = z.number().gt(0).max(0.45);
const positiveInt = z.number().int().positive();

export const settingsSchema = z.object({
  historyTokens: positiveInt,
  archiveTriggerTokens: positiveInt.nullable(),
  summaryIdleSeconds: z.number().int().nonnegative(),
  maxDistance: z.number().gt(0).max(2),
  neighborhoodPadding: z.number().int().nonnegative().max(50),
  retrievalTopK: positiveInt.max(100),
  indexCooldownSeconds: z.number().int().nonnegative(),
});

export const configSchema = z.object({
  store: z.object({ path: z.string().min(1) }),
  embedding: z.object({
    provider: z.enum(["openai", "gemini", "ollama", "auto"]),
    model: z.string().min(1),
    apiKey: z.string().optional(),
    baseUrl: z.string().url().optional(),
    dimensions: positiveInt.max(8192),
    allowTruncation: z.boolean(),
    timeoutMs: positiveInt,
    ollama: z
      .object({
        baseUrl: z.string().optional(),
        model: z.string().optional(),
      })
      .optional(),
  }),
  summary: z.object({
    model: z.string().min(1),
    apiKey: z.string().optional(),
    baseUrl: z.string().url().optional(),
    timeoutMs: positiveInt,
    temperature: z.number().min(0).max(2),
  }),
  window: z.object({
    candidateCap: positiveInt,
    maxMessageChars: z.number().int().min(1000),
    headRatio: ratio,
    tailRatio: ratio,
  }),
  archive: z.object({
    cooldownMs: z.number().int().nonnegative(),
    sweepIntervalMs: positiveInt,
    sweepLookbackMs: positiveInt,
  }),
  indexing: z.object({
    batchSize: positiveInt.max(2048),
    fusionDepth: z.number().int().nonnegative().max(20),
    intervalMs: positiveInt,
    concurrency: positiveInt.max(64),
  }),
  retrieval: z.object({ minQueryChars: z.number().int().nonnegative() }),
  vectors: z.object({
    annThreshold: z.number().int().nonnegative(),
    candidateMultiplier: positiveInt,
  }),
  locks: z.object({ idleEvictMs: positiveInt }),
  settingsDefaults: settingsSchema,
});

export function resolveConfig(userConfig?: ContextMemoryUserConfig): ContextMemoryConfig {
  const merged: ContextMemoryConfig = {
    store: { ...DEFAULT_CONFIG.store, ...userConfig?.store },
    embedding: { ...DEFAULT_CONFIG.embedding, ...userConfig?.embedding },
    summary: { ...DEFAULT_CONFIG.summary, ...userConfig?.summary },
    window: { ...DEFAULT_CONFIG.window, ...userConfig?.window },
    archive: { ...DEFAULT_CONFIG.archive, ...userConfig?.archive },
    indexing: { ...DEFAULT_CONFIG.indexing, ...userConfig?.indexing },
    retrieval: { ...DEFAULT_CONFIG.retrieval, ...userConfig?.retrieval },
    vectors: { ...DEFAULT_CONFIG.vectors, ...userConfig?.vectors },
    locks: { ...DEFAULT_CONFIG.locks, ...userConfig?.locks },
    settingsDefaults: { ...DEFAULT_CONFIG.settingsDefaults, ...userConfig?.settingsDefaults },
  };

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigValidationError(`Invalid context memory config:\n${issues.join("\n")}`, issues);
  }
  return merged;
}

/**
 * Shared fixtures: deterministic keyword embeddings, fake providers, deferreds
 */
import { vi } from "vitest";
import type { EmbeddingProvider, SummaryProvider } from "../src/types.js";

/** 2024-01-01 00:00 UTC */
export const T0 = Date.UTC(2024, 0, 1, 0, 0);

export const DIMS = 8;

// One dimension per keyword; a word counts when it starts with the keyword ("cats" → cat)
export const KEYWORDS = ["cat", "dog", "pizza", "rocket", "garden", "music", "travel", "code"] as const;

export function keywordVector(text: string): number[] {
  const words = text.toLowerCase().match(/[a-z]+/g) ?? [];
  return KEYWORDS.map((keyword) => words.filter((word) => word.startsWith(keyword)).length);
}

export function unitVector(index: number, dims = DIMS): number[] {
  const vec = new Array<number>(dims).fill(0);
  vec[index] = 1;
  return vec;
}

export function createKeywordEmbedder(truncatable = false) {
  const embedQuery = vi.fn(async (text: string) => keywordVector(text));
  const embedBatch = vi.fn(async (texts: string[]) => texts.map(keywordVector));
  const provider: EmbeddingProvider = {
    id: "keyword",
    model: "keyword-test",
    truncatable,
    embedQuery,
    embedBatch,
  };
  return { provider, embedQuery, embedBatch };
}

export function createFakeSummarizer(reply = "profile") {
  const summarize = vi.fn(async (_previous: string, _buffer: string) => reply);
  const provider: SummaryProvider = { id: "fake", summarize };
  return { provider, summarize };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
}

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

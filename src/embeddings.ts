/**
 * Embedding providers for chat memory
 * Supports OpenAI-compatible endpoints, Gemini, and Ollama
 */

import { z } from "zod";
import { EmbeddingUnavailableError, fail, IncompatibleEmbeddingError, ok, type Result } from "./errors.js";
import { createLogger, errorMessage } from "./logger.js";
import type { ContextMemoryConfig, EmbeddingProvider } from "./types.js";

const log = createLogger("embeddings");

export type EmbeddingConfig = ContextMemoryConfig["embedding"];

/** Minimal fetch signature so tests can hand in a stub. */
export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

async function postJson<T>(
  fetchImpl: FetchLike,
  label: string,
  url: string,
  headers: Record<string, string>,
  body: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  timeoutMs: number,
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  let res: Response;
  try {
    res = await fetchImpl(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body: JSON.stringify(body),
      signal: controller.signal,
    });
  } catch (err) {
    const reason = controller.signal.aborted ? `timed out after ${timeoutMs}ms` : errorMessage(err);
    throw new EmbeddingUnavailableError(`${label} request failed: ${reason}`, { cause: err });
  } finally {
    clearTimeout(timer);
  }

  if (!res.ok) {
    const text = await res.text().catch(() => "");
    throw new EmbeddingUnavailableError(`${label} failed: ${res.status} ${text}`.trim());
  }

  const parsed = schema.safeParse(await res.json().catch(() => undefined));
  if (!parsed.success) {
    throw new EmbeddingUnavailableError(`${label} returned an unexpected payload`, { cause: parsed.error });
  }
  return parsed.data;
}

const vectorSchema = z.array(z.number());

// =============================================================================
// OpenAI Embeddings
// =============================================================================

const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";

const openAiResponseSchema = z.object({
  data: z.array(z.object({ index: z.number().int().optional(), embedding: vectorSchema })),
});

/** text-embedding-3 models are Matryoshka-trained and accept a `dimensions` parameter. */
function isMatryoshkaOpenAiModel(model: string): boolean {
  return model.startsWith("text-embedding-3");
}

export async function createOpenAiEmbeddingProvider(
  config: EmbeddingConfig,
  fetchImpl: FetchLike = fetch,
): Promise<EmbeddingProvider> {
  const apiKey = config.apiKey || process.env.OPENAI_API_KEY?.trim();
  if (!apiKey) {
    throw new EmbeddingUnavailableError("No API key found for OpenAI. Set OPENAI_API_KEY environment variable.");
  }

  const baseUrl = (config.baseUrl || DEFAULT_OPENAI_BASE_URL).replace(/\/$/, "");
  const model = config.model || "text-embedding-3-small";
  const url = `${baseUrl}/embeddings`;
  const truncatable = isMatryoshkaOpenAiModel(model);

  const embed = async (input: string[]): Promise<number[][]> => {
    if (input.length === 0) return [];

    const body: Record<string, unknown> = { model, input };
    if (truncatable) body.dimensions = config.dimensions;

    const payload = await postJson(
      fetchImpl,
      "OpenAI embeddings",
      url,
      { Authorization: `Bearer ${apiKey}` },
      body,
      openAiResponseSchema,
      config.timeoutMs,
    );

    const ordered = payload.data.every((entry) => entry.index !== undefined)
      ? [...payload.data].sort((a, b) => (a.index ?? 0) - (b.index ?? 0))
      : payload.data;
    if (ordered.length !== input.length) {
      throw new EmbeddingUnavailableError(`OpenAI embeddings returned ${ordered.length} vectors for ${input.length} inputs`);
    }
    return ordered.map((entry) => entry.embedding);
  };

  return {
    id: "openai",
    model,
    truncatable,
    embedQuery: async (text) => {
      const [vec] = await embed([text]);
      return vec ?? [];
    },
    embedBatch: embed,
  };
}

// =============================================================================
// Gemini Embeddings
// =============================================================================

const DEFAULT_GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";
const DEFAULT_GEMINI_MODEL = "gemini-embedding-001";

const geminiSingleSchema = z.object({ embedding: z.object({ values: vectorSchema }) });
const geminiBatchSchema = z.object({ embeddings: z.array(z.object({ values: vectorSchema })) });

export async function createGeminiEmbeddingProvider(
  config: EmbeddingConfig,
  fetchImpl: FetchLike = fetch,
): Promise<EmbeddingProvider> {
  const apiKey = config.apiKey || process.env.GOOGLE_API_KEY?.trim() || process.env.GEMINI_API_KEY?.trim();

  if (!apiKey) {
    throw new EmbeddingUnavailableError(
      "No API key found for Gemini. Set GOOGLE_API_KEY or GEMINI_API_KEY environment variable.",
    );
  }

  const baseUrl = (config.baseUrl || DEFAULT_GEMINI_BASE_URL).replace(/\/$/, "");
  // The configured default names an OpenAI model; auto fallback lands here with it
  const model = config.model.startsWith("text-embedding-") ? DEFAULT_GEMINI_MODEL : config.model;
  const modelPath = model.startsWith("models/") ? model : `models/${model}`;
  const headers = { "x-goog-api-key": apiKey };

  const embedQuery = async (text: string): Promise<number[]> => {
    if (!text.trim()) return [];

    const payload = await postJson(
      fetchImpl,
      "Gemini embeddings",
      `${baseUrl}/${modelPath}:embedContent`,
      headers,
      {
        content: { parts: [{ text }] },
        taskType: "RETRIEVAL_QUERY",
        outputDimensionality: config.dimensions,
      },
      geminiSingleSchema,
      config.timeoutMs,
    );
    return payload.embedding.values;
  };

  const embedBatch = async (texts: string[]): Promise<number[][]> => {
    if (texts.length === 0) return [];

    const requests = texts.map((text) => ({
      model: modelPath,
      content: { parts: [{ text }] },
      taskType: "RETRIEVAL_DOCUMENT",
      outputDimensionality: config.dimensions,
    }));

    const payload = await postJson(
      fetchImpl,
      "Gemini batch embeddings",
      `${baseUrl}/${modelPath}:batchEmbedContents`,
      headers,
      { requests },
      geminiBatchSchema,
      config.timeoutMs,
    );

    if (payload.embeddings.length !== texts.length) {
      throw new EmbeddingUnavailableError(
        `Gemini batch embeddings returned ${payload.embeddings.length} vectors for ${texts.length} inputs`,
      );
    }
    return payload.embeddings.map((entry) => entry.values);
  };

  return {
    id: "gemini",
    model,
    // gemini-embedding-001 is trained with Matryoshka representation learning
    truncatable: true,
    embedQuery,
    embedBatch,
  };
}

// =============================================================================
// Ollama Embeddings
// =============================================================================

const ollamaResponseSchema = z.object({ embeddings: z.array(vectorSchema) });

export async function createOllamaEmbeddingProvider(
  config: EmbeddingConfig,
  fetchImpl: FetchLike = fetch,
): Promise<EmbeddingProvider> {
  const baseUrl = (config.ollama?.baseUrl || process.env.OLLAMA_HOST || "http://localhost:11434").replace(/\/$/, "");
  const model = config.ollama?.model || "nomic-embed-text";

  // Verify Ollama is reachable
  const healthRes = await fetchImpl(`${baseUrl}/api/tags`, { method: "GET" }).catch(() => null);
  if (!healthRes?.ok) {
    throw new EmbeddingUnavailableError(`Ollama not reachable at ${baseUrl}`);
  }

  const embed = async (input: string | string[], count: number): Promise<number[][]> => {
    const payload = await postJson(
      fetchImpl,
      "Ollama embed",
      `${baseUrl}/api/embed`,
      {},
      { model, input },
      ollamaResponseSchema,
      config.timeoutMs,
    );
    if (payload.embeddings.length !== count) {
      throw new EmbeddingUnavailableError(`Ollama returned ${payload.embeddings.length} vectors for ${count} inputs`);
    }
    return payload.embeddings;
  };

  return {
    id: "ollama",
    model,
    truncatable: false,
    embedQuery: async (text) => (await embed(text, 1))[0] ?? [],
    // Ollama /api/embed accepts input as string[] natively
    embedBatch: async (texts) => (texts.length === 0 ? [] : embed(texts, texts.length)),
  };
}

// =============================================================================
// Provider Factory
// =============================================================================

export async function createEmbeddingProvider(
  config: EmbeddingConfig,
  fetchImpl: FetchLike = fetch,
): Promise<EmbeddingProvider> {
  const provider = config.provider;

  if (provider === "openai") {
    return createOpenAiEmbeddingProvider(config, fetchImpl);
  }

  if (provider === "gemini") {
    return createGeminiEmbeddingProvider(config, fetchImpl);
  }

  if (provider === "ollama") {
    return createOllamaEmbeddingProvider(config, fetchImpl);
  }

  // Auto: try OpenAI → Gemini → Ollama
  const errors: string[] = [];

  try {
    return await createOpenAiEmbeddingProvider(config, fetchImpl);
  } catch (err) {
    errors.push(`OpenAI: ${errorMessage(err)}`);
  }

  try {
    return await createGeminiEmbeddingProvider(config, fetchImpl);
  } catch (err) {
    errors.push(`Gemini: ${errorMessage(err)}`);
  }

  try {
    return await createOllamaEmbeddingProvider(config, fetchImpl);
  } catch (err) {
    errors.push(`Ollama: ${errorMessage(err)}`);
  }

  log.error(`No embedding provider available: ${errors.join("; ")}`);
  throw new EmbeddingUnavailableError(`No embedding provider available:\n${errors.join("\n")}`);
}

// =============================================================================
// Projection to the store width
// =============================================================================

export function sanitizeAndNormalizeEmbedding(vec: readonly number[]): number[] {
  const sanitized = vec.map((value) => (Number.isFinite(value) ? value : 0));
  const magnitude = Math.sqrt(sanitized.reduce((sum, value) => sum + value * value, 0));
  if (magnitude < 1e-10) return sanitized;
  return sanitized.map((value) => value / magnitude);
}

/**
 * Fit a provider vector to the store's fixed width. Longer vectors are cut
 * to their leading dimensions and renormalized, which only preserves meaning
 * for truncatable models; shorter vectors can never be fitted.
 */
export function projectEmbedding(
  vec: readonly number[],
  dimensions: number,
  allowTruncation: boolean,
): Result<number[], IncompatibleEmbeddingError> {
  if (vec.length < dimensions) {
    return fail(
      new IncompatibleEmbeddingError(
        `Embedding has ${vec.length} dims, store expects ${dimensions}`,
        dimensions,
        vec.length,
      ),
    );
  }
  if (vec.length > dimensions && !allowTruncation) {
    return fail(
      new IncompatibleEmbeddingError(
        `Embedding has ${vec.length} dims and the provider's vectors cannot be truncated to ${dimensions}`,
        dimensions,
        vec.length,
      ),
    );
  }
  return ok(sanitizeAndNormalizeEmbedding(vec.length > dimensions ? vec.slice(0, dimensions) : vec));
}

/**
 * Embeddings tests
 *
 * Projection to the store width, plus provider request/response handling
 * against a stubbed fetch.
 */
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  createEmbeddingProvider,
  createGeminiEmbeddingProvider,
  createOllamaEmbeddingProvider,
  createOpenAiEmbeddingProvider,
  type EmbeddingConfig,
  projectEmbedding,
  sanitizeAndNormalizeEmbedding,
} from "../../src/embeddings.js";
import { EmbeddingUnavailableError, IncompatibleEmbeddingError } from "../../src/errors.js";
import { DEFAULT_CONFIG } from "../../src/types.js";

function makeConfig(overrides: Partial<EmbeddingConfig> = {}): EmbeddingConfig {
  return { ...DEFAULT_CONFIG.embedding, ...overrides };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function requestBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
}

beforeEach(() => {
  vi.stubEnv("OPENAI_API_KEY", "");
  vi.stubEnv("GOOGLE_API_KEY", "");
  vi.stubEnv("GEMINI_API_KEY", "");
  vi.stubEnv("OLLAMA_HOST", "");
});

afterEach(() => {
  vi.unstubAllEnvs();
});

// =============================================================================
// sanitizeAndNormalizeEmbedding
// =============================================================================

describe("sanitizeAndNormalizeEmbedding", () => {
  it("should normalize to unit length", () => {
    const result = sanitizeAndNormalizeEmbedding([3, 4]);
    expect(result[0]).toBeCloseTo(0.6, 10);
    expect(result[1]).toBeCloseTo(0.8, 10);
  });

  it("should handle all-zero vectors", () => {
    expect(sanitizeAndNormalizeEmbedding([0, 0, 0])).toEqual([0, 0, 0]);
  });

  it("should replace non-finite values with 0", () => {
    expect(sanitizeAndNormalizeEmbedding([NaN, Infinity, 2])).toEqual([0, 0, 1]);
  });
});

// =============================================================================
// projectEmbedding
// =============================================================================

describe("projectEmbedding", () => {
  it("normalizes vectors of the exact width", () => {
    const projected = projectEmbedding([3, 4], 2, false);
    expect(projected.ok).toBe(true);
    if (projected.ok) {
      expect(projected.value[0]).toBeCloseTo(0.6, 10);
      expect(projected.value[1]).toBeCloseTo(0.8, 10);
    }
  });

  it("truncates and renormalizes when allowed", () => {
    const projected = projectEmbedding([3, 4, 12], 2, true);
    expect(projected.ok).toBe(true);
    if (projected.ok) {
      expect(projected.value[0]).toBeCloseTo(0.6, 10);
      expect(projected.value[1]).toBeCloseTo(0.8, 10);
    }
  });

  it("refuses to truncate when not allowed", () => {
    const projected = projectEmbedding([3, 4, 12], 2, false);
    expect(projected.ok).toBe(false);
    if (!projected.ok) {
      expect(projected.error).toBeInstanceOf(IncompatibleEmbeddingError);
      expect(projected.error.actual).toBe(3);
    }
  });

  it("always rejects narrower vectors", () => {
    const projected = projectEmbedding([1, 0], 4, true);
    expect(projected.ok).toBe(false);
    if (!projected.ok) {
      expect(projected.error.expected).toBe(4);
      expect(projected.error.actual).toBe(2);
    }
  });
});

// =============================================================================
// OpenAI
// =============================================================================

describe("createOpenAiEmbeddingProvider", () => {
  it("throws when no API key is available", async () => {
    await expect(createOpenAiEmbeddingProvider(makeConfig())).rejects.toThrow(EmbeddingUnavailableError);
  });

  it("requests the store width and orders vectors by index", async () => {
    const fetchImpl = vi.fn(async (_url: string, _init: RequestInit) =>
      jsonResponse({
        data: [
          { index: 1, embedding: [0, 1] },
          { index: 0, embedding: [1, 0] },
        ],
      }),
    );
    const provider = await createOpenAiEmbeddingProvider(makeConfig({ apiKey: "test-secret" }), fetchImpl);

    expect(provider.truncatable).toBe(true);
    expect(await provider.embedBatch(["a", "b"])).toEqual([
      [1, 0],
      [0, 1],
    ]);

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("https://api.openai.com/v1/embeddings");
    expect(requestBody(init)).toEqual({ model: "text-embedding-3-small", input: ["a", "b"], dimensions: 768 });
  });

  it("wraps HTTP errors", async () => {
    const fetchImpl = vi.fn(async () => new Response("oops", { status: 500 }));
    const provider = await createOpenAiEmbeddingProvider(makeConfig({ apiKey: "test-secret" }), fetchImpl);
    await expect(provider.embedQuery("hello")).rejects.toThrow("OpenAI embeddings failed: 500 oops");
  });

  it("rejects malformed payloads", async () => {
    const fetchImpl = vi.fn(async () => jsonResponse({ nope: true }));
    const provider = await createOpenAiEmbeddingProvider(makeConfig({ apiKey: "test-secret" }), fetchImpl);
    await expect(provider.embedQuery("hello")).rejects.toThrow("OpenAI embeddings returned an unexpected payload");
  });

  it("skips the request for an empty batch", async () => {
    const fetchImpl = vi.fn(async () => jsonResponse({ data: [] }));
    const provider = await createOpenAiEmbeddingProvider(makeConfig({ apiKey: "test-secret" }), fetchImpl);
    expect(await provider.embedBatch([])).toEqual([]);
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});

// =============================================================================
// Gemini
// =============================================================================

describe("createGeminiEmbeddingProvider", () => {
  it("throws when no API key is available", async () => {
    await expect(createGeminiEmbeddingProvider(makeConfig())).rejects.toThrow(
      "No API key found for Gemini. Set GOOGLE_API_KEY or GEMINI_API_KEY environment variable.",
    );
  });

  it("embeds a query with the default Gemini model", async () => {
    const fetchImpl = vi.fn(async (_url: string, _init: RequestInit) => jsonResponse({ embedding: { values: [1, 2] } }));
    const provider = await createGeminiEmbeddingProvider(makeConfig({ apiKey: "test-secret" }), fetchImpl);

    expect(await provider.embedQuery("hi")).toEqual([1, 2]);
    expect(fetchImpl.mock.calls[0][0]).toBe(
      "https://generativelanguage.googleapis.com/v1beta/models/gemini-embedding-001:embedContent",
    );
  });
});

// =============================================================================
// Ollama and auto
// =============================================================================

describe("createOllamaEmbeddingProvider", () => {
  it("throws when the server is unreachable", async () => {
    const fetchImpl = vi.fn(async () => {
      throw new Error("ECONNREFUSED");
    });
    await expect(createOllamaEmbeddingProvider(makeConfig(), fetchImpl)).rejects.toThrow(
      "Ollama not reachable at http://localhost:11434",
    );
  });

  it("embeds batches natively", async () => {
    const fetchImpl = vi.fn(async (url: string, _init: RequestInit) =>
      url.endsWith("/api/tags") ? jsonResponse({ models: [] }) : jsonResponse({ embeddings: [[1], [2]] }),
    );
    const provider = await createOllamaEmbeddingProvider(makeConfig(), fetchImpl);
    expect(provider.truncatable).toBe(false);
    expect(await provider.embedBatch(["a", "b"])).toEqual([[1], [2]]);
  });
});

describe("createEmbeddingProvider", () => {
  it("falls through to the first provider that works", async () => {
    vi.stubEnv("GEMINI_API_KEY", "test-secret");
    const provider = await createEmbeddingProvider(makeConfig(), vi.fn(async () => jsonResponse({})));
    expect(provider.id).toBe("gemini");
  });

  it("reports every failure when nothing is available", async () => {
    const fetchImpl = vi.fn(async () => {
      throw new Error("offline");
    });
    await expect(createEmbeddingProvider(makeConfig(), fetchImpl)).rejects.toThrow(/No embedding provider available/);
  });
});

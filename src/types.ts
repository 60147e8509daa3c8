/**
 * Types for the chat context memory core
 */

// =============================================================================
// Messages
// =============================================================================

export const MESSAGE_ROLES = ["user", "assistant", "system"] as const;
export type MessageRole = (typeof MESSAGE_ROLES)[number];

export const MESSAGE_KINDS = ["text", "voice", "image"] as const;
export type MessageKind = (typeof MESSAGE_KINDS)[number];

export interface ChatMessage {
  id: number;
  chatId: string;
  role: MessageRole;
  kind: MessageKind;
  content: string;
  platformMessageId: string | null;
  replyToId: string | null;
  replyToSnippet: string | null;
  /** ms since epoch */
  createdAt: number;
}

export interface NewChatMessage {
  chatId: string;
  role: MessageRole;
  content: string;
  kind?: MessageKind;
  platformMessageId?: string | null;
  replyToId?: string | null;
  replyToSnippet?: string | null;
  createdAt?: number;
}

export interface ArchivePointer {
  chatId: string;
  profile: string;
  lastFoldedId: number;
  updatedAt: number;
}

// =============================================================================
// Consumed capabilities
// =============================================================================

export interface EmbeddingProvider {
  id: string;
  model: string;
  /**
   * Leading dimensions of this model's vectors are independently meaningful,
   * so truncating them to a shorter width keeps them comparable.
   */
  truncatable: boolean;
  embedQuery: (text: string) => Promise<number[]>;
  embedBatch: (texts: string[]) => Promise<number[][]>;
}

export interface SummaryProvider {
  id: string;
  summarize: (previousProfile: string, bufferText: string) => Promise<string>;
}

// =============================================================================
// Persisted settings (read-through key-value surface)
// =============================================================================

export interface MemorySettings {
  /** Active window token budget */
  historyTokens: number;
  /** Buffer size that triggers compaction; null means "same as historyTokens" */
  archiveTriggerTokens: number | null;
  summaryIdleSeconds: number;
  /** Maximum cosine distance for a retrieval match */
  maxDistance: number;
  neighborhoodPadding: number;
  retrievalTopK: number;
  indexCooldownSeconds: number;
}

export const DEFAULT_SETTINGS: MemorySettings = {
  historyTokens: 6000,
  archiveTriggerTokens: null,
  summaryIdleSeconds: 10800,
  maxDistance: 0.6,
  neighborhoodPadding: 2,
  retrievalTopK: 5,
  indexCooldownSeconds: 180,
};

// =============================================================================
// Static configuration
// =============================================================================

export interface ContextMemoryConfig {
  store: {
    /** SQLite database path; ":memory:" for an ephemeral store */
    path: string;
  };

  embedding: {
    provider: "openai" | "gemini" | "ollama" | "auto";
    model: string;
    apiKey?: string;
    baseUrl?: string;
    /** Fixed vector width of the store */
    dimensions: number;
    /** Allow truncating vectors from providers that do not declare themselves truncatable */
    allowTruncation: boolean;
    timeoutMs: number;
    ollama?: {
      baseUrl?: string;
      model?: string;
    };
  };

  summary: {
    model: string;
    apiKey?: string;
    baseUrl?: string;
    timeoutMs: number;
    temperature: number;
  };

  window: {
    candidateCap: number;
    maxMessageChars: number;
    headRatio: number;
    tailRatio: number;
  };

  archive: {
    cooldownMs: number;
    /** Period of the sweep that catches chats gone idle */
    sweepIntervalMs: number;
    /** How far back the sweep looks for active chats */
    sweepLookbackMs: number;
  };

  indexing: {
    batchSize: number;
    fusionDepth: number;
    intervalMs: number;
    concurrency: number;
  };

  retrieval: {
    minQueryChars: number;
  };

  vectors: {
    /** Chats with more vectors than this use the HNSW candidate index */
    annThreshold: number;
    candidateMultiplier: number;
  };

  locks: {
    idleEvictMs: number;
  };

  settingsDefaults: MemorySettings;
}

export const DEFAULT_CONFIG: ContextMemoryConfig = {
  store: {
    path: "data/context-memory.sqlite",
  },
  embedding: {
    provider: "auto",
    model: "text-embedding-3-small",
    dimensions: 768,
    allowTruncation: false,
    timeoutMs: 30_000,
  },
  summary: {
    model: "gpt-4o-mini",
    timeoutMs: 60_000,
    temperature: 0.3,
  },
  window: {
    candidateCap: 200,
    maxMessageChars: 8000,
    headRatio: 0.3,
    tailRatio: 0.3,
  },
  archive: {
    cooldownMs: 5000,
    sweepIntervalMs: 10 * 60_000,
    sweepLookbackMs: 7 * 24 * 60 * 60_000,
  },
  indexing: {
    batchSize: 50,
    fusionDepth: 3,
    intervalMs: 120_000,
    concurrency: 4,
  },
  retrieval: {
    minQueryChars: 3,
  },
  vectors: {
    annThreshold: 2000,
    candidateMultiplier: 4,
  },
  locks: {
    idleEvictMs: 10 * 60_000,
  },
  settingsDefaults: DEFAULT_SETTINGS,
};

/** Deep-partial form accepted from callers; merged over DEFAULT_CONFIG. */
export type ContextMemoryUserConfig = {
  [K in keyof ContextMemoryConfig]?: Partial<ContextMemoryConfig[K]>;
};

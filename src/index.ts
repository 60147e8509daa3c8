/**
 * chat-context-memory
 *
 * Bounded, relevant context for conversational agents over an unbounded
 * per-chat message history.
 *
 * Features:
 * - Active window: the newest messages that fit a token budget
 * - Archive: messages that fall out of the window are folded into a profile
 * - Semantic recall: past exchanges similar to the current query
 */

import { ArchiveTrigger, type ArchiveOutcome, type ArchivePhase } from "./archive.js";
import { ChatLockRegistry } from "./chat-locks.js";
import { resolveConfig } from "./config.js";
import { createEmbeddingProvider } from "./embeddings.js";
import { type IndexOutcome, SemanticIndexer } from "./indexer.js";
import { createLogger, errorMessage } from "./logger.js";
import { ContextRetriever, type RetrievalResult } from "./retriever.js";
import { JobScheduler } from "./scheduler.js";
import { type MemoryDatabase, openMemoryDatabase } from "./storage/database.js";
import { MessageLog } from "./storage/message-log.js";
import { ProfileStore } from "./storage/profile-store.js";
import { SettingsStore } from "./storage/settings-store.js";
import { VectorStore } from "./storage/vector-store.js";
import { createOpenAiSummaryProvider } from "./summarizer.js";
import type {
  ChatMessage,
  ContextMemoryConfig,
  ContextMemoryUserConfig,
  EmbeddingProvider,
  NewChatMessage,
  SummaryProvider,
} from "./types.js";
import { ChatAnnIndexCache } from "./vector-index.js";
import { type WindowStats, WindowSelector } from "./window.js";

const log = createLogger("context-memory");

// =============================================================================
// Facade types
// =============================================================================

export interface ContextMemoryProviders {
  embedder: EmbeddingProvider;
  summarizer: SummaryProvider;
}

export interface BuildContextOptions {
  /** Extra ids never used as retrieval anchors; the window's own ids are always excluded */
  excludeIds?: Iterable<number>;
}

export interface BuiltContext {
  profile: string;
  /** Chronological, content truncated */
  window: ChatMessage[];
  retrieved: RetrievalResult;
  stats: WindowStats;
}

export interface ChatStats extends WindowStats {
  profile: string | null;
  messageCount: number;
  vectorCount: number;
  archivePhase: ArchivePhase;
  indexCooldownMs: number;
}

export interface ContextMemoryOptions {
  /** Clock override, used by tests */
  now?: () => number;
}

// =============================================================================
// ContextMemory
// =============================================================================

export class ContextMemory {
  readonly config: ContextMemoryConfig;
  readonly db: MemoryDatabase;
  readonly messages: MessageLog;
  readonly profiles: ProfileStore;
  readonly vectors: VectorStore;
  readonly settings: SettingsStore;
  readonly locks: ChatLockRegistry;
  readonly scheduler: JobScheduler;
  readonly window: WindowSelector;
  readonly archive: ArchiveTrigger;
  readonly indexer: SemanticIndexer;
  readonly retriever: ContextRetriever;

  private readonly now: () => number;
  private started = false;
  private closed = false;

  constructor(config: ContextMemoryConfig, providers: ContextMemoryProviders, options: ContextMemoryOptions = {}) {
    const now = options.now ?? Date.now;
    this.now = now;
    this.config = config;
    this.db = openMemoryDatabase(config.store.path);

    this.messages = new MessageLog(this.db);
    this.profiles = new ProfileStore(this.db);
    this.settings = new SettingsStore(this.db, config.settingsDefaults);
    this.vectors = new VectorStore(this.db, config.embedding.dimensions, {
      cache: new ChatAnnIndexCache(config.embedding.dimensions),
      threshold: config.vectors.annThreshold,
      candidateMultiplier: config.vectors.candidateMultiplier,
    });
    this.locks = new ChatLockRegistry(config.locks.idleEvictMs, now);
    this.scheduler = new JobScheduler(now);
    this.window = new WindowSelector(this.messages, config.window);

    this.archive = new ArchiveTrigger({
      messages: this.messages,
      profiles: this.profiles,
      settings: this.settings,
      window: this.window,
      locks: this.locks,
      summarizer: providers.summarizer,
      config,
      now,
    });
    this.indexer = new SemanticIndexer({
      messages: this.messages,
      vectors: this.vectors,
      settings: this.settings,
      locks: this.locks,
      embedder: providers.embedder,
      config,
      now,
    });
    this.retriever = new ContextRetriever({
      messages: this.messages,
      vectors: this.vectors,
      settings: this.settings,
      embedder: providers.embedder,
      config,
    });
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  async recordMessage(input: NewChatMessage): Promise<ChatMessage> {
    return this.locks.runExclusive(input.chatId, () => this.messages.append(input));
  }

  /**
   * Replace a message's content, e.g. a transcript arriving for a voice
   * placeholder. The message and the reply after it are re-indexed later.
   */
  async patchMessage(messageId: number, content: string): Promise<boolean> {
    const message = await this.messages.get(messageId);
    if (!message) return false;
    return this.locks.runExclusive(message.chatId, async () => {
      const patched = await this.messages.patchContent(messageId, content);
      if (patched) await this.indexer.invalidateMessage(message.chatId, messageId);
      return patched;
    });
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  /** Everything a prompt needs for the next turn of a chat. */
  async buildContext(chatId: string, query: string, options: BuildContextOptions = {}): Promise<BuiltContext> {
    const settings = await this.settings.load();

    const { pointer, selection, stats } = await this.locks.runExclusive(chatId, async () => {
      const pointer = await this.profiles.get(chatId);
      const lastFoldedId = pointer?.lastFoldedId ?? 0;
      const selection = await this.window.select(chatId, settings.historyTokens, { afterId: lastFoldedId });
      const stats = await this.window.computeStats(chatId, settings.historyTokens, lastFoldedId);
      return { pointer, selection, stats };
    });

    const excludeIds = new Set(selection.messages.map((m) => m.id));
    for (const id of options.excludeIds ?? []) excludeIds.add(id);

    const retrieved = await this.retriever.search(chatId, query, { excludeIds });

    return { profile: pointer?.profile ?? "", window: selection.messages, retrieved, stats };
  }

  async getStats(chatId: string): Promise<ChatStats> {
    const settings = await this.settings.load();
    const pointer = await this.profiles.get(chatId);
    const stats = await this.window.computeStats(chatId, settings.historyTokens, pointer?.lastFoldedId ?? 0);
    return {
      ...stats,
      profile: pointer?.profile ?? null,
      messageCount: await this.messages.count(chatId),
      vectorCount: await this.vectors.countForChat(chatId),
      archivePhase: this.archive.phase(chatId),
      indexCooldownMs: await this.indexer.cooldownRemaining(chatId),
    };
  }

  // ---------------------------------------------------------------------------
  // Maintenance
  // ---------------------------------------------------------------------------

  /** Queue archival and indexing for a chat after a reply went out. Returns immediately. */
  afterTurn(chatId: string): void {
    this.scheduler.dispatch(`archive:${chatId}`, () => this.archive.maybeCompact(chatId));
    this.scheduler.dispatch(`index:${chatId}`, () => this.indexer.syncChat(chatId));
  }

  async compactNow(chatId: string): Promise<ArchiveOutcome> {
    return this.archive.maybeCompact(chatId);
  }

  async syncIndex(chatId: string): Promise<IndexOutcome> {
    return this.indexer.syncChat(chatId);
  }

  async rebuildIndex(chatId: string): Promise<IndexOutcome> {
    return this.indexer.rebuildChat(chatId);
  }

  /**
   * Forget a chat entirely. In-flight archive and index work for it is
   * invalidated and will not write its results.
   */
  async resetChat(chatId: string): Promise<void> {
    await this.locks.runExclusive(chatId, async () => {
      this.locks.invalidate(chatId);
      await this.indexer.clearChat(chatId);
      const removed = await this.messages.deleteChat(chatId);
      await this.profiles.delete(chatId);
      this.archive.reset(chatId);
      log.info(`Reset chat ${chatId}: ${removed} messages removed`);
    });
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /** Start the periodic indexing and idle-archive jobs. */
  start(): void {
    if (this.started || this.closed) return;
    this.started = true;

    this.scheduler.every("index-pending", this.config.indexing.intervalMs, () => this.indexer.syncPending());
    this.scheduler.every("archive-sweep", this.config.archive.sweepIntervalMs, () => this.sweepIdleChats());
    this.locks.startSweeper();
    log.info("Context memory background jobs started");
  }

  async stop(): Promise<void> {
    this.started = false;
    this.locks.stopSweeper();
    await this.scheduler.stop();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    await this.stop();
    this.closed = true;
    this.db.close();
  }

  /**
   * Check every recently active chat for compaction. A chat that throws is
   * logged and the sweep moves on. Resolves to the number of chats compacted.
   */
  async sweepIdleChats(): Promise<number> {
    const since = this.now() - this.config.archive.sweepLookbackMs;
    const chatIds = await this.messages.listActiveChats(since, 1000);
    let compacted = 0;
    for (const chatId of chatIds) {
      try {
        const outcome = await this.archive.maybeCompact(chatId);
        if (outcome.status === "compacted") {
          compacted++;
          log.info(`Idle sweep compacted chat ${chatId} through id ${outcome.foldedThroughId}`);
        }
      } catch (err) {
        log.error(`Idle sweep failed for chat ${chatId}: ${errorMessage(err)}`);
      }
    }
    return compacted;
  }
}

/**
 * Build a ContextMemory from user config. Providers not passed in are
 * created from the config's embedding and summary sections.
 */
export async function createContextMemory(
  userConfig?: ContextMemoryUserConfig,
  providers: Partial<ContextMemoryProviders> = {},
  options: ContextMemoryOptions = {},
): Promise<ContextMemory> {
  const config = resolveConfig(userConfig);
  const embedder = providers.embedder ?? (await createEmbeddingProvider(config.embedding));
  const summarizer = providers.summarizer ?? createOpenAiSummaryProvider(config.summary);
  log.info(`Context memory using ${embedder.id}/${embedder.model} at ${config.embedding.dimensions} dims`);
  return new ContextMemory(config, { embedder, summarizer }, options);
}

// =============================================================================
// Re-exports
// =============================================================================

export type { ArchiveOutcome, ArchivePhase, ArchiveSkipReason, ArchiveTriggerReason } from "./archive.js";
export { ArchiveTrigger, decideTrigger } from "./archive.js";
export { ChatLockRegistry } from "./chat-locks.js";
export { configSchema, resolveConfig, settingsSchema } from "./config.js";
export {
  createEmbeddingProvider,
  createGeminiEmbeddingProvider,
  createOllamaEmbeddingProvider,
  createOpenAiEmbeddingProvider,
  projectEmbedding,
} from "./embeddings.js";
export {
  ConfigValidationError,
  EmbeddingUnavailableError,
  IncompatibleEmbeddingError,
  SummarizationFailedError,
} from "./errors.js";
export { estimateTokens, renderMessageLine } from "./format.js";
export type { IndexOutcome } from "./indexer.js";
export { SemanticIndexer } from "./indexer.js";
export type { RetrievalOptions, RetrievalResult, RetrievedCluster } from "./retriever.js";
export { ContextRetriever, mergeNeighborhoods } from "./retriever.js";
export { sanitizeContent, truncateContent } from "./sanitize.js";
export type { JobRun } from "./scheduler.js";
export { JobScheduler } from "./scheduler.js";
export { SETTING_KEYS } from "./storage/settings-store.js";
export { createOpenAiSummaryProvider } from "./summarizer.js";
export type {
  ArchivePointer,
  ChatMessage,
  ContextMemoryConfig,
  ContextMemoryUserConfig,
  EmbeddingProvider,
  MemorySettings,
  MessageKind,
  MessageRole,
  NewChatMessage,
  SummaryProvider,
} from "./types.js";
export { DEFAULT_CONFIG, DEFAULT_SETTINGS } from "./types.js";
export type { WindowSelection, WindowStats } from "./window.js";
export { WindowSelector } from "./window.js";

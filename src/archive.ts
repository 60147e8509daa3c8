/**
 * Archive trigger: folds messages that fell out of the active window into
 * the chat's long-term profile.
 *
 * Per chat the trigger moves idle → buffer_growing → compacting. Reading the
 * buffer and committing the pointer happen under the chat lock; the summary
 * call runs outside it so a slow provider never blocks the chat.
 */

import type { ChatLockRegistry } from "./chat-locks.js";
import { type SummarizationFailedError, toSummarizationFailure } from "./errors.js";
import { createLogger } from "./logger.js";
import type { MessageLog } from "./storage/message-log.js";
import type { ProfileStore } from "./storage/profile-store.js";
import type { SettingsStore } from "./storage/settings-store.js";
import { renderBuffer } from "./summarizer.js";
import type { ChatMessage, ContextMemoryConfig, MemorySettings, SummaryProvider } from "./types.js";
import type { WindowSelector, WindowStats } from "./window.js";

const log = createLogger("archive");

export type ArchivePhase = "idle" | "buffer_growing" | "compacting";

export type ArchiveTriggerReason = "threshold" | "idle";

export type ArchiveSkipReason = "in_flight" | "cooldown" | "empty_buffer" | "below_threshold" | "stale";

export type ArchiveOutcome =
  | {
      status: "compacted";
      trigger: ArchiveTriggerReason;
      foldedThroughId: number;
      messageCount: number;
      bufferTokens: number;
    }
  | { status: "skipped"; reason: ArchiveSkipReason }
  | { status: "failed"; error: SummarizationFailedError };

export interface ArchiveTriggerDeps {
  messages: MessageLog;
  profiles: ProfileStore;
  settings: SettingsStore;
  window: WindowSelector;
  locks: ChatLockRegistry;
  summarizer: SummaryProvider;
  config: Pick<ContextMemoryConfig, "archive" | "window">;
  now?: () => number;
}

interface BufferSnapshot {
  trigger: ArchiveTriggerReason;
  previousProfile: string;
  lastFoldedId: number;
  buffer: ChatMessage[];
  stats: WindowStats;
}

/** Which branch, if any, fires for the given stats. */
export function decideTrigger(stats: WindowStats, settings: MemorySettings, now: number): ArchiveTriggerReason | null {
  if (stats.bufferCount === 0) return null;
  const threshold = settings.archiveTriggerTokens ?? settings.historyTokens;
  if (stats.bufferTokens >= threshold) return "threshold";
  if (stats.newestMessageAt !== null && now - stats.newestMessageAt > settings.summaryIdleSeconds * 1000) {
    return "idle";
  }
  return null;
}

export class ArchiveTrigger {
  private readonly phases = new Map<string, ArchivePhase>();
  private readonly inFlight = new Set<string>();
  private readonly lastFiredAt = new Map<string, number>();
  private readonly now: () => number;

  constructor(private readonly deps: ArchiveTriggerDeps) {
    this.now = deps.now ?? Date.now;
  }

  phase(chatId: string): ArchivePhase {
    return this.phases.get(chatId) ?? "idle";
  }

  /**
   * Check the chat and compact its buffer if a branch fires. Attempts that
   * overlap a running one, or come within the cooldown after a fired one,
   * are dropped rather than queued.
   */
  async maybeCompact(chatId: string): Promise<ArchiveOutcome> {
    if (this.inFlight.has(chatId)) return { status: "skipped", reason: "in_flight" };

    const lastFired = this.lastFiredAt.get(chatId);
    if (lastFired !== undefined && this.now() - lastFired < this.deps.config.archive.cooldownMs) {
      return { status: "skipped", reason: "cooldown" };
    }

    this.inFlight.add(chatId);
    try {
      return await this.deps.locks.withLease(chatId, (epoch) => this.run(chatId, epoch));
    } finally {
      this.inFlight.delete(chatId);
    }
  }

  /** Forget per-chat trigger state (phase and cooldown). */
  reset(chatId: string): void {
    this.phases.delete(chatId);
    this.lastFiredAt.delete(chatId);
  }

  private async run(chatId: string, epoch: number): Promise<ArchiveOutcome> {
    const settings = await this.deps.settings.load();
    const snapshot = await this.deps.locks.runExclusive(chatId, () => this.snapshot(chatId, settings));
    if (snapshot === null) {
      const reason = this.phase(chatId) === "idle" ? "empty_buffer" : "below_threshold";
      return { status: "skipped", reason };
    }

    const { trigger, previousProfile, lastFoldedId, buffer, stats } = snapshot;
    const foldedThroughId = buffer[buffer.length - 1].id;
    this.phases.set(chatId, "compacting");
    this.lastFiredAt.set(chatId, this.now());
    log.info(
      `Compacting chat ${chatId} (${trigger}): ${buffer.length} messages, ~${stats.bufferTokens} tokens, through id ${foldedThroughId}`,
    );

    const bufferText = renderBuffer(buffer, {
      maxChars: this.deps.config.window.maxMessageChars,
      headRatio: this.deps.config.window.headRatio,
      tailRatio: this.deps.config.window.tailRatio,
    });

    let profile: string;
    try {
      profile = await this.deps.summarizer.summarize(previousProfile, bufferText);
    } catch (err) {
      const error = toSummarizationFailure(err);
      this.phases.set(chatId, "buffer_growing");
      log.warn(`Summarization failed for chat ${chatId}: ${error.message}`);
      return { status: "failed", error };
    }

    const committed = await this.deps.locks.runExclusive(chatId, async () => {
      if (!this.deps.locks.isCurrent(chatId, epoch)) return false;
      const current = await this.deps.profiles.get(chatId);
      if ((current?.lastFoldedId ?? 0) !== lastFoldedId) return false;
      return this.deps.profiles.advance(chatId, profile, foldedThroughId, this.now());
    });

    if (!committed) {
      this.phases.delete(chatId);
      log.info(`Discarded stale summary for chat ${chatId}`);
      return { status: "skipped", reason: "stale" };
    }

    this.phases.set(chatId, "idle");
    return {
      status: "compacted",
      trigger,
      foldedThroughId,
      messageCount: buffer.length,
      bufferTokens: stats.bufferTokens,
    };
  }

  private async snapshot(chatId: string, settings: MemorySettings): Promise<BufferSnapshot | null> {
    const pointer = await this.deps.profiles.get(chatId);
    const lastFoldedId = pointer?.lastFoldedId ?? 0;
    const stats = await this.deps.window.computeStats(chatId, settings.historyTokens, lastFoldedId);

    const trigger = decideTrigger(stats, settings, this.now());
    if (trigger === null || stats.windowStartId === null) {
      this.phases.set(chatId, stats.bufferCount === 0 ? "idle" : "buffer_growing");
      return null;
    }

    const buffer = await this.deps.messages.listBetween(chatId, lastFoldedId, stats.windowStartId);
    if (buffer.length === 0) {
      this.phases.set(chatId, "idle");
      return null;
    }
    return { trigger, previousProfile: pointer?.profile ?? "", lastFoldedId, buffer, stats };
  }
}

/**
 * Archive trigger tests
 *
 * historyTokens is 30 and every seeded message costs 10 tokens, so the
 * window holds the newest three and anything older is buffer.
 */
import { beforeEach, describe, expect, it, type Mock, vi } from "vitest";
import { ArchiveTrigger, decideTrigger } from "../../src/archive.js";
import { ChatLockRegistry } from "../../src/chat-locks.js";
import { SummarizationFailedError } from "../../src/errors.js";
import { type MemoryDatabase, openMemoryDatabase } from "../../src/storage/database.js";
import { MessageLog } from "../../src/storage/message-log.js";
import { ProfileStore } from "../../src/storage/profile-store.js";
import { SettingsStore } from "../../src/storage/settings-store.js";
import { DEFAULT_CONFIG, DEFAULT_SETTINGS, type SummaryProvider } from "../../src/types.js";
import { WindowSelector, type WindowStats } from "../../src/window.js";
import { createDeferred, T0 } from "../helpers.js";

const CHAT = "chat-1";

let db: MemoryDatabase;
let log: MessageLog;
let profiles: ProfileStore;
let locks: ChatLockRegistry;
let clock: number;
let summarize: Mock<(previous: string, buffer: string) => Promise<string>>;
let trigger: ArchiveTrigger;

async function seed(from: number, to: number): Promise<number[]> {
  const ids: number[] = [];
  for (let i = from; i <= to; i++) {
    ids.push((await log.append({ chatId: CHAT, role: "user", content: `message 0${i} here`, createdAt: T0 })).id);
  }
  return ids;
}

beforeEach(() => {
  db = openMemoryDatabase(":memory:");
  log = new MessageLog(db);
  profiles = new ProfileStore(db);
  locks = new ChatLockRegistry(600_000);
  clock = T0 + 1000;
  summarize = vi.fn(async (_previous: string, _buffer: string) => "P1");
  const summarizer: SummaryProvider = { id: "fake", summarize };

  trigger = new ArchiveTrigger({
    messages: log,
    profiles,
    settings: new SettingsStore(db, { ...DEFAULT_SETTINGS, historyTokens: 30 }),
    window: new WindowSelector(log, DEFAULT_CONFIG.window),
    locks,
    summarizer,
    config: DEFAULT_CONFIG,
    now: () => clock,
  });
});

// =============================================================================
// decideTrigger
// =============================================================================

describe("decideTrigger", () => {
  const stats = (overrides: Partial<WindowStats>): WindowStats => ({
    windowTokens: 0,
    windowCount: 0,
    windowStartId: null,
    bufferTokens: 0,
    bufferCount: 0,
    bufferFirstId: null,
    bufferLastId: null,
    lastArchivedId: 0,
    newestMessageAt: T0,
    ...overrides,
  });

  it("does nothing with an empty buffer", () => {
    expect(decideTrigger(stats({}), DEFAULT_SETTINGS, T0 + 10 ** 9)).toBeNull();
  });

  it("fires on the threshold, defaulting it to the window budget", () => {
    const settings = { ...DEFAULT_SETTINGS, historyTokens: 100 };
    expect(decideTrigger(stats({ bufferCount: 3, bufferTokens: 100 }), settings, T0)).toBe("threshold");
    expect(decideTrigger(stats({ bufferCount: 3, bufferTokens: 99 }), settings, T0)).toBeNull();
  });

  it("uses an explicit archive threshold when set", () => {
    const settings = { ...DEFAULT_SETTINGS, historyTokens: 100, archiveTriggerTokens: 50 };
    expect(decideTrigger(stats({ bufferCount: 1, bufferTokens: 50 }), settings, T0)).toBe("threshold");
  });

  it("fires on idle once the newest message is older than the idle threshold", () => {
    const settings = { ...DEFAULT_SETTINGS, summaryIdleSeconds: 60 };
    expect(decideTrigger(stats({ bufferCount: 1, bufferTokens: 1 }), settings, T0 + 60_000)).toBeNull();
    expect(decideTrigger(stats({ bufferCount: 1, bufferTokens: 1 }), settings, T0 + 60_001)).toBe("idle");
  });
});

// =============================================================================
// ArchiveTrigger
// =============================================================================

describe("ArchiveTrigger", () => {
  it("compacts the buffer when it reaches the threshold", async () => {
    const ids = await seed(1, 6);
    const outcome = await trigger.maybeCompact(CHAT);

    expect(outcome).toEqual({
      status: "compacted",
      trigger: "threshold",
      foldedThroughId: ids[2],
      messageCount: 3,
      bufferTokens: 30,
    });
    expect(summarize).toHaveBeenCalledWith(
      "",
      "User: message 01 here\nUser: message 02 here\nUser: message 03 here",
    );
    expect(await profiles.get(CHAT)).toMatchObject({ profile: "P1", lastFoldedId: ids[2] });
    expect(trigger.phase(CHAT)).toBe("idle");
  });

  it("waits while the buffer is small and the chat is active", async () => {
    await seed(1, 5);
    const outcome = await trigger.maybeCompact(CHAT);
    expect(outcome).toEqual({ status: "skipped", reason: "below_threshold" });
    expect(summarize).not.toHaveBeenCalled();
    expect(trigger.phase(CHAT)).toBe("buffer_growing");
  });

  it("compacts a small buffer once the chat has gone idle", async () => {
    const ids = await seed(1, 5);
    clock = T0 + DEFAULT_SETTINGS.summaryIdleSeconds * 1000 + 1;
    const outcome = await trigger.maybeCompact(CHAT);
    expect(outcome).toMatchObject({ status: "compacted", trigger: "idle", foldedThroughId: ids[1] });
  });

  it("skips a chat whose messages all fit in the window", async () => {
    await seed(1, 2);
    expect(await trigger.maybeCompact(CHAT)).toEqual({ status: "skipped", reason: "empty_buffer" });
    expect(trigger.phase(CHAT)).toBe("idle");
  });

  it("leaves the pointer untouched when summarization fails", async () => {
    await seed(1, 6);
    summarize.mockRejectedValueOnce(new Error("boom"));

    const outcome = await trigger.maybeCompact(CHAT);
    expect(outcome.status).toBe("failed");
    if (outcome.status === "failed") {
      expect(outcome.error).toBeInstanceOf(SummarizationFailedError);
      expect(outcome.error.message).toBe("boom");
    }
    expect(await profiles.get(CHAT)).toBeUndefined();
    expect(trigger.phase(CHAT)).toBe("buffer_growing");
  });

  it("drops attempts during the cooldown after a fired one", async () => {
    await seed(1, 6);
    summarize.mockRejectedValueOnce(new Error("boom"));
    await trigger.maybeCompact(CHAT);

    expect(await trigger.maybeCompact(CHAT)).toEqual({ status: "skipped", reason: "cooldown" });

    clock += DEFAULT_CONFIG.archive.cooldownMs;
    expect((await trigger.maybeCompact(CHAT)).status).toBe("compacted");
    expect(summarize).toHaveBeenCalledTimes(2);
  });

  it("drops an attempt that overlaps a running one", async () => {
    await seed(1, 6);
    const reply = createDeferred<string>();
    const started = createDeferred<void>();
    summarize.mockImplementationOnce(async () => {
      started.resolve();
      return reply.promise;
    });

    const first = trigger.maybeCompact(CHAT);
    expect(await trigger.maybeCompact(CHAT)).toEqual({ status: "skipped", reason: "in_flight" });

    await started.promise;
    expect(trigger.phase(CHAT)).toBe("compacting");
    reply.resolve("P1");
    expect((await first).status).toBe("compacted");
  });

  it("discards a summary when the chat is reset while it is generated", async () => {
    await seed(1, 6);
    const reply = createDeferred<string>();
    const started = createDeferred<void>();
    summarize.mockImplementationOnce(async () => {
      started.resolve();
      return reply.promise;
    });

    const pending = trigger.maybeCompact(CHAT);
    await started.promise;
    locks.invalidate(CHAT);
    reply.resolve("stale profile");

    expect(await pending).toEqual({ status: "skipped", reason: "stale" });
    expect(await profiles.get(CHAT)).toBeUndefined();
  });

  it("moves the pointer forward across rounds and passes the previous profile", async () => {
    const first = await seed(1, 6);
    await trigger.maybeCompact(CHAT);

    await seed(7, 9);
    clock += DEFAULT_CONFIG.archive.cooldownMs;
    summarize.mockResolvedValueOnce("P2");
    const outcome = await trigger.maybeCompact(CHAT);

    expect(outcome).toMatchObject({ status: "compacted", foldedThroughId: first[5] });
    expect(summarize).toHaveBeenLastCalledWith(
      "P1",
      "User: message 04 here\nUser: message 05 here\nUser: message 06 here",
    );
    expect(await profiles.get(CHAT)).toMatchObject({ profile: "P2", lastFoldedId: first[5] });
  });

  it("compacts different chats independently", async () => {
    await seed(1, 6);
    for (let i = 1; i <= 6; i++) {
      await log.append({ chatId: "chat-2", role: "user", content: `message 0${i} here`, createdAt: T0 });
    }
    const [a, b] = await Promise.all([trigger.maybeCompact(CHAT), trigger.maybeCompact("chat-2")]);
    expect(a.status).toBe("compacted");
    expect(b.status).toBe("compacted");
  });
});

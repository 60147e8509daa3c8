/**
 * Registry of per-chat mutual-exclusion handles
 *
 * Each chat gets a lazily created promise-chain mutex and an epoch. A reset
 * bumps the epoch, so background work that captured the old value can tell
 * its results are stale before writing them. Handles that are idle (no queued
 * work, no lease) for longer than `idleEvictMs` are dropped by the sweeper.
 */

import { createLogger } from "./logger.js";

const log = createLogger("chat-locks");

interface ChatLock {
  tail: Promise<void>;
  /** queued or running exclusive sections */
  pending: number;
  /** long-running operations that read the epoch before their critical sections */
  leases: number;
  epoch: number;
  lastUsedAt: number;
}

export class ChatLockRegistry {
  private readonly locks = new Map<string, ChatLock>();
  private nextEpoch = 1;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly idleEvictMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  /** Run `fn` once every earlier section for the same chat has finished. */
  async runExclusive<T>(chatId: string, fn: () => Promise<T>): Promise<T> {
    const lock = this.acquire(chatId);
    lock.pending++;

    const previous = lock.tail;
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    lock.tail = previous.then(() => current);

    try {
      await previous;
      return await fn();
    } finally {
      lock.pending--;
      lock.lastUsedAt = this.now();
      release();
    }
  }

  /**
   * Keep the chat's handle (and therefore its epoch) alive while `fn` runs.
   * `fn` receives the epoch current at the start.
   */
  async withLease<T>(chatId: string, fn: (epoch: number) => Promise<T>): Promise<T> {
    const lock = this.acquire(chatId);
    lock.leases++;
    try {
      return await fn(lock.epoch);
    } finally {
      lock.leases--;
      lock.lastUsedAt = this.now();
    }
  }

  epoch(chatId: string): number {
    return this.acquire(chatId).epoch;
  }

  isCurrent(chatId: string, epoch: number): boolean {
    return this.locks.get(chatId)?.epoch === epoch;
  }

  /** Invalidate in-flight work for a chat. Returns the new epoch. */
  invalidate(chatId: string): number {
    const lock = this.acquire(chatId);
    lock.epoch = this.nextEpoch++;
    return lock.epoch;
  }

  /** Drop idle handles. Returns how many were evicted. */
  evictIdle(): number {
    const cutoff = this.now() - this.idleEvictMs;
    let evicted = 0;
    for (const [chatId, lock] of this.locks) {
      if (lock.pending === 0 && lock.leases === 0 && lock.lastUsedAt <= cutoff) {
        this.locks.delete(chatId);
        evicted++;
      }
    }
    if (evicted > 0) log.debug(`Evicted ${evicted} idle chat handles (${this.locks.size} remaining)`);
    return evicted;
  }

  startSweeper(intervalMs = this.idleEvictMs): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.evictIdle(), intervalMs);
    this.sweepTimer.unref();
  }

  stopSweeper(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  size(): number {
    return this.locks.size;
  }

  private acquire(chatId: string): ChatLock {
    let lock = this.locks.get(chatId);
    if (!lock) {
      lock = { tail: Promise.resolve(), pending: 0, leases: 0, epoch: this.nextEpoch++, lastUsedAt: this.now() };
      this.locks.set(chatId, lock);
    }
    return lock;
  }
}

/**
 * Background job scheduler
 *
 * Periodic jobs never overlap with themselves; one-off jobs with the same
 * name are dropped while one is still running. Failures are logged and
 * emitted, never thrown into the timer loop.
 */

import { EventEmitter } from "node:events";
import { createLogger, errorMessage } from "./logger.js";

const log = createLogger("scheduler");

export interface JobRun {
  name: string;
  startedAt: number;
  finishedAt: number;
  ok: boolean;
  error?: string;
}

export interface SchedulerEvents {
  "job:completed": [run: JobRun];
  "job:failed": [run: JobRun, error: unknown];
}

type Job = () => Promise<unknown>;

export class JobScheduler extends EventEmitter<SchedulerEvents> {
  private readonly timers = new Map<string, NodeJS.Timeout>();
  private readonly running = new Map<string, Promise<void>>();
  private readonly lastRuns = new Map<string, JobRun>();
  private stopped = false;

  constructor(private readonly now: () => number = Date.now) {
    super();
  }

  /** Run `fn` every `intervalMs`. A tick that finds the previous run still going is skipped. */
  every(name: string, intervalMs: number, fn: Job): void {
    if (this.timers.has(name)) throw new Error(`Job "${name}" is already scheduled`);
    this.stopped = false;
    const timer = setInterval(() => {
      this.dispatch(name, fn);
    }, intervalMs);
    timer.unref();
    this.timers.set(name, timer);
    log.debug(`Scheduled ${name} every ${intervalMs}ms`);
  }

  /** Start `fn` now unless a job with this name is running. Returns whether it started. */
  dispatch(name: string, fn: Job): boolean {
    if (this.stopped || this.running.has(name)) return false;
    const run = this.execute(name, fn).finally(() => this.running.delete(name));
    this.running.set(name, run);
    return true;
  }

  isRunning(name: string): boolean {
    return this.running.has(name);
  }

  lastRun(name: string): JobRun | undefined {
    return this.lastRuns.get(name);
  }

  /** Resolves once every running job has settled. */
  async idle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all(this.running.values());
    }
  }

  /** Cancel timers, refuse new work, wait for in-flight runs. */
  async stop(): Promise<void> {
    this.stopped = true;
    for (const timer of this.timers.values()) clearInterval(timer);
    this.timers.clear();
    await this.idle();
  }

  private async execute(name: string, fn: Job): Promise<void> {
    const startedAt = this.now();
    try {
      await fn();
      const run: JobRun = { name, startedAt, finishedAt: this.now(), ok: true };
      this.lastRuns.set(name, run);
      this.emit("job:completed", run);
    } catch (err) {
      const run: JobRun = { name, startedAt, finishedAt: this.now(), ok: false, error: errorMessage(err) };
      this.lastRuns.set(name, run);
      log.error(`Job ${name} failed: ${run.error}`);
      this.emit("job:failed", run, err);
    }
  }
}

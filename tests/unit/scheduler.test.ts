/**
 * Background job scheduler tests
 */
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { type JobRun, JobScheduler } from "../../src/scheduler.js";
import { createDeferred } from "../helpers.js";

describe("JobScheduler", () => {
  let scheduler: JobScheduler;

  beforeEach(() => {
    vi.useFakeTimers();
    scheduler = new JobScheduler();
  });

  afterEach(async () => {
    await scheduler.stop();
    vi.useRealTimers();
  });

  it("runs periodic jobs on their interval", async () => {
    const job = vi.fn(async () => {});
    scheduler.every("tick", 1000, job);

    await vi.advanceTimersByTimeAsync(999);
    expect(job).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    expect(job).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(2000);
    expect(job).toHaveBeenCalledTimes(3);
  });

  it("skips ticks while the previous run is still going", async () => {
    const gate = createDeferred<void>();
    const job = vi.fn(() => gate.promise);
    scheduler.every("slow", 1000, job);

    await vi.advanceTimersByTimeAsync(3000);
    expect(job).toHaveBeenCalledTimes(1);
    expect(scheduler.isRunning("slow")).toBe(true);

    gate.resolve();
    await scheduler.idle();
    await vi.advanceTimersByTimeAsync(1000);
    expect(job).toHaveBeenCalledTimes(2);
  });

  it("refuses to schedule the same name twice", () => {
    scheduler.every("tick", 1000, async () => {});
    expect(() => scheduler.every("tick", 1000, async () => {})).toThrow('Job "tick" is already scheduled');
  });

  it("drops a dispatch while the same job is running", async () => {
    const gate = createDeferred<void>();
    expect(scheduler.dispatch("once", () => gate.promise)).toBe(true);
    expect(scheduler.dispatch("once", async () => {})).toBe(false);
    gate.resolve();
    await scheduler.idle();
    expect(scheduler.dispatch("once", async () => {})).toBe(true);
  });

  it("records and emits failures without throwing", async () => {
    const failed: JobRun[] = [];
    scheduler.on("job:failed", (run) => failed.push(run));

    scheduler.dispatch("broken", async () => {
      throw new Error("kaput");
    });
    await scheduler.idle();

    expect(failed).toHaveLength(1);
    expect(failed[0]).toMatchObject({ name: "broken", ok: false, error: "kaput" });
    expect(scheduler.lastRun("broken")?.ok).toBe(false);
  });

  it("emits completion events", async () => {
    const completed = vi.fn();
    scheduler.on("job:completed", completed);
    scheduler.dispatch("fine", async () => "ok");
    await scheduler.idle();
    expect(completed).toHaveBeenCalledWith(expect.objectContaining({ name: "fine", ok: true }));
  });

  it("stop waits for in-flight runs and refuses new ones", async () => {
    const gate = createDeferred<void>();
    let finished = false;
    scheduler.dispatch("long", async () => {
      await gate.promise;
      finished = true;
    });

    const stopped = scheduler.stop();
    expect(scheduler.dispatch("late", async () => {})).toBe(false);
    gate.resolve();
    await stopped;
    expect(finished).toBe(true);
  });
});

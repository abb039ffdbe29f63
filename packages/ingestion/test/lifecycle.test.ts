import { describe, expect, it, vi } from "vitest";

import { AlreadyRunningError } from "../src/api/errors";
import { createLifecycle } from "../src/core/lifecycle";
import { sleepFor } from "../src/core/sleep";

function untilAborted(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

describe("createLifecycle", () => {
  it("moves through running back to stopped", async () => {
    const lifecycle = createLifecycle({ name: "test loop" });
    const states: string[] = [];

    lifecycle.start(async (signal) => {
      states.push(lifecycle.state());
      await untilAborted(signal);
      states.push(lifecycle.state());
    });

    expect(lifecycle.isRunning()).toBe(true);
    await lifecycle.stop();

    expect(states).toEqual(["running", "stopping"]);
    expect(lifecycle.state()).toBe("stopped");
  });

  it("refuses a second start while one is active", async () => {
    const lifecycle = createLifecycle({ name: "test loop" });

    lifecycle.start(untilAborted);

    expect(() => lifecycle.start(untilAborted)).toThrow(AlreadyRunningError);
    expect(() => lifecycle.start(untilAborted)).toThrow("test loop is already running");
    await lifecycle.stop();
  });

  it("can start again after stopping", async () => {
    const lifecycle = createLifecycle({ name: "test loop" });
    const run = vi.fn(untilAborted);

    lifecycle.start(run);
    await lifecycle.stop();
    lifecycle.start(run);
    await lifecycle.stop();

    expect(run).toHaveBeenCalledTimes(2);
  });

  it("returns to stopped when the run finishes on its own", async () => {
    const lifecycle = createLifecycle({ name: "test loop" });

    lifecycle.start(async () => undefined);
    await lifecycle.stop();

    expect(lifecycle.state()).toBe("stopped");
  });

  it("treats stop on an idle lifecycle as a no-op", async () => {
    const lifecycle = createLifecycle({ name: "test loop" });

    await expect(lifecycle.stop()).resolves.toBeUndefined();
    expect(lifecycle.state()).toBe("stopped");
  });

  it("settles every stop call, overlapping or repeated", async () => {
    const lifecycle = createLifecycle({ name: "test loop" });
    const finished = vi.fn();

    lifecycle.start(async (signal) => {
      await untilAborted(signal);
      finished();
    });

    await expect(Promise.all([lifecycle.stop(), lifecycle.stop()])).resolves.toEqual([undefined, undefined]);
    await expect(lifecycle.stop()).resolves.toBeUndefined();

    expect(finished).toHaveBeenCalledTimes(1);
    expect(lifecycle.state()).toBe("stopped");
  });

  it("stops when the parent signal aborts", async () => {
    const lifecycle = createLifecycle({ name: "test loop" });
    const parent = new AbortController();
    let finished = false;

    lifecycle.start(async (signal) => {
      await untilAborted(signal);
      finished = true;
    }, parent.signal);

    parent.abort();
    await lifecycle.stop();

    expect(finished).toBe(true);
    expect(lifecycle.state()).toBe("stopped");
  });

  it("hands the run an aborted signal when the parent already aborted", async () => {
    const lifecycle = createLifecycle({ name: "test loop" });
    const parent = new AbortController();
    parent.abort();
    let sawAborted = false;

    lifecycle.start(async (signal) => {
      sawAborted = signal.aborted;
    }, parent.signal);
    await lifecycle.stop();

    expect(sawAborted).toBe(true);
  });

  it("reports a rejected run to onFault", async () => {
    const onFault = vi.fn();
    const lifecycle = createLifecycle({ name: "test loop", onFault });
    const failure = new Error("run failed");

    lifecycle.start(async () => {
      throw failure;
    });
    await lifecycle.stop();

    expect(onFault).toHaveBeenCalledWith(failure);
    expect(lifecycle.state()).toBe("stopped");
  });
});

describe("sleepFor", () => {
  it("resolves early when the signal aborts", async () => {
    const controller = new AbortController();
    const started = Date.now();

    const sleeping = sleepFor(60_000, controller.signal);
    controller.abort();
    await sleeping;

    expect(Date.now() - started).toBeLessThan(1000);
  });

  it("returns immediately for an already aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sleepFor(60_000, controller.signal)).resolves.toBeUndefined();
  });
});

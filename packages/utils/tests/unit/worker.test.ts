import { afterEach, describe, expect, test } from "vitest";

import { LogLevel, logger, type LogRecord } from "../../src/logger";
import { sleep } from "../../src/sleep";
import { runIntervalLoop } from "../../src/worker";

describe("sleep", () => {
  test("resolves early when the signal aborts", async () => {
    const controller = new AbortController();
    const startedAt = Date.now();

    const pending = sleep(5_000, controller.signal);
    controller.abort();
    await pending;

    expect(Date.now() - startedAt).toBeLessThan(1_000);
  });

  test("resolves immediately for an already-aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sleep(5_000, controller.signal)).resolves.toBeUndefined();
  });
});

describe("runIntervalLoop", () => {
  afterEach(() => {
    logger.clearSink();
  });

  test("keeps running after a failed iteration and stops on abort", async () => {
    const records: LogRecord[] = [];
    logger.setSink({ write: r => records.push(r) });

    const controller = new AbortController();
    let calls = 0;

    await runIntervalLoop({
      name: "poller",
      intervalMs: 1,
      signal: controller.signal,
      runOnce: async () => {
        calls++;
        if (calls === 1) throw new Error("boom");
        if (calls === 3) controller.abort();
      },
    });

    expect(calls).toBe(3);
    const errors = records.filter(r => r.level === LogLevel.ERROR);
    expect(errors).toHaveLength(1);
    expect(errors[0]?.message).toBe("poller iteration failed");
    expect(errors[0]?.fields).toEqual({ error: "boom" });
  });

  test("does not run at all when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    let calls = 0;

    await runIntervalLoop({
      name: "idle",
      intervalMs: 1,
      signal: controller.signal,
      runOnce: async () => {
        calls++;
      },
    });

    expect(calls).toBe(0);
  });
});

import { describe, expect, it, vi } from "vitest";
import type { PollOutcome } from "@maplink/types";
import { RunLoop, sleepUnlessAborted, type Pollable } from "./run-loop.js";
import { RecordingLogger } from "./testing.js";

const scripted = (steps: Array<() => Promise<readonly PollOutcome[]>>) => {
  let call = 0;
  const bot = {
    pollOnce: vi.fn(async () => {
      const step = steps[call];
      call += 1;
      return step ? step() : [];
    }),
    recordFailure: vi.fn(),
  } satisfies Pollable;
  return bot;
};

describe("RunLoop", () => {
  it("backs off after a failing iteration and keeps polling until aborted", async () => {
    const controller = new AbortController();
    const failure = new Error("reddit is down");
    const bot = scripted([
      async () => {
        throw failure;
      },
      async () => {
        controller.abort();
        return [];
      },
    ]);
    const sleeps: number[] = [];
    const logger = new RecordingLogger();
    const loop = new RunLoop(bot, {
      pollIntervalMs: 5,
      errorBackoffMs: 50,
      logger,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });

    await loop.run(controller.signal);

    expect(bot.pollOnce).toHaveBeenCalledTimes(2);
    expect(bot.recordFailure).toHaveBeenCalledWith(failure);
    expect(sleeps).toEqual([50, 5]);
    expect(logger.events()).toEqual(["bot_started", "poll_iteration_failed", "bot_stopped"]);
    expect(logger.entries[1]?.fields).toEqual({ error: "Error: reddit is down", backoffMs: 50 });
  });

  it("does not poll once the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const bot = scripted([]);

    await new RunLoop(bot, { sleep: async () => undefined }).run(controller.signal);

    expect(bot.pollOnce).not.toHaveBeenCalled();
  });

  it("rethrows from a single iteration", async () => {
    const bot = scripted([
      async () => {
        throw new Error("boom");
      },
    ]);

    await expect(new RunLoop(bot).runOnce()).rejects.toThrow("boom");
  });
});

describe("sleepUnlessAborted", () => {
  it("wakes up as soon as the signal aborts", async () => {
    const controller = new AbortController();
    const sleeping = sleepUnlessAborted(60_000, controller.signal);
    controller.abort();

    await expect(sleeping).resolves.toBeUndefined();
  });

  it("waits out the delay without a signal", async () => {
    vi.useFakeTimers();
    try {
      let done = false;
      const sleeping = sleepUnlessAborted(1_000).then(() => {
        done = true;
      });
      await vi.advanceTimersByTimeAsync(999);
      expect(done).toBe(false);
      await vi.advanceTimersByTimeAsync(1);
      await sleeping;
      expect(done).toBe(true);
    } finally {
      vi.useRealTimers();
    }
  });
});

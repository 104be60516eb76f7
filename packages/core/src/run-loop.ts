import type { Logger, PollOutcome } from "@maplink/types";
import { describeError, silentLogger } from "./logger.js";

export const DEFAULT_POLL_INTERVAL_MS = 3_000;
export const DEFAULT_ERROR_BACKOFF_MS = 15_000;

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export const sleepUnlessAborted: Sleeper = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });

export interface Pollable {
  pollOnce(): Promise<readonly PollOutcome[]>;
  recordFailure(error: unknown): void;
}

export interface RunLoopOptions {
  readonly pollIntervalMs?: number;
  readonly errorBackoffMs?: number;
  readonly logger?: Logger;
  readonly sleep?: Sleeper;
}

export class RunLoop {
  private readonly pollIntervalMs: number;
  private readonly errorBackoffMs: number;
  private readonly logger: Logger;
  private readonly sleep: Sleeper;

  constructor(
    private readonly bot: Pollable,
    options: RunLoopOptions = {},
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.errorBackoffMs = options.errorBackoffMs ?? DEFAULT_ERROR_BACKOFF_MS;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? sleepUnlessAborted;
  }

  /** Polls until `signal` aborts. Failed iterations are logged and backed off from. */
  async run(signal: AbortSignal): Promise<void> {
    this.logger.info("bot_started", { pollIntervalMs: this.pollIntervalMs });

    while (!signal.aborted) {
      try {
        await this.bot.pollOnce();
        await this.sleep(this.pollIntervalMs, signal);
      } catch (error) {
        this.bot.recordFailure(error);
        this.logger.error("poll_iteration_failed", {
          error: describeError(error),
          backoffMs: this.errorBackoffMs,
        });
        await this.sleep(this.errorBackoffMs, signal);
      }
    }

    this.logger.info("bot_stopped");
  }

  async runOnce(): Promise<readonly PollOutcome[]> {
    return this.bot.pollOnce();
  }
}

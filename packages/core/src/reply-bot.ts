import type {
  BotStats,
  Item,
  Logger,
  PollOutcome,
  ResourceReference,
  StreamKind,
  StreamSource,
  StreamState,
} from "@maplink/types";
import type { ComposedReply } from "./composer.js";
import { referencesFromItem } from "./extract.js";
import { describeError, silentLogger } from "./logger.js";
import { RecencySet } from "./recency-set.js";
import { isSameAccount, ReplyChecker } from "./reply-checker.js";

// Headroom over the poll size for items that arrive between polls.
export const SEEN_COMMENT_MARGIN = 100;
export const SEEN_SUBMISSION_MARGIN = 50;

export interface ReplyComposer {
  compose(references: readonly ResourceReference[]): Promise<ComposedReply>;
}

export interface ReplyBotOptions {
  readonly source: StreamSource;
  readonly composer: ReplyComposer;
  readonly botName: string;
  readonly limits: Readonly<Record<StreamKind, number>>;
  /** Defaults to a checker reading threads from `source`. */
  readonly checker?: Pick<ReplyChecker, "hasReplied">;
  /** Compose replies and log them instead of posting. */
  readonly dryRun?: boolean;
  readonly logger?: Logger;
}

/**
 * Walks each stream newest first and replies to items with beatmap links.
 * A walk stops at the first item it has seen before, or at the first item
 * Reddit already shows a reply from the bot on: everything older is
 * assumed handled.
 */
export class ReplyBot {
  readonly seen: Readonly<Record<StreamKind, RecencySet>>;
  private readonly states: Record<StreamKind, StreamState> = {
    comment: "idle",
    submission: "idle",
  };
  private readonly checker: Pick<ReplyChecker, "hasReplied">;
  private readonly logger: Logger;
  private iterations = 0;
  private repliesPosted = 0;
  private failures = 0;
  private lastIterationAt: Date | null = null;
  private lastError: string | null = null;

  constructor(private readonly options: ReplyBotOptions) {
    this.seen = {
      comment: new RecencySet(options.limits.comment + SEEN_COMMENT_MARGIN),
      submission: new RecencySet(options.limits.submission + SEEN_SUBMISSION_MARGIN),
    };
    this.checker = options.checker ?? new ReplyChecker(options.source, options.botName);
    this.logger = options.logger ?? silentLogger;
  }

  async pollOnce(): Promise<readonly PollOutcome[]> {
    this.iterations += 1;
    this.lastIterationAt = new Date();
    const comments = await this.pollStream("comment");
    const submissions = await this.pollStream("submission");
    return [comments, submissions];
  }

  async pollStream(kind: StreamKind): Promise<PollOutcome> {
    this.states[kind] = "walking";
    try {
      const outcome = await this.walk(kind);
      this.states[kind] = "done";
      return outcome;
    } catch (error) {
      this.states[kind] = "idle";
      throw error;
    }
  }

  recordFailure(error: unknown): void {
    this.failures += 1;
    this.lastError = describeError(error);
  }

  stats(): BotStats {
    return {
      iterations: this.iterations,
      repliesPosted: this.repliesPosted,
      failures: this.failures,
      lastIterationAt: this.lastIterationAt?.toISOString() ?? null,
      lastError: this.lastError,
      streams: { ...this.states },
    };
  }

  private async list(kind: StreamKind): Promise<readonly Item[]> {
    const limit = this.options.limits[kind];
    const items =
      kind === "comment"
        ? await this.options.source.listComments(limit)
        : await this.options.source.listNewSubmissions(limit);
    return items.slice(0, limit);
  }

  private async walk(kind: StreamKind): Promise<PollOutcome> {
    const seen = this.seen[kind];
    let scanned = 0;
    let replied = 0;

    for (const item of await this.list(kind)) {
      if (seen.has(item.id)) {
        return { kind, scanned, replied, stopReason: "seen" };
      }
      // recorded before anything can fail, so a failing item is never retried
      seen.add(item.id);
      scanned += 1;

      const references = referencesFromItem(item);
      if (references.length === 0) {
        this.logger.info("item_without_links", { kind, id: item.id });
        continue;
      }

      if (isSameAccount(item.author, this.options.botName)) {
        this.logger.info("skipping_self_authored", { kind, id: item.id });
        continue;
      }

      if (await this.checker.hasReplied(item)) {
        this.logger.info("already_replied", { kind, id: item.id });
        return { kind, scanned, replied, stopReason: "already_replied" };
      }

      await this.reply(item, await this.options.composer.compose(references));
      replied += 1;
    }

    return { kind, scanned, replied, stopReason: "exhausted" };
  }

  private async reply(item: Item, reply: ComposedReply): Promise<void> {
    if (this.options.dryRun) {
      this.logger.info("dry_run_reply", { kind: item.kind, id: item.id, text: reply.text });
      return;
    }

    this.logger.info("replying", { kind: item.kind, id: item.id, author: item.author });
    await this.options.source.postReply(item, reply.text);
    this.repliesPosted += 1;
    this.logger.info("reply_posted", {
      kind: item.kind,
      id: item.id,
      beatmaps: reply.included,
      dropped: reply.dropped,
    });
  }
}

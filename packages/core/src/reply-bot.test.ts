import { describe, expect, it, vi } from "vitest";
import type { Item } from "@maplink/types";
import type { BlockFormatter } from "./beatmap-formatter.js";
import { CommentComposer } from "./composer.js";
import { ReplyBot } from "./reply-bot.js";
import { comment, FakeStreamSource, RecordingLogger, renderedLink, submission } from "./testing.js";

const BOT = "MapBot";

const labelled: BlockFormatter = { format: async (ref) => `${ref.kind} ${ref.id}` };

const withMap = (id: string, beatmapId: number, author = "player"): Item =>
  comment({ id, author, bodyHtml: renderedLink(`https://osu.ppy.sh/b/${beatmapId}`) });

const setup = (options: { dryRun?: boolean } = {}) => {
  const source = new FakeStreamSource();
  const logger = new RecordingLogger();
  const composer = new CommentComposer(labelled, { header: "H", footer: "F" });
  const compose = vi.spyOn(composer, "compose");
  const bot = new ReplyBot({
    source,
    composer,
    botName: BOT,
    limits: { comment: 10, submission: 5 },
    dryRun: options.dryRun,
    logger,
  });
  return { source, logger, compose, bot };
};

describe("ReplyBot", () => {
  it("sizes the seen sets with headroom over the poll limits", () => {
    const { bot } = setup();

    expect(bot.seen.comment.capacity).toBe(110);
    expect(bot.seen.submission.capacity).toBe(55);
  });

  it("stops walking at the first item it has seen before", async () => {
    const { source, bot } = setup();
    const [a, b, c] = [withMap("a", 1), withMap("b", 2), withMap("c", 3)];
    source.comments = [a, b, c];
    bot.seen.comment.add("c");

    const outcome = await bot.pollStream("comment");

    expect(outcome).toEqual({ kind: "comment", scanned: 2, replied: 2, stopReason: "seen" });
    expect(bot.seen.comment.has("a")).toBe(true);
    expect(bot.seen.comment.has("b")).toBe(true);
    expect(source.threadReads).toEqual([a.permalink, b.permalink]);
    expect(source.posted).toEqual([
      { item: a, text: "H\n\nitem 1\n\nF" },
      { item: b, text: "H\n\nitem 2\n\nF" },
    ]);
  });

  it("treats an item Reddit already shows our reply on as the end of new items", async () => {
    const { source, bot, compose, logger } = setup();
    const [a, b] = [withMap("a", 1), withMap("b", 2)];
    source.comments = [a, b];
    source.threads.set(a.permalink, [
      { id: "a", author: "player", replies: [{ id: "r", author: "mapbot", replies: [] }] },
    ]);

    const outcome = await bot.pollStream("comment");

    expect(outcome).toEqual({ kind: "comment", scanned: 1, replied: 0, stopReason: "already_replied" });
    expect(bot.seen.comment.has("a")).toBe(true);
    expect(bot.seen.comment.has("b")).toBe(false);
    expect(compose).not.toHaveBeenCalled();
    expect(source.posted).toEqual([]);
    expect(logger.events()).toContain("already_replied");
  });

  it("never replies to its own items", async () => {
    const { source, bot, logger } = setup();
    const own = withMap("own", 1, "mapbot");
    const other = withMap("other", 2);
    source.comments = [own, other];

    const outcome = await bot.pollStream("comment");

    expect(outcome.replied).toBe(1);
    expect(source.posted.map((post) => post.item.id)).toEqual(["other"]);
    expect(source.threadReads).toEqual([other.permalink]);
    expect(logger.entries).toContainEqual({
      level: "info",
      event: "skipping_self_authored",
      fields: { kind: "comment", id: "own" },
    });
  });

  it("skips items without beatmap links but still remembers them", async () => {
    const { source, bot } = setup();
    source.comments = [comment({ id: "plain", bodyHtml: "&lt;p&gt;hello&lt;/p&gt;" })];

    const outcome = await bot.pollStream("comment");

    expect(outcome).toEqual({ kind: "comment", scanned: 1, replied: 0, stopReason: "exhausted" });
    expect(bot.seen.comment.has("plain")).toBe(true);
    expect(source.threadReads).toEqual([]);
  });

  it("does not retry an item whose reply failed", async () => {
    const { source, bot } = setup();
    source.comments = [withMap("a", 1)];
    source.failPost = new Error("rate limited");

    await expect(bot.pollStream("comment")).rejects.toThrow("rate limited");
    expect(bot.stats().streams.comment).toBe("idle");

    source.failPost = null;
    const outcome = await bot.pollStream("comment");

    expect(outcome.stopReason).toBe("seen");
    expect(source.posted).toEqual([]);
  });

  it("polls comments and then submissions", async () => {
    const { source, bot } = setup();
    const post = submission({ id: "s1", selftextHtml: renderedLink("https://osu.ppy.sh/s/40") });
    source.comments = [withMap("c1", 1)];
    source.submissions = [post];

    const outcomes = await bot.pollOnce();

    expect(outcomes.map((outcome) => [outcome.kind, outcome.replied])).toEqual([
      ["comment", 1],
      ["submission", 1],
    ]);
    expect(source.posted[1]).toEqual({ item: post, text: "H\n\ncollection 40\n\nF" });
    expect(bot.stats()).toMatchObject({
      iterations: 1,
      repliesPosted: 2,
      failures: 0,
      streams: { comment: "done", submission: "done" },
    });
  });

  it("only walks as many items as the poll limit", async () => {
    const { source, bot } = setup();
    source.submissions = Array.from({ length: 8 }, (_, index) => submission({ id: `s${index}` }));

    const outcome = await bot.pollStream("submission");

    expect(outcome.scanned).toBe(5);
  });

  it("logs instead of posting in dry-run mode", async () => {
    const { source, bot, logger } = setup({ dryRun: true });
    source.comments = [withMap("a", 7)];

    await bot.pollStream("comment");

    expect(source.posted).toEqual([]);
    expect(logger.entries).toContainEqual({
      level: "info",
      event: "dry_run_reply",
      fields: { kind: "comment", id: "a", text: "H\n\nitem 7\n\nF" },
    });
    expect(bot.stats().repliesPosted).toBe(0);
  });

  it("records failures reported by the run loop", () => {
    const { bot } = setup();

    bot.recordFailure(new TypeError("fetch failed"));

    expect(bot.stats()).toMatchObject({ failures: 1, lastError: "TypeError: fetch failed" });
  });
});

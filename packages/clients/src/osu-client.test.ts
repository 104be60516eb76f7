import { afterEach, describe, expect, it, vi } from "vitest";
import { RemoteError } from "./errors.js";
import { OsuApiClient } from "./osu-client.js";

const json = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });

const client = (maxRetryAttempts = 1) =>
  new OsuApiClient({ apiKey: "test-key", maxRetryAttempts, retryBaseDelayMs: 1 });

describe("OsuApiClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("queries get_beatmaps with b for beatmaps and s for sets", async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request) =>
      json([{ beatmap_id: "101", title: "Song", source: null }]),
    );
    vi.stubGlobal("fetch", fetchMock);

    const records = await client().lookup({ kind: "item", id: 101 });
    await client().lookup({ kind: "collection", id: 55 });

    expect(records).toEqual([{ beatmap_id: "101", title: "Song", source: null }]);
    const urls = fetchMock.mock.calls.map(([input]) => new URL(String(input)));
    expect(urls[0]?.pathname).toBe("/api/get_beatmaps");
    expect(urls[0]?.searchParams.get("k")).toBe("test-key");
    expect(urls[0]?.searchParams.get("b")).toBe("101");
    expect(urls[1]?.searchParams.get("s")).toBe("55");
    expect(urls[1]?.searchParams.has("b")).toBe(false);
  });

  it("returns an empty list for unknown beatmaps", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => json([])));

    await expect(client().lookup({ kind: "item", id: 1 })).resolves.toEqual([]);
  });

  it("raises a RemoteError when the API reports an error", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => json({ error: "Please provide a valid API key." })));

    await expect(client().lookup({ kind: "item", id: 1 })).rejects.toThrow(
      new RemoteError("osu!api returned an error of Please provide a valid API key."),
    );
  });

  it("retries server errors before giving up with a RemoteError", async () => {
    const fetchMock = vi.fn(async () => json({}, 502));
    vi.stubGlobal("fetch", fetchMock);

    const failure = await client(2)
      .lookup({ kind: "item", id: 1 })
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(RemoteError);
    expect(failure).toMatchObject({ status: 502 });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("wraps network failures", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      }),
    );

    await expect(client().lookup({ kind: "item", id: 1 })).rejects.toBeInstanceOf(RemoteError);
  });

  it("rejects responses of the wrong shape", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => json({ beatmaps: [] })));

    await expect(client().lookup({ kind: "collection", id: 3 })).rejects.toThrow(
      "Unexpected get_beatmaps response for collection 3",
    );
  });
});

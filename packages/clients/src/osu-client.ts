import { z } from "zod";
import type { BeatmapRecord, Logger, MetadataLookup, ResourceReference } from "@maplink/types";
import { RemoteError } from "./errors.js";
import { fetchJson, type HttpRetryConfig } from "./http.js";

const DEFAULT_BASE_URL = "https://osu.ppy.sh/api";

const beatmapsSchema = z.array(z.record(z.string(), z.string().nullable()));
const apiErrorSchema = z.object({ error: z.string() });

export interface OsuApiClientConfig extends HttpRetryConfig {
  readonly apiKey: string;
  readonly baseUrl?: string;
  readonly logger?: Logger;
}

/** Client for the osu! API v1 `get_beatmaps` endpoint. */
export class OsuApiClient implements MetadataLookup {
  constructor(private readonly config: OsuApiClientConfig) {}

  async lookup(ref: ResourceReference): Promise<readonly BeatmapRecord[]> {
    const url = new URL(`${this.config.baseUrl ?? DEFAULT_BASE_URL}/get_beatmaps`);
    url.searchParams.set("k", this.config.apiKey);
    url.searchParams.set(ref.kind === "item" ? "b" : "s", String(ref.id));

    const body = await fetchJson(
      url.toString(),
      async () => ({ headers: { accept: "application/json" } }),
      {
        label: `get_beatmaps ${ref.kind} ${ref.id}`,
        retry: this.config,
        logger: this.config.logger,
        fail: (message, status, cause) => new RemoteError(message, { status, cause }),
      },
    );

    const apiError = apiErrorSchema.safeParse(body);
    if (apiError.success) {
      throw new RemoteError(`osu!api returned an error of ${apiError.data.error}`);
    }

    const parsed = beatmapsSchema.safeParse(body);
    if (!parsed.success) {
      throw new RemoteError(`Unexpected get_beatmaps response for ${ref.kind} ${ref.id}`);
    }
    return parsed.data;
  }
}

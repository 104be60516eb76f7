import { z } from "zod";
import type { CommentNode, Item, Logger, StreamSource } from "@maplink/types";
import { PlatformError } from "./errors.js";
import { fetchJson, type HttpRetryConfig } from "./http.js";

const TOKEN_URL = "https://www.reddit.com/api/v1/access_token";
const API_BASE = "https://oauth.reddit.com";
const TOKEN_EXPIRY_MARGIN_MS = 60_000;
/** Reddit returns at most this many children per listing page. */
export const LISTING_PAGE_SIZE = 100;

const listingChildSchema = z.object({
  kind: z.string(),
  data: z.record(z.string(), z.unknown()),
});

const listingSchema = z.object({
  data: z.object({
    after: z.string().nullish(),
    children: z.array(listingChildSchema),
  }),
});

const commentDataSchema = z.object({
  id: z.string(),
  author: z.string().nullish(),
  permalink: z.string(),
  body_html: z.string().nullish(),
  replies: z.unknown().optional(),
});

const treeCommentSchema = commentDataSchema.extend({ permalink: z.string().optional() });

const submissionDataSchema = z.object({
  id: z.string(),
  author: z.string().nullish(),
  permalink: z.string(),
  selftext_html: z.string().nullish(),
});

const tokenSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive(),
});

const apiErrorSchema = z.object({ error: z.union([z.string(), z.number()]) });

const commentResponseSchema = z.object({
  json: z.object({
    errors: z.array(z.array(z.unknown())).default([]),
  }),
});

type ListingChild = z.infer<typeof listingChildSchema>;

export interface RedditClientConfig extends HttpRetryConfig {
  readonly clientId: string;
  readonly clientSecret: string;
  readonly username: string;
  readonly password: string;
  readonly userAgent: string;
  readonly subreddit: string;
  readonly logger?: Logger;
}

interface AccessToken {
  readonly value: string;
  readonly expiresAt: number;
}

const toAuthor = (author: string | null | undefined): string | null =>
  !author || author === "[deleted]" ? null : author;

export class RedditClient implements StreamSource {
  private token: AccessToken | null = null;

  constructor(private readonly config: RedditClientConfig) {}

  async listComments(limit: number): Promise<readonly Item[]> {
    const listing = await this.getListing(`/r/${this.config.subreddit}/comments`, limit);
    const items: Item[] = [];
    for (const child of listing) {
      if (child.kind !== "t1") {
        continue;
      }
      const parsed = commentDataSchema.safeParse(child.data);
      if (!parsed.success) {
        continue;
      }
      items.push({
        kind: "comment",
        id: parsed.data.id,
        author: toAuthor(parsed.data.author),
        permalink: parsed.data.permalink,
        bodyHtml: parsed.data.body_html ?? "",
      });
    }
    return items;
  }

  async listNewSubmissions(limit: number): Promise<readonly Item[]> {
    const listing = await this.getListing(`/r/${this.config.subreddit}/new`, limit);
    const items: Item[] = [];
    for (const child of listing) {
      if (child.kind !== "t3") {
        continue;
      }
      const parsed = submissionDataSchema.safeParse(child.data);
      if (!parsed.success) {
        continue;
      }
      items.push({
        kind: "submission",
        id: parsed.data.id,
        author: toAuthor(parsed.data.author),
        permalink: parsed.data.permalink,
        selftextHtml: parsed.data.selftext_html ?? null,
      });
    }
    return items;
  }

  async getSubmissionComments(permalink: string): Promise<readonly CommentNode[]> {
    const body = await this.request("GET", permalink, { limit: "500", depth: "2" });
    const parsed = z.array(listingSchema).min(2).safeParse(body);
    if (!parsed.success) {
      throw new PlatformError(`Unexpected comment tree shape for ${permalink}`);
    }
    const [, comments] = parsed.data;
    return comments ? this.toCommentNodes(comments.data.children) : [];
  }

  async postReply(item: Item, text: string): Promise<void> {
    const thingId = item.kind === "comment" ? `t1_${item.id}` : `t3_${item.id}`;
    const body = await this.request(
      "POST",
      "/api/comment",
      undefined,
      { api_type: "json", thing_id: thingId, text },
      false,
    );

    const parsed = commentResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new PlatformError(`Unexpected reply response for ${thingId}`);
    }
    if (parsed.data.json.errors.length > 0) {
      const reasons = parsed.data.json.errors.map((entry) => entry.map(String).join(": "));
      throw new PlatformError(`Reply to ${thingId} rejected: ${reasons.join("; ")}`);
    }
  }

  private toCommentNodes(children: readonly ListingChild[]): CommentNode[] {
    const nodes: CommentNode[] = [];
    for (const child of children) {
      // "more" stubs carry no author
      if (child.kind !== "t1") {
        continue;
      }
      const parsed = treeCommentSchema.safeParse(child.data);
      if (!parsed.success) {
        continue;
      }
      // an empty string when there are no replies
      const replies = listingSchema.safeParse(parsed.data.replies);
      nodes.push({
        id: parsed.data.id,
        author: toAuthor(parsed.data.author),
        replies: replies.success ? this.toCommentNodes(replies.data.data.children) : [],
      });
    }
    return nodes;
  }

  private async getListing(path: string, limit: number): Promise<readonly ListingChild[]> {
    const children: ListingChild[] = [];
    let after: string | null = null;
    while (children.length < limit) {
      const query: Record<string, string> = {
        limit: String(Math.min(LISTING_PAGE_SIZE, limit - children.length)),
      };
      if (after) {
        query.after = after;
      }
      const body = await this.request("GET", path, query);
      const parsed = listingSchema.safeParse(body);
      if (!parsed.success) {
        throw new PlatformError(`Unexpected listing shape for ${path}`);
      }
      children.push(...parsed.data.data.children);
      after = parsed.data.data.after ?? null;
      if (!after || parsed.data.data.children.length === 0) {
        break;
      }
    }
    return children.slice(0, limit);
  }

  private async request(
    method: "GET" | "POST",
    path: string,
    query?: Record<string, string>,
    form?: Record<string, string>,
    retryUnsafe = true,
  ): Promise<unknown> {
    const url = new URL(path, API_BASE);
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, value);
    }

    return fetchJson(
      url.toString(),
      async () => ({
        method,
        headers: {
          authorization: `bearer ${await this.accessToken()}`,
          "user-agent": this.config.userAgent,
          accept: "application/json",
          ...(form ? { "content-type": "application/x-www-form-urlencoded" } : {}),
        },
        ...(form ? { body: new URLSearchParams(form).toString() } : {}),
      }),
      {
        label: `${method} ${path}`,
        retry: this.config,
        retryUnsafe,
        logger: this.config.logger,
        fail: (message, status, cause) => new PlatformError(message, { status, cause }),
        onUnauthorized: () => {
          this.token = null;
        },
      },
    );
  }

  private async accessToken(): Promise<string> {
    if (this.token && this.token.expiresAt > Date.now()) {
      return this.token.value;
    }

    const credentials = Buffer.from(`${this.config.clientId}:${this.config.clientSecret}`).toString(
      "base64",
    );
    const body = await fetchJson(
      TOKEN_URL,
      async () => ({
        method: "POST",
        headers: {
          authorization: `Basic ${credentials}`,
          "user-agent": this.config.userAgent,
          "content-type": "application/x-www-form-urlencoded",
        },
        body: new URLSearchParams({
          grant_type: "password",
          username: this.config.username,
          password: this.config.password,
        }).toString(),
      }),
      {
        label: "POST /api/v1/access_token",
        retry: this.config,
        logger: this.config.logger,
        fail: (message, status, cause) => new PlatformError(message, { status, cause }),
      },
    );

    const parsed = tokenSchema.safeParse(body);
    if (!parsed.success) {
      const apiError = apiErrorSchema.safeParse(body);
      const reason = apiError.success ? String(apiError.data.error) : "malformed token response";
      throw new PlatformError(`Reddit authentication failed: ${reason}`);
    }

    this.token = {
      value: parsed.data.access_token,
      expiresAt: Date.now() + parsed.data.expires_in * 1000 - TOKEN_EXPIRY_MARGIN_MS,
    };
    return this.token.value;
  }
}

import type { BeatmapRecord, CommentNode, Item, ResourceReference } from "./models.js";

export interface StreamSource {
  /** Newest first. */
  listComments(limit: number): Promise<readonly Item[]>;
  /** Newest first. */
  listNewSubmissions(limit: number): Promise<readonly Item[]>;
  /** First-level comments of the thread at `permalink`, with their replies. */
  getSubmissionComments(permalink: string): Promise<readonly CommentNode[]>;
  postReply(item: Item, text: string): Promise<void>;
}

export interface MetadataLookup {
  /** Resolves to `[]` when the resource does not exist. */
  lookup(ref: ResourceReference): Promise<readonly BeatmapRecord[]>;
}

export type LogFields = Readonly<Record<string, unknown>>;

export interface Logger {
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
}

import type {
  BeatmapRecord,
  CommentItem,
  CommentNode,
  Item,
  LogFields,
  Logger,
  MetadataLookup,
  ResourceReference,
  StreamSource,
  SubmissionItem,
} from "@maplink/types";
import { referenceKey } from "@maplink/types";

export interface LogEntry {
  readonly level: "info" | "warn" | "error";
  readonly event: string;
  readonly fields: LogFields | undefined;
}

export class RecordingLogger implements Logger {
  readonly entries: LogEntry[] = [];

  info(event: string, fields?: LogFields): void {
    this.entries.push({ level: "info", event, fields });
  }

  warn(event: string, fields?: LogFields): void {
    this.entries.push({ level: "warn", event, fields });
  }

  error(event: string, fields?: LogFields): void {
    this.entries.push({ level: "error", event, fields });
  }

  events(): string[] {
    return this.entries.map((entry) => entry.event);
  }
}

/** Wraps a link the way Reddit renders it in `body_html`: escaped markup. */
export const renderedLink = (url: string, text: string = url): string =>
  `&lt;div class="md"&gt;&lt;p&gt;&lt;a href="${url.replaceAll("&", "&amp;amp;")}"&gt;${text.replaceAll("&", "&amp;amp;")}&lt;/a&gt;&lt;/p&gt;&lt;/div&gt;`;

export const comment = (overrides: Partial<CommentItem> & { id: string }): CommentItem => ({
  kind: "comment",
  author: "someone",
  permalink: `/r/osugame/comments/t/thread/${overrides.id}/`,
  bodyHtml: "",
  ...overrides,
});

export const submission = (overrides: Partial<SubmissionItem> & { id: string }): SubmissionItem => ({
  kind: "submission",
  author: "someone",
  permalink: `/r/osugame/comments/${overrides.id}/thread/`,
  selftextHtml: null,
  ...overrides,
});

/** In-memory Reddit: streams, threads keyed by permalink, and posted replies. */
export class FakeStreamSource implements StreamSource {
  comments: Item[] = [];
  submissions: Item[] = [];
  readonly threads = new Map<string, CommentNode[]>();
  readonly posted: Array<{ item: Item; text: string }> = [];
  readonly threadReads: string[] = [];
  failPost: Error | null = null;

  async listComments(limit: number): Promise<readonly Item[]> {
    return this.comments.slice(0, limit);
  }

  async listNewSubmissions(limit: number): Promise<readonly Item[]> {
    return this.submissions.slice(0, limit);
  }

  async getSubmissionComments(permalink: string): Promise<readonly CommentNode[]> {
    this.threadReads.push(permalink);
    return this.threads.get(permalink) ?? [];
  }

  async postReply(item: Item, text: string): Promise<void> {
    if (this.failPost) {
      throw this.failPost;
    }
    this.posted.push({ item, text });
  }
}

export class FakeMetadataLookup implements MetadataLookup {
  readonly records = new Map<string, BeatmapRecord[]>();
  readonly calls: ResourceReference[] = [];

  set(ref: ResourceReference, records: BeatmapRecord[]): this {
    this.records.set(referenceKey(ref), records);
    return this;
  }

  async lookup(ref: ResourceReference): Promise<readonly BeatmapRecord[]> {
    this.calls.push(ref);
    return this.records.get(referenceKey(ref)) ?? [];
  }
}

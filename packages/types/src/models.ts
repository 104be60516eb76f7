export type StreamKind = "comment" | "submission";

export interface CommentItem {
  readonly kind: "comment";
  readonly id: string;
  readonly author: string | null;
  readonly permalink: string;
  readonly bodyHtml: string;
}

export interface SubmissionItem {
  readonly kind: "submission";
  readonly id: string;
  readonly author: string | null;
  readonly permalink: string;
  readonly selftextHtml: string | null;
}

export type Item = CommentItem | SubmissionItem;

export type ReferenceKind = "item" | "collection";

/** A single beatmap (`item`) or a beatmap set (`collection`) linked from an item. */
export interface ResourceReference {
  readonly kind: ReferenceKind;
  readonly id: number;
}

export interface CommentNode {
  readonly id: string;
  readonly author: string | null;
  readonly replies: readonly CommentNode[];
}

/** One row of a `get_beatmaps` response. The API returns every field as a string. */
export type BeatmapRecord = Readonly<Record<string, string | null>>;

export type StreamState = "idle" | "walking" | "done";

export type StopReason = "seen" | "already_replied" | "exhausted";

export interface PollOutcome {
  readonly kind: StreamKind;
  readonly scanned: number;
  readonly replied: number;
  readonly stopReason: StopReason;
}

export interface BotStats {
  readonly iterations: number;
  readonly repliesPosted: number;
  readonly failures: number;
  readonly lastIterationAt: string | null;
  readonly lastError: string | null;
  readonly streams: Readonly<Record<StreamKind, StreamState>>;
}

export const referenceKey = (ref: ResourceReference): string => `${ref.kind}:${ref.id}`;

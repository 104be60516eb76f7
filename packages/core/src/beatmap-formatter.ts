import type { MetadataLookup, ResourceReference } from "@maplink/types";
import { escapeMarkdown } from "./markdown.js";
import { renderTemplate, type TemplateValue } from "./template.js";

/** Maps a raw API field to display text, e.g. `approved: "1"` to `Ranked`. */
export interface TemplateExtra {
  readonly field: string;
  readonly values: Readonly<Record<string, string>>;
}

export interface BeatmapTemplates {
  readonly map: string;
  readonly mapset: string;
  readonly invalidMap?: string;
  readonly invalidMapset?: string;
  readonly extras?: Readonly<Record<string, TemplateExtra>>;
}

const ESCAPED_FIELDS = ["artist", "creator", "source", "title", "version"] as const;
const CLOCK_FIELDS = ["hit_length", "total_length"] as const;

export const secondsToString = (seconds: number): string =>
  `${Math.floor(seconds / 60)}:${String(seconds % 60).padStart(2, "0")}`;

export interface BlockFormatter {
  format(ref: ResourceReference): Promise<string>;
}

export class BeatmapFormatter implements BlockFormatter {
  constructor(
    private readonly metadata: MetadataLookup,
    private readonly templates: BeatmapTemplates,
  ) {}

  async format(ref: ResourceReference): Promise<string> {
    const records = await this.metadata.lookup(ref);
    const [first] = records;
    if (!first) {
      return ref.kind === "item"
        ? (this.templates.invalidMap ?? "Invalid map.")
        : (this.templates.invalidMapset ?? "Invalid mapset.");
    }

    const values: Record<string, TemplateValue> = { ...first };

    for (const [name, extra] of Object.entries(this.templates.extras ?? {})) {
      const raw = first[extra.field];
      values[name] = raw == null ? null : (extra.values[raw] ?? raw);
    }

    const rating = Number(first.difficultyrating);
    if (first.difficultyrating != null && Number.isFinite(rating)) {
      values.difficultyrating = rating;
    }

    for (const field of CLOCK_FIELDS) {
      const raw = first[field];
      const seconds = Number(raw);
      if (raw != null && Number.isInteger(seconds)) {
        values[field] = secondsToString(seconds);
      }
    }

    for (const field of ESCAPED_FIELDS) {
      const raw = first[field];
      if (raw != null) {
        values[field] = escapeMarkdown(raw);
      }
    }

    return renderTemplate(records.length === 1 ? this.templates.map : this.templates.mapset, values);
  }
}

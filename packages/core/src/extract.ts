import { decodeHTML } from "entities";
import {
  referenceKey,
  type Item,
  type ReferenceKind,
  type ResourceReference,
} from "@maplink/types";

export const BEATMAP_HOST = "osu.ppy.sh";

// The anchor text must repeat the href so a link cannot hide where it points.
const ANCHOR_PATTERN = /<a href="(https:\/\/osu\.ppy\.sh\/[^"]+)">\1<\/a>/g;
const DIGITS = /^\d+$/;
// `URL#pathname` resolves dot segments; match on the path as written
const RAW_PATH = /^[a-z][a-z\d+.-]*:\/\/[^/?#]*(\/[^?#]*)?/i;

/**
 * Parses a beatmap URL. Recognised shapes:
 *
 *   https://osu.ppy.sh/b/244182
 *   https://osu.ppy.sh/s/295480
 *   https://osu.ppy.sh/p/beatmap?b=115891&m=0
 *   https://osu.ppy.sh/p/beatmap?s=295480
 *
 * `b` wins over `s` whenever it is present, even if its value is not a number.
 */
export function parseResourceUrl(url: string): ResourceReference | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }

  if (parsed.hostname !== BEATMAP_HOST) {
    return null;
  }

  let kind: ReferenceKind | null = null;
  let rawId: string | null = null;
  const path = RAW_PATH.exec(url)?.[1] ?? "/";

  if (path.startsWith("/b/")) {
    kind = "item";
    rawId = path.slice(3);
  } else if (path.startsWith("/s/")) {
    kind = "collection";
    rawId = path.slice(3);
  } else if (path === "/p/beatmap") {
    const beatmapId = parsed.searchParams.get("b");
    const setId = parsed.searchParams.get("s");
    if (beatmapId) {
      kind = "item";
      rawId = beatmapId;
    } else if (setId) {
      kind = "collection";
      rawId = setId;
    }
  }

  if (kind === null || rawId === null) {
    return null;
  }

  const ampersand = rawId.indexOf("&");
  if (ampersand !== -1) {
    rawId = rawId.slice(0, ampersand);
  }

  if (!DIGITS.test(rawId)) {
    return null;
  }
  const id = Number(rawId);
  return Number.isSafeInteger(id) ? { kind, id } : null;
}

/**
 * Finds beatmap links in rendered item HTML, in document order. Duplicates
 * are kept; the composer removes them.
 */
export function extractReferences(html: string): ResourceReference[] {
  const references: ResourceReference[] = [];
  for (const match of decodeHTML(html).matchAll(ANCHOR_PATTERN)) {
    const url = match[1];
    if (url === undefined) {
      continue;
    }
    const ref = parseResourceUrl(decodeHTML(url));
    if (ref) {
      references.push(ref);
    }
  }
  return references;
}

export function referencesFromItem(item: Item): ResourceReference[] {
  switch (item.kind) {
    case "comment":
      return extractReferences(item.bodyHtml);
    case "submission":
      return item.selftextHtml ? extractReferences(item.selftextHtml) : [];
  }
}

export function uniqueReferences(refs: readonly ResourceReference[]): ResourceReference[] {
  const seen = new Set<string>();
  return refs.filter((ref) => {
    const key = referenceKey(ref);
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}

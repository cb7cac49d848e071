const CITATION_PATTERN = /\[(\d+)\]/g;

export type ContentSegment =
  | { type: "text"; text: string }
  | { type: "citation"; index: number; url: string | null };

export type IndexedSource = {
  index: number;
  url: string;
};

function sourceAt(sources: readonly string[], index: number): string | null {
  return index >= 1 && index <= sources.length ? sources[index - 1] : null;
}

/**
 * Splits content on `[n]` markers. A marker resolves to the n-th source
 * (1-indexed); markers with no matching source keep `url: null` and are
 * rendered as plain text.
 */
export function resolveCitations(
  content: string,
  sources: readonly string[]
): ContentSegment[] {
  const segments: ContentSegment[] = [];
  let cursor = 0;

  for (const match of content.matchAll(CITATION_PATTERN)) {
    const start = match.index ?? cursor;
    if (start > cursor) {
      segments.push({ type: "text", text: content.slice(cursor, start) });
    }
    const index = Number(match[1]);
    segments.push({ type: "citation", index, url: sourceAt(sources, index) });
    cursor = start + match[0].length;
  }

  if (cursor < content.length) {
    segments.push({ type: "text", text: content.slice(cursor) });
  }
  return segments;
}

export function citedSources(
  content: string,
  sources: readonly string[]
): IndexedSource[] {
  return sources
    .map((url, i) => ({ index: i + 1, url }))
    .filter((s) => content.includes(`[${s.index}]`));
}

const OPEN_TAG = "<think>";
const SPAN_PATTERN = /<think>([\s\S]*?)<\/think>/g;

export type ThinkingSplit = {
  content: string;
  thinking: string[];
  pending: string | null;
};

/**
 * Splits accumulated model output into visible content and `<think>` blocks.
 *
 * Closed spans are extracted in order. Anything after an unclosed `<think>` is
 * returned as `pending` and belongs to neither list until its closing tag
 * arrives. Cheap enough to re-run on every streamed update.
 */
export function parseThinking(raw: string): ThinkingSplit {
  const thinking: string[] = [];
  let visible = "";
  let cursor = 0;

  for (const match of raw.matchAll(SPAN_PATTERN)) {
    const start = match.index ?? cursor;
    visible += raw.slice(cursor, start);
    thinking.push(match[1].trim());
    cursor = start + match[0].length;
  }

  let rest = raw.slice(cursor);
  let pending: string | null = null;
  const open = rest.indexOf(OPEN_TAG);
  if (open >= 0) {
    pending = rest.slice(open + OPEN_TAG.length);
    rest = rest.slice(0, open);
  }
  visible += rest;

  return { content: visible.trim(), thinking, pending };
}

import { Marked } from "marked";
import { markedTerminal } from "marked-terminal";

export type MarkdownRenderer = {
  render(markdown: string): string;
};

export type MarkdownOptions = {
  /** Fixed wrap width; follows the terminal when omitted. */
  width?: number;
};

/**
 * Terminal markdown for finished answers. One parser is kept per wrap
 * width, so a resized terminal gets a fresh one on the next render.
 */
export function createMarkdownRenderer(options: MarkdownOptions = {}): MarkdownRenderer {
  const parsers = new Map<number, Marked>();

  function parserFor(width: number): Marked {
    let parser = parsers.get(width);
    if (!parser) {
      parser = new Marked();
      // @types/marked-terminal doesn't match marked's extension type
      parser.use(markedTerminal({ width, reflowText: true, tab: 2 }) as object);
      parsers.set(width, parser);
    }
    return parser;
  }

  return {
    render(markdown) {
      const width = options.width ?? (process.stdout.columns || 80);
      const result = parserFor(width).parse(markdown, { async: false });
      return typeof result === "string" ? result.trimEnd() : markdown;
    },
  };
}

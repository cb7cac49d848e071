import chalk from "chalk";
import { citedSources, resolveCitations } from "../content/citations.js";
import type { RenderedMessage, SearchResult } from "../types.js";
import type { MarkdownRenderer } from "./markdown.js";

export type RendererOptions = {
  plain?: boolean;
  markdown?: MarkdownRenderer;
};

export type Renderer = {
  /** Writes whatever visible content arrived since the last call. */
  assistantUpdate(message: RenderedMessage): void;
  /** Replaces the streamed text with the final formatted message. */
  assistantEnd(message: RenderedMessage): void;
  assistantComplete(message: RenderedMessage): void;
  searchResults(results: SearchResult[]): void;
  error(message: string): void;
  info(message: string): void;
};

function linkCitations(text: string, sources: readonly string[]): string {
  return resolveCitations(text, sources)
    .map((segment) => {
      if (segment.type === "text") return segment.text;
      const marker = `[${segment.index}]`;
      return segment.url ? chalk.blue(marker) : marker;
    })
    .join("");
}

const SNIPPET_WORDS = 50;

export function trimSnippet(text: string, maxWords = SNIPPET_WORDS): string {
  const words = text.trim().split(/\s+/).filter(Boolean);
  if (words.length <= maxWords) return words.join(" ");
  return words.slice(0, maxWords).join(" ") + "...";
}

export function createRenderer(options: RendererOptions = {}): Renderer {
  const plain = options.plain ?? false;
  let written = "";

  function writeDelta(message: RenderedMessage): void {
    if (!message.content.startsWith(written)) return;
    const delta = message.content.slice(written.length);
    if (!delta) return;
    if (!written) process.stdout.write("\n");
    written = message.content;
    process.stdout.write(delta);
  }

  if (plain) {
    const printPlain = (message: RenderedMessage): void => {
      for (const block of message.thinking) {
        console.log(`[thinking] ${block}`);
      }
      const cited = citedSources(message.content, message.sources);
      if (cited.length > 0) {
        console.log("");
        for (const source of cited) {
          console.log(`[${source.index}] ${source.url}`);
        }
      }
      if (message.error) console.error(message.error);
    };

    return {
      assistantUpdate: writeDelta,
      assistantEnd(message) {
        process.stdout.write("\n");
        written = "";
        printPlain(message);
      },
      assistantComplete(message) {
        process.stdout.write(message.content + "\n");
        printPlain(message);
      },
      searchResults(results) {
        if (results.length === 0) {
          console.log("No results found.");
          return;
        }
        results.forEach((result, i) => {
          console.log(`${i + 1}. ${result.title}`);
          console.log(`   ${result.url}`);
          if (result.snippet) console.log(`   ${trimSnippet(result.snippet)}`);
        });
      },
      error(message) {
        console.error(message);
      },
      info(message) {
        console.log(message);
      },
    };
  }

  function countLines(text: string): number {
    const cols = process.stdout.columns || 80;
    let count = 0;
    for (const line of text.split("\n")) {
      count += Math.max(1, Math.ceil(line.length / cols));
    }
    return count;
  }

  function clearLines(count: number): void {
    for (let i = 0; i < count; i++) {
      process.stdout.write("\x1b[2K"); // Clear line
      if (i < count - 1) {
        process.stdout.write("\x1b[1A"); // Move up
      }
    }
    process.stdout.write("\r");
  }

  function printFormatted(message: RenderedMessage): void {
    for (const block of message.thinking) {
      console.log(chalk.dim.italic(`Thinking: ${block}`));
    }
    if (message.content) {
      const body = options.markdown ? options.markdown.render(message.content) : message.content;
      process.stdout.write(linkCitations(body, message.sources) + "\n");
    }

    const cited = citedSources(message.content, message.sources);
    if (cited.length > 0) {
      console.log("");
      for (const source of cited) {
        console.log(chalk.dim(`[${source.index}] `) + chalk.blue.underline(source.url));
      }
    }
    if (message.error) {
      console.error(chalk.red(message.error));
    }
  }

  return {
    assistantUpdate: writeDelta,

    assistantEnd(message) {
      if (written) {
        clearLines(countLines(written));
      } else {
        process.stdout.write("\n");
      }
      written = "";
      printFormatted(message);
    },

    assistantComplete(message) {
      printFormatted(message);
    },

    searchResults(results) {
      if (results.length === 0) {
        console.log(chalk.dim("No results found."));
        return;
      }
      results.forEach((result, i) => {
        if (i > 0) console.log("");
        console.log(chalk.dim(`${i + 1}. `) + chalk.bold(result.title));
        console.log("   " + chalk.blue.underline(result.url));
        if (result.snippet) console.log("   " + chalk.dim(trimSnippet(result.snippet)));
      });
    },

    error(message) {
      console.error(chalk.red(message));
    },

    info(message) {
      console.log(chalk.dim(message));
    },
  };
}

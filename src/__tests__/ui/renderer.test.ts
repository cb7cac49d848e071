import { describe, it, expect, vi, beforeEach } from "vitest";
import type { MockInstance } from "vitest";
import chalk from "chalk";
import { createRenderedMessage } from "../../client/consumer.js";
import type { RenderedMessage } from "../../types.js";
import type { MarkdownRenderer } from "../../ui/markdown.js";
import { createRenderer, trimSnippet } from "../../ui/renderer.js";

let stdoutWriteSpy: MockInstance<typeof process.stdout.write>;
let consoleLogSpy: ReturnType<typeof vi.spyOn>;
let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

beforeEach(() => {
  stdoutWriteSpy = vi.spyOn(process.stdout, "write").mockReturnValue(true);
  consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
});

function message(fields: Partial<RenderedMessage>): RenderedMessage {
  return { ...createRenderedMessage(), ...fields };
}

function createMockMarkdown(output: string): MarkdownRenderer {
  return { render: vi.fn(() => output) };
}

describe("plain mode", () => {
  it("writes only the growth of the visible content", () => {
    const r = createRenderer({ plain: true });

    r.assistantUpdate(message({ content: "Hel" }));
    r.assistantUpdate(message({ content: "Hel" }));
    r.assistantUpdate(message({ content: "Hello" }));

    expect(stdoutWriteSpy.mock.calls).toEqual([["\n"], ["Hel"], ["lo"]]);
  });

  it("skips writing while the answer is still empty", () => {
    const r = createRenderer({ plain: true });
    r.assistantUpdate(message({ pending: "reasoning" }));
    expect(stdoutWriteSpy).not.toHaveBeenCalled();
  });

  it("lists reasoning and cited sources at the end", () => {
    const r = createRenderer({ plain: true });

    r.assistantEnd(
      message({
        content: "Answer [2]",
        thinking: ["plan"],
        sources: ["https://a", "https://b"],
        streaming: false,
      })
    );

    expect(stdoutWriteSpy).toHaveBeenCalledWith("\n");
    expect(consoleLogSpy.mock.calls).toEqual([["[thinking] plan"], [""], ["[2] https://b"]]);
  });

  it("reports a stream error", () => {
    const r = createRenderer({ plain: true });
    r.assistantEnd(message({ content: "Part", error: "Rate limited.", streaming: false }));
    expect(consoleErrorSpy).toHaveBeenCalledWith("Rate limited.");
  });

  it("writes a complete answer at once", () => {
    const r = createRenderer({ plain: true });
    r.assistantComplete(message({ content: "hello", streaming: false }));
    expect(stdoutWriteSpy).toHaveBeenCalledWith("hello\n");
  });

  it("prints info and errors as is", () => {
    const r = createRenderer({ plain: true });
    r.info("some info");
    r.error("bad thing");
    expect(consoleLogSpy).toHaveBeenCalledWith("some info");
    expect(consoleErrorSpy).toHaveBeenCalledWith("bad thing");
  });
});

describe("formatted mode", () => {
  it("renders markdown and highlights resolved citations", () => {
    const markdown = createMockMarkdown("rendered [1] and [3]");
    const r = createRenderer({ markdown });

    r.assistantComplete(
      message({ content: "raw [1] and [3]", sources: ["https://a"], streaming: false })
    );

    expect(markdown.render).toHaveBeenCalledWith("raw [1] and [3]");
    expect(stdoutWriteSpy).toHaveBeenCalledWith(
      "rendered " + chalk.blue("[1]") + " and [3]\n"
    );
    expect(consoleLogSpy).toHaveBeenCalledWith(
      chalk.dim("[1] ") + chalk.blue.underline("https://a")
    );
  });

  it("shows reasoning dimmed before the answer", () => {
    const r = createRenderer();
    r.assistantComplete(message({ content: "x", thinking: ["weigh it"], streaming: false }));
    expect(consoleLogSpy).toHaveBeenCalledWith(chalk.dim.italic("Thinking: weigh it"));
  });

  it("clears the streamed text before printing the final message", () => {
    const r = createRenderer({ markdown: createMockMarkdown("final") });

    r.assistantUpdate(message({ content: "draft" }));
    r.assistantEnd(message({ content: "draft", streaming: false }));

    expect(stdoutWriteSpy).toHaveBeenCalledWith("\x1b[2K");
    expect(stdoutWriteSpy).toHaveBeenLastCalledWith("final\n");
  });

  it("paints errors red", () => {
    const r = createRenderer();
    r.error("bad thing");
    expect(consoleErrorSpy).toHaveBeenCalledWith(chalk.red("bad thing"));
  });
});

describe("searchResults", () => {
  const results = [
    { title: "Rust", url: "https://rust.example", snippet: "Fast and safe" },
    { title: "Go", url: "https://go.example", snippet: "" },
  ];

  it("lists numbered results in plain mode", () => {
    createRenderer({ plain: true }).searchResults(results);
    expect(consoleLogSpy.mock.calls).toEqual([
      ["1. Rust"],
      ["   https://rust.example"],
      ["   Fast and safe"],
      ["2. Go"],
      ["   https://go.example"],
    ]);
  });

  it("formats titles and links in formatted mode", () => {
    createRenderer().searchResults(results.slice(0, 1));
    expect(consoleLogSpy.mock.calls).toEqual([
      [chalk.dim("1. ") + chalk.bold("Rust")],
      ["   " + chalk.blue.underline("https://rust.example")],
      ["   " + chalk.dim("Fast and safe")],
    ]);
  });

  it("says when nothing was found", () => {
    createRenderer({ plain: true }).searchResults([]);
    expect(consoleLogSpy).toHaveBeenCalledWith("No results found.");
  });
});

describe("trimSnippet", () => {
  it("collapses whitespace and keeps short text whole", () => {
    expect(trimSnippet("  one\n two  three ")).toBe("one two three");
  });

  it("cuts long text at the word limit", () => {
    expect(trimSnippet("a b c d e", 3)).toBe("a b c...");
  });
});

import { describe, it, expect } from "vitest";
import { parseThinking } from "../../content/thinking.js";

describe("parseThinking", () => {
  it("returns clean text untouched apart from trimming", () => {
    expect(parseThinking("  Plain answer. ")).toEqual({
      content: "Plain answer.",
      thinking: [],
      pending: null,
    });
  });

  it("extracts every closed span in order", () => {
    expect(
      parseThinking("<think> first </think>Answer<think>second</think> continues")
    ).toEqual({
      content: "Answer continues",
      thinking: ["first", "second"],
      pending: null,
    });
  });

  it("keeps an unterminated span pending", () => {
    expect(parseThinking("Intro <think>still reason")).toEqual({
      content: "Intro",
      thinking: [],
      pending: "still reason",
    });
  });

  it("extracts a span once its closing tag arrives across fragments", () => {
    const fragments = ["<thi", "nk>weigh", " options</th", "ink>Result"];
    let raw = "";
    const splits = fragments.map((fragment) => {
      raw += fragment;
      return parseThinking(raw);
    });
    expect(splits[1]).toEqual({ content: "", thinking: [], pending: "weigh" });
    expect(splits[2]).toEqual({ content: "", thinking: [], pending: "weigh options</th" });
    expect(splits[3]).toEqual({ content: "Result", thinking: ["weigh options"], pending: null });
  });

  it("leaves a stray closing tag as text", () => {
    expect(parseThinking("a </think> b").content).toBe("a </think> b");
  });

  it("is idempotent on already-clean text", () => {
    const once = parseThinking("<think>plan</think> See [1].\n");
    const twice = parseThinking(once.content);
    expect(twice.content).toBe(once.content);
    expect(parseThinking(twice.content)).toEqual(twice);
  });
});

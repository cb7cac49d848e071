import { describe, it, expect } from "vitest";
import type { UpstreamIncrement } from "../../api/perplexity.js";
import { relayComplete, relayStream } from "../../relay/relay.js";
import type { StreamEvent } from "../../types.js";
import { asyncIterableFrom, collect } from "../helpers.js";

function trackedSource(
  increments: UpstreamIncrement[],
  failAt?: { index: number; error: Error }
) {
  const state = { released: false, read: 0 };
  async function* source(): AsyncGenerator<UpstreamIncrement, void, undefined> {
    try {
      for (const [i, increment] of increments.entries()) {
        if (failAt && failAt.index === i) throw failAt.error;
        state.read++;
        yield increment;
      }
    } finally {
      state.released = true;
    }
  }
  return { source: source(), state };
}

describe("relayStream", () => {
  it("forwards text and closes with done when the source runs dry", async () => {
    const events = await collect(
      relayStream(asyncIterableFrom<UpstreamIncrement>([
        { type: "text", text: "Hel" },
        { type: "text", text: "lo" },
      ]))
    );
    expect(events).toEqual([
      { type: "content_delta", text: "Hel" },
      { type: "content_delta", text: "lo" },
      { type: "done" },
    ]);
  });

  it("emits exactly one done and nothing that arrives after it", async () => {
    const { source, state } = trackedSource([
      { type: "text", text: "a" },
      { type: "done" },
      { type: "text", text: "late" },
      { type: "done" },
    ]);
    const events = await collect(relayStream(source));
    expect(events).toEqual([{ type: "content_delta", text: "a" }, { type: "done" }]);
    expect(state.read).toBe(2);
    expect(state.released).toBe(true);
  });

  it("keeps earlier events and ends with a single error on upstream failure", async () => {
    const { source, state } = trackedSource(
      [
        { type: "text", text: "partial" },
        { type: "citations", urls: ["https://a.example"] },
        { type: "text", text: "never" },
        { type: "done" },
      ],
      { index: 2, error: new Error("socket hang up") }
    );
    const events = await collect(relayStream(source));
    expect(events).toEqual([
      { type: "content_delta", text: "partial" },
      { type: "citations", urls: ["https://a.example"] },
      { type: "error", message: "socket hang up" },
    ]);
    expect(state.released).toBe(true);
  });

  it("fails when the very first read fails", async () => {
    const { source } = trackedSource([{ type: "text", text: "x" }], {
      index: 0,
      error: new Error("401"),
    });
    expect(await collect(relayStream(source))).toEqual([{ type: "error", message: "401" }]);
  });

  it("replaces citations and skips unchanged repeats", async () => {
    const events = await collect(
      relayStream(asyncIterableFrom<UpstreamIncrement>([
        { type: "citations", urls: [] },
        { type: "citations", urls: ["https://a.example"] },
        { type: "citations", urls: ["https://a.example"] },
        { type: "citations", urls: ["https://b.example", "https://a.example"] },
      ]))
    );
    const citationEvents = events.filter(
      (e): e is Extract<StreamEvent, { type: "citations" }> => e.type === "citations"
    );
    expect(citationEvents).toEqual([
      { type: "citations", urls: ["https://a.example"] },
      { type: "citations", urls: ["https://b.example", "https://a.example"] },
    ]);
  });

  it("surfaces a stalled upstream as an error", async () => {
    async function* stalled(): AsyncGenerator<UpstreamIncrement, void, undefined> {
      yield { type: "text", text: "before" };
      await new Promise<never>(() => {});
    }
    const events = await collect(relayStream(stalled(), { idleTimeoutMs: 20 }));
    expect(events).toEqual([
      { type: "content_delta", text: "before" },
      { type: "error", message: "Upstream stalled: no data received for 20ms." },
    ]);
  });

  it("releases the source when the consumer stops early", async () => {
    const { source, state } = trackedSource([
      { type: "text", text: "one" },
      { type: "text", text: "two" },
      { type: "done" },
    ]);
    for await (const event of relayStream(source)) {
      expect(event).toEqual({ type: "content_delta", text: "one" });
      break;
    }
    expect(state.released).toBe(true);
    expect(state.read).toBe(1);
  });
});

describe("relayComplete", () => {
  it("returns content and sources without thinking when there is none", () => {
    expect(relayComplete({ content: "pong", citations: [] })).toEqual({
      content: "pong",
      sources: [],
    });
  });

  it("separates thinking spans from the visible content", () => {
    expect(
      relayComplete({
        content: "<think>check sources</think>Answer [1]",
        citations: ["https://a.example"],
      })
    ).toEqual({
      content: "Answer [1]",
      sources: ["https://a.example"],
      thinking: ["check sources"],
    });
  });
});

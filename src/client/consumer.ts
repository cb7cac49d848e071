import { parseThinking } from "../content/thinking.js";
import { StreamProtocolError } from "../errors.js";
import { isTerminal, parseEvent } from "../relay/events.js";
import type { RenderedMessage, Role, StreamEvent } from "../types.js";
import type { Logger } from "../utils/logger.js";

export type ConsumeOptions = {
  logger?: Logger;
  onUpdate?: (message: RenderedMessage, event: StreamEvent) => void;
};

export function createRenderedMessage(role: Role = "assistant"): RenderedMessage {
  return {
    role,
    raw: "",
    content: "",
    thinking: [],
    pending: null,
    sources: [],
    streaming: true,
    error: null,
  };
}

function parseLine(line: string, logger: Logger | undefined): StreamEvent | null {
  if (!line) return null;
  try {
    return parseEvent(line);
  } catch (error) {
    if (!(error instanceof StreamProtocolError)) throw error;
    logger?.warn("Skipping malformed stream record", { reason: error.message, line });
    return null;
  }
}

/**
 * Yields one event per complete line of an NDJSON byte stream. Lines may be
 * split across chunks anywhere, including inside a multi-byte character.
 */
export async function* readEvents(
  body: AsyncIterable<Uint8Array>,
  options: Pick<ConsumeOptions, "logger"> = {}
): AsyncGenerator<StreamEvent, void, undefined> {
  const decoder = new TextDecoder();
  let buffer = "";

  for await (const chunk of body) {
    buffer += decoder.decode(chunk, { stream: true });

    let newline = buffer.indexOf("\n");
    while (newline >= 0) {
      const event = parseLine(buffer.slice(0, newline).trim(), options.logger);
      buffer = buffer.slice(newline + 1);
      if (event) yield event;
      newline = buffer.indexOf("\n");
    }
  }

  buffer += decoder.decode();
  const last = parseLine(buffer.trim(), options.logger);
  if (last) yield last;
}

/** Applies one event in place. A finished message ignores anything further. */
export function applyEvent(message: RenderedMessage, event: StreamEvent): void {
  if (!message.streaming) return;

  switch (event.type) {
    case "content_delta": {
      message.raw += event.text;
      const split = parseThinking(message.raw);
      message.content = split.content;
      message.thinking = split.thinking;
      message.pending = split.pending;
      return;
    }
    case "citations":
      message.sources = [...event.urls];
      return;
    case "done":
      message.streaming = false;
      return;
    case "error":
      message.error = event.message;
      message.streaming = false;
      return;
    default: {
      const unhandled: never = event;
      throw new StreamProtocolError("Unhandled stream event", JSON.stringify(unhandled));
    }
  }
}

/**
 * Drives a message from a relay stream until a terminal event. Transport
 * failures and streams that end early are recorded on the message; content
 * received before them is kept.
 */
export async function consumeChatStream(
  body: AsyncIterable<Uint8Array>,
  message: RenderedMessage,
  options: ConsumeOptions = {}
): Promise<RenderedMessage> {
  try {
    for await (const event of readEvents(body, options)) {
      applyEvent(message, event);
      options.onUpdate?.(message, event);
      if (isTerminal(event)) return message;
    }
    applyEvent(message, { type: "error", message: "Stream ended unexpectedly." });
  } catch (error) {
    options.logger?.error("Relay stream failed", error);
    applyEvent(message, {
      type: "error",
      message: error instanceof Error ? error.message : "Relay stream failed.",
    });
  }
  return message;
}

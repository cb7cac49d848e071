import { z } from "zod";
import { StreamProtocolError } from "../errors.js";
import type { StreamEvent } from "../types.js";

export const STREAM_CONTENT_TYPE = "application/x-ndjson";

const streamEventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("content_delta"), text: z.string() }),
  z.object({ type: z.literal("citations"), urls: z.array(z.string()) }),
  z.object({ type: z.literal("done") }),
  z.object({ type: z.literal("error"), message: z.string() }),
]);

export function encodeEvent(event: StreamEvent): string {
  return JSON.stringify(event) + "\n";
}

export function isTerminal(event: StreamEvent): boolean {
  return event.type === "done" || event.type === "error";
}

export function parseEvent(line: string): StreamEvent {
  let data: unknown;
  try {
    data = JSON.parse(line);
  } catch {
    throw new StreamProtocolError("Record is not valid JSON", line);
  }

  const result = streamEventSchema.safeParse(data);
  if (!result.success) {
    throw new StreamProtocolError("Record is not a known stream event", line);
  }
  return result.data;
}

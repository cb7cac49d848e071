import { vi } from "vitest";
import type { PerplexityClient, UpstreamIncrement } from "../api/perplexity.js";
import type { RelayClient } from "../client/api.js";
import { startServer, type RunningServer } from "../server/server.js";
import type { Renderer } from "../ui/renderer.js";
import type { Logger } from "../utils/logger.js";

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

export async function* asyncIterableFrom<T>(items: T[]): AsyncGenerator<T, void, undefined> {
  for (const item of items) {
    yield item;
  }
}

export function bytesFrom(...parts: string[]): AsyncGenerator<Uint8Array, void, undefined> {
  const encoder = new TextEncoder();
  return asyncIterableFrom(parts.map((p) => encoder.encode(p)));
}

export function createMockLogger(): Logger & {
  [K in "debug" | "info" | "warn" | "error"]: ReturnType<typeof vi.fn>;
} {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn((): Logger => logger),
  };
  return logger;
}

export function createMockRenderer(): {
  [K in keyof Renderer]: ReturnType<typeof vi.fn>;
} {
  return {
    assistantUpdate: vi.fn(),
    assistantEnd: vi.fn(),
    assistantComplete: vi.fn(),
    searchResults: vi.fn(),
    error: vi.fn(),
    info: vi.fn(),
  };
}

export function createFakeClient(
  overrides: Partial<PerplexityClient> = {}
): PerplexityClient {
  return {
    async *streamChat(): AsyncGenerator<UpstreamIncrement, void, undefined> {
      yield { type: "done" };
    },
    complete: vi.fn().mockResolvedValue({ content: "", citations: [] }),
    search: vi.fn().mockResolvedValue([]),
    ...overrides,
  };
}

export function createFakeRelay(overrides: Partial<RelayClient> = {}): RelayClient {
  return {
    complete: vi.fn().mockResolvedValue({ content: "", sources: [] }),
    stream: vi.fn().mockResolvedValue(bytesFrom('{"type":"done"}\n')),
    search: vi.fn().mockResolvedValue([]),
    listModels: vi.fn().mockResolvedValue([]),
    ...overrides,
  };
}

/** Runs the relay in-process on an ephemeral port in front of `client`. */
export function startFakeRelay(client: PerplexityClient): Promise<RunningServer> {
  return startServer(
    { port: 0, host: "127.0.0.1", allowedOrigins: [], idleTimeoutMs: 5_000 },
    client,
    createMockLogger()
  );
}

import { classifyApiError, type CompletionPayload, type UpstreamIncrement } from "../api/perplexity.js";
import { parseThinking } from "../content/thinking.js";
import { UpstreamError } from "../errors.js";
import type { ChatResponse, StreamEvent } from "../types.js";

export const DEFAULT_IDLE_TIMEOUT_MS = 30_000;

export type RelayOptions = {
  /** Longest wait for a single upstream increment before the exchange fails. */
  idleTimeoutMs?: number;
};

type RelayState = "open" | "closed";

class IdleTimeoutError extends UpstreamError {
  constructor(ms: number) {
    super(`Upstream stalled: no data received for ${ms}ms.`);
  }
}

function nextWithTimeout<T>(
  iterator: AsyncIterator<T>,
  ms: number
): Promise<IteratorResult<T>> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new IdleTimeoutError(ms)), ms);
  });
  return Promise.race([iterator.next(), timeout]).finally(() => clearTimeout(timer));
}

function sameList(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((url, i) => url === b[i]);
}

/**
 * Re-emits an upstream increment stream as relay events.
 *
 * The relay is open until it yields `done` or `error`, and yields nothing
 * after either. Content already emitted is never retracted. The upstream
 * iterator is released on every exit path; when a read is still in flight
 * after a timeout, releasing it is left to the caller's abort signal.
 */
export async function* relayStream(
  source: AsyncIterable<UpstreamIncrement>,
  options: RelayOptions = {}
): AsyncGenerator<StreamEvent, void, undefined> {
  const idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
  const iterator = source[Symbol.asyncIterator]();
  let state: RelayState = "open";
  let readPending = false;
  let citations: string[] = [];

  try {
    while (state === "open") {
      let result: IteratorResult<UpstreamIncrement>;
      readPending = true;
      try {
        result = await nextWithTimeout(iterator, idleTimeoutMs);
        readPending = false;
      } catch (error) {
        readPending = error instanceof IdleTimeoutError;
        state = "closed";
        yield { type: "error", message: classifyApiError(error) };
        return;
      }

      if (result.done || result.value.type === "done") {
        state = "closed";
        yield { type: "done" };
        return;
      }

      const increment = result.value;
      switch (increment.type) {
        case "text":
          yield { type: "content_delta", text: increment.text };
          break;
        case "citations":
          if (!sameList(citations, increment.urls)) {
            citations = [...increment.urls];
            yield { type: "citations", urls: citations };
          }
          break;
      }
    }
  } finally {
    if (!readPending) {
      await iterator.return?.();
    }
  }
}

/** Non-streaming path: one complete payload, thinking spans stripped. */
export function relayComplete(payload: CompletionPayload): ChatResponse {
  const { content, thinking } = parseThinking(payload.content);
  const response: ChatResponse = { content, sources: [...payload.citations] };
  if (thinking.length > 0) {
    response.thinking = thinking;
  }
  return response;
}

import type { Request, RequestHandler, Response } from "express";
import type { Writable } from "node:stream";
import { z } from "zod";
import { toUpstreamError, type PerplexityClient } from "../api/perplexity.js";
import { parseChatRequest } from "../api/request.js";
import { ClientInputError } from "../errors.js";
import { encodeEvent, STREAM_CONTENT_TYPE } from "../relay/events.js";
import { relayComplete, relayStream } from "../relay/relay.js";
import type { ChatRequest, StreamEvent } from "../types.js";
import type { Logger } from "../utils/logger.js";

export type ExchangeDeps = {
  client: PerplexityClient;
  logger: Logger;
  idleTimeoutMs?: number;
};

const searchQuerySchema = z.object({
  query: z.string().trim().min(1, { message: "query must not be empty" }),
  max_results: z.number().int().min(1).max(50).default(10),
});

export function requestIdOf(res: Response): string {
  const id: unknown = res.locals["requestId"];
  return typeof id === "string" ? id : "unknown";
}

function abortOnClose(res: Response): AbortController {
  const controller = new AbortController();
  res.on("close", () => controller.abort());
  return controller;
}

/**
 * Writes one event and, when the socket buffer is full, waits for it to
 * drain. Resolves early once `signal` aborts.
 */
export function writeEvent(out: Writable, event: StreamEvent, signal: AbortSignal): Promise<void> {
  if (out.write(encodeEvent(event)) || signal.aborted) {
    return Promise.resolve();
  }

  return new Promise((resolve) => {
    const settle = (): void => {
      out.off("drain", settle);
      signal.removeEventListener("abort", settle);
      resolve();
    };
    out.once("drain", settle);
    signal.addEventListener("abort", settle, { once: true });
  });
}

async function completeExchange(
  deps: ExchangeDeps,
  request: ChatRequest,
  res: Response,
  logger: Logger
): Promise<void> {
  const controller = abortOnClose(res);
  try {
    const payload = await deps.client.complete(request, { signal: controller.signal });
    res.json(relayComplete(payload));
    logger.info("Exchange completed", { sources: payload.citations.length });
  } catch (error) {
    throw toUpstreamError(error);
  }
}

async function streamExchange(
  deps: ExchangeDeps,
  request: ChatRequest,
  res: Response,
  logger: Logger
): Promise<void> {
  const controller = abortOnClose(res);
  const events = relayStream(
    deps.client.streamChat(request, { signal: controller.signal }),
    { idleTimeoutMs: deps.idleTimeoutMs }
  );
  let started = false;
  let forwarded = 0;

  try {
    for await (const event of events) {
      if (controller.signal.aborted || res.destroyed) {
        logger.info("Client disconnected, stopping relay", { forwarded });
        break;
      }

      if (!started) {
        // Nothing sent yet, so a failure can still be a plain error response.
        if (event.type === "error") {
          logger.warn("Upstream failed before streaming", { reason: event.message });
          res.status(502).json({ error: event.message });
          return;
        }
        res.status(200).set({
          "Content-Type": STREAM_CONTENT_TYPE,
          "Cache-Control": "no-cache",
          Connection: "keep-alive",
          "X-Accel-Buffering": "no",
        });
        res.flushHeaders();
        started = true;
      }

      await writeEvent(res, event, controller.signal);
      forwarded++;

      if (event.type === "error") {
        logger.warn("Upstream failed mid-stream", { reason: event.message, forwarded });
      } else if (event.type === "done") {
        logger.info("Exchange completed", { forwarded });
      }
    }
  } finally {
    controller.abort();
    if (started && !res.writableEnded) {
      res.end();
    }
  }
}

async function handleChat(deps: ExchangeDeps, req: Request, res: Response): Promise<void> {
  const request = parseChatRequest(req.body);
  const logger = deps.logger.child({
    requestId: requestIdOf(res),
    model: request.model,
    stream: request.stream,
  });
  logger.debug("Exchange started", { turns: request.history.length });

  if (request.stream) {
    await streamExchange(deps, request, res, logger);
  } else {
    await completeExchange(deps, request, res, logger);
  }
}

async function handleSearch(deps: ExchangeDeps, req: Request, res: Response): Promise<void> {
  const parsed = searchQuerySchema.safeParse(req.body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ClientInputError(`${issue.path.join(".")}: ${issue.message}`);
  }

  const { query, max_results } = parsed.data;
  const controller = abortOnClose(res);
  try {
    const results = await deps.client.search(query, max_results, { signal: controller.signal });
    res.json({ query, results });
  } catch (error) {
    throw toUpstreamError(error);
  }
}

export function createChatHandler(deps: ExchangeDeps): RequestHandler {
  return (req, res, next) => {
    handleChat(deps, req, res).catch(next);
  };
}

export function createSearchHandler(deps: ExchangeDeps): RequestHandler {
  return (req, res, next) => {
    handleSearch(deps, req, res).catch(next);
  };
}

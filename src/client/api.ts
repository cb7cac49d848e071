import { z } from "zod";
import type { ModelInfo } from "../api/models.js";
import { VALID_MODELS } from "../api/models.js";
import { UpstreamError } from "../errors.js";
import type { ChatRequest, ChatResponse, SearchResult } from "../types.js";

export type RelayClient = {
  complete(request: ChatRequest, options?: { signal?: AbortSignal }): Promise<ChatResponse>;
  stream(
    request: ChatRequest,
    options?: { signal?: AbortSignal }
  ): Promise<AsyncIterable<Uint8Array>>;
  search(
    query: string,
    maxResults?: number,
    options?: { signal?: AbortSignal }
  ): Promise<SearchResult[]>;
  listModels(): Promise<ModelInfo[]>;
};

const chatResponseSchema = z.object({
  content: z.string(),
  sources: z.array(z.string()),
  thinking: z.array(z.string()).optional(),
});

const modelsResponseSchema = z.object({
  models: z.array(
    z.object({ id: z.enum(VALID_MODELS), name: z.string(), description: z.string() })
  ),
});

const searchResponseSchema = z.object({
  query: z.string(),
  results: z.array(z.object({ title: z.string(), url: z.string(), snippet: z.string() })),
});

const errorBodySchema = z.object({ error: z.string() });

async function failureMessage(response: Response): Promise<string> {
  const body: unknown = await response.json().catch(() => null);
  const parsed = errorBodySchema.safeParse(body);
  return parsed.success ? parsed.data.error : `Relay responded with ${response.status}`;
}

export function createRelayClient(baseUrl: string): RelayClient {
  const root = baseUrl.replace(/\/+$/, "");

  async function send(path: string, init: RequestInit = {}): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(`${root}${path}`, init);
    } catch (error) {
      if (init.signal?.aborted) throw error;
      throw new UpstreamError(`Could not reach the relay at ${root}.`, { cause: error });
    }

    if (!response.ok) {
      throw new UpstreamError(await failureMessage(response), { status: response.status });
    }
    return response;
  }

  function post(path: string, body: unknown, signal: AbortSignal | undefined): Promise<Response> {
    return send(path, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
      signal,
    });
  }

  return {
    async complete(request, options = {}) {
      const response = await post("/api/chat", { ...request, stream: false }, options.signal);
      const parsed = chatResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new UpstreamError("Relay returned a malformed chat response.");
      }
      return parsed.data;
    },

    async stream(request, options = {}) {
      const response = await post("/api/chat", { ...request, stream: true }, options.signal);
      if (!response.body) {
        throw new UpstreamError("Relay returned an empty stream.");
      }
      return response.body;
    },

    async search(query, maxResults, options = {}) {
      const response = await post(
        "/api/search",
        { query, max_results: maxResults },
        options.signal
      );
      const parsed = searchResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new UpstreamError("Relay returned malformed search results.");
      }
      return parsed.data.results;
    },

    async listModels() {
      const response = await send("/api/models");
      const parsed = modelsResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new UpstreamError("Relay returned a malformed model list.");
      }
      return parsed.data.models;
    },
  };
}

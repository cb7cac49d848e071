import Perplexity from "@perplexity-ai/perplexity_ai";
import { ConfigurationError, UpstreamError } from "../errors.js";
import type { ChatRequest, SearchResult } from "../types.js";
import { buildConversation } from "./request.js";

export type UpstreamIncrement =
  | { type: "text"; text: string }
  | { type: "citations"; urls: string[] }
  | { type: "done" };

export type CompletionPayload = {
  content: string;
  citations: string[];
};

export type RequestOptions = {
  signal?: AbortSignal;
};

export type PerplexityClient = {
  streamChat(
    request: ChatRequest,
    options?: RequestOptions
  ): AsyncGenerator<UpstreamIncrement, void, undefined>;
  complete(request: ChatRequest, options?: RequestOptions): Promise<CompletionPayload>;
  search(
    query: string,
    maxResults: number,
    options?: RequestOptions
  ): Promise<SearchResult[]>;
};

function stringField(value: unknown, key: string): string | null {
  if (typeof value !== "object" || value === null || !(key in value)) return null;
  const field: unknown = Reflect.get(value, key);
  return typeof field === "string" ? field : null;
}

// Content may arrive as a plain string or as a list of typed parts.
function textOf(content: unknown): string {
  if (typeof content === "string") return content;
  if (!Array.isArray(content)) return "";
  return content.map((part: unknown) => stringField(part, "text") ?? "").join("");
}

function contentOf(message: unknown): unknown {
  if (typeof message !== "object" || message === null || !("content" in message)) {
    return null;
  }
  return message.content;
}

function citationsOf(chunk: object): string[] | null {
  if ("citations" in chunk && Array.isArray(chunk.citations)) {
    return chunk.citations.filter((c: unknown): c is string => typeof c === "string");
  }
  if ("search_results" in chunk && Array.isArray(chunk.search_results)) {
    return chunk.search_results.flatMap((r: unknown) => {
      const url = stringField(r, "url");
      return url ? [url] : [];
    });
  }
  return null;
}

function requestOptions(options: RequestOptions): { signal: AbortSignal } | undefined {
  return options.signal ? { signal: options.signal } : undefined;
}

function completionParams(request: ChatRequest) {
  // Provider-defined scoping, forwarded untouched.
  const scoping: object | undefined = request.search_options;
  return {
    model: request.model,
    messages: buildConversation(request.history, request.query),
    ...(scoping ? { web_search_options: scoping } : {}),
  };
}

export function createPerplexityClient(apiKey: string | undefined): PerplexityClient {
  if (!apiKey) {
    throw new ConfigurationError(
      "No API key configured. Set the PERPLEXITY_API_KEY environment variable."
    );
  }

  const client = new Perplexity({ apiKey });

  return {
    async *streamChat(request, options = {}) {
      const stream = await client.chat.completions.create(
        { ...completionParams(request), stream: true },
        requestOptions(options)
      );

      for await (const chunk of stream) {
        const choice = chunk.choices[0];
        const content = choice?.delta?.content;
        if (typeof content === "string" && content.length > 0) {
          yield { type: "text", text: content };
        }

        const urls = citationsOf(chunk);
        if (urls) {
          yield { type: "citations", urls };
        }

        if (choice && "finish_reason" in choice && choice.finish_reason) {
          yield { type: "done" };
          return;
        }
      }
    },

    async complete(request, options = {}) {
      const completion = await client.chat.completions.create(
        { ...completionParams(request), stream: false },
        requestOptions(options)
      );

      const choice = completion.choices[0];
      const message = choice && "message" in choice ? choice.message : undefined;
      return {
        content: textOf(contentOf(message)),
        citations: citationsOf(completion) ?? [],
      };
    },

    async search(query, maxResults, options = {}) {
      const response = await client.search.create(
        { query, max_results: maxResults },
        requestOptions(options)
      );
      return response.results.map((r) => ({
        title: r.title,
        url: r.url,
        snippet: r.snippet,
      }));
    },
  };
}

function retryAfterOf(headers: unknown): string | null {
  if (headers instanceof Headers) return headers.get("retry-after");
  return stringField(headers, "retry-after");
}

export function classifyApiError(error: unknown): string {
  if (error instanceof Perplexity.APIUserAbortError) {
    return "Request was aborted.";
  }

  if (error instanceof Perplexity.APIConnectionTimeoutError) {
    return "Request to api.perplexity.ai timed out.";
  }

  if (error instanceof Perplexity.APIConnectionError) {
    return "Could not reach api.perplexity.ai. Check your connection.";
  }

  if (error instanceof Perplexity.APIError) {
    switch (error.status) {
      case 401:
        return "Invalid API key. Check your PERPLEXITY_API_KEY.";
      case 429: {
        const retryAfter = retryAfterOf(error.headers);
        const suffix = retryAfter ? ` Retry after ${retryAfter}s.` : "";
        return `Rate limited.${suffix}`;
      }
      default:
        if (error.status && error.status >= 500) {
          return `Perplexity server error (${error.status}). Try again later.`;
        }
        return `API error (${error.status}): ${error.message}`;
    }
  }

  if (error instanceof Error) {
    return error.message;
  }

  return "An unknown error occurred.";
}

/** Wraps anything thrown by the SDK so callers only deal with relay errors. */
export function toUpstreamError(error: unknown): UpstreamError {
  if (error instanceof UpstreamError) return error;
  const status = error instanceof Perplexity.APIError ? error.status : undefined;
  return new UpstreamError(classifyApiError(error), {
    status: typeof status === "number" ? status : undefined,
    cause: error,
  });
}

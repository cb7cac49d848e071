export type Role = "user" | "assistant";

export type ConversationTurn = {
  role: Role;
  content: string;
};

export type ModelId = "sonar" | "sonar-pro" | "sonar-reasoning";

// Provider-defined web search scoping (context size, user location), forwarded as is.
export type SearchOptions = Record<string, unknown>;

export type ChatRequest = {
  history: ConversationTurn[];
  query: string;
  model: ModelId;
  stream: boolean;
  search_options?: SearchOptions;
};

export type StreamEvent =
  | { type: "content_delta"; text: string }
  | { type: "citations"; urls: string[] }
  | { type: "done" }
  | { type: "error"; message: string };

export type ChatResponse = {
  content: string;
  sources: string[];
  thinking?: string[];
};

export type SearchResult = {
  title: string;
  url: string;
  snippet: string;
};

export type RenderedMessage = {
  role: Role;
  /** Everything received so far, thinking markup included. */
  raw: string;
  content: string;
  thinking: string[];
  /** Text inside a `<think>` that has not been closed yet. */
  pending: string | null;
  sources: string[];
  streaming: boolean;
  error: string | null;
};

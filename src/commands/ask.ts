import { createRelayClient } from "../client/api.js";
import { consumeChatStream, createRenderedMessage } from "../client/consumer.js";
import { relayUrl } from "../config.js";
import type { ChatRequest, RenderedMessage } from "../types.js";
import { createMarkdownRenderer } from "../ui/markdown.js";
import { createRenderer } from "../ui/renderer.js";
import { createLogger } from "../utils/logger.js";
import { resolveModelOption, resolveSearchOptions, type SearchScopeOptions } from "./resolve.js";

export type AskOptions = SearchScopeOptions & {
  plain?: boolean;
  model?: string;
  url?: string;
  stream?: boolean;
};

function completedMessage(content: string, sources: string[], thinking: string[]): RenderedMessage {
  return {
    ...createRenderedMessage(),
    raw: content,
    content,
    thinking,
    sources,
    streaming: false,
  };
}

export async function runAsk(question: string, options: AskOptions = {}): Promise<void> {
  const model = resolveModelOption(options.model);
  const relay = createRelayClient(options.url ?? relayUrl());
  const renderer = createRenderer({
    plain: options.plain,
    markdown: options.plain ? undefined : createMarkdownRenderer(),
  });
  const logger = createLogger({ level: "warn", plain: options.plain });
  const request: ChatRequest = {
    history: [],
    query: question,
    model,
    stream: options.stream ?? true,
    search_options: resolveSearchOptions(options),
  };

  try {
    if (request.stream) {
      const message = createRenderedMessage();
      const body = await relay.stream(request);
      await consumeChatStream(body, message, {
        logger,
        onUpdate: (updated) => renderer.assistantUpdate(updated),
      });
      renderer.assistantEnd(message);
      if (message.error) process.exit(1);
    } else {
      const response = await relay.complete(request);
      renderer.assistantComplete(
        completedMessage(response.content, response.sources, response.thinking ?? [])
      );
    }
  } catch (error) {
    renderer.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

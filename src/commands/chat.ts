import { createRelayClient } from "../client/api.js";
import { relayUrl } from "../config.js";
import { createChatSession, startSession } from "../repl/session.js";
import { createMarkdownRenderer } from "../ui/markdown.js";
import { createRenderer } from "../ui/renderer.js";
import { createLogger } from "../utils/logger.js";
import { resolveModelOption, resolveSearchOptions, type SearchScopeOptions } from "./resolve.js";

export type ChatOptions = SearchScopeOptions & {
  plain?: boolean;
  model?: string;
  url?: string;
};

export async function runChat(options: ChatOptions = {}): Promise<void> {
  const model = resolveModelOption(options.model);
  const relay = createRelayClient(options.url ?? relayUrl());
  const renderer = createRenderer({
    plain: options.plain,
    markdown: options.plain ? undefined : createMarkdownRenderer(),
  });
  const logger = createLogger({ level: "warn", plain: options.plain });

  const session = createChatSession(model, resolveSearchOptions(options));

  await startSession({ relay, renderer, session, logger });
}

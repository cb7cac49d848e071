import { createInterface } from "node:readline";
import { DEFAULT_MODEL, isValidModel, VALID_MODELS } from "../api/models.js";
import type { RelayClient } from "../client/api.js";
import { consumeChatStream, createRenderedMessage } from "../client/consumer.js";
import type { ConversationTurn, ModelId, RenderedMessage, SearchOptions } from "../types.js";
import type { Renderer } from "../ui/renderer.js";
import type { Logger } from "../utils/logger.js";

const PROMPT = "❯ ";

const INTRO_TEXT = `\nSonar relay chat - Ask anything or type /help for commands`;

const HELP_TEXT = `Available commands:
  /help         Show this help message
  /model [id]   Show or switch the model (${VALID_MODELS.join(", ")})
  /clear        Start a new conversation
  /exit         Exit the application`;

/** Conversation state owned by the chat command and shared with the REPL. */
export type ChatSession = {
  model: ModelId;
  history: ConversationTurn[];
  searchOptions?: SearchOptions;
};

export type SessionDeps = {
  relay: RelayClient;
  renderer: Renderer;
  session: ChatSession;
  logger?: Logger;
};

export type CommandResult = "continue" | "exit";

export function createChatSession(
  model: ModelId = DEFAULT_MODEL,
  searchOptions?: SearchOptions
): ChatSession {
  return searchOptions ? { model, history: [], searchOptions } : { model, history: [] };
}

/**
 * Streams one exchange and renders it. The turn is added to the history
 * only when some content came back, partial or not.
 */
export async function sendMessage(deps: SessionDeps, query: string): Promise<RenderedMessage> {
  const { relay, renderer, session, logger } = deps;
  const message = createRenderedMessage();

  try {
    const body = await relay.stream({
      history: session.history,
      query,
      model: session.model,
      stream: true,
      search_options: session.searchOptions,
    });
    await consumeChatStream(body, message, {
      logger,
      onUpdate: (updated) => renderer.assistantUpdate(updated),
    });
  } catch (error) {
    message.error = error instanceof Error ? error.message : String(error);
    message.streaming = false;
  }

  renderer.assistantEnd(message);

  if (message.content) {
    session.history.push(
      { role: "user", content: query },
      { role: "assistant", content: message.content }
    );
  }
  return message;
}

export function handleCommand(deps: SessionDeps, input: string): CommandResult {
  const { renderer, session } = deps;
  const [command, ...args] = input.trim().split(/\s+/);

  switch (command) {
    case "/help":
      renderer.info(HELP_TEXT);
      return "continue";
    case "/model": {
      const requested = args[0];
      if (!requested) {
        renderer.info(`Current model: ${session.model}`);
      } else if (isValidModel(requested)) {
        session.model = requested;
        renderer.info(`Switched to ${requested}.`);
      } else {
        renderer.error(`Invalid model: ${requested}. Valid models: ${VALID_MODELS.join(", ")}`);
      }
      return "continue";
    }
    case "/clear":
      session.history = [];
      renderer.info("Started new conversation.");
      return "continue";
    case "/exit":
      return "exit";
    default:
      renderer.error(`Unknown command: ${command}`);
      return "continue";
  }
}

export function startSession(deps: SessionDeps): Promise<void> {
  const { renderer } = deps;

  return new Promise<void>((resolve) => {
    const rl = createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: PROMPT,
    });

    function showPrompt(): void {
      console.log();
      rl.prompt();
    }

    async function submit(content: string): Promise<void> {
      rl.pause();
      try {
        await sendMessage(deps, content);
      } finally {
        rl.resume();
        showPrompt();
      }
    }

    rl.on("line", (line: string) => {
      const content = line.trim();
      if (!content) {
        showPrompt();
        return;
      }

      if (content.startsWith("/")) {
        console.log();
        if (handleCommand(deps, content) === "exit") {
          rl.close();
        } else {
          showPrompt();
        }
        return;
      }

      submit(content).catch((e) => renderer.error(String(e)));
    });

    rl.on("close", () => {
      renderer.info("Goodbye!");
      resolve();
    });

    renderer.info(INTRO_TEXT);
    console.log();
    rl.prompt();
  });
}

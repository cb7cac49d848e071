#!/usr/bin/env node

import { createRequire } from "node:module";
import { fileURLToPath } from "node:url";
import { realpathSync } from "node:fs";
import { Command, InvalidArgumentError } from "commander";
import { runAsk, type AskOptions } from "./commands/ask.js";
import { runChat, type ChatOptions } from "./commands/chat.js";
import { runModels, type ModelsOptions } from "./commands/models.js";
import {
  CONTEXT_SIZES,
  parseSearchOptions,
  type ContextSize,
} from "./commands/resolve.js";
import { runSearch, type SearchCommandOptions } from "./commands/search.js";
import { runServe } from "./commands/serve.js";
import { readStdinIfPiped } from "./utils/stdin.js";

const require = createRequire(import.meta.url);
const { version } = require("../package.json") as { version: string };

export function mergeStdinAndQuestion(
  stdinContent: string,
  question: string
): string {
  const trimmedStdin = stdinContent.trim();
  if (trimmedStdin && question) {
    return `${trimmedStdin}\n\n${question}`;
  }
  return trimmedStdin || question;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError("Port must be an integer between 0 and 65535.");
  }
  return port;
}

function parseContextSize(value: string): ContextSize {
  const size = CONTEXT_SIZES.find((candidate) => candidate === value);
  if (!size) {
    throw new InvalidArgumentError(`Context size must be one of: ${CONTEXT_SIZES.join(", ")}.`);
  }
  return size;
}

function parseMaxResults(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 1 || count > 50) {
    throw new InvalidArgumentError("Max results must be an integer between 1 and 50.");
  }
  return count;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("sonar-relay")
    .description("Streaming relay and terminal client for Perplexity Sonar models")
    .version(version);

  program
    .command("serve")
    .description("Start the HTTP relay server")
    .option("--port <port>", "Port to listen on (default: $PORT or 8000)", parsePort)
    .option("--host <host>", "Interface to bind (default: $HOST or 0.0.0.0)")
    .option("-p, --plain", "Disable colored log output")
    .action((options: { port?: number; host?: string; plain?: boolean }) =>
      runServe(options)
    );

  program
    .command("chat")
    .description("Interactive chat against a running relay")
    .option("-u, --url <url>", "Relay base URL (default: $RELAY_URL)")
    .option("-m, --model <model>", "Model to use (sonar, sonar-pro, sonar-reasoning)")
    .option("--context-size <size>", "Web search context size (low, medium, high)", parseContextSize)
    .option("--search-options <json>", "Extra web search options as a JSON object", parseSearchOptions)
    .option("-p, --plain", "Disable colors and markdown formatting")
    .action((options: ChatOptions) => runChat(options));

  program
    .command("ask")
    .description("Ask a single question; piped stdin is prepended to it")
    .argument("[question...]", "Question to ask")
    .option("-u, --url <url>", "Relay base URL (default: $RELAY_URL)")
    .option("-m, --model <model>", "Model to use (sonar, sonar-pro, sonar-reasoning)")
    .option("--context-size <size>", "Web search context size (low, medium, high)", parseContextSize)
    .option("--search-options <json>", "Extra web search options as a JSON object", parseSearchOptions)
    .option("--no-stream", "Wait for the complete answer instead of streaming")
    .option("-p, --plain", "Disable colors and markdown formatting")
    .action(
      async (questionParts: string[], options: AskOptions) => {
        const stdinContent = await readStdinIfPiped();
        const question = mergeStdinAndQuestion(stdinContent, questionParts.join(" "));
        if (!question) {
          console.error("Nothing to ask: pass a question or pipe text on stdin.");
          process.exit(1);
        }
        await runAsk(question, options);
      }
    );

  program
    .command("search")
    .description("Search the web through the relay")
    .argument("<query...>", "Search query")
    .option("-u, --url <url>", "Relay base URL (default: $RELAY_URL)")
    .option("-n, --max-results <count>", "Number of results, 1-50 (default: 10)", parseMaxResults)
    .option("-p, --plain", "Disable colors")
    .action((queryParts: string[], options: SearchCommandOptions) =>
      runSearch(queryParts.join(" "), options)
    );

  program
    .command("models")
    .description("List the models the relay accepts")
    .option("-u, --url <url>", "Relay base URL (default: $RELAY_URL)")
    .option("-p, --plain", "Disable colors")
    .action((options: ModelsOptions) => runModels(options));

  return program;
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  return realpathSync(entry) === fileURLToPath(import.meta.url);
}

if (isEntryPoint()) {
  buildProgram()
    .parseAsync()
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    });
}

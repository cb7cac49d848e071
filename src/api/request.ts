import { z } from "zod";
import { ClientInputError } from "../errors.js";
import type { ChatRequest, ConversationTurn } from "../types.js";
import { DEFAULT_MODEL, VALID_MODELS } from "./models.js";

const RESUME_PROMPT = "Hello, I'd like to continue our conversation.";

export type ProviderMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

const turnSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
});

const chatRequestSchema = z.object({
  history: z.array(turnSchema).default([]),
  query: z.string().trim().min(1, { message: "query must not be empty" }),
  model: z
    .enum(VALID_MODELS, {
      errorMap: () => ({
        message: `model must be one of: ${VALID_MODELS.join(", ")}`,
      }),
    })
    .default(DEFAULT_MODEL),
  stream: z.boolean().default(false),
  search_options: z.record(z.unknown()).optional(),
});

/**
 * Validates an inbound chat body. Unknown models and empty queries are
 * rejected here, before any upstream call.
 */
export function parseChatRequest(input: unknown): ChatRequest {
  const result = chatRequestSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join(".");
    throw new ClientInputError(field ? `${field}: ${issue.message}` : issue.message);
  }
  return result.data;
}

function mergeAlternating(history: ConversationTurn[]): ProviderMessage[] {
  const merged: ProviderMessage[] = [];

  for (const turn of history) {
    const last = merged[merged.length - 1];
    if (last && last.role === turn.role) {
      last.content += `\n\n${turn.content}`;
    } else {
      merged.push({ role: turn.role, content: turn.content });
    }
  }

  if (merged[0]?.role === "assistant") {
    merged.unshift({ role: "user", content: RESUME_PROMPT });
  }
  return merged;
}

/**
 * Builds the provider message list: user and assistant turns alternate,
 * the first turn is from the user and the query is the final user turn.
 */
export function buildConversation(
  history: ConversationTurn[],
  query: string
): ProviderMessage[] {
  const messages = mergeAlternating(history);
  const last = messages[messages.length - 1];

  if (last && last.role === "user") {
    messages[messages.length - 1] = { role: "user", content: query };
  } else {
    messages.push({ role: "user", content: query });
  }
  return messages;
}

import { InvalidArgumentError } from "commander";
import { z } from "zod";
import { DEFAULT_MODEL, isValidModel, VALID_MODELS } from "../api/models.js";
import type { ModelId, SearchOptions } from "../types.js";

export const CONTEXT_SIZES = ["low", "medium", "high"] as const;

export type ContextSize = (typeof CONTEXT_SIZES)[number];

export type SearchScopeOptions = {
  contextSize?: ContextSize;
  searchOptions?: SearchOptions;
};

const searchOptionsSchema = z.record(z.unknown());

/** Validates a `--model` option, exiting on an unknown id rather than falling back. */
export function resolveModelOption(model: string | undefined): ModelId {
  if (model === undefined) return DEFAULT_MODEL;
  if (isValidModel(model)) return model;

  console.error(`Invalid model: ${model}`);
  console.error(`Valid models: ${VALID_MODELS.join(", ")}`);
  process.exit(1);
}

/** commander argument parser for `--search-options <json>`. */
export function parseSearchOptions(value: string): SearchOptions {
  let data: unknown;
  try {
    data = JSON.parse(value);
  } catch {
    throw new InvalidArgumentError("Search options must be valid JSON.");
  }

  const parsed = searchOptionsSchema.safeParse(data);
  if (!parsed.success) {
    throw new InvalidArgumentError("Search options must be a JSON object.");
  }
  return parsed.data;
}

/**
 * Combines the scoping flags into the request's `search_options`.
 * `--context-size` wins over the same key given in `--search-options`.
 */
export function resolveSearchOptions(options: SearchScopeOptions): SearchOptions | undefined {
  const { contextSize, searchOptions } = options;
  if (!contextSize && !searchOptions) return undefined;
  return contextSize ? { ...searchOptions, search_context_size: contextSize } : { ...searchOptions };
}

import { createRelayClient } from "../client/api.js";
import { relayUrl } from "../config.js";
import { createRenderer } from "../ui/renderer.js";

export type SearchCommandOptions = {
  plain?: boolean;
  url?: string;
  maxResults?: number;
};

export async function runSearch(query: string, options: SearchCommandOptions = {}): Promise<void> {
  const relay = createRelayClient(options.url ?? relayUrl());
  const renderer = createRenderer({ plain: options.plain });

  try {
    const results = await relay.search(query, options.maxResults);
    renderer.searchResults(results);
  } catch (error) {
    renderer.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

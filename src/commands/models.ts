import type { ModelInfo } from "../api/models.js";
import { createRelayClient } from "../client/api.js";
import { relayUrl } from "../config.js";
import { createRenderer } from "../ui/renderer.js";

export type ModelsOptions = {
  plain?: boolean;
  url?: string;
};

export function formatModelTable(models: readonly ModelInfo[]): string[] {
  const idWidth = Math.max(...models.map((m) => m.id.length), 2);
  const nameWidth = Math.max(...models.map((m) => m.name.length), 4);

  const header = `${"ID".padEnd(idWidth)}  ${"Name".padEnd(nameWidth)}  Description`;
  return [
    header,
    "-".repeat(header.length),
    ...models.map((m) => `${m.id.padEnd(idWidth)}  ${m.name.padEnd(nameWidth)}  ${m.description}`),
  ];
}

/** Lists the models the relay at `--url` accepts. */
export async function runModels(options: ModelsOptions = {}): Promise<void> {
  const url = options.url ?? relayUrl();
  const relay = createRelayClient(url);

  try {
    const models = await relay.listModels();
    for (const line of formatModelTable(models)) {
      console.log(line);
    }
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    createRenderer({ plain: options.plain }).error(`Could not list models: ${reason}`);
    process.exit(1);
  }
}

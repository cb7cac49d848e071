import { createPerplexityClient } from "../api/perplexity.js";
import { loadEnvFile, loadServerConfig, type ServerConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";
import { startServer } from "../server/server.js";
import { createLogger } from "../utils/logger.js";

export type ServeOptions = {
  port?: number;
  host?: string;
  plain?: boolean;
};

function readConfig(): ServerConfig {
  try {
    return loadServerConfig();
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;
    console.error(error.message);
    process.exit(1);
  }
}

export async function runServe(options: ServeOptions = {}): Promise<void> {
  loadEnvFile();
  const config = readConfig();
  const logger = createLogger({ level: config.logLevel, plain: options.plain });
  const client = createPerplexityClient(config.apiKey);

  const running = await startServer(
    {
      ...config,
      port: options.port ?? config.port,
      host: options.host ?? config.host,
    },
    client,
    logger
  );
  logger.info(`  Health: ${running.url}/health`);
  logger.info(`  Chat:   ${running.url}/api/chat`);

  const shutdown = (signal: string): void => {
    logger.info("Shutting down", { signal });
    running.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error("Shutdown failed", error);
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

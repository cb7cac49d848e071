import type { Server } from "node:http";
import type { PerplexityClient } from "../api/perplexity.js";
import type { ServerConfig } from "../config.js";
import type { Logger } from "../utils/logger.js";
import { createApp } from "./app.js";

export type RunningServer = {
  server: Server;
  url: string;
  close(): Promise<void>;
};

export function startServer(
  config: Pick<ServerConfig, "port" | "host" | "allowedOrigins" | "idleTimeoutMs">,
  client: PerplexityClient,
  logger: Logger
): Promise<RunningServer> {
  const app = createApp({
    client,
    logger,
    allowedOrigins: config.allowedOrigins,
    idleTimeoutMs: config.idleTimeoutMs,
  });

  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, config.host);

    server.once("error", reject);
    server.once("listening", () => {
      server.off("error", reject);
      const address = server.address();
      const port = typeof address === "object" && address ? address.port : config.port;
      const host = config.host === "0.0.0.0" ? "localhost" : config.host;
      const url = `http://${host}:${port}`;
      logger.info("Relay listening", { url });

      resolve({
        server,
        url,
        close: () =>
          new Promise<void>((done, fail) => {
            server.closeAllConnections();
            server.close((error) => (error ? fail(error) : done()));
          }),
      });
    });
  });
}

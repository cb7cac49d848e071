import cors from "cors";
import express, {
  type ErrorRequestHandler,
  type Express,
  type RequestHandler,
} from "express";
import helmet from "helmet";
import morgan from "morgan";
import { nanoid } from "nanoid";
import { MODELS } from "../api/models.js";
import type { PerplexityClient } from "../api/perplexity.js";
import { ClientInputError, ConfigurationError, RelayError, UpstreamError } from "../errors.js";
import type { Logger } from "../utils/logger.js";
import { createChatHandler, createSearchHandler, requestIdOf } from "./chat.js";

export type AppOptions = {
  client: PerplexityClient;
  logger: Logger;
  allowedOrigins: string[];
  idleTimeoutMs?: number;
};

const REQUEST_ID_HEADER = "x-request-id";

const assignRequestId: RequestHandler = (req, res, next) => {
  const id = req.get(REQUEST_ID_HEADER) || nanoid(12);
  res.locals["requestId"] = id;
  res.setHeader(REQUEST_ID_HEADER, id);
  next();
};

function statusOf(error: unknown): number {
  if (error instanceof ClientInputError) return 400;
  if (error instanceof ConfigurationError) return 500;
  if (error instanceof UpstreamError) return 502;
  // body-parser marks malformed JSON bodies with a 4xx status
  if (error instanceof Error && "status" in error && typeof error.status === "number") {
    return error.status >= 400 && error.status < 500 ? error.status : 500;
  }
  return 500;
}

function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (error: unknown, req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const status = statusOf(error);
    const exposed = error instanceof RelayError || status < 500;
    const message = exposed && error instanceof Error ? error.message : "Internal server error";
    const context = { requestId: requestIdOf(res), path: req.path, status };

    if (status >= 500) {
      logger.error("Request failed", error, context);
    } else {
      logger.warn(message, context);
    }
    res.status(status).json({ error: message });
  };
}

export function createApp(options: AppOptions): Express {
  const { client, logger, allowedOrigins, idleTimeoutMs } = options;
  const httpLogger = logger.child({ component: "http" });
  const app = express();

  app.use(helmet({ crossOriginResourcePolicy: { policy: "cross-origin" } }));
  app.use(cors({ origin: allowedOrigins, credentials: true }));
  app.use(assignRequestId);
  app.use(
    morgan(":method :url :status :res[content-length] - :response-time ms", {
      stream: { write: (line: string) => httpLogger.info(line.trim()) },
    })
  );
  app.use(express.json({ limit: "1mb" }));

  app.get("/", (_req, res) => {
    res.json({ message: "Sonar relay API", status: "running" });
  });

  app.get("/health", (_req, res) => {
    res.json({
      status: "healthy",
      allowed_origins: allowedOrigins,
      timestamp: new Date().toISOString(),
    });
  });

  app.get("/api/models", (_req, res) => {
    res.json({ models: MODELS });
  });

  const exchange = { client, logger: logger.child({ component: "relay" }), idleTimeoutMs };
  app.post("/api/chat", createChatHandler(exchange));
  app.post("/api/search", createSearchHandler(exchange));

  app.use((_req, res) => {
    res.status(404).json({ error: "Not Found" });
  });
  app.use(createErrorHandler(logger));

  return app;
}

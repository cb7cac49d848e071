import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { DEFAULT_IDLE_TIMEOUT_MS } from "./relay/relay.js";
import type { LogLevel } from "./utils/logger.js";

const DEFAULT_RELAY_URL = "http://localhost:8000";

export type ServerConfig = {
  apiKey: string;
  port: number;
  host: string;
  allowedOrigins: string[];
  idleTimeoutMs: number;
  logLevel: LogLevel;
};

const envSchema = z.object({
  PERPLEXITY_API_KEY: z.string().trim().optional(),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().default("0.0.0.0"),
  ALLOWED_ORIGINS: z.string().optional(),
  DEPLOY_HOST: z.string().default("localhost"),
  FRONTEND_PORT: z.string().default("3000"),
  RELAY_IDLE_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_IDLE_TIMEOUT_MS),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

/** Reads `.env` into `process.env` without overriding values already set. */
export function loadEnvFile(): void {
  loadDotenv();
}

function defaultOrigins(deployHost: string, frontendPort: string): string[] {
  const origins = [
    `http://${deployHost}:${frontendPort}`,
    `https://${deployHost}:${frontendPort}`,
    `http://localhost:${frontendPort}`,
    `http://127.0.0.1:${frontendPort}`,
    "http://localhost:3000",
    "http://127.0.0.1:3000",
    "http://localhost:3003",
    "http://127.0.0.1:3003",
  ];
  return [...new Set(origins)];
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(`Invalid ${issue.path.join(".")}: ${issue.message}`);
  }

  const values = result.data;
  if (!values.PERPLEXITY_API_KEY) {
    throw new ConfigurationError(
      "No API key configured. Set the PERPLEXITY_API_KEY environment variable."
    );
  }

  const allowedOrigins = values.ALLOWED_ORIGINS
    ? values.ALLOWED_ORIGINS.split(",").map((o) => o.trim()).filter(Boolean)
    : defaultOrigins(values.DEPLOY_HOST, values.FRONTEND_PORT);

  return {
    apiKey: values.PERPLEXITY_API_KEY,
    port: values.PORT,
    host: values.HOST,
    allowedOrigins,
    idleTimeoutMs: values.RELAY_IDLE_TIMEOUT_MS,
    logLevel: values.LOG_LEVEL,
  };
}

export function relayUrl(env: NodeJS.ProcessEnv = process.env): string {
  return env["RELAY_URL"] || DEFAULT_RELAY_URL;
}

import { z } from "zod";
import type { LogLevel } from "./logger.js";

export const DEFAULT_BASE_URL = "https://pokeapi.co/api/v2";
export const DEFAULT_TIMEOUT_MS = 10_000;
// Comfortably above the upstream species count, so one list call returns every name
export const DEFAULT_SEARCH_INDEX_LIMIT = 10_000;

const envSchema = z.object({
  POKEAPI_BASE_URL: z
    .string()
    .url()
    .default(DEFAULT_BASE_URL)
    .transform((url) => url.replace(/\/+$/, "")),
  POKEAPI_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  POKEAPI_SEARCH_INDEX_LIMIT: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_SEARCH_INDEX_LIMIT),
  HTTP: z.enum(["0", "1"]).default("0"),
  PORT: z.coerce.number().int().min(1).max(65535).default(1111),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info")
});

export interface ServerConfig {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly searchIndexLimit: number;
  readonly transport: "stdio" | "sse";
  readonly port: number;
  readonly logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Read server settings from the environment. Called once at startup; the
 * returned object is frozen.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  // Blank variables count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  const config: ServerConfig = {
    baseUrl: vars.POKEAPI_BASE_URL,
    timeoutMs: vars.POKEAPI_TIMEOUT_MS,
    searchIndexLimit: vars.POKEAPI_SEARCH_INDEX_LIMIT,
    transport: vars.HTTP === "1" ? "sse" : "stdio",
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL
  };
  return Object.freeze(config);
}

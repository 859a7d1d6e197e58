import { z } from "zod";
import { logger } from "./logger.js";

// Schemas
// Only the fields the tools rely on are checked; everything else upstream sends
// is kept as-is by passthrough().
const namedResourceSchema = z
  .object({
    name: z.string(),
    url: z.string()
  })
  .passthrough();

export const pokemonSummarySchema = namedResourceSchema;

export const pokemonListSchema = z
  .object({
    count: z.number().int(),
    next: z.string().nullable().optional(),
    previous: z.string().nullable().optional(),
    results: z.array(pokemonSummarySchema)
  })
  .passthrough();

export const pokemonDetailSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    height: z.number().int().optional(),
    weight: z.number().int().optional(),
    base_experience: z.number().int().nullable().optional(),
    types: z
      .array(z.object({ slot: z.number().int(), type: namedResourceSchema }).passthrough())
      .optional(),
    stats: z
      .array(
        z
          .object({
            base_stat: z.number().int(),
            effort: z.number().int(),
            stat: namedResourceSchema
          })
          .passthrough()
      )
      .optional(),
    abilities: z
      .array(
        z
          .object({
            ability: namedResourceSchema,
            is_hidden: z.boolean(),
            slot: z.number().int()
          })
          .passthrough()
      )
      .optional()
  })
  .passthrough();

export type PokemonSummary = z.infer<typeof pokemonSummarySchema>;
export type PokemonList = z.infer<typeof pokemonListSchema>;
export type PokemonDetail = z.infer<typeof pokemonDetailSchema>;

export interface PokemonSearchResult {
  query: string;
  count: number;
  results: PokemonSummary[];
}

export interface ToolError {
  error: string;
}

export type ToolResult<T> = T | ToolError;

export function isToolError(value: unknown): value is ToolError {
  return (
    typeof value === "object" &&
    value !== null &&
    "error" in value &&
    typeof value.error === "string"
  );
}

// Errors
export type PokeApiErrorCode = "NOT_FOUND" | "API_ERROR" | "NETWORK_ERROR" | "INVALID_RESPONSE";

export class PokeApiError extends Error {
  constructor(
    message: string,
    public readonly code: PokeApiErrorCode,
    public readonly status?: number
  ) {
    super(message);
    this.name = "PokeApiError";
  }
}

function describeNetworkError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  if (error.name === "AbortError") return "request was cancelled";
  // undici reports "fetch failed" and keeps the socket/DNS error as the cause
  return error.cause instanceof Error ? `${error.message} (${error.cause.message})` : error.message;
}

/**
 * Convert any failure from an upstream call into the `{ error }` result shape.
 * `notFoundMessage` replaces the generic status message for lookups that can 404.
 */
export function toErrorResult(error: unknown, notFoundMessage?: string): ToolError {
  if (error instanceof PokeApiError) {
    if (error.code === "NOT_FOUND" && notFoundMessage) {
      return { error: notFoundMessage };
    }
    return { error: error.message };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { error: `Unexpected error: ${message}` };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(Math.trunc(value), min), max);
}

// Client
export interface PokeApiConfig {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly searchIndexLimit: number;
  /** Substitute transport, used by tests. Defaults to the global fetch. */
  readonly fetch?: typeof fetch;
}

export interface RequestOptions {
  /** Cancels the in-flight request, e.g. when the host cancels the tool call. */
  signal?: AbortSignal;
}

export const MAX_PAGE_SIZE = 100;
export const DEFAULT_LIST_LIMIT = 20;
export const DEFAULT_SEARCH_LIMIT = 10;

export class PokeApiService {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly config: PokeApiConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.fetchImpl = config.fetch ?? fetch;
  }

  private async fetchJson<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {}
  ): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const timeout = AbortSignal.timeout(this.config.timeoutMs);
    const signal = options.signal ? AbortSignal.any([timeout, options.signal]) : timeout;

    let body: string;
    try {
      const res = await this.fetchImpl(url, {
        method: "GET",
        headers: { Accept: "application/json" },
        signal
      });
      if (res.status === 404) {
        throw new PokeApiError("API error: 404", "NOT_FOUND", 404);
      }
      if (!res.ok) {
        throw new PokeApiError(`API error: ${res.status}`, "API_ERROR", res.status);
      }
      body = await res.text();
    } catch (error) {
      if (error instanceof PokeApiError) {
        logger.warn(`PokeAPI responded ${error.status} for ${url}`);
        throw error;
      }
      // The abort reason may be any value, so ask the signals which one fired
      const detail = timeout.aborted
        ? `request timed out after ${this.config.timeoutMs}ms`
        : options.signal?.aborted
          ? "request was cancelled"
          : describeNetworkError(error);
      logger.warn(`PokeAPI request to ${url} failed: ${detail}`);
      throw new PokeApiError(`Network error: ${detail}`, "NETWORK_ERROR");
    }

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch {
      logger.warn(`PokeAPI returned a non-JSON body for ${url}`);
      throw new PokeApiError("Invalid response from API", "INVALID_RESPONSE");
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      logger.warn(`Unexpected PokeAPI response structure for ${url}`, parsed.error.issues);
      throw new PokeApiError("Invalid response from API", "INVALID_RESPONSE");
    }
    return parsed.data;
  }

  /** One page of the species index; `limit` is clamped to [1, 100], `offset` to >= 0. */
  async getPokemonList(
    limit: number = DEFAULT_LIST_LIMIT,
    offset: number = 0,
    options?: RequestOptions
  ): Promise<ToolResult<PokemonList>> {
    const params = new URLSearchParams({
      limit: String(clamp(limit, 1, MAX_PAGE_SIZE)),
      offset: String(clamp(offset, 0, Number.MAX_SAFE_INTEGER))
    });
    try {
      return await this.fetchJson(`/pokemon?${params}`, pokemonListSchema, options);
    } catch (error) {
      return toErrorResult(error);
    }
  }

  async getPokemonDetails(name: string, options?: RequestOptions): Promise<ToolResult<PokemonDetail>> {
    const normalized = name.trim().toLowerCase();
    if (!normalized) {
      return { error: "Pokemon name is required" };
    }
    try {
      return await this.fetchJson(
        `/pokemon/${encodeURIComponent(normalized)}`,
        pokemonDetailSchema,
        options
      );
    } catch (error) {
      return toErrorResult(error, `Pokemon '${normalized}' not found`);
    }
  }

  async getPokemonById(pokemonId: number, options?: RequestOptions): Promise<ToolResult<PokemonDetail>> {
    // Digit strings past 2^53 parse to values like 1e+23, which are not usable IDs
    if (!Number.isSafeInteger(pokemonId) || pokemonId < 1) {
      return { error: "Invalid Pokemon ID" };
    }
    try {
      return await this.fetchJson(`/pokemon/${pokemonId}`, pokemonDetailSchema, options);
    } catch (error) {
      return toErrorResult(error, `Pokemon with ID ${pokemonId} not found`);
    }
  }

  /**
   * Case-insensitive substring match over the full name index, fetched with a
   * single list call. Results keep upstream order and are cut at `limit`.
   */
  async searchPokemon(
    query: string,
    limit: number = DEFAULT_SEARCH_LIMIT,
    options?: RequestOptions
  ): Promise<ToolResult<PokemonSearchResult>> {
    const needle = query.trim().toLowerCase();
    if (!needle) {
      return { error: "Search query is required" };
    }

    const params = new URLSearchParams({
      limit: String(this.config.searchIndexLimit),
      offset: "0"
    });
    let index: PokemonList;
    try {
      index = await this.fetchJson(`/pokemon?${params}`, pokemonListSchema, options);
    } catch (error) {
      return toErrorResult(error);
    }

    const results = index.results
      .filter((pokemon) => pokemon.name.toLowerCase().includes(needle))
      .slice(0, clamp(limit, 1, MAX_PAGE_SIZE));

    return { query, count: results.length, results };
  }
}

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { logger } from "./logger.js";
import {
  PokeApiService,
  isToolError,
  toErrorResult,
  DEFAULT_LIST_LIMIT,
  DEFAULT_SEARCH_LIMIT,
  MAX_PAGE_SIZE,
  type PokeApiConfig,
  type RequestOptions,
  type ToolError
} from "./pokeApiService.js";

export const SERVER_NAME = "pokemon-data";
export const SERVER_VERSION = "0.1.0";

export const TOOL_NAMES = [
  "get_pokemon_list",
  "get_pokemon_details",
  "get_pokemon_by_id",
  "search_pokemon"
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export interface ToolDefinition {
  name: ToolName;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, Record<string, unknown>>;
    required: string[];
  };
}

// Argument schemas
// Hosts sometimes send integers as strings, so digit strings are accepted too.
// Each branch carries the message: a union reports a branch's own issue when that
// branch got past its type check.
function integerArg(message: string) {
  return z.union(
    [
      z.number({ invalid_type_error: message }).int({ message }),
      z
        .string({ invalid_type_error: message })
        .trim()
        .regex(/^[-+]?\d+$/, { message })
        .transform(Number)
    ],
    { errorMap: () => ({ message }) }
  );
}

function stringArg(requiredMessage: string, typeMessage: string) {
  return z.string({ required_error: requiredMessage, invalid_type_error: typeMessage });
}

const listArgsSchema = z.object({
  limit: integerArg("Invalid limit: must be an integer").optional(),
  offset: integerArg("Invalid offset: must be an integer").optional()
});

const detailsArgsSchema = z.object({
  name: stringArg("Pokemon name is required", "Pokemon name must be a string")
});

const byIdArgsSchema = z.object({
  pokemon_id: integerArg("Invalid Pokemon ID")
});

const searchArgsSchema = z.object({
  query: stringArg("Search query is required", "Search query must be a string"),
  limit: integerArg("Invalid limit: must be an integer").optional()
});

export const TOOL_DEFINITIONS: ToolDefinition[] = [
  {
    name: "get_pokemon_list",
    description: `List Pokemon with pagination.

WHEN TO USE:
• Browsing the Pokedex page by page
• Discovering valid Pokemon names before looking one up

RETURNS:
The PokeAPI list page unchanged: { count, next, previous, results: [{ name, url }] }

EXAMPLES:
get_pokemon_list({ limit: 5 }) → bulbasaur, ivysaur, venusaur, charmander, charmeleon
get_pokemon_list({ limit: 20, offset: 140 }) → the 141st to 160th entries`,
    inputSchema: {
      type: "object",
      properties: {
        limit: {
          type: "integer",
          description: `Number of Pokemon to return (1-${MAX_PAGE_SIZE}). Out-of-range values are clamped.`,
          default: DEFAULT_LIST_LIMIT,
          minimum: 1,
          maximum: MAX_PAGE_SIZE
        },
        offset: {
          type: "integer",
          description: "Number of Pokemon to skip. Negative values are treated as 0.",
          default: 0,
          minimum: 0
        }
      },
      required: []
    }
  },
  {
    name: "get_pokemon_details",
    description: `Get full details for one Pokemon by name.

WHEN TO USE:
• The user names a Pokemon ("what type is Pikachu?")
• Looking up stats, abilities, height or weight

RETURNS:
The PokeAPI Pokemon record: id, name, height, weight, base_experience, types, stats, abilities and the rest of the upstream fields.
Unknown names return { "error": "Pokemon '<name>' not found" }.

EXAMPLES:
get_pokemon_details({ name: "Pikachu" }) → same result as "pikachu" (names are case-insensitive)`,
    inputSchema: {
      type: "object",
      properties: {
        name: {
          type: "string",
          description: "Pokemon name, e.g. 'pikachu' or 'charizard'. Case-insensitive; surrounding spaces are ignored.",
          minLength: 1
        }
      },
      required: ["name"]
    }
  },
  {
    name: "get_pokemon_by_id",
    description: `Get full details for one Pokemon by its National Pokedex number.

WHEN TO USE:
• The user refers to a Pokemon by number ("who is #25?")

RETURNS:
The same record as get_pokemon_details. IDs below 1 return { "error": "Invalid Pokemon ID" } without contacting PokeAPI.

EXAMPLES:
get_pokemon_by_id({ pokemon_id: 1 }) → bulbasaur
get_pokemon_by_id({ pokemon_id: 25 }) → pikachu`,
    inputSchema: {
      type: "object",
      properties: {
        pokemon_id: {
          type: "integer",
          description: "Positive Pokedex ID (1 for Bulbasaur, 25 for Pikachu).",
          minimum: 1
        }
      },
      required: ["pokemon_id"]
    }
  },
  {
    name: "search_pokemon",
    description: `Search Pokemon by partial name.

WHEN TO USE:
• The user only remembers part of a name ("the one with 'char' in it")
• Finding an evolution line that shares a name stem

RETURNS:
{ query, count, results: [{ name, url }] }, results in Pokedex order, at most \`limit\` entries.
Follow up with get_pokemon_details for any match.

EXAMPLES:
search_pokemon({ query: "char", limit: 3 }) → charmander, charmeleon, charizard`,
    inputSchema: {
      type: "object",
      properties: {
        query: {
          type: "string",
          description: "Text to look for anywhere in the Pokemon name. Case-insensitive.",
          minLength: 1
        },
        limit: {
          type: "integer",
          description: `Maximum number of results (1-${MAX_PAGE_SIZE}).`,
          default: DEFAULT_SEARCH_LIMIT,
          minimum: 1,
          maximum: MAX_PAGE_SIZE
        }
      },
      required: ["query"]
    }
  }
];

// Dispatch
type ToolHandler = (args: Record<string, unknown>, options: RequestOptions) => Promise<unknown>;

function validationError(error: z.ZodError): ToolError {
  const [issue] = error.issues;
  return { error: issue ? issue.message : "Invalid parameters" };
}

function withArgs<S extends z.ZodTypeAny>(
  schema: S,
  run: (args: z.infer<S>, options: RequestOptions) => Promise<unknown>
): ToolHandler {
  return async (args, options) => {
    const parsed = schema.safeParse(args);
    if (!parsed.success) return validationError(parsed.error);
    return run(parsed.data, options);
  };
}

function createToolHandlers(service: PokeApiService): Record<ToolName, ToolHandler> {
  return {
    get_pokemon_list: withArgs(listArgsSchema, ({ limit, offset }, options) =>
      service.getPokemonList(limit, offset, options)
    ),
    get_pokemon_details: withArgs(detailsArgsSchema, ({ name }, options) =>
      service.getPokemonDetails(name, options)
    ),
    get_pokemon_by_id: withArgs(byIdArgsSchema, ({ pokemon_id }, options) =>
      service.getPokemonById(pokemon_id, options)
    ),
    search_pokemon: withArgs(searchArgsSchema, ({ query, limit }, options) =>
      service.searchPokemon(query, limit, options)
    )
  };
}

export type ToolDispatcher = (
  name: string,
  args: Record<string, unknown> | undefined,
  options?: RequestOptions
) => Promise<unknown>;

/**
 * Route a tool call to its handler. Always resolves: unknown tools, bad
 * arguments and unexpected failures all come back as `{ error }`.
 */
export function createToolDispatcher(service: PokeApiService): ToolDispatcher {
  const handlers = createToolHandlers(service);

  return async (name, args, options = {}) => {
    const tool = TOOL_NAMES.find((candidate) => candidate === name);
    if (!tool) {
      return { error: `Unknown tool: ${name}` };
    }

    logger.debug(`Calling ${tool}`, args);
    try {
      return await handlers[tool](args ?? {}, options);
    } catch (error) {
      logger.error(`Tool ${tool} failed unexpectedly`, error);
      return toErrorResult(error);
    }
  };
}

export function createServer(config: PokeApiConfig): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION
    },
    {
      capabilities: {
        tools: {}
      }
    }
  );

  const dispatch = createToolDispatcher(new PokeApiService(config));

  // Handle list tools
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: TOOL_DEFINITIONS
    };
  });

  // Handle tool calls
  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;
    const result = await dispatch(name, args, { signal: extra.signal });

    return {
      content: [
        {
          type: "text",
          text: JSON.stringify(result, null, 2)
        }
      ],
      isError: isToolError(result)
    };
  });

  return server;
}

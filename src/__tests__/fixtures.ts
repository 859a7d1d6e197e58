import type { PokeApiConfig } from "../pokeApiService.js";

export const BASE_URL = "https://pokeapi.test/api/v2";

export function testConfig(fetchImpl: typeof fetch, overrides: Partial<PokeApiConfig> = {}): PokeApiConfig {
  return {
    baseUrl: BASE_URL,
    timeoutMs: 1000,
    searchIndexLimit: 2000,
    fetch: fetchImpl,
    ...overrides
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" }
  });
}

export function textResponse(body: string, status: number): Response {
  return new Response(body, { status, headers: { "Content-Type": "text/plain" } });
}

/** A fetch that never settles on its own, only when its signal aborts. */
export function hangingFetch(): typeof fetch {
  return (_input, init) =>
    new Promise<Response>((_resolve, reject) => {
      const signal = init?.signal;
      if (!signal) return;
      if (signal.aborted) reject(signal.reason);
      signal.addEventListener("abort", () => reject(signal.reason));
    });
}

const resource = (kind: string, id: number, name: string) => ({
  name,
  url: `${BASE_URL}/${kind}/${id}/`
});

export const pikachu = {
  id: 25,
  name: "pikachu",
  height: 4,
  weight: 60,
  base_experience: 112,
  order: 35,
  types: [{ slot: 1, type: resource("type", 13, "electric") }],
  stats: [
    { base_stat: 35, effort: 0, stat: resource("stat", 1, "hp") },
    { base_stat: 55, effort: 0, stat: resource("stat", 2, "attack") },
    { base_stat: 90, effort: 2, stat: resource("stat", 6, "speed") }
  ],
  abilities: [
    { ability: resource("ability", 9, "static"), is_hidden: false, slot: 1 },
    { ability: resource("ability", 31, "lightning-rod"), is_hidden: true, slot: 3 }
  ],
  species: resource("pokemon-species", 25, "pikachu")
};

const INDEX_NAMES = [
  "bulbasaur",
  "ivysaur",
  "venusaur",
  "charmander",
  "charmeleon",
  "charizard",
  "squirtle",
  "pikachu",
  "raichu",
  "charjabug",
  "charcadet"
];

export function pokemonPage(names: string[] = INDEX_NAMES, firstId = 1) {
  return {
    count: names.length,
    next: null,
    previous: null,
    results: names.map((name, i) => resource("pokemon", firstId + i, name))
  };
}

// pattern: Imperative Shell

import type { SearchConfig } from "../config/schema.ts";
import { createBraveAdapter } from "./providers/brave.ts";
import { createDuckDuckGoAdapter } from "./providers/duckduckgo.ts";
import { createSearXNGAdapter } from "./providers/searxng.ts";
import { errorMessage, isAbortError } from "./http.ts";
import type { SearchOptions, SearchProvider, SearchResponse } from "./types.ts";

export type SearchChain = {
  search(query: string, limit: number, options?: SearchOptions): Promise<SearchResponse>;
  readonly providers: ReadonlyArray<string>;
};

type SearchChainConfig = Pick<SearchConfig, "brave_api_key" | "searxng_endpoint">;

export function createSearchChain(
  config: SearchChainConfig,
  providers: ReadonlyArray<SearchProvider> = defaultProviders(config),
): SearchChain {
  return {
    providers: providers.map((p) => p.name),

    async search(query: string, limit: number, options?: SearchOptions): Promise<SearchResponse> {
      const errors: Array<{ provider: string; error: string }> = [];

      for (const provider of providers) {
        try {
          return await provider.search(query, limit, options);
        } catch (err) {
          if (options?.signal?.aborted || isAbortError(err)) {
            throw err;
          }
          console.warn(`[search] ${provider.name} failed, trying next: ${errorMessage(err)}`);
          errors.push({ provider: provider.name, error: errorMessage(err) });
        }
      }

      const summary = errors.map((e) => `${e.provider}: ${e.error}`).join("; ");
      throw new Error(`all search providers failed: ${summary}`);
    },
  };
}

function defaultProviders(config: SearchChainConfig): Array<SearchProvider> {
  const providers: Array<SearchProvider> = [];
  if (config.brave_api_key) {
    providers.push(createBraveAdapter(config.brave_api_key));
  }
  if (config.searxng_endpoint) {
    providers.push(createSearXNGAdapter(config.searxng_endpoint));
  }
  providers.push(createDuckDuckGoAdapter());
  return providers;
}

// pattern: Imperative Shell

import { z } from "zod";
import { SEARCH_TIMEOUT_MS, deadline } from "../http.ts";
import type { SearchOptions, SearchProvider, SearchResponse } from "../types.ts";

const SearXNGApiResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string(),
        url: z.string(),
        content: z.string().optional(),
        snippet: z.string().optional(),
      }),
    )
    .default([]),
});

export function createSearXNGAdapter(endpoint: string): SearchProvider {
  return {
    name: "searxng",
    async search(query: string, limit: number, options?: SearchOptions): Promise<SearchResponse> {
      const url = new URL("/search", endpoint);
      url.searchParams.set("q", query);
      url.searchParams.set("format", "json");

      const response = await fetch(url, {
        signal: deadline(SEARCH_TIMEOUT_MS, options?.signal),
      });

      if (!response.ok) {
        throw new Error(`searxng search failed: ${response.status} ${response.statusText}`);
      }

      const data = SearXNGApiResponseSchema.parse(await response.json());
      const results = data.results.slice(0, limit).map((r) => ({
        title: r.title,
        url: r.url,
        snippet: r.content ?? r.snippet ?? "",
      }));

      return { results, provider: "searxng" };
    },
  };
}

// pattern: Imperative Shell

import { z } from "zod";
import { SEARCH_TIMEOUT_MS, deadline } from "../http.ts";
import type { SearchOptions, SearchProvider, SearchResponse } from "../types.ts";

const BraveApiResponseSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string(),
            url: z.string(),
            description: z.string().default(""),
          }),
        )
        .default([]),
    })
    .optional(),
});

export function createBraveAdapter(apiKey: string): SearchProvider {
  return {
    name: "brave",
    async search(query: string, limit: number, options?: SearchOptions): Promise<SearchResponse> {
      const url = new URL("https://api.search.brave.com/res/v1/web/search");
      url.searchParams.set("q", query);
      url.searchParams.set("count", String(Math.min(limit, 20)));

      const response = await fetch(url, {
        headers: { "X-Subscription-Token": apiKey, Accept: "application/json" },
        signal: deadline(SEARCH_TIMEOUT_MS, options?.signal),
      });

      if (!response.ok) {
        throw new Error(`brave search failed: ${response.status} ${response.statusText}`);
      }

      const data = BraveApiResponseSchema.parse(await response.json());
      const results = (data.web?.results ?? []).map((r) => ({
        title: r.title,
        url: r.url,
        snippet: r.description,
      }));

      return { results, provider: "brave" };
    },
  };
}

// pattern: Imperative Shell

import { parseHTML } from "linkedom";
import { SEARCH_TIMEOUT_MS, USER_AGENT, deadline } from "../http.ts";
import type { SearchOptions, SearchProvider, SearchResponse, SearchResult } from "../types.ts";

function extractUrl(href: string): string {
  if (href.includes("uddg=")) {
    const uddg = new URL(href, "https://duckduckgo.com").searchParams.get("uddg");
    if (uddg) return uddg;
  }
  return href;
}

export function createDuckDuckGoAdapter(): SearchProvider {
  return {
    name: "duckduckgo",
    async search(query: string, limit: number, options?: SearchOptions): Promise<SearchResponse> {
      const response = await fetch("https://html.duckduckgo.com/html/", {
        method: "POST",
        headers: {
          "User-Agent": USER_AGENT,
          "Content-Type": "application/x-www-form-urlencoded",
        },
        body: `q=${encodeURIComponent(query)}`,
        signal: deadline(SEARCH_TIMEOUT_MS, options?.signal),
      });

      if (!response.ok) {
        throw new Error(`duckduckgo search failed: ${response.status} ${response.statusText}`);
      }

      const html = await response.text();
      const { document } = parseHTML(html);

      const results: Array<SearchResult> = [];
      for (const el of Array.from(document.querySelectorAll(".result"))) {
        if (results.length >= limit) break;

        const anchor = el.querySelector(".result__a");
        const snippetEl = el.querySelector(".result__snippet");
        if (!anchor) continue;

        const title = anchor.textContent?.trim() ?? "";
        const url = extractUrl(anchor.getAttribute("href") ?? "");
        const snippet = snippetEl?.textContent?.trim() ?? "";

        if (title && url) {
          results.push({ title, url, snippet });
        }
      }

      return { results, provider: "duckduckgo" };
    },
  };
}

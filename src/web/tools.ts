// pattern: Imperative Shell

/**
 * Tool dispatch table and the retriever that drives it. Each kind is one row:
 * how candidates are found, which extractor reads them, how much context the
 * result is expected to need and which TTL it is cached under. Adding a kind
 * means adding a row.
 */

import type { FetchConfig, SearchConfig, TtlSeconds } from "../config/schema.ts";
import type { SizeClass } from "../context/types.ts";
import { isLargeModel } from "../model/size.ts";
import type { SearchChain } from "./chain.ts";
import { clipContent, openWeatherUrl } from "./extract.ts";
import { fetchAll, type FetcherDeps } from "./fetcher.ts";
import { errorMessage, isAbortError } from "./http.ts";
import { planTasks } from "./task.ts";
import {
  RequestCancelledError,
  type Candidate,
  type FetchTask,
  type SearchResult,
  type ToolKind,
} from "./types.ts";

export type ToolPlan = {
  readonly candidates: ReadonlyArray<Candidate>;
  readonly summary: string | null;
  /** Another tool to run when every candidate comes back empty. */
  readonly fallback?: { readonly kind: FetchKind; readonly query: string };
};

export type PlanContext = {
  readonly search: SearchChain;
  readonly config: SearchConfig;
  readonly signal?: AbortSignal;
};

export type FetchKind = Exclude<ToolKind, "recall">;

export type ToolSpec =
  | {
      readonly kind: FetchKind;
      readonly source: "fetch";
      readonly sizeClass: SizeClass;
      readonly ttlKey: keyof TtlSeconds;
      readonly scrapeCount: number;
      plan(query: string, context: PlanContext): Promise<ToolPlan>;
    }
  | {
      readonly kind: "recall";
      readonly source: "cache";
      readonly sizeClass: SizeClass;
      readonly ttlKey: keyof TtlSeconds;
    };

const SUMMARY_RESULTS = 5;

export function formatSnippets(results: ReadonlyArray<SearchResult>, count = SUMMARY_RESULTS): string | null {
  const lines = results
    .slice(0, count)
    .filter((r) => r.title && r.snippet)
    .map((r, i) => `${i + 1}. ${r.title}\n   ${r.snippet}\n   URL: ${r.url}`);
  return lines.length > 0 ? `Additional search results:\n${lines.join("\n\n")}` : null;
}

function onHost(url: string, host: string): boolean {
  try {
    const hostname = new URL(url).hostname;
    return hostname === host || hostname.endsWith(`.${host}`);
  } catch {
    return false;
  }
}

async function searchOrEmpty(
  context: PlanContext,
  query: string,
  limit: number,
): Promise<ReadonlyArray<SearchResult>> {
  try {
    const response = await context.search.search(query, limit, { signal: context.signal });
    console.log(`[search] ${response.provider} returned ${response.results.length} results for "${query}"`);
    return response.results;
  } catch (error) {
    if (context.signal?.aborted || isAbortError(error)) {
      throw new RequestCancelledError();
    }
    console.warn(`[search] no results for "${query}": ${errorMessage(error)}`);
    return [];
  }
}

async function planWebSearch(query: string, context: PlanContext): Promise<ToolPlan> {
  const results = await searchOrEmpty(context, query, context.config.result_count);
  return {
    candidates: results.map((r): Candidate => ({ url: r.url, extractor: "article", title: r.title })),
    summary: formatSnippets(results),
  };
}

export function wikipediaArticleUrl(query: string): string {
  const title = query.trim().replace(/\s+/g, "_");
  const capitalised = title.charAt(0).toUpperCase() + title.slice(1);
  return `https://en.wikipedia.org/wiki/${encodeURIComponent(capitalised)}`;
}

export const TOOLS: Readonly<Record<ToolKind, ToolSpec>> = {
  web: {
    kind: "web",
    source: "fetch",
    sizeClass: "article",
    ttlKey: "web",
    scrapeCount: 2,
    plan: planWebSearch,
  },

  reddit: {
    kind: "reddit",
    source: "fetch",
    sizeClass: "article",
    ttlKey: "reddit",
    scrapeCount: 2,
    async plan(query, context) {
      const results = await searchOrEmpty(context, `site:reddit.com ${query}`, 8);
      const threads = results.filter((r) => onHost(r.url, "reddit.com") && r.url.includes("/comments/"));
      return {
        candidates: threads.map((r): Candidate => ({ url: r.url, extractor: "reddit-thread", title: r.title })),
        summary: formatSnippets(results, 6),
      };
    },
  },

  wikipedia: {
    kind: "wikipedia",
    source: "fetch",
    sizeClass: "article",
    ttlKey: "wikipedia",
    scrapeCount: 1,
    async plan(query, context) {
      const results = await searchOrEmpty(context, `site:wikipedia.org ${query}`, 3);
      const articles = results.filter((r) => onHost(r.url, "wikipedia.org"));
      return {
        candidates: [
          ...articles.map((r): Candidate => ({ url: r.url, extractor: "wikipedia", title: r.title })),
          { url: wikipediaArticleUrl(query), extractor: "wikipedia" },
        ],
        summary: formatSnippets(results, 3),
      };
    },
  },

  weather: {
    kind: "weather",
    source: "fetch",
    sizeClass: "fact",
    ttlKey: "weather",
    scrapeCount: 1,
    async plan(query, context) {
      const fallbackQuery = `${query} weather today`;
      if (context.config.openweather_api_key) {
        return {
          candidates: [{ url: openWeatherUrl(query), extractor: "weather-api", title: `Weather in ${query}` }],
          summary: null,
          fallback: { kind: "web", query: fallbackQuery },
        };
      }
      return planWebSearch(fallbackQuery, context);
    },
  },

  recall: {
    kind: "recall",
    source: "cache",
    sizeClass: "article",
    ttlKey: "recall",
  },
};

export function ttlFor(kind: ToolKind, ttl: TtlSeconds): number {
  return ttl[TOOLS[kind].ttlKey];
}

export type Retrieval = {
  readonly kind: FetchKind;
  readonly query: string;
  /** Null when nothing usable came back. */
  readonly content: string | null;
  readonly sources: ReadonlyArray<string>;
  readonly tasks: ReadonlyArray<FetchTask>;
};

export type RetrieveOptions = {
  readonly model: string;
  readonly signal?: AbortSignal;
};

export type Retriever = {
  retrieve(kind: FetchKind, query: string, options: RetrieveOptions): Promise<Retrieval>;
};

export type RetrieverDeps = FetcherDeps & {
  readonly search: SearchChain;
  readonly searchConfig: SearchConfig;
  readonly fetchConfig: FetchConfig;
};

function assemble(tasks: ReadonlyArray<FetchTask>, summary: string | null, maxLength: number) {
  const sections: Array<string> = [];
  const sources: Array<string> = [];

  for (const task of tasks) {
    const outcome = task.outcome;
    if (outcome?.type !== "extracted" || sources.includes(outcome.url)) continue;
    sources.push(outcome.url);
    sections.push(`Source: ${outcome.title ?? outcome.url}\nURL: ${outcome.url}\n\n${outcome.content}`);
  }

  const used = sections.join("\n\n").length;
  if (summary) {
    // Snippets get what the pages left, at least 500 chars.
    sections.push(clipContent(summary, Math.max(maxLength - used, 500)));
  }

  return { content: sections.length > 0 ? sections.join("\n\n") : null, sources };
}

export function createRetriever(deps: RetrieverDeps): Retriever {
  async function retrieve(kind: FetchKind, query: string, options: RetrieveOptions): Promise<Retrieval> {
    const tool = TOOLS[kind];
    if (tool.source !== "fetch") {
      throw new Error(`tool ${kind} does not fetch`);
    }

    const plan = await tool.plan(query, { search: deps.search, config: deps.searchConfig, signal: options.signal });
    const maxLength = isLargeModel(options.model)
      ? deps.fetchConfig.large_model_content_length
      : deps.fetchConfig.max_content_length;

    const tasks = await fetchAll(planTasks(kind, plan.candidates, tool.scrapeCount), deps, {
      concurrency: deps.fetchConfig.concurrency,
      graceMs: deps.fetchConfig.grace_ms,
      signal: options.signal,
      maxLength: Math.max(deps.fetchConfig.max_content_length, deps.fetchConfig.large_model_content_length),
      readLength: Math.floor(maxLength / tool.scrapeCount),
    });

    const extracted = tasks.filter((t) => t.outcome?.type === "extracted").length;
    console.log(`[fetch] ${kind}: extracted ${extracted}/${tasks.length} pages for "${query}"`);

    if (extracted === 0 && plan.fallback) {
      console.log(`[fetch] ${kind} produced nothing, falling back to ${plan.fallback.kind}`);
      const fallback = await retrieve(plan.fallback.kind, plan.fallback.query, options);
      return { ...fallback, kind, query, tasks: [...tasks, ...fallback.tasks] };
    }

    const { content, sources } = assemble(tasks, plan.summary, maxLength);
    return { kind, query, content, sources, tasks };
  }

  return { retrieve };
}

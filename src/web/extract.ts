// pattern: Imperative Shell

/**
 * Per-kind content extraction. Each strategy turns one URL into plain text
 * (markdown for articles); the render-aware reader is the shared fallback
 * for page-like candidates.
 */

import { Readability } from "@mozilla/readability";
import { parseHTML } from "linkedom";
import TurndownService from "turndown";
import { z } from "zod";
import type { FetchConfig, SearchConfig } from "../config/schema.ts";
import { truncateToTokens } from "../context/counter.ts";
import { USER_AGENT, deadline, errorMessage } from "./http.ts";
import type { Candidate, Extraction, ExtractorName } from "./types.ts";

/** Below this many characters a page counts as empty. */
export const MIN_CONTENT_CHARS = 40;

const MAX_REDDIT_COMMENTS = 5;

export type ExtractOptions = {
  readonly signal?: AbortSignal;
  readonly maxLength: number;
};

export type ContentExtractor = {
  extract(candidate: Candidate, options: ExtractOptions): Promise<Extraction | null>;
};

type Strategy = (url: string, signal?: AbortSignal) => Promise<Extraction | null>;

const charCount = (text: string) => text.length;

export function clipContent(text: string, maxLength: number): string {
  return truncateToTokens(text, maxLength, charCount);
}

export function stripCitations(text: string): string {
  return text
    .replace(/\\?\[\d+\\?\]/g, "")
    .replace(/\\?\[(edit|citation needed)\\?\]/gi, "")
    .replace(/[ \t]+\n/g, "\n");
}

function createTurndown(): TurndownService {
  const turndown = new TurndownService({
    headingStyle: "atx",
    codeBlockStyle: "fenced",
  });
  turndown.remove(["script", "style", "noscript", "iframe"]);
  return turndown;
}

/** Readability over linkedom, then turndown; raw HTML when Readability gives up. */
export function htmlToArticle(html: string, turndown: TurndownService = createTurndown()): Extraction {
  let title: string | null = null;
  let body = html;

  try {
    const { document } = parseHTML(html);
    const article = new Readability(document).parse();
    if (article) {
      title = article.title || null;
      body = article.content ?? html;
    }
  } catch (error) {
    console.warn(`[fetch] readability failed, converting raw html: ${errorMessage(error)}`);
  }

  return { title, content: turndown.turndown(body).trim() };
}

const RedditListingSchema = z.object({
  data: z.object({
    children: z.array(
      z.object({
        kind: z.string(),
        data: z.object({
          title: z.string().optional(),
          selftext: z.string().optional(),
          subreddit: z.string().optional(),
          body: z.string().optional(),
          score: z.number().optional(),
        }),
      }),
    ),
  }),
});

const RedditThreadSchema = z.tuple([RedditListingSchema, RedditListingSchema]).rest(RedditListingSchema);

export function formatRedditThread(raw: unknown): Extraction | null {
  const [postListing, commentListing] = RedditThreadSchema.parse(raw);
  const post = postListing.data.children.find((child) => child.kind === "t3")?.data;
  if (!post?.title) {
    return null;
  }

  const comments = commentListing.data.children
    .filter((child) => child.kind === "t1" && child.data.body && child.data.body !== "[deleted]")
    .sort((a, b) => (b.data.score ?? 0) - (a.data.score ?? 0))
    .slice(0, MAX_REDDIT_COMMENTS)
    .map((child) => `- (${child.data.score ?? 0} points) ${(child.data.body ?? "").trim()}`);

  const lines = [`r/${post.subreddit ?? "unknown"}: ${post.title}`];
  if (post.selftext?.trim()) {
    lines.push("", post.selftext.trim());
  }
  if (comments.length > 0) {
    lines.push("", "Top comments:", ...comments);
  }

  return { title: post.title, content: lines.join("\n") };
}

export function redditJsonUrl(threadUrl: string): string {
  const url = new URL(threadUrl);
  url.hash = "";
  url.search = "";
  url.pathname = `${url.pathname.replace(/\/+$/, "")}.json`;
  url.searchParams.set("limit", "20");
  url.searchParams.set("sort", "top");
  return url.toString();
}

const OpenWeatherSchema = z.object({
  name: z.string(),
  sys: z.object({ country: z.string().optional() }).optional(),
  main: z.object({
    temp: z.number(),
    feels_like: z.number(),
    humidity: z.number(),
  }),
  weather: z.array(z.object({ description: z.string() })).default([]),
  wind: z.object({ speed: z.number() }).optional(),
});

export function formatWeather(raw: unknown): Extraction {
  const data = OpenWeatherSchema.parse(raw);
  const place = data.sys?.country ? `${data.name}, ${data.sys.country}` : data.name;
  const conditions = data.weather.map((w) => w.description).join(", ") || "conditions unavailable";
  const wind = data.wind ? `, wind ${data.wind.speed} m/s` : "";

  return {
    title: `Weather in ${place}`,
    content:
      `Current weather in ${place}: ${Math.round(data.main.temp)}°C ` +
      `(feels like ${Math.round(data.main.feels_like)}°C), ${conditions}. ` +
      `Humidity ${data.main.humidity}%${wind}.`,
  };
}

export function openWeatherUrl(city: string): string {
  const url = new URL("https://api.openweathermap.org/data/2.5/weather");
  url.searchParams.set("q", city);
  url.searchParams.set("units", "metric");
  return url.toString();
}

export function createContentExtractor(
  fetchConfig: FetchConfig,
  searchConfig: Pick<SearchConfig, "reader_url" | "openweather_api_key">,
): ContentExtractor {
  const turndown = createTurndown();

  async function get(url: string, accept: string, signal?: AbortSignal): Promise<Response> {
    const response = await fetch(url, {
      headers: { "User-Agent": USER_AGENT, Accept: accept },
      signal: deadline(fetchConfig.timeout_ms, signal),
    });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText} for ${url}`);
    }
    return response;
  }

  async function readText(response: Response): Promise<string> {
    const text = await response.text();
    return text.length > fetchConfig.max_fetch_size ? text.slice(0, fetchConfig.max_fetch_size) : text;
  }

  const article: Strategy = async (url, signal) => {
    const response = await get(url, "text/html,application/xhtml+xml", signal);
    const contentType = response.headers.get("content-type") ?? "not specified";
    if (!contentType.includes("text/html") && !contentType.includes("xhtml")) {
      throw new Error(`unsupported content type: ${contentType}`);
    }
    return htmlToArticle(await readText(response), turndown);
  };

  const strategies: Readonly<Record<ExtractorName, Strategy>> = {
    article,

    wikipedia: async (url, signal) => {
      const extraction = await article(url, signal);
      return extraction ? { ...extraction, content: stripCitations(extraction.content) } : null;
    },

    "reddit-thread": async (url, signal) => {
      const response = await get(redditJsonUrl(url), "application/json", signal);
      return formatRedditThread(await response.json());
    },

    "weather-api": async (url, signal) => {
      const apiKey = searchConfig.openweather_api_key;
      if (!apiKey) {
        return null;
      }
      const withKey = new URL(url);
      withKey.searchParams.set("appid", apiKey);
      const response = await get(withKey.toString(), "application/json", signal);
      return formatWeather(await response.json());
    },
  };

  async function reader(url: string, signal?: AbortSignal): Promise<Extraction | null> {
    const response = await get(`${searchConfig.reader_url}${url}`, "text/plain", signal);
    const content = (await readText(response)).trim();
    return content ? { title: null, content } : null;
  }

  function usable(extraction: Extraction | null): extraction is Extraction {
    return extraction !== null && extraction.content.trim().length >= MIN_CONTENT_CHARS;
  }

  return {
    async extract(candidate, options) {
      let primaryError: unknown = null;
      let extraction: Extraction | null = null;

      try {
        extraction = await strategies[candidate.extractor](candidate.url, options.signal);
      } catch (error) {
        if (options.signal?.aborted) throw error;
        primaryError = error;
        console.warn(`[fetch] ${candidate.extractor} extraction failed for ${candidate.url}: ${errorMessage(error)}`);
      }

      if (!usable(extraction) && candidate.extractor !== "weather-api") {
        console.log(`[fetch] falling back to reader for ${candidate.url}`);
        try {
          extraction = await reader(candidate.url, options.signal);
        } catch (error) {
          if (options.signal?.aborted) throw error;
          console.warn(`[fetch] reader failed for ${candidate.url}: ${errorMessage(error)}`);
          throw primaryError ?? error;
        }
      }

      if (!usable(extraction)) {
        if (primaryError) throw primaryError;
        return null;
      }

      return {
        title: extraction.title ?? candidate.title ?? null,
        content: clipContent(extraction.content, options.maxLength),
      };
    },
  };
}

// pattern: Functional Core

/**
 * Query analysis: a cheap recency pre-filter and explicit intent routing
 * before any generation call, tag parsing and cutoff detection after one.
 */

import type { Turn } from "../context/types.ts";
import type { ModelProvider } from "../model/types.ts";
import type { ToolKind } from "../web/types.ts";
import {
  CUTOFF_PATTERNS,
  LIVE_SUBJECT_PATTERN,
  RECALL_INTENT_PATTERN,
  REDDIT_INTENT_PATTERN,
  SEARCH_ID_PATTERN,
  TEMPORAL_PATTERN,
  TOOL_TAG_LINE_PATTERN,
  TOOL_TAG_PATTERN,
  TRAILING_TIME_PATTERN,
  WEATHER_INTENT_PATTERN,
  WIKIPEDIA_INTENT_PATTERN,
  YEAR_PATTERN,
} from "./patterns.ts";
import { queryExtractionPrompt } from "./prompts.ts";
import type { SearchDecision, ToolRequest } from "./types.ts";

const QUERY_MAX_TOKENS = 64;

const TAG_KINDS: Readonly<Record<string, ToolKind>> = {
  WEATHER: "weather",
  REDDIT: "reddit",
  WIKI: "wikipedia",
  WIKIPEDIA: "wikipedia",
  GOOGLE: "web",
  WEB: "web",
  SEARCH: "web",
  RECALL: "recall",
};

export function isRecencySensitive(prompt: string, now: Date = new Date()): boolean {
  if (TEMPORAL_PATTERN.test(prompt) || LIVE_SUBJECT_PATTERN.test(prompt)) {
    return true;
  }
  const lastYear = now.getFullYear() - 1;
  for (const match of prompt.matchAll(YEAR_PATTERN)) {
    if (Number(match[1]) >= lastYear) {
      return true;
    }
  }
  return false;
}

/** The newest `[search_id: N]` annotation in the history, or null. */
export function latestSearchId(history: ReadonlyArray<Turn>): number | null {
  for (let i = history.length - 1; i >= 0; i--) {
    const ids = Array.from(history[i]?.content.matchAll(SEARCH_ID_PATTERN) ?? [], (m) => Number(m[1]));
    const last = ids[ids.length - 1];
    if (last !== undefined) {
      return last;
    }
  }
  return null;
}

function wikipediaTopic(prompt: string): string {
  const topic = prompt
    .replace(/\b(?:on|in|from|according to)\s+wiki(?:pedia)?\b/gi, " ")
    .replace(/\bwiki(?:pedia)?\b/gi, " ")
    .replace(/[?!.]+$/, "")
    .replace(/\s+/g, " ")
    .trim()
    .replace(/^(?:search|look up|check|find)\s+(?:for\s+)?/i, "");
  const about = /\babout\s+(.+)$/i.exec(topic);
  return about?.[1] ?? (topic || prompt.trim());
}

/**
 * Routing that needs no generation call. Null when the prompt names no
 * tool explicitly.
 */
export function detectIntent(prompt: string, history: ReadonlyArray<Turn>): SearchDecision | null {
  const searchId = latestSearchId(history);
  if (searchId !== null && RECALL_INTENT_PATTERN.test(prompt)) {
    return { type: "tool", kind: "recall", query: String(searchId) };
  }

  const place = WEATHER_INTENT_PATTERN.exec(prompt)?.[1]?.trim().replace(TRAILING_TIME_PATTERN, "").trim();
  if (place) {
    return { type: "tool", kind: "weather", query: place };
  }

  if (REDDIT_INTENT_PATTERN.test(prompt)) {
    return { type: "tool", kind: "reddit", query: prompt.trim() };
  }

  if (WIKIPEDIA_INTENT_PATTERN.test(prompt)) {
    return { type: "tool", kind: "wikipedia", query: wikipediaTopic(prompt) };
  }

  return null;
}

/** The first tag line in `text`, e.g. `WEATHER: Boston`. */
export function parseToolTag(text: string): ToolRequest | null {
  const match = TOOL_TAG_PATTERN.exec(text);
  const kind = match?.[1] ? TAG_KINDS[match[1].toUpperCase()] : undefined;
  if (!match || !kind) {
    return null;
  }

  const query = (match[2] ?? "").replace(/^[\s"'*_`]+|[\s"'*_`]+$/g, "");
  if (kind === "recall") {
    const id = /\d+/.exec(query);
    return id ? { kind, query: id[0] } : null;
  }
  return query ? { kind, query } : null;
}

/** The source of the first knowledge-gap pattern `text` matches, or null. */
export function detectCutoff(text: string): string | null {
  return CUTOFF_PATTERNS.find((pattern) => pattern.test(text))?.source ?? null;
}

export function cleanResponse(text: string): string {
  return text
    .replace(TOOL_TAG_LINE_PATTERN, "")
    .replace(SEARCH_ID_PATTERN, "")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export function annotateSearchId(text: string, searchId: number): string {
  return `${text}\n\n[search_id: ${searchId}]`;
}

export type QueryGenerationInput = {
  readonly prompt: string;
  readonly history: ReadonlyArray<Turn>;
  readonly model: string;
  readonly signal?: AbortSignal;
  readonly now?: Date;
};

/**
 * Ask the model for a single tag line. An unparseable reply (or a recall
 * tag, which this prompt never offers) falls back to a web search for the
 * raw prompt.
 */
export async function generateSearchQuery(
  provider: ModelProvider,
  input: QueryGenerationInput,
): Promise<ToolRequest> {
  const response = await provider.complete(
    {
      model: input.model,
      system: queryExtractionPrompt(input.now ?? new Date()),
      messages: [...input.history, { role: "user", content: input.prompt }],
      max_tokens: QUERY_MAX_TOKENS,
      temperature: 0,
    },
    { signal: input.signal },
  );

  const tag = parseToolTag(response.text);
  if (!tag || tag.kind === "recall") {
    return { kind: "web", query: input.prompt.trim() };
  }
  return tag;
}

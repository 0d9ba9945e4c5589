// pattern: Functional Core

/**
 * Orchestrator types: the accepted request, the streamed event schema and
 * the final result carried by `done` (and returned by `respond`).
 */

import { z } from "zod";
import type { Turn } from "../context/types.ts";
import type { ModelErrorCode } from "../model/types.ts";
import type { ToolKind } from "../web/types.ts";

const TurnSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
});

export const ChatRequestSchema = z.object({
  prompt: z.string().trim().min(1, "prompt must not be empty"),
  history: z.array(TurnSchema).default([]),
  memory: z.string().optional(),
  system_prompt: z.string().optional(),
  model: z.string().min(1).optional(),
});

export type ChatRequestInput = z.input<typeof ChatRequestSchema>;

/** A validated request. Frozen once accepted. */
export type ChatRequest = Readonly<{
  prompt: string;
  history: ReadonlyArray<Turn>;
  memory?: string;
  system_prompt?: string;
  model?: string;
}>;

export type Stage =
  | "start"
  | "analyzing"
  | "cache-check"
  | "direct-answer"
  | "tool-dispatch"
  | "fetching"
  | "synthesizing"
  | "responding";

export type ErrorKind = ModelErrorCode | "context_budget" | "invalid_request" | "internal";

export type TokenUsage = {
  readonly used: number;
  readonly limit: number;
  readonly model_max: number;
  readonly usage_percent: number;
};

export type ChatResult = {
  readonly response: string;
  readonly model: string;
  readonly search_performed: boolean;
  readonly search_type: ToolKind | null;
  readonly search_query: string | null;
  readonly search_id: number | null;
  /** Domain of `source_url`. */
  readonly source: string | null;
  readonly source_url: string | null;
  readonly cache_hit: boolean;
  /** ISO timestamp of the cache entry's last access, set on cache hits. */
  readonly cache_last_access: string | null;
  readonly reroutes: number;
  readonly reroute_suppressed: boolean;
  readonly context_messages_count: number;
  readonly token_usage: TokenUsage;
};

export type StreamEventBody =
  | { readonly type: "status"; readonly stage: Stage; readonly message?: string }
  | { readonly type: "token"; readonly text: string }
  | { readonly type: "done"; readonly result: ChatResult }
  | { readonly type: "error"; readonly kind: ErrorKind; readonly message: string };

/** One event of a request's stream; `seq` is strictly increasing from 1. */
export type StreamEvent = StreamEventBody & { readonly seq: number };

export class OrchestratorError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "OrchestratorError";
  }
}

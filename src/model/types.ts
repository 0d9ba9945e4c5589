// pattern: Functional Core

/**
 * Shared types for generation providers.
 * These types define the port interface that all model adapters normalize to.
 * The orchestrator only ever sees this contract, never a vendor SDK.
 */

export type Message = {
  role: "user" | "assistant";
  content: string;
};

export type ModelRequest = {
  messages: ReadonlyArray<Message>;
  system?: string;
  model: string;
  max_tokens: number;
  temperature?: number;
};

export type CallOptions = {
  signal?: AbortSignal;
};

export type UsageStats = {
  input_tokens: number;
  output_tokens: number;
};

export type ModelResponse = {
  text: string;
  usage: UsageStats;
};

export type ModelStreamChunk =
  | { type: "text"; text: string }
  | { type: "stop"; usage: UsageStats | null };

export type ModelErrorCode = "auth" | "rate_limit" | "timeout" | "cancelled" | "api_error";

export class ModelError extends Error {
  constructor(
    public code: ModelErrorCode,
    public retryable: boolean = false,
    message: string = ""
  ) {
    super(message);
    this.name = "ModelError";
  }
}

export interface ModelProvider {
  complete(request: ModelRequest, options?: CallOptions): Promise<ModelResponse>;
  stream(request: ModelRequest, options?: CallOptions): AsyncIterable<ModelStreamChunk>;
}

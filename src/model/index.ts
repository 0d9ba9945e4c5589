// pattern: Functional Core

export type {
  Message,
  ModelRequest,
  CallOptions,
  UsageStats,
  ModelResponse,
  ModelStreamChunk,
  ModelErrorCode,
} from "./types.ts";

export { ModelError, type ModelProvider } from "./types.ts";
export { createAnthropicAdapter } from "./anthropic.ts";
export { createOpenAICompatAdapter } from "./openai-compat.ts";
export { createModelProvider } from "./factory.ts";

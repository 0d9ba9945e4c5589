// pattern: Imperative Shell

import type { ModelConfig } from "../config/schema.ts";
import type { ModelProvider } from "./types.ts";
import { createAnthropicAdapter } from "./anthropic.ts";
import { createOpenAICompatAdapter } from "./openai-compat.ts";

export function createModelProvider(config: ModelConfig): ModelProvider {
  switch (config.provider) {
    case "anthropic":
      return createAnthropicAdapter(config);
    case "openai-compat":
      return createOpenAICompatAdapter(config);
    default:
      throw new Error(
        `Unknown model provider: ${String(config.provider)}. Valid providers are: 'anthropic', 'openai-compat'`
      );
  }
}

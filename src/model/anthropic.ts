// pattern: Imperative Shell

import Anthropic from "@anthropic-ai/sdk";
import type { ModelConfig } from "../config/schema.ts";
import type {
  CallOptions,
  ModelProvider,
  ModelRequest,
  ModelResponse,
  ModelStreamChunk,
} from "./types.ts";
import { ModelError } from "./types.ts";

function toModelError(error: unknown): unknown {
  if (error instanceof ModelError) {
    return error;
  }
  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return new ModelError("timeout", false, error.message || "generation timed out");
  }
  if (error instanceof Anthropic.APIUserAbortError) {
    return new ModelError("cancelled", false, error.message || "generation aborted");
  }
  if (error instanceof Anthropic.AuthenticationError) {
    return new ModelError("auth", false, error.message || "authentication failed");
  }
  if (error instanceof Anthropic.RateLimitError) {
    return new ModelError("rate_limit", true, error.message || "rate limit exceeded");
  }
  if (error instanceof Anthropic.APIError) {
    return new ModelError("api_error", false, error.message || "api error");
  }
  return error;
}

/**
 * Anthropic rejects consecutive turns with the same role, so adjacent turns
 * are merged and a leading assistant turn is dropped.
 */
export function normalizeAnthropicMessages(
  request: ModelRequest
): Array<Anthropic.MessageParam> {
  const messages: Array<Anthropic.MessageParam> = [];

  for (const msg of request.messages) {
    const previous = messages[messages.length - 1];
    if (previous && previous.role === msg.role && typeof previous.content === "string") {
      previous.content = `${previous.content}\n\n${msg.content}`;
      continue;
    }
    if (messages.length === 0 && msg.role === "assistant") {
      continue;
    }
    messages.push({ role: msg.role, content: msg.content });
  }

  return messages;
}

export function createAnthropicAdapter(config: ModelConfig): ModelProvider {
  const apiKey = config.api_key || process.env["ANTHROPIC_API_KEY"];

  if (!apiKey) {
    throw new Error(
      "Anthropic adapter requires api_key in config or ANTHROPIC_API_KEY environment variable"
    );
  }

  const client = new Anthropic({
    apiKey,
    baseURL: config.base_url,
    timeout: config.timeout_ms,
    maxRetries: 0,
  });

  return {
    async complete(request: ModelRequest, options?: CallOptions): Promise<ModelResponse> {
      let response: Anthropic.Message;
      try {
        response = await client.messages.create(
          {
            model: request.model,
            max_tokens: request.max_tokens,
            system: request.system,
            temperature: request.temperature,
            messages: normalizeAnthropicMessages(request),
          },
          { signal: options?.signal }
        );
      } catch (error) {
        throw toModelError(error);
      }

      const text = response.content
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("");

      return {
        text,
        usage: {
          input_tokens: response.usage.input_tokens,
          output_tokens: response.usage.output_tokens,
        },
      };
    },

    async *stream(request: ModelRequest, options?: CallOptions): AsyncIterable<ModelStreamChunk> {
      let inputTokens = 0;
      let outputTokens = 0;

      try {
        const stream = await client.messages.create(
          {
            model: request.model,
            max_tokens: request.max_tokens,
            system: request.system,
            temperature: request.temperature,
            messages: normalizeAnthropicMessages(request),
            stream: true,
          },
          { signal: options?.signal }
        );

        for await (const event of stream) {
          if (event.type === "message_start") {
            inputTokens = event.message.usage.input_tokens;
          } else if (event.type === "content_block_delta" && event.delta.type === "text_delta") {
            yield { type: "text", text: event.delta.text };
          } else if (event.type === "message_delta") {
            outputTokens = event.usage.output_tokens;
          }
        }
      } catch (error) {
        throw toModelError(error);
      }

      yield {
        type: "stop",
        usage: { input_tokens: inputTokens, output_tokens: outputTokens },
      };
    },
  };
}

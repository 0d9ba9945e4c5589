// pattern: Imperative Shell

import OpenAI from "openai";
import type { ModelConfig } from "../config/schema.ts";
import type {
  CallOptions,
  Message,
  ModelProvider,
  ModelRequest,
  ModelResponse,
  ModelStreamChunk,
  UsageStats,
} from "./types.ts";
import { ModelError } from "./types.ts";

/**
 * Map SDK failures onto ModelError codes. Timeout and abort are checked first
 * because both SDK classes extend APIError.
 */
export function toModelError(error: unknown): unknown {
  if (error instanceof ModelError) {
    return error;
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new ModelError("timeout", false, error.message || "generation timed out");
  }
  if (error instanceof OpenAI.APIUserAbortError) {
    return new ModelError("cancelled", false, error.message || "generation aborted");
  }
  if (error instanceof OpenAI.AuthenticationError) {
    return new ModelError("auth", false, error.message || "authentication failed");
  }
  if (error instanceof OpenAI.RateLimitError) {
    return new ModelError("rate_limit", true, error.message || "rate limit exceeded");
  }
  if (error instanceof OpenAI.APIError) {
    return new ModelError("api_error", false, error.message || "api error");
  }
  return error;
}

export function normalizeMessages(
  request: ModelRequest
): Array<OpenAI.Chat.ChatCompletionMessageParam> {
  const messages: Array<OpenAI.Chat.ChatCompletionMessageParam> = [];

  if (request.system) {
    messages.push({
      role: "system",
      content: request.system,
    });
  }

  messages.push(
    ...request.messages.map((msg: Message): OpenAI.Chat.ChatCompletionMessageParam =>
      msg.role === "user"
        ? { role: "user", content: msg.content }
        : { role: "assistant", content: msg.content }
    )
  );

  return messages;
}

function normalizeUsage(usage: OpenAI.Completions.CompletionUsage | undefined): UsageStats {
  return {
    input_tokens: usage?.prompt_tokens ?? 0,
    output_tokens: usage?.completion_tokens ?? 0,
  };
}

export function createOpenAICompatAdapter(config: ModelConfig): ModelProvider {
  // Local OpenAI-compatible servers (Ollama, llama.cpp) accept any key.
  const apiKey = config.api_key || process.env["OPENAI_API_KEY"] || (config.base_url ? "local" : undefined);

  if (!apiKey) {
    throw new Error(
      "OpenAI-compatible adapter requires api_key in config, OPENAI_API_KEY, or a base_url pointing at a local server"
    );
  }

  const client = new OpenAI({
    apiKey,
    baseURL: config.base_url,
    timeout: config.timeout_ms,
    maxRetries: 0,
  });

  return {
    async complete(request: ModelRequest, options?: CallOptions): Promise<ModelResponse> {
      let response: OpenAI.Chat.ChatCompletion;
      try {
        response = await client.chat.completions.create(
          {
            model: request.model,
            max_tokens: request.max_tokens,
            temperature: request.temperature,
            messages: normalizeMessages(request),
          },
          { signal: options?.signal }
        );
      } catch (error) {
        throw toModelError(error);
      }

      const choice = response.choices[0];
      if (!choice) {
        throw new ModelError("api_error", false, "No choices in response");
      }

      return {
        text: choice.message.content ?? "",
        usage: normalizeUsage(response.usage),
      };
    },

    async *stream(request: ModelRequest, options?: CallOptions): AsyncIterable<ModelStreamChunk> {
      let usage: UsageStats | null = null;
      try {
        const stream = await client.chat.completions.create(
          {
            model: request.model,
            max_tokens: request.max_tokens,
            temperature: request.temperature,
            messages: normalizeMessages(request),
            stream: true,
          },
          { signal: options?.signal }
        );

        for await (const event of stream) {
          if (event.usage) {
            usage = normalizeUsage(event.usage);
          }
          const choice = event.choices[0];
          if (!choice) continue;

          if (choice.delta.content) {
            yield { type: "text", text: choice.delta.content };
          }
        }
      } catch (error) {
        throw toModelError(error);
      }

      yield { type: "stop", usage };
    },
  };
}

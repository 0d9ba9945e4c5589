// pattern: Imperative Shell

import { describe, it, expect, afterEach, beforeEach, vi } from "vitest";
import { createAnthropicAdapter, normalizeAnthropicMessages } from "./anthropic.ts";
import type { ModelConfig } from "../config/schema.ts";

const baseConfig: ModelConfig = {
  provider: "anthropic",
  name: "claude-3-5-haiku-latest",
  max_tokens: 1024,
  timeout_ms: 60000,
};

describe("createAnthropicAdapter", () => {
  beforeEach(() => {
    vi.stubEnv("ANTHROPIC_API_KEY", "");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("throws if no api key is configured or in environment", () => {
    expect(() => createAnthropicAdapter(baseConfig)).toThrow();
  });

  it("accepts api_key from config", () => {
    expect(() => createAnthropicAdapter({ ...baseConfig, api_key: "test-key" })).not.toThrow();
  });

  it("accepts api_key from environment variable", () => {
    vi.stubEnv("ANTHROPIC_API_KEY", "test-env-key");
    expect(() => createAnthropicAdapter(baseConfig)).not.toThrow();
  });
});

describe("normalizeAnthropicMessages", () => {
  it("merges adjacent turns with the same role", () => {
    const messages = normalizeAnthropicMessages({
      model: "claude",
      max_tokens: 100,
      messages: [
        { role: "user", content: "first" },
        { role: "user", content: "second" },
        { role: "assistant", content: "reply" },
      ],
    });

    expect(messages).toEqual([
      { role: "user", content: "first\n\nsecond" },
      { role: "assistant", content: "reply" },
    ]);
  });

  it("drops a leading assistant turn", () => {
    const messages = normalizeAnthropicMessages({
      model: "claude",
      max_tokens: 100,
      messages: [
        { role: "assistant", content: "orphan" },
        { role: "user", content: "question" },
      ],
    });

    expect(messages).toEqual([{ role: "user", content: "question" }]);
  });
});

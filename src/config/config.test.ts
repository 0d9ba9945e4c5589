// pattern: Imperative Shell

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFileSync, unlinkSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { applyEnvOverrides, loadConfig } from "./config.ts";

const getTempConfigPath = () =>
  join(tmpdir(), `test-config-${Date.now()}-${Math.random().toString(36).slice(2)}.toml`);

const baseTomlContent = `
[model]
provider = "openai-compat"
name = "llama3.1:8b"
base_url = "http://localhost:11434/v1"
`;

const ENV_KEYS = [
  "MODEL_API_KEY",
  "ANTHROPIC_API_KEY",
  "OPENAI_COMPAT_API_KEY",
  "BRAVE_API_KEY",
  "OPENWEATHER_API_KEY",
  "SEARXNG_ENDPOINT",
  "DATABASE_URL",
];

describe("loadConfig", () => {
  let tempPath: string;

  beforeEach(() => {
    tempPath = getTempConfigPath();
    for (const key of ENV_KEYS) {
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      delete process.env[key];
    }
    try {
      unlinkSync(tempPath);
    } catch {
      // file might not exist
    }
  });

  it("fills every section with defaults when only [model] is given", () => {
    writeFileSync(tempPath, baseTomlContent);

    const config = loadConfig(tempPath);

    expect(config.model.name).toBe("llama3.1:8b");
    expect(config.model.timeout_ms).toBe(60000);
    expect(config.fetch.concurrency).toBe(3);
    expect(config.cache.ttl_seconds.weather).toBe(1800);
    expect(config.cache.ttl_seconds.wikipedia).toBe(432000);
    expect(config.context.safety_buffer).toBe(0.9);
    expect(config.orchestrator.max_reroutes).toBe(1);
    expect(config.database).toBeUndefined();
  });

  it("reads the model limit table", () => {
    writeFileSync(
      tempPath,
      `${baseTomlContent}
[context.model_limits]
"llama3.1" = 131072
"qwen2.5" = 32768
`,
    );

    const config = loadConfig(tempPath);

    expect(config.context.model_limits).toEqual({ "llama3.1": 131072, "qwen2.5": 32768 });
  });

  it("lets environment secrets override TOML values", () => {
    writeFileSync(
      tempPath,
      `${baseTomlContent}
api_key = "toml-key"

[search]
brave_api_key = "toml-brave"
result_count = 3
`,
    );

    process.env["MODEL_API_KEY"] = "env-key";
    process.env["BRAVE_API_KEY"] = "env-brave";
    process.env["DATABASE_URL"] = "postgresql://localhost/relay_test";

    const config = loadConfig(tempPath);

    expect(config.model.api_key).toBe("env-key");
    expect(config.search.brave_api_key).toBe("env-brave");
    expect(config.search.result_count).toBe(3);
    expect(config.database?.url).toBe("postgresql://localhost/relay_test");
  });

  it("rejects an unknown model provider", () => {
    writeFileSync(
      tempPath,
      `
[model]
provider = "mystery"
name = "x"
`,
    );

    expect(() => loadConfig(tempPath)).toThrow();
  });
});

describe("applyEnvOverrides", () => {
  it("leaves the parsed table untouched when no variables are set", () => {
    const parsed = { model: { provider: "anthropic", name: "claude" } };

    expect(applyEnvOverrides(parsed, {})).toEqual(parsed);
  });

  it("prefers MODEL_API_KEY over provider-specific variables", () => {
    const merged = applyEnvOverrides(
      { model: { provider: "anthropic", name: "claude" } },
      { MODEL_API_KEY: "generic", ANTHROPIC_API_KEY: "specific" },
    );

    expect(merged["model"]).toEqual({ provider: "anthropic", name: "claude", api_key: "generic" });
  });
});

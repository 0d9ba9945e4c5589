// pattern: Imperative Shell

import TOML from "@iarna/toml";
import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { AppConfigSchema, type AppConfig } from "./schema.ts";

export type {
  AppConfig,
  ModelConfig,
  SearchConfig,
  FetchConfig,
  CacheConfig,
  TtlSeconds,
  ContextConfig,
  OrchestratorConfig,
  DatabaseConfig,
} from "./schema.ts";

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(parsed: Table, name: string): Table {
  const existing = parsed[name];
  return isTable(existing) ? { ...existing } : {};
}

/**
 * Apply secret overrides from the environment. Only keys whose variable is
 * set are touched, so TOML values survive when the environment is silent.
 */
export function applyEnvOverrides(parsed: Table, env: NodeJS.ProcessEnv = process.env): Table {
  const merged: Table = { ...parsed };

  const modelKey = env["MODEL_API_KEY"] ?? env["ANTHROPIC_API_KEY"] ?? env["OPENAI_COMPAT_API_KEY"];
  if (modelKey) {
    merged["model"] = { ...section(parsed, "model"), api_key: modelKey };
  }

  const searchOverrides: Table = {};
  if (env["BRAVE_API_KEY"]) {
    searchOverrides["brave_api_key"] = env["BRAVE_API_KEY"];
  }
  if (env["OPENWEATHER_API_KEY"]) {
    searchOverrides["openweather_api_key"] = env["OPENWEATHER_API_KEY"];
  }
  if (env["SEARXNG_ENDPOINT"]) {
    searchOverrides["searxng_endpoint"] = env["SEARXNG_ENDPOINT"];
  }
  if (Object.keys(searchOverrides).length > 0) {
    merged["search"] = { ...section(parsed, "search"), ...searchOverrides };
  }

  if (env["DATABASE_URL"]) {
    merged["database"] = { url: env["DATABASE_URL"] };
  }

  return merged;
}

export function loadConfig(configPath?: string): AppConfig {
  const resolvedPath = resolve(configPath ?? process.env["RELAY_CONFIG"] ?? "config.toml");
  const raw = readFileSync(resolvedPath, "utf-8");
  const parsed = TOML.parse(raw);

  return AppConfigSchema.parse(applyEnvOverrides(parsed));
}

// pattern: Functional Core
import { z } from "zod";

const ModelConfigSchema = z.object({
  provider: z.enum(["anthropic", "openai-compat"]),
  name: z.string(),
  api_key: z.string().optional(),
  base_url: z.string().url().optional(),
  max_tokens: z.number().int().positive().default(1024),
  timeout_ms: z.number().int().positive().default(60000),
});

const SearchConfigSchema = z.object({
  brave_api_key: z.string().optional(),
  searxng_endpoint: z.string().url().optional(),
  openweather_api_key: z.string().optional(),
  reader_url: z.string().url().default("https://r.jina.ai/"),
  result_count: z.number().int().positive().max(20).default(5),
});

const FetchConfigSchema = z.object({
  concurrency: z.number().int().positive().default(3),
  timeout_ms: z.number().int().positive().default(10000),
  max_fetch_size: z.number().int().positive().default(2 * 1024 * 1024),
  grace_ms: z.number().int().nonnegative().default(250),
  max_content_length: z.number().int().positive().default(4000),
  large_model_content_length: z.number().int().positive().default(8000),
});

const TtlSecondsSchema = z.object({
  weather: z.number().int().positive().default(30 * 60),
  web: z.number().int().positive().default(15 * 60 * 60),
  reddit: z.number().int().positive().default(8 * 60 * 60),
  wikipedia: z.number().int().positive().default(5 * 24 * 60 * 60),
  recall: z.number().int().positive().default(2 * 60 * 60),
  default: z.number().int().positive().default(2 * 60 * 60),
});

const CacheConfigSchema = z.object({
  similarity_threshold: z.number().min(0).max(1).default(0.8),
  simhash_max_distance: z.number().int().min(0).max(64).default(18),
  url_similarity_threshold: z.number().min(0).max(1).default(0.95),
  use_synonyms: z.boolean().default(true),
  max_entries: z.number().int().positive().default(500),
  refresh_ttl_on_hit: z.boolean().default(false),
  ttl_seconds: TtlSecondsSchema.default({}),
});

const ContextConfigSchema = z.object({
  safety_buffer: z.number().gt(0).max(1).default(0.9),
  default_limit: z.number().int().positive().default(8192),
  response_reserve: z.number().int().nonnegative().default(500),
  model_limits: z.record(z.string(), z.number().int().positive()).default({}),
});

const OrchestratorConfigSchema = z.object({
  max_history_messages: z.number().int().positive().default(30),
  max_reroutes: z.number().int().nonnegative().default(1),
});

const DatabaseConfigSchema = z.object({
  url: z.string().url(),
  max_connections: z.number().int().positive().default(4),
});

const AppConfigSchema = z.object({
  model: ModelConfigSchema,
  search: SearchConfigSchema.default({}),
  fetch: FetchConfigSchema.default({}),
  cache: CacheConfigSchema.default({}),
  context: ContextConfigSchema.default({}),
  orchestrator: OrchestratorConfigSchema.default({}),
  database: DatabaseConfigSchema.optional(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type FetchConfig = z.infer<typeof FetchConfigSchema>;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type TtlSeconds = z.infer<typeof TtlSecondsSchema>;
export type ContextConfig = z.infer<typeof ContextConfigSchema>;
export type OrchestratorConfig = z.infer<typeof OrchestratorConfigSchema>;
export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;

export {
  AppConfigSchema,
  ModelConfigSchema,
  SearchConfigSchema,
  FetchConfigSchema,
  CacheConfigSchema,
  TtlSecondsSchema,
  ContextConfigSchema,
  OrchestratorConfigSchema,
  DatabaseConfigSchema,
};

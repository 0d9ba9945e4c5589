// pattern: Functional Core

export type {
  AttemptResult,
  Candidate,
  Extraction,
  ExtractorName,
  FetchOutcome,
  FetchTask,
  SearchOptions,
  SearchProvider,
  SearchResponse,
  SearchResult,
  ToolKind,
  UrlAttempt,
  UrlState,
} from "./types.ts";
export { RequestCancelledError, TOOL_KINDS, isToolKind } from "./types.ts";
export { createBraveAdapter } from "./providers/brave.ts";
export { createSearXNGAdapter } from "./providers/searxng.ts";
export { createDuckDuckGoAdapter } from "./providers/duckduckgo.ts";
export { createSearchChain, type SearchChain } from "./chain.ts";
export {
  createContentExtractor,
  htmlToArticle,
  openWeatherUrl,
  type ContentExtractor,
  type ExtractOptions,
} from "./extract.ts";
export { createFetchTask, planTasks, attempts } from "./task.ts";
export { fetchAll, runFetchTask, withGrace, type FetcherDeps, type FetchOptions } from "./fetcher.ts";
export {
  TOOLS,
  createRetriever,
  ttlFor,
  type FetchKind,
  type Retrieval,
  type RetrieveOptions,
  type Retriever,
  type RetrieverDeps,
  type ToolSpec,
} from "./tools.ts";

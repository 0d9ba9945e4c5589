// pattern: Functional Core

export type { SearchDecision, ToolRequest } from "./types.ts";
export {
  annotateSearchId,
  cleanResponse,
  detectCutoff,
  detectIntent,
  generateSearchQuery,
  isRecencySensitive,
  latestSearchId,
  parseToolTag,
  type QueryGenerationInput,
} from "./analyzer.ts";
export {
  NO_DATA_MARKER,
  defaultSystemPrompt,
  formatDate,
  queryExtractionPrompt,
  simpleSystemPrompt,
  synthesisPrompt,
} from "./prompts.ts";

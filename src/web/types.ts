// pattern: Functional Core

/**
 * Shared types for the retrieval side: search providers, candidates and the
 * per-task fetch state machine.
 */

export const TOOL_KINDS = ['web', 'reddit', 'wikipedia', 'weather', 'recall'] as const;

export type ToolKind = (typeof TOOL_KINDS)[number];

export function isToolKind(value: string): value is ToolKind {
  return (TOOL_KINDS as ReadonlyArray<string>).includes(value);
}

export type SearchResult = {
  readonly title: string;
  readonly url: string;
  readonly snippet: string;
  readonly score?: number;
};

export type SearchResponse = {
  readonly results: ReadonlyArray<SearchResult>;
  readonly provider: string;
};

export type SearchOptions = {
  readonly signal?: AbortSignal;
};

export interface SearchProvider {
  readonly name: string;
  search(query: string, limit: number, options?: SearchOptions): Promise<SearchResponse>;
}

export type ExtractorName = 'article' | 'wikipedia' | 'reddit-thread' | 'weather-api';

export type Candidate = {
  readonly url: string;
  readonly extractor: ExtractorName;
  readonly title?: string;
};

export type Extraction = {
  readonly content: string;
  readonly title: string | null;
};

export type UrlState = 'pending' | 'fetching' | 'extracted' | 'empty' | 'failed';

export type UrlAttempt = {
  readonly url: string;
  readonly state: UrlState;
  readonly error?: string;
};

export type FetchOutcome =
  | {
      readonly type: 'extracted';
      readonly url: string;
      readonly title: string | null;
      readonly content: string;
      readonly cached: boolean;
    }
  | {
      readonly type: 'failed-overall';
      readonly attempts: ReadonlyArray<UrlAttempt>;
    };

export type AttemptResult =
  | { readonly type: 'extracted'; readonly extraction: Extraction; readonly cached: boolean }
  | { readonly type: 'empty' }
  | { readonly type: 'failed'; readonly error: string };

/**
 * One page to obtain: candidates are walked strictly in order and the task
 * stops at the first extracted one. Value type; transitions return a new task.
 */
export type FetchTask = {
  readonly kind: ToolKind;
  readonly candidates: ReadonlyArray<Candidate>;
  readonly states: ReadonlyArray<UrlState>;
  readonly errors: ReadonlyArray<string | undefined>;
  readonly cursor: number;
  readonly outcome: FetchOutcome | null;
};

export class RequestCancelledError extends Error {
  constructor(message = "request cancelled") {
    super(message);
    this.name = "RequestCancelledError";
  }
}

// pattern: Functional Core

/**
 * Token/context budget types.
 * A TokenBudget is scoped to one request cycle; `consumed + reserved <= limit`
 * holds whenever one is produced by the token manager.
 */

export type Turn = {
  readonly role: 'user' | 'assistant';
  readonly content: string;
};

export type TokenCounter = (text: string) => number;

export type SizeClass = 'fact' | 'snippet' | 'article';

export type ModelBudget = {
  readonly limit: number;
  readonly modelMax: number;
};

export type TokenBudget = ModelBudget & {
  readonly consumed: number;
  readonly reserved: number;
};

export type FitInput = {
  readonly model: string;
  readonly system: string;
  readonly memory?: string | null;
  readonly prompt: string;
  readonly history: ReadonlyArray<Turn>;
  readonly reserve: number;
};

export type FitResult = {
  readonly history: ReadonlyArray<Turn>;
  readonly budget: TokenBudget;
  readonly dropped: number;
  readonly clipped: boolean;
};

export type ContentFit = {
  readonly fit: FitResult;
  readonly content: string;
  readonly contentClipped: boolean;
};

export type TokenManager = {
  budgetFor(model: string): ModelBudget;
  countTokens(model: string, text: string): number;
  reserveFor(sizeClass: SizeClass): number;
  fit(input: FitInput): FitResult;
  fitWithContent(input: FitInput, content: string): ContentFit;
};

export class ContextBudgetError extends Error {
  constructor(
    public readonly required: number,
    public readonly limit: number,
  ) {
    super(`fixed context needs ${required} tokens but the budget is ${limit}`);
    this.name = 'ContextBudgetError';
  }
}

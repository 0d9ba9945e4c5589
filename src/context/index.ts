// pattern: Functional Core

export type {
  Turn,
  TokenCounter,
  SizeClass,
  ModelBudget,
  TokenBudget,
  FitInput,
  FitResult,
  ContentFit,
  TokenManager,
} from './types.ts';
export { ContextBudgetError } from './types.ts';
export { createTokenManager, groupUnits } from './budget.ts';
export {
  MESSAGE_OVERHEAD,
  conservativeCounter,
  selectCounter,
  clipToTokens,
  truncateToTokens,
} from './counter.ts';

// pattern: Functional Core

/**
 * Token manager: sizes the context for one generation call.
 * History is dropped oldest-unit-first, where a unit is a user turn plus the
 * assistant turns that answer it, so no assistant reply is left without its
 * question. The system prompt and the newest unit always survive; the newest
 * unit is clipped rather than dropped when it alone overflows.
 */

import type { ContextConfig } from '../config/schema.ts';
import {
  MESSAGE_OVERHEAD,
  clipToTokens,
  selectCounter,
  truncateToTokens,
} from './counter.ts';
import {
  ContextBudgetError,
  type ContentFit,
  type FitInput,
  type FitResult,
  type ModelBudget,
  type SizeClass,
  type TokenCounter,
  type TokenManager,
  type Turn,
} from './types.ts';

const SIZE_CLASS_RESERVE: Readonly<Record<SizeClass, number>> = {
  fact: 600,
  snippet: 1500,
  article: 4000,
};

export type CreateTokenManagerOptions = {
  readonly config: ContextConfig;
  readonly counters?: Readonly<Record<string, TokenCounter>>;
};

/**
 * Group turns into dialogue units, oldest first. An assistant turn with no
 * preceding user turn forms a unit of its own.
 */
export function groupUnits(history: ReadonlyArray<Turn>): Array<Array<Turn>> {
  const units: Array<Array<Turn>> = [];
  let current: Array<Turn> | null = null;

  for (const turn of history) {
    if (turn.role === 'user' || !current) {
      current = [turn];
      units.push(current);
    } else {
      current.push(turn);
    }
  }

  return units;
}

export function createTokenManager(options: CreateTokenManagerOptions): TokenManager {
  const { config } = options;
  const counters = options.counters ?? {};

  function budgetFor(model: string): ModelBudget {
    const name = model.toLowerCase();
    let modelMax = config.default_limit;
    let matched = '';

    for (const [prefix, limit] of Object.entries(config.model_limits)) {
      const key = prefix.toLowerCase();
      if (name.startsWith(key) && key.length > matched.length) {
        matched = key;
        modelMax = limit;
      }
    }

    const limit = Math.max(0, Math.floor(modelMax * config.safety_buffer) - config.response_reserve);
    return { limit, modelMax };
  }

  function countTokens(model: string, text: string): number {
    return selectCounter(model, counters)(text);
  }

  function messageTokens(counter: TokenCounter, text: string): number {
    return counter(text) + MESSAGE_OVERHEAD;
  }

  function unitTokens(counter: TokenCounter, unit: ReadonlyArray<Turn>): number {
    return unit.reduce((sum, turn) => sum + messageTokens(counter, turn.content), 0);
  }

  /**
   * Water-fill the unit into `available`: turns smaller than an even share
   * keep their full text, the rest split what remains.
   * Returns null when not even the framing fits.
   */
  function clipUnit(
    counter: TokenCounter,
    unit: ReadonlyArray<Turn>,
    available: number,
  ): Array<Turn> | null {
    let remaining = available - unit.length * MESSAGE_OVERHEAD;
    if (remaining <= 0) {
      return null;
    }

    const order = unit
      .map((turn, index) => ({ index, tokens: counter(turn.content) }))
      .sort((a, b) => a.tokens - b.tokens);

    const clipped = unit.map((turn) => ({ ...turn }));
    let left = order.length;

    for (const { index, tokens } of order) {
      const share = Math.floor(remaining / left);
      const turn = clipped[index];
      if (!turn) continue;
      if (tokens > share) {
        clipped[index] = { ...turn, content: clipToTokens(turn.content, share, counter) };
      }
      remaining -= counter(clipped[index]?.content ?? '');
      left--;
    }

    return clipped;
  }

  function fit(input: FitInput): FitResult {
    const counter = selectCounter(input.model, counters);
    const { limit, modelMax } = budgetFor(input.model);

    const fixed =
      messageTokens(counter, input.system) +
      (input.memory ? messageTokens(counter, input.memory) : 0) +
      messageTokens(counter, input.prompt);

    if (fixed > limit) {
      throw new ContextBudgetError(fixed, limit);
    }

    // The reservation is a hint: it can only claim what the fixed parts leave.
    const reserved = Math.max(0, Math.min(input.reserve, limit - fixed));
    const available = limit - fixed - reserved;

    const units = groupUnits(input.history);
    const kept: Array<Array<Turn>> = [];
    let used = 0;
    let clipped = false;

    for (let i = units.length - 1; i >= 0; i--) {
      const unit = units[i];
      if (!unit) continue;
      const cost = unitTokens(counter, unit);

      if (used + cost <= available) {
        kept.unshift(unit);
        used += cost;
        continue;
      }

      if (kept.length === 0) {
        const shrunk = clipUnit(counter, unit, available);
        if (shrunk) {
          kept.unshift(shrunk);
          used += unitTokens(counter, shrunk);
          clipped = true;
        }
      }
      break;
    }

    const history = kept.flat();
    const dropped = input.history.length - history.length;

    if (dropped > 0 || clipped) {
      console.log(
        `[context] truncated history: kept ${history.length}/${input.history.length} turns ` +
          `(${used}/${available} tokens, reserved ${reserved})${clipped ? ', newest pair clipped' : ''}`,
      );
    }

    return {
      history,
      dropped,
      clipped,
      budget: {
        limit,
        modelMax,
        consumed: fixed + used,
        reserved,
      },
    };
  }

  function fitWithContent(input: FitInput, content: string): ContentFit {
    const counter = selectCounter(input.model, counters);
    const needed = messageTokens(counter, content);

    // Fresh content outranks old turns: re-truncate history around it first.
    const refit = fit({ ...input, reserve: Math.max(input.reserve, needed) });
    const room = refit.budget.reserved - MESSAGE_OVERHEAD;

    if (needed <= refit.budget.reserved) {
      return { fit: refit, content, contentClipped: false };
    }

    console.warn(
      `[context] retrieved content needs ${needed} tokens, only ${refit.budget.reserved} available; clipping content`,
    );
    return {
      fit: refit,
      content: truncateToTokens(content, room, counter),
      contentClipped: true,
    };
  }

  return {
    budgetFor,
    countTokens,
    reserveFor: (sizeClass) => SIZE_CLASS_RESERVE[sizeClass],
    fit,
    fitWithContent,
  };
}

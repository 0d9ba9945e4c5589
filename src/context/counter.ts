// pattern: Functional Core

import type { TokenCounter } from './types.ts';

/** Per-message framing cost added on top of the content count. */
export const MESSAGE_OVERHEAD = 4;

/**
 * Estimate that errs high: the larger of chars/3 and words*4/3. Real
 * tokenizers land between chars/4 and chars/3 for English prose, so this
 * stays an overestimate without a vocabulary.
 */
export const conservativeCounter: TokenCounter = (text) => {
  if (!text) {
    return 0;
  }
  const byChars = Math.ceil(text.length / 3);
  const words = text.split(/\s+/).filter(Boolean).length;
  const byWords = Math.ceil((words * 4) / 3);
  return Math.max(byChars, byWords);
};

/**
 * Pick the counter registered for the longest family prefix of `model`,
 * falling back to the conservative estimate.
 */
export function selectCounter(
  model: string,
  counters: Readonly<Record<string, TokenCounter>>,
): TokenCounter {
  const name = model.toLowerCase();
  let best: { prefix: string; counter: TokenCounter } | null = null;

  for (const [prefix, counter] of Object.entries(counters)) {
    const family = prefix.toLowerCase();
    if (name.startsWith(family) && (!best || family.length > best.prefix.length)) {
      best = { prefix: family, counter };
    }
  }

  return best?.counter ?? conservativeCounter;
}

/**
 * Keep the tail of `text` so that it counts at most `maxTokens`.
 * Binary search over the suffix length; the counter is assumed monotonic in
 * length.
 */
export function clipToTokens(text: string, maxTokens: number, counter: TokenCounter): string {
  if (counter(text) <= maxTokens) {
    return text;
  }
  const marker = '[…] ';
  if (maxTokens <= counter(marker)) {
    return '';
  }

  let low = 0;
  let high = text.length;
  while (low < high) {
    const mid = Math.ceil((low + high) / 2);
    const candidate = marker + text.slice(text.length - mid);
    if (counter(candidate) <= maxTokens) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }

  return marker + text.slice(text.length - low);
}

/**
 * Keep the head of `text` so that it counts at most `maxTokens`, cutting at
 * the last sentence end when one falls in the final 30%.
 */
export function truncateToTokens(text: string, maxTokens: number, counter: TokenCounter): string {
  if (counter(text) <= maxTokens) {
    return text;
  }
  if (maxTokens <= 0) {
    return '';
  }

  let low = 0;
  let high = text.length;
  while (low < high) {
    const mid = Math.ceil((low + high) / 2);
    if (counter(text.slice(0, mid)) <= maxTokens) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }

  const head = text.slice(0, low);
  const lastPeriod = head.lastIndexOf('.');
  if (lastPeriod > low * 0.7) {
    return head.slice(0, lastPeriod + 1);
  }
  return head;
}

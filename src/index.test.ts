// pattern: Imperative Shell

/**
 * Tests for the entry point interaction loop.
 * Verifies streamed output, history bookkeeping, REPL commands and shutdown.
 */

import { describe, it, expect, vi } from 'vitest';
import { createInteractionLoop, formatFooter, performShutdown } from '@/index.ts';
import type { Turn } from '@/context/index.ts';
import { ModelError } from '@/model/types.ts';
import type { ChatResult } from '@/orchestrator/index.ts';
import type { PersistenceProvider } from '@/persistence/types.ts';
import {
  createFakeRetriever,
  createScriptedModel,
  createTestOrchestrator,
  type ScriptedReply,
} from '@/integration/test-helpers.ts';

function setup(streams: ReadonlyArray<ScriptedReply>, pages = {}) {
  const model = createScriptedModel({ streams });
  const { retriever } = createFakeRetriever(pages);
  const { orchestrator, cache } = createTestOrchestrator({ model: model.provider, retriever });
  const written: Array<string> = [];
  const history: Array<Turn> = [];
  const loop = createInteractionLoop({
    orchestrator,
    cache,
    output: { write: (text: string) => written.push(text) },
    history,
  });
  return { loop, written, history, cache, model };
}

const baseResult: ChatResult = {
  response: 'ok',
  model: 'test-model',
  search_performed: false,
  search_type: null,
  search_query: null,
  search_id: null,
  source: null,
  source_url: null,
  cache_hit: false,
  cache_last_access: null,
  reroutes: 0,
  reroute_suppressed: false,
  context_messages_count: 1,
  token_usage: { used: 700, limit: 7000, model_max: 8192, usage_percent: 10 },
};

describe('formatFooter', () => {
  it('shows only context usage for a direct answer', () => {
    expect(formatFooter(baseResult)).toBe('(10% context)');
  });

  it('describes a cached search', () => {
    expect(
      formatFooter({
        ...baseResult,
        search_performed: true,
        search_type: 'weather',
        search_query: 'Paris',
        source: 'weather.example.com',
        cache_hit: true,
        reroutes: 1,
      }),
    ).toBe('(weather: Paris · weather.example.com · cached · re-routed 1x · 10% context)');
  });
});

describe('interaction loop', () => {
  it('streams the answer and records the exchange', async () => {
    const { loop, written, history } = setup(['Hamlet was written by Shakespeare.']);

    const result = await loop('Who wrote Hamlet?');

    expect(result?.response).toBe('Hamlet was written by Shakespeare.');
    expect(written.join('')).toMatch(/^Hamlet was written by Shakespeare\.\n\(\d+(\.\d)?% context\)\n\n$/);
    expect(history).toEqual([
      { role: 'user', content: 'Who wrote Hamlet?' },
      { role: 'assistant', content: 'Hamlet was written by Shakespeare.' },
    ]);
  });

  it('sends earlier exchanges as history', async () => {
    const { loop, model } = setup(['First answer.', 'Second answer.']);

    await loop('Who wrote Hamlet?');
    await loop('And Macbeth?');

    expect(model.streamRequests[1]?.messages).toEqual([
      { role: 'user', content: 'Who wrote Hamlet?' },
      { role: 'assistant', content: 'First answer.' },
      { role: 'user', content: 'And Macbeth?' },
    ]);
  });

  it('prints status messages and keeps the search annotation in history', async () => {
    const { loop, written, history } = setup(['Rainy, 18°C.'], {
      'weather:Paris': { content: 'Paris: 18°C, light rain', sources: ['https://weather.example.com/paris'] },
    });

    await loop("What's the weather in Paris?");

    expect(written).toContain('  [tool-dispatch] weather: Paris\n');
    expect(written).toContain('  [fetching] Paris\n');
    expect(history[1]).toEqual({ role: 'assistant', content: 'Rainy, 18°C.\n\n[search_id: 1]' });
  });

  it('reports an error without recording the exchange', async () => {
    const { loop, written, history } = setup([new ModelError('timeout', true, 'model took too long')]);

    const result = await loop('Who wrote Hamlet?');

    expect(result).toBeNull();
    expect(written).toContain('\nerror (timeout): model took too long\n\n');
    expect(history).toEqual([]);
  });

  it('lists recent searches and resets the conversation', async () => {
    const { loop, written, history } = setup(['Rainy.'], {
      'weather:Paris': { content: 'Paris: 18°C, light rain', sources: ['https://weather.example.com/paris'] },
    });

    await loop('/searches');
    expect(written.at(-1)).toBe('no cached searches\n\n');

    await loop("What's the weather in Paris?");
    await loop('/searches');
    expect(written.at(-1)).toBe('  #1 weather: paris\n\n');

    await loop('/reset');
    expect(history).toEqual([]);
    expect(written.at(-1)).toBe('conversation cleared\n\n');
  });
});

describe('performShutdown', () => {
  it('closes the prompt, flushes the cache and disconnects', async () => {
    const { cache } = setup([]);
    const close = vi.fn();
    const disconnect = vi.fn(async () => {});
    const flush = vi.spyOn(cache, 'close');
    const persistence: PersistenceProvider = {
      connect: async () => {},
      disconnect,
      runMigrations: async () => [],
      query: async () => [],
      withTransaction: async (fn) => fn(async () => []),
    };

    await performShutdown({ close }, cache, persistence);

    expect(close).toHaveBeenCalledTimes(1);
    expect(flush).toHaveBeenCalledTimes(1);
    expect(disconnect).toHaveBeenCalledTimes(1);
  });

  it('skips the database when there is none', async () => {
    const { cache } = setup([]);
    const close = vi.fn();

    await expect(performShutdown({ close }, cache, null)).resolves.toBeUndefined();
    expect(close).toHaveBeenCalledTimes(1);
  });
});

// pattern: Functional Core

/**
 * Shared test utilities.
 * A scripted model provider that replays canned generations in order, and a
 * retriever stand-in that answers from a table instead of the network.
 */

import { vi } from 'vitest';
import { CacheConfigSchema, ContextConfigSchema, OrchestratorConfigSchema, TtlSecondsSchema } from '../config/schema.ts';
import { SimilarityCache, createMemoryCacheStore } from '../cache/index.ts';
import { createTokenManager } from '../context/index.ts';
import { ModelError, type ModelProvider } from '../model/index.ts';
import type { CallOptions, ModelRequest, ModelStreamChunk } from '../model/types.ts';
import { createOrchestrator, type OrchestratorDeps } from '../orchestrator/orchestrator.ts';
import type { StreamEvent } from '../orchestrator/types.ts';
import type { FetchKind, Retrieval, RetrieveOptions, Retriever } from '../web/index.ts';

/** A reply is text (streamed in small chunks) or an error thrown on the call. */
export type ScriptedReply = string | Error;

const CHUNK_SIZE = 5;

function chunksOf(text: string): Array<string> {
  const chunks: Array<string> = [];
  for (let i = 0; i < text.length; i += CHUNK_SIZE) {
    chunks.push(text.slice(i, i + CHUNK_SIZE));
  }
  return chunks;
}

export type ScriptedModel = {
  readonly provider: ModelProvider;
  readonly streamRequests: Array<ModelRequest>;
  readonly completeRequests: Array<ModelRequest>;
};

/**
 * `streams` answer `stream()` calls in order, `completions` answer
 * `complete()` calls in order. Running out of script fails the call.
 * An aborted signal ends a stream with a `cancelled` ModelError.
 */
export function createScriptedModel(script: {
  streams?: ReadonlyArray<ScriptedReply>;
  completions?: ReadonlyArray<ScriptedReply>;
}): ScriptedModel {
  const streams = [...(script.streams ?? [])];
  const completions = [...(script.completions ?? [])];
  const streamRequests: Array<ModelRequest> = [];
  const completeRequests: Array<ModelRequest> = [];

  function take(queue: Array<ScriptedReply>, call: string): ScriptedReply {
    const reply = queue.shift();
    if (reply === undefined) {
      throw new Error(`no scripted reply left for ${call}()`);
    }
    return reply;
  }

  const provider: ModelProvider = {
    async complete(request: ModelRequest) {
      completeRequests.push(request);
      const reply = take(completions, 'complete');
      if (reply instanceof Error) {
        throw reply;
      }
      return { text: reply, usage: { input_tokens: 10, output_tokens: 5 } };
    },

    async *stream(request: ModelRequest, options?: CallOptions): AsyncIterable<ModelStreamChunk> {
      streamRequests.push(request);
      const reply = take(streams, 'stream');
      if (reply instanceof Error) {
        throw reply;
      }
      for (const text of chunksOf(reply)) {
        await new Promise((resolve) => setTimeout(resolve, 0));
        if (options?.signal?.aborted) {
          throw new ModelError('cancelled', false, 'generation aborted');
        }
        yield { type: 'text', text };
      }
      yield { type: 'stop', usage: { input_tokens: 10, output_tokens: reply.length } };
    },
  };

  return { provider, streamRequests, completeRequests };
}

export type FakePage = {
  readonly content: string | null;
  readonly sources?: ReadonlyArray<string>;
};

/**
 * Answers `retrieve(kind, query)` from `pages`, keyed `kind:query`. Unknown
 * keys come back empty, as a retrieval that found nothing does.
 */
export function createFakeRetriever(pages: Record<string, FakePage>) {
  const retrieve = vi.fn(
    async (kind: FetchKind, query: string, _options: RetrieveOptions): Promise<Retrieval> => {
      await new Promise((resolve) => setTimeout(resolve, 0));
      const page = pages[`${kind}:${query}`];
      return {
        kind,
        query,
        content: page?.content ?? null,
        sources: page?.sources ?? [],
        tasks: [],
      };
    },
  );
  const retriever: Retriever = { retrieve };
  return { retriever, retrieve };
}

export const TEST_NOW = new Date('2026-10-19T12:00:00Z');

/** An orchestrator over in-memory parts, with a clock the test controls. */
export function createTestOrchestrator(options: {
  model: ModelProvider;
  retriever: Retriever;
  modelName?: string;
  maxReroutes?: number;
  clock?: { now: number };
}) {
  const clock = options.clock ?? { now: TEST_NOW.getTime() };
  const cache = new SimilarityCache({
    config: CacheConfigSchema.parse({}),
    store: createMemoryCacheStore(),
    now: () => clock.now,
  });
  const deps: OrchestratorDeps = {
    model: options.model,
    modelConfig: { name: options.modelName ?? 'test-model', max_tokens: 256 },
    cache,
    retriever: options.retriever,
    tokens: createTokenManager({ config: ContextConfigSchema.parse({}) }),
    config: OrchestratorConfigSchema.parse({ max_reroutes: options.maxReroutes ?? 1 }),
    ttl: TtlSecondsSchema.parse({}),
    now: () => new Date(clock.now),
  };
  return { orchestrator: createOrchestrator(deps), cache, clock };
}

export async function collect(events: AsyncIterable<StreamEvent>): Promise<Array<StreamEvent>> {
  const seen: Array<StreamEvent> = [];
  for await (const event of events) {
    seen.push(event);
  }
  return seen;
}

export function stages(events: ReadonlyArray<StreamEvent>): Array<string> {
  return events.flatMap((event) => (event.type === 'status' ? [event.stage] : []));
}

export function streamedText(events: ReadonlyArray<StreamEvent>): string {
  return events.map((event) => (event.type === 'token' ? event.text : '')).join('');
}

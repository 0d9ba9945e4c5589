// pattern: Imperative Shell

/**
 * Per-request orchestrator.
 *
 * Drives one request through
 * start → analyzing → {cache-check | direct-answer} → tool-dispatch → fetching
 * → synthesizing → responding → done, emitting every stage as a status event.
 * A recall of an earlier search skips straight to responding. A knowledge gap
 * in a direct answer re-routes to a web search at most `max_reroutes` times.
 *
 * The cache is the only state shared between requests; everything else lives
 * in the request's own cycle.
 */

import {
  annotateSearchId,
  cleanResponse,
  defaultSystemPrompt,
  detectCutoff,
  detectIntent,
  generateSearchQuery,
  isRecencySensitive,
  queryExtractionPrompt,
  simpleSystemPrompt,
  synthesisPrompt,
} from '../analyzer/index.ts';
import type { SearchDecision, ToolRequest } from '../analyzer/index.ts';
import type { CacheEntry, SimilarityCache } from '../cache/index.ts';
import { urlHost } from '../cache/index.ts';
import type { ModelConfig, OrchestratorConfig, TtlSeconds } from '../config/schema.ts';
import { ContextBudgetError } from '../context/index.ts';
import type { FitInput, FitResult, SizeClass, TokenManager, Turn } from '../context/index.ts';
import { ModelError, type ModelProvider } from '../model/index.ts';
import { isSmallModel } from '../model/size.ts';
import { StreamSanitizer } from '../stream/index.ts';
import type { SanitizerOptions, SanitizerSignal } from '../stream/index.ts';
import { RequestCancelledError, TOOLS, ttlFor } from '../web/index.ts';
import type { Retriever, ToolKind } from '../web/index.ts';
import { createEventSequencer } from './events.ts';
import {
  ChatRequestSchema,
  OrchestratorError,
  type ChatRequest,
  type ChatResult,
  type ErrorKind,
  type Stage,
  type StreamEvent,
  type StreamEventBody,
} from './types.ts';

export type OrchestratorDeps = {
  readonly model: ModelProvider;
  readonly modelConfig: Pick<ModelConfig, 'name' | 'max_tokens'>;
  readonly cache: SimilarityCache;
  readonly retriever: Retriever;
  readonly tokens: TokenManager;
  readonly config: OrchestratorConfig;
  readonly ttl: TtlSeconds;
  readonly now?: () => Date;
};

export type RunOptions = {
  readonly signal?: AbortSignal;
};

export type Orchestrator = {
  run(request: unknown, options?: RunOptions): AsyncGenerator<StreamEvent, void, undefined>;
  respond(request: unknown, options?: RunOptions): Promise<ChatResult>;
};

type Cycle = {
  readonly request: ChatRequest;
  readonly model: string;
  readonly history: ReadonlyArray<Turn>;
  readonly now: Date;
  readonly signal?: AbortSignal;
};

type Retrieved = {
  readonly decision: SearchDecision;
  readonly kind: ToolKind;
  readonly query: string;
  readonly sizeClass: SizeClass;
  /** Null when retrieval came back empty. */
  readonly content: string | null;
  readonly entry: CacheEntry | null;
  readonly cacheHit: boolean;
  readonly recall: boolean;
};

type Generation = {
  readonly text: string;
  readonly signal: SanitizerSignal | null;
  readonly fit: FitResult;
  readonly contentTokens: number;
};

type GenerateOptions = {
  readonly system: string;
  readonly fit: FitResult;
  readonly contentTokens: number;
  readonly sanitizer: SanitizerOptions;
  /** End the generation at the first tool-call or cutoff signal. */
  readonly stopOnSignal: boolean;
};

function status(stage: Stage, message?: string): StreamEventBody {
  return message ? { type: 'status', stage, message } : { type: 'status', stage };
}

function withMemory(system: string, memory: string | undefined): string {
  return memory ? `${system}\n\nWhat you know about the user:\n${memory}` : system;
}

function describe(decision: SearchDecision): string {
  switch (decision.type) {
    case 'none':
      return 'none';
    case 'cache-hit':
      return `cache-hit ${decision.kind} #${decision.entry.searchId ?? '-'}`;
    case 'tool':
      return `tool ${decision.kind} "${decision.query}"`;
  }
}

function toErrorBody(error: unknown, signal: AbortSignal | undefined): StreamEventBody {
  let kind: ErrorKind;
  let message: string;

  if (signal?.aborted || error instanceof RequestCancelledError) {
    kind = 'cancelled';
    message = 'request cancelled';
  } else if (error instanceof ModelError) {
    kind = error.code;
    message = error.message || `generation failed (${error.code})`;
  } else if (error instanceof ContextBudgetError) {
    kind = 'context_budget';
    message = error.message;
  } else {
    console.error('[orchestrator] request failed:', error);
    kind = 'internal';
    message = error instanceof Error ? error.message : String(error);
  }

  if (kind !== 'internal') {
    console.warn(`[orchestrator] request ended with ${kind}: ${message}`);
  }
  return { type: 'error', kind, message };
}

function freeze(request: ChatRequest): ChatRequest {
  return Object.freeze({
    ...request,
    history: Object.freeze(request.history.map((turn) => Object.freeze({ ...turn }))),
  });
}

export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  const maxReroutes = deps.config.max_reroutes;

  function fitInput(cycle: Cycle, system: string, reserve: number): FitInput {
    return {
      model: cycle.model,
      system,
      memory: cycle.request.memory ?? null,
      prompt: cycle.request.prompt,
      history: cycle.history,
      reserve,
    };
  }

  async function planQuery(cycle: Cycle): Promise<ToolRequest> {
    const fit = deps.tokens.fit(fitInput(cycle, queryExtractionPrompt(cycle.now), 0));
    const request = await generateSearchQuery(deps.model, {
      prompt: cycle.request.prompt,
      history: fit.history,
      model: cycle.model,
      signal: cycle.signal,
      now: cycle.now,
    });
    console.log(`[orchestrator] planned ${request.kind} search "${request.query}"`);
    return request;
  }

  async function* generate(cycle: Cycle, options: GenerateOptions): AsyncGenerator<StreamEventBody, Generation> {
    const sanitizer = new StreamSanitizer(options.sanitizer);
    const controller = new AbortController();
    const signal = cycle.signal ? AbortSignal.any([cycle.signal, controller.signal]) : controller.signal;
    let responding = false;
    let stopped: SanitizerSignal | null = null;

    try {
      const chunks = deps.model.stream(
        {
          model: cycle.model,
          system: withMemory(options.system, cycle.request.memory),
          messages: [...options.fit.history, { role: 'user', content: cycle.request.prompt }],
          max_tokens: deps.modelConfig.max_tokens,
        },
        { signal },
      );

      for await (const chunk of chunks) {
        if (chunk.type !== 'text') continue;

        const step = sanitizer.feed(chunk.text);
        if (step.text) {
          if (!responding) {
            responding = true;
            yield status('responding');
          }
          yield { type: 'token', text: step.text };
        }

        if (step.signal) {
          if (options.stopOnSignal) {
            stopped = step.signal;
            break;
          }
          console.log(`[orchestrator] ignoring ${step.signal.type} signal in a grounded answer`);
        }
      }

      if (!stopped) {
        const last = sanitizer.finish();
        if (last.text) {
          if (!responding) {
            responding = true;
            yield status('responding');
          }
          yield { type: 'token', text: last.text };
        }
        if (last.signal && options.stopOnSignal) {
          stopped = last.signal;
        }
      }
    } finally {
      // Ends the upstream call when generation stops early or the consumer goes away.
      controller.abort();
    }

    return { text: sanitizer.text, signal: stopped, fit: options.fit, contentTokens: options.contentTokens };
  }

  async function* retrieve(cycle: Cycle, request: ToolRequest): AsyncGenerator<StreamEventBody, Retrieved> {
    const { kind, query } = request;

    if (kind === 'recall') {
      const searchId = Number(query);
      const entry = deps.cache.getBySearchId(searchId);
      if (entry) {
        return {
          decision: { type: 'cache-hit', kind, entry },
          kind,
          query,
          sizeClass: TOOLS.recall.sizeClass,
          content: entry.payload.content,
          entry,
          cacheHit: true,
          recall: true,
        };
      }

      console.log(`[orchestrator] search #${searchId} is no longer cached, searching again`);
      yield status('tool-dispatch', `search #${searchId} has expired, searching again`);
      return yield* retrieve(cycle, await planQuery(cycle));
    }

    const tool = TOOLS[kind];

    yield status('cache-check');
    const hit = deps.cache.lookup('query', query, kind);
    if (hit) {
      return {
        decision: { type: 'cache-hit', kind, entry: hit.entry },
        kind,
        query,
        sizeClass: tool.sizeClass,
        content: hit.entry.payload.content,
        entry: hit.entry,
        cacheHit: true,
        recall: false,
      };
    }

    yield status('tool-dispatch', `${kind}: ${query}`);

    // Room for the content is claimed before anything is fetched.
    const reservation = deps.tokens.fit(
      fitInput(cycle, synthesisPrompt({ now: cycle.now, content: '' }), deps.tokens.reserveFor(tool.sizeClass)),
    );
    console.log(
      `[context] reserved ${reservation.budget.reserved} tokens for ${kind} content ` +
        `(${reservation.budget.consumed}/${reservation.budget.limit} consumed)`,
    );

    yield status('fetching', query);
    const resolution = await deps.cache.resolve('query', query, kind, ttlFor(kind, deps.ttl), async () => {
      const retrieval = await deps.retriever.retrieve(kind, query, { model: cycle.model, signal: cycle.signal });
      if (retrieval.content === null) {
        return null;
      }
      return {
        content: retrieval.content,
        sourceUrl: retrieval.sources[0] ?? null,
        kind,
        sources: retrieval.sources,
      };
    });

    if (!resolution) {
      console.warn(`[orchestrator] no data retrieved for ${kind} "${query}"`);
    }

    return {
      decision: { type: 'tool', kind, query },
      kind,
      query,
      sizeClass: tool.sizeClass,
      content: resolution?.entry.payload.content ?? null,
      entry: resolution?.entry ?? null,
      cacheHit: resolution?.cached ?? false,
      recall: false,
    };
  }

  async function* synthesize(cycle: Cycle, retrieved: Retrieved): AsyncGenerator<StreamEventBody, Generation> {
    if (!retrieved.recall) {
      yield status('synthesizing');
    }

    const grounded = { sanitizer: { detectCutoff: false }, stopOnSignal: false };

    if (retrieved.content === null) {
      const system = synthesisPrompt({ now: cycle.now, content: null });
      const fit = deps.tokens.fit(fitInput(cycle, system, 0));
      return yield* generate(cycle, { ...grounded, system, fit, contentTokens: 0 });
    }

    const skeleton = synthesisPrompt({ now: cycle.now, content: '', recall: retrieved.recall });
    const fitted = deps.tokens.fitWithContent(
      fitInput(cycle, skeleton, deps.tokens.reserveFor(retrieved.sizeClass)),
      retrieved.content,
    );

    return yield* generate(cycle, {
      ...grounded,
      system: synthesisPrompt({ now: cycle.now, content: fitted.content, recall: retrieved.recall }),
      fit: fitted.fit,
      contentTokens: deps.tokens.countTokens(cycle.model, fitted.content),
    });
  }

  async function* pipeline(request: ChatRequest, signal?: AbortSignal): AsyncGenerator<StreamEventBody, void> {
    const cycle: Cycle = {
      request,
      model: request.model ?? deps.modelConfig.name,
      history: request.history.slice(-deps.config.max_history_messages),
      now: deps.now?.() ?? new Date(),
      signal,
    };

    yield status('start');
    yield status('analyzing');

    let reroutes = 0;
    let suppressed = false;
    let retrieved: Retrieved | null = null;
    let answer: Generation;

    const intent = detectIntent(request.prompt, cycle.history);
    let tool: ToolRequest | null = intent?.type === 'tool' ? { kind: intent.kind, query: intent.query } : null;

    if (!tool && isRecencySensitive(request.prompt, cycle.now)) {
      console.log('[orchestrator] prompt asks for current information, planning a search');
      tool = await planQuery(cycle);
    }

    if (tool) {
      retrieved = yield* retrieve(cycle, tool);
      answer = yield* synthesize(cycle, retrieved);
    } else {
      yield status('direct-answer');

      const system =
        request.system_prompt ?? (isSmallModel(cycle.model) ? simpleSystemPrompt : defaultSystemPrompt)(cycle.now);
      const direct = yield* generate(cycle, {
        system,
        fit: deps.tokens.fit(fitInput(cycle, system, 0)),
        contentTokens: 0,
        sanitizer: { holdFirstLine: true, detectCutoff: reroutes < maxReroutes },
        stopOnSignal: true,
      });

      const requested = direct.signal?.type === 'tool-call' ? direct.signal.request : null;
      const cutoff = direct.signal?.type === 'cutoff' ? direct.signal.pattern : detectCutoff(direct.text);

      if (requested) {
        console.log(`[orchestrator] model asked for ${requested.kind} "${requested.query}"`);
        yield status('tool-dispatch', `model requested a ${requested.kind} search`);
        retrieved = yield* retrieve(cycle, requested);
        answer = yield* synthesize(cycle, retrieved);
      } else if (cutoff && reroutes < maxReroutes) {
        reroutes++;
        console.log(`[orchestrator] knowledge gap (/${cutoff}/), re-routing to search (${reroutes}/${maxReroutes})`);
        yield status('tool-dispatch', 'knowledge gap detected, discarding the draft and searching');
        retrieved = yield* retrieve(cycle, await planQuery(cycle));
        answer = yield* synthesize(cycle, retrieved);
      } else {
        if (cutoff) {
          suppressed = true;
          console.log(`[orchestrator] knowledge gap (/${cutoff}/) with no re-route budget left, answering as-is`);
        }
        answer = direct;
      }
    }

    if (retrieved) {
      console.log(`[orchestrator] decision: ${describe(retrieved.decision)}`);
      const gap = detectCutoff(answer.text);
      if (gap) {
        suppressed = true;
        console.log(`[orchestrator] knowledge gap (/${gap}/) after retrieval, not re-routing again`);
      }
    }

    const entry = retrieved?.entry ?? null;
    let response = cleanResponse(answer.text);
    if (entry?.searchId != null) {
      response = annotateSearchId(response, entry.searchId);
      yield { type: 'token', text: annotateSearchId('', entry.searchId) };
    }

    const budget = answer.fit.budget;
    const used = budget.consumed + answer.contentTokens + deps.tokens.countTokens(cycle.model, response);
    const sourceUrl = entry?.payload.sourceUrl ?? null;

    yield {
      type: 'done',
      result: {
        response,
        model: cycle.model,
        search_performed: retrieved !== null,
        search_type: retrieved?.kind ?? null,
        search_query: retrieved?.query ?? null,
        search_id: entry?.searchId ?? null,
        source: sourceUrl ? urlHost(sourceUrl) : null,
        source_url: sourceUrl,
        cache_hit: retrieved?.cacheHit ?? false,
        cache_last_access: entry && retrieved?.cacheHit ? new Date(entry.lastAccess).toISOString() : null,
        reroutes,
        reroute_suppressed: suppressed,
        context_messages_count: answer.fit.history.length + 1,
        token_usage: {
          used,
          limit: budget.limit,
          model_max: budget.modelMax,
          usage_percent: budget.limit > 0 ? Math.round((used / budget.limit) * 1000) / 10 : 100,
        },
      },
    };
  }

  async function* run(input: unknown, options: RunOptions = {}): AsyncGenerator<StreamEvent, void, undefined> {
    const sequencer = createEventSequencer();
    const parsed = ChatRequestSchema.safeParse(input);

    if (!parsed.success) {
      const message = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`)
        .join('; ');
      console.warn(`[orchestrator] rejected request: ${message}`);
      yield sequencer.next({ type: 'error', kind: 'invalid_request', message });
      return;
    }

    const request = freeze(parsed.data);
    const started = Date.now();

    try {
      for await (const body of pipeline(request, options.signal)) {
        yield sequencer.next(body);
      }
    } catch (error) {
      yield sequencer.next(toErrorBody(error, options.signal));
      return;
    }

    console.log(`[orchestrator] request completed in ${Date.now() - started}ms`);
  }

  async function respond(input: unknown, options: RunOptions = {}): Promise<ChatResult> {
    for await (const event of run(input, options)) {
      if (event.type === 'done') {
        return event.result;
      }
      if (event.type === 'error') {
        throw new OrchestratorError(event.kind, event.message);
      }
    }
    throw new OrchestratorError('internal', 'event stream ended without a terminal event');
  }

  return { run, respond };
}

// pattern: Imperative Shell

/**
 * Relay agent entry point.
 * Composition root that wires config, cache, retrieval and the orchestrator,
 * then starts the interactive REPL.
 */

import * as readline from 'node:readline';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadConfig } from '@/config/config.ts';
import { createPostgresProvider } from '@/persistence/postgres.ts';
import { SimilarityCache, createPostgresCacheStore } from '@/cache/index.ts';
import { createModelProvider } from '@/model/factory.ts';
import { createTokenManager } from '@/context/index.ts';
import { createContentExtractor, createRetriever, createSearchChain, ttlFor } from '@/web/index.ts';
import { createOrchestrator } from '@/orchestrator/index.ts';
import type { Orchestrator, ChatResult } from '@/orchestrator/index.ts';
import type { Turn } from '@/context/index.ts';
import type { PersistenceProvider } from '@/persistence/types.ts';

export type Output = {
  write(text: string): unknown;
};

type InteractionLoopDeps = {
  orchestrator: Orchestrator;
  cache: SimilarityCache;
  output: Output;
  /** Conversation so far; the loop appends each completed exchange. */
  history: Array<Turn>;
};

/** One-line summary printed under an answer that used retrieval. */
export function formatFooter(result: ChatResult): string {
  const parts: Array<string> = [];
  if (result.search_performed) {
    parts.push(`${result.search_type ?? 'search'}: ${result.search_query ?? ''}`);
    parts.push(result.source ?? 'no data');
    if (result.cache_hit) parts.push('cached');
  }
  if (result.reroutes > 0) parts.push(`re-routed ${result.reroutes}x`);
  if (result.reroute_suppressed) parts.push('gap not re-routed');
  parts.push(`${result.token_usage.usage_percent}% context`);
  return `(${parts.join(' · ')})`;
}

/**
 * Create an interaction loop that can be tested with mock dependencies.
 * Streams tokens and status lines to the output; `/searches` lists recent
 * cached searches and `/reset` forgets the conversation.
 */
export function createInteractionLoop(
  deps: InteractionLoopDeps,
): (input: string, signal?: AbortSignal) => Promise<ChatResult | null> {
  return async (userInput, signal) => {
    if (userInput === '/reset') {
      deps.history.length = 0;
      deps.output.write('conversation cleared\n\n');
      return null;
    }

    if (userInput === '/searches') {
      const recent = deps.cache.recent();
      const lines = recent.map((entry) => `  #${entry.searchId ?? '-'} ${entry.scope}: ${entry.key}`);
      deps.output.write(lines.length > 0 ? `${lines.join('\n')}\n\n` : 'no cached searches\n\n');
      return null;
    }

    let result: ChatResult | null = null;

    for await (const event of deps.orchestrator.run({ prompt: userInput, history: deps.history }, { signal })) {
      switch (event.type) {
        case 'status':
          if (event.message) {
            deps.output.write(`  [${event.stage}] ${event.message}\n`);
          }
          break;
        case 'token':
          deps.output.write(event.text);
          break;
        case 'done':
          result = event.result;
          deps.output.write(`\n${formatFooter(event.result)}\n\n`);
          break;
        case 'error':
          deps.output.write(`\nerror (${event.kind}): ${event.message}\n\n`);
          break;
      }
    }

    if (result) {
      deps.history.push({ role: 'user', content: userInput }, { role: 'assistant', content: result.response });
    }
    return result;
  };
}

/**
 * Core shutdown logic without process.exit - for testability.
 * Flushes queued cache writes before the pool goes away.
 */
export async function performShutdown(
  rl: Pick<readline.Interface, 'close'>,
  cache: SimilarityCache,
  persistence: PersistenceProvider | null,
): Promise<void> {
  rl.close();
  await cache.close();
  if (persistence) {
    await persistence.disconnect();
  }
}

/**
 * Main entry point: wires all components and starts the REPL.
 */
async function main(): Promise<void> {
  console.log('relay-agent starting...\n');

  const config = loadConfig(process.argv[2]);

  let persistence: PersistenceProvider | null = null;
  if (config.database) {
    persistence = createPostgresProvider(config.database);
    await persistence.connect();
    console.log('[db] connected');
    await persistence.runMigrations();
  } else {
    console.log('[cache] no database configured, results are kept in memory only');
  }

  const cache = new SimilarityCache({
    config: config.cache,
    store: persistence ? createPostgresCacheStore(persistence) : null,
  });
  await cache.load();

  const search = createSearchChain(config.search);
  console.log(`[search] providers: ${search.providers.join(', ')}`);

  const retriever = createRetriever({
    cache,
    extractor: createContentExtractor(config.fetch, config.search),
    ttlSeconds: (kind) => ttlFor(kind, config.cache.ttl_seconds),
    search,
    searchConfig: config.search,
    fetchConfig: config.fetch,
  });

  const orchestrator = createOrchestrator({
    model: createModelProvider(config.model),
    modelConfig: config.model,
    cache,
    retriever,
    tokens: createTokenManager({ config: config.context }),
    config: config.orchestrator,
    ttl: config.cache.ttl_seconds,
  });

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const interactionHandler = createInteractionLoop({
    orchestrator,
    cache,
    output: process.stdout,
    history: [],
  });

  let inFlight: AbortController | null = null;

  const shutdownHandler = async (): Promise<void> => {
    console.log('\nShutting down...');
    inFlight?.abort();
    await performShutdown(rl, cache, persistence);
    process.exit(0);
  };

  const onShutdownSignal = () => {
    shutdownHandler().catch((error: unknown) => {
      console.error('error during shutdown:', error);
      process.exit(1);
    });
  };

  // Ctrl+C cancels a running request; at the prompt it exits.
  rl.on('SIGINT', () => {
    if (inFlight) {
      inFlight.abort();
      return;
    }
    onShutdownSignal();
  });
  process.on('SIGTERM', onShutdownSignal);

  console.log(`model: ${config.model.name} (${config.model.provider})`);
  console.log('Type your message (Ctrl+C to cancel or exit, /searches, /reset):\n');

  rl.setPrompt('> ');
  rl.prompt();

  for await (const line of rl) {
    const trimmed = line.trim();
    if (trimmed) {
      inFlight = new AbortController();
      try {
        await interactionHandler(trimmed, inFlight.signal);
      } catch (error) {
        const errorMsg = error instanceof Error ? error.message : String(error);
        console.error(`error: ${errorMsg}`);
      } finally {
        inFlight = null;
      }
    }
    rl.prompt();
  }

  // stdin closed
  await performShutdown(rl, cache, persistence);
}

// Run main entry point only when file is executed directly
const entry = process.argv[1];
if (entry && resolve(entry) === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}

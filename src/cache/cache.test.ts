// pattern: Imperative Shell

import { describe, it, expect, vi } from 'vitest';
import { CacheConfigSchema, type CacheConfig } from '../config/schema.ts';
import { SimilarityCache } from './cache.ts';
import { createMemoryCacheStore, type CacheStore } from './store.ts';
import type { CachePayload } from './types.ts';

function payload(content: string, sourceUrl: string | null = 'https://example.com/a'): CachePayload {
  return { content, sourceUrl, kind: 'web', sources: sourceUrl ? ['example.com'] : [] };
}

function setup(overrides: Partial<CacheConfig> = {}, store: CacheStore | null = null) {
  let now = 1_000_000;
  const config = { ...CacheConfigSchema.parse({}), ...overrides };
  const cache = new SimilarityCache({ config, store, now: () => now });
  return {
    cache,
    advance(ms: number) {
      now += ms;
    },
    get now() {
      return now;
    },
  };
}

describe('SimilarityCache lookup', () => {
  it('hits on the normalised fingerprint', () => {
    const { cache } = setup();
    cache.admit('query', 'weather in Paris', payload('18C'), 1800, 'weather');

    const hit = cache.lookup('query', 'Weather in PARIS!', 'weather');

    expect(hit?.match).toBe('exact');
    expect(hit?.entry.payload.content).toBe('18C');
  });

  it('hits on a reordered query through similarity', () => {
    const { cache } = setup();
    cache.admit('query', 'paris weather', payload('18C'), 1800, 'weather');

    const hit = cache.lookup('query', 'weather paris', 'weather');

    expect(hit?.match).toBe('similar');
    expect(hit?.score).toBe(1);
  });

  it('hits on a synonym rewrite', () => {
    const { cache } = setup();
    cache.admit('query', 'paris forecast', payload('18C'), 1800, 'weather');

    expect(cache.lookup('query', 'paris weather', 'weather')?.match).toBe('similar');
  });

  it('misses the synonym rewrite when synonyms are off', () => {
    const { cache } = setup({ use_synonyms: false });
    cache.admit('query', 'paris forecast', payload('18C'), 1800, 'weather');

    expect(cache.lookup('query', 'paris weather', 'weather')).toBeNull();
  });

  it('keeps scopes apart', () => {
    const { cache } = setup();
    cache.admit('query', 'paris weather', payload('18C'), 1800, 'weather');

    expect(cache.lookup('query', 'paris weather', 'web')).toBeNull();
  });

  it('misses unrelated queries', () => {
    const { cache } = setup();
    cache.admit('query', 'paris weather', payload('18C'), 1800, 'weather');

    expect(cache.lookup('query', 'bitcoin price', 'weather')).toBeNull();
  });

  it('prefers the most recently used entry among equal scores', () => {
    const { cache, advance } = setup();
    cache.admit('query', 'paris weather today', payload('first'), 1800, 'web');
    advance(1000);
    cache.admit('query', 'today paris weather', payload('second'), 1800, 'web');
    advance(1000);
    cache.lookup('query', 'paris weather today', 'web');
    advance(1000);

    const hit = cache.lookup('query', 'weather today paris', 'web');

    expect(hit?.match).toBe('similar');
    expect(hit?.entry.payload.content).toBe('first');
  });

  it('never returns an expired entry', () => {
    const { cache, advance } = setup();
    cache.admit('query', 'paris weather', payload('18C'), 60, 'weather');
    advance(60_000);

    expect(cache.lookup('query', 'paris weather', 'weather')).toBeNull();
    expect(cache.size('query')).toBe(0);
  });

  it('records access time and hit count', () => {
    const { cache, advance } = setup();
    const admitted = cache.admit('query', 'paris weather', payload('18C'), 1800, 'weather');
    advance(5000);

    const hit = cache.lookup('query', 'paris weather', 'weather');

    expect(hit?.entry.lastAccess).toBe(admitted.createdAt + 5000);
    expect(hit?.entry.hits).toBe(1);
    expect(hit?.entry.expiresAt).toBe(admitted.expiresAt);
  });

  it('extends the ttl on hit when configured to', () => {
    const { cache, advance } = setup({ refresh_ttl_on_hit: true });
    const admitted = cache.admit('query', 'paris weather', payload('18C'), 60, 'weather');
    advance(30_000);

    const hit = cache.lookup('query', 'paris weather', 'weather');

    expect(hit?.entry.expiresAt).toBe(admitted.createdAt + 30_000 + 60_000);
  });
});

describe('SimilarityCache url namespace', () => {
  it('matches on the canonical url and scopes by host', () => {
    const { cache } = setup();
    const entry = cache.admit('url', 'https://Example.com/a/?utm_source=feed', payload('page'), 600);

    expect(entry.scope).toBe('example.com');
    expect(cache.lookup('url', 'https://example.com/a')?.match).toBe('exact');
    expect(cache.lookup('url', 'https://other.org/a')).toBeNull();
  });

  it('treats unparseable urls as a miss', () => {
    const { cache } = setup();
    expect(cache.lookup('url', 'not a url')).toBeNull();
    expect(() => cache.admit('url', 'not a url', payload('x'), 60)).toThrow();
  });

  it('gives url entries no search id', () => {
    const { cache } = setup();
    expect(cache.admit('url', 'https://example.com/a', payload('page'), 600).searchId).toBeNull();
  });
});

describe('SimilarityCache eviction', () => {
  it('evicts the least recently used entry past capacity', () => {
    const { cache, advance } = setup({ max_entries: 2 });
    cache.admit('query', 'alpha', payload('a'), 1800, 'web');
    advance(1000);
    cache.admit('query', 'bravo', payload('b'), 1800, 'web');
    advance(1000);
    cache.lookup('query', 'alpha', 'web');
    advance(1000);
    cache.admit('query', 'charlie', payload('c'), 1800, 'web');

    expect(cache.size('query')).toBe(2);
    expect(cache.lookup('query', 'bravo', 'web')).toBeNull();
    expect(cache.lookup('query', 'alpha', 'web')?.entry.payload.content).toBe('a');
  });

  it('sweeps expired entries', () => {
    const { cache, advance } = setup();
    cache.admit('query', 'alpha', payload('a'), 60, 'web');
    cache.admit('query', 'bravo', payload('b'), 600, 'web');
    advance(120_000);

    expect(cache.evictExpired()).toBe(1);
    expect(cache.size()).toBe(1);
  });

  it('invalidates by key', () => {
    const { cache } = setup();
    cache.admit('query', 'alpha', payload('a'), 60, 'web');

    expect(cache.invalidate('query', 'Alpha?', 'web')).toBe(true);
    expect(cache.invalidate('query', 'alpha', 'web')).toBe(false);
  });
});

describe('SimilarityCache search ids', () => {
  it('numbers query entries and recalls them', () => {
    const { cache } = setup();
    const first = cache.admit('query', 'alpha', payload('a'), 1800, 'web');
    const second = cache.admit('query', 'bravo', payload('b'), 1800, 'web');

    expect(first.searchId).toBe(1);
    expect(second.searchId).toBe(2);
    expect(cache.getBySearchId(2)?.payload.content).toBe('b');
    expect(cache.getBySearchId(3)).toBeNull();
  });

  it('lists recent searches newest first', () => {
    const { cache, advance } = setup();
    cache.admit('query', 'alpha', payload('a'), 1800, 'web');
    advance(1000);
    cache.admit('query', 'bravo', payload('b'), 1800, 'web');

    expect(cache.recent(5).map((entry) => entry.key)).toEqual(['bravo', 'alpha']);
  });
});

describe('SimilarityCache resolve', () => {
  it('runs one producer for concurrent callers on the same key', async () => {
    const { cache } = setup();
    const producer = vi.fn(async () => {
      await new Promise((resolve) => setTimeout(resolve, 10));
      return payload('fresh');
    });

    const results = await Promise.all(
      Array.from({ length: 5 }, () => cache.resolve('query', 'paris weather', 'weather', 1800, producer)),
    );

    expect(producer).toHaveBeenCalledTimes(1);
    expect(results.map((r) => r?.entry.payload.content)).toEqual(['fresh', 'fresh', 'fresh', 'fresh', 'fresh']);
    expect(results.filter((r) => r?.cached === false)).toHaveLength(1);
    expect(new Set(results.map((r) => r?.entry.searchId))).toEqual(new Set([1]));
  });

  it('serves a later call from the cache', async () => {
    const { cache } = setup();
    const producer = vi.fn(async () => payload('fresh'));

    await cache.resolve('query', 'paris weather', 'weather', 1800, producer);
    const again = await cache.resolve('query', 'Paris weather?', 'weather', 1800, producer);

    expect(producer).toHaveBeenCalledTimes(1);
    expect(again?.cached).toBe(true);
  });

  it('admits nothing when the producer comes back empty', async () => {
    const { cache } = setup();

    const result = await cache.resolve('url', 'https://example.com/a', undefined, 600, async () => null);

    expect(result).toBeNull();
    expect(cache.size()).toBe(0);
  });

  it('lets the next caller produce after a failure', async () => {
    const { cache } = setup();
    const failing = cache.resolve('query', 'alpha', 'web', 60, async () => {
      throw new Error('upstream down');
    });
    const next = cache.resolve('query', 'alpha', 'web', 60, async () => payload('ok'));

    await expect(failing).rejects.toThrow('upstream down');
    expect((await next)?.entry.payload.content).toBe('ok');
  });
});

describe('SimilarityCache persistence', () => {
  it('survives a restart through the store', async () => {
    const store = createMemoryCacheStore();
    const before = setup({}, store);
    before.cache.admit('query', 'paris weather', payload('18C'), 1800, 'weather');
    await before.cache.close();

    const after = setup({}, store);
    expect(await after.cache.load()).toBe(1);
    expect(after.cache.lookup('query', 'paris weather', 'weather')?.entry.payload.content).toBe('18C');
    expect(after.cache.admit('query', 'bravo', payload('b'), 1800, 'web').searchId).toBe(2);
  });

  it('skips and deletes corrupted rows', async () => {
    const source = createMemoryCacheStore();
    const writer = setup({}, source);
    writer.cache.admit('query', 'paris weather', payload('18C'), 1800, 'weather');
    await writer.cache.flush();

    const broken = {
      namespace: 'query',
      fingerprint: 'web:broken',
      scope: 'web',
      key_text: 'broken',
      payload: '{not json',
      signature: '{}',
      search_id: 9,
      created_at: 0,
      last_access: 0,
      expires_at: 9_999_999_999,
      hits: 0,
      ttl_seconds: 60,
    };
    const store = createMemoryCacheStore([...source.rows(), broken, 42]);
    const reader = setup({}, store);

    expect(await reader.cache.load()).toBe(1);
    await reader.cache.flush();
    expect(store.rows()).toHaveLength(2);
    expect(store.rows()).toContain(42);
  });

  it('starts empty when the store cannot be read', async () => {
    const store: CacheStore = {
      load: async () => {
        throw new Error('connection refused');
      },
      save: async () => undefined,
      remove: async () => undefined,
      clear: async () => undefined,
    };
    const { cache } = setup({}, store);

    expect(await cache.load()).toBe(0);
    expect(cache.admit('query', 'alpha', payload('a'), 60, 'web').searchId).toBe(1);
  });

  it('keeps serving when store writes fail', async () => {
    const store: CacheStore = {
      load: async () => [],
      save: async () => {
        throw new Error('disk full');
      },
      remove: async () => undefined,
      clear: async () => undefined,
    };
    const { cache } = setup({}, store);

    cache.admit('query', 'alpha', payload('a'), 60, 'web');
    await cache.flush();

    expect(cache.lookup('query', 'alpha', 'web')?.entry.payload.content).toBe('a');
  });

  it('clears memory and store', async () => {
    const store = createMemoryCacheStore();
    const { cache } = setup({}, store);
    cache.admit('query', 'alpha', payload('a'), 60, 'web');

    await cache.clear();

    expect(cache.size()).toBe(0);
    expect(store.rows()).toHaveLength(0);
  });
});

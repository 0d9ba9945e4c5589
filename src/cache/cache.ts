// pattern: Imperative Shell

/**
 * Similarity cache: query→result and url→content memo shared by every
 * request of the process. Lookups run against the in-memory index and never
 * suspend; writes to the backing store are queued and awaited by flush().
 *
 * Lifecycle: construct once, load() from the store, hand the instance to the
 * orchestrator, close() at shutdown.
 */

import type { CacheConfig } from '../config/schema.ts';
import { canonicalUrl, queryFingerprint, urlKeyText } from './fingerprint.ts';
import { KeyedLock } from './lock.ts';
import {
  hammingDistance,
  normalizeQuery,
  signatureOf,
  similarityScore,
  stripSiteOperators,
  tokenize,
  type Signature,
} from './similarity.ts';
import { parseRow, toRow, type CacheStore } from './store.ts';
import type {
  CacheEntry,
  CacheHit,
  CachePayload,
  Namespace,
  Producer,
  Resolution,
} from './types.ts';

export type SimilarityCacheOptions = {
  readonly config: CacheConfig;
  readonly store?: CacheStore | null;
  readonly now?: () => number;
};

type Identity = {
  readonly fingerprint: string;
  readonly scope: string;
  readonly keyText: string;
  readonly signature: Signature;
};

const DEFAULT_SCOPE = 'default';

function preview(text: string): string {
  return text.length > 50 ? `${text.slice(0, 50)}…` : text;
}

export class SimilarityCache {
  private readonly config: CacheConfig;
  private readonly store: CacheStore | null;
  private readonly now: () => number;
  private readonly locks = new KeyedLock();
  private readonly index: Record<Namespace, Map<string, CacheEntry>> = {
    query: new Map(),
    url: new Map(),
  };
  private writes: Promise<void> = Promise.resolve();
  private searchCounter = 0;

  constructor(options: SimilarityCacheOptions) {
    this.config = options.config;
    this.store = options.store ?? null;
    this.now = options.now ?? Date.now;
  }

  /**
   * Hydrate the index from the store. Malformed and expired rows are dropped
   * (and deleted); a store that cannot be read leaves the cache empty.
   */
  async load(): Promise<number> {
    if (!this.store) {
      return 0;
    }

    let rows: Array<unknown>;
    try {
      rows = await this.store.load();
    } catch (error) {
      console.error('[cache] could not read store, starting empty:', error);
      return 0;
    }

    const now = this.now();
    let loaded = 0;
    let discarded = 0;

    for (const raw of rows) {
      const parsed = parseRow(raw);
      if (!parsed.ok) {
        discarded++;
        console.warn(`[cache] discarding corrupted row: ${parsed.reason}`);
        const key = parsed.key;
        if (key) {
          this.persist((store) => store.remove(key.namespace, key.fingerprint));
        }
        continue;
      }

      const { entry } = parsed;
      if (entry.expiresAt <= now) {
        discarded++;
        this.persist((store) => store.remove(entry.namespace, entry.fingerprint));
        continue;
      }

      this.index[entry.namespace].set(entry.fingerprint, entry);
      if (entry.searchId !== null && entry.searchId > this.searchCounter) {
        this.searchCounter = entry.searchId;
      }
      loaded++;
    }

    console.log(`[cache] loaded ${loaded} entries (${discarded} discarded)`);
    return loaded;
  }

  size(namespace?: Namespace): number {
    if (namespace) {
      return this.index[namespace].size;
    }
    return this.index.query.size + this.index.url.size;
  }

  /** Exact fingerprint first, then the best similar entry in the same scope. */
  lookup(namespace: Namespace, key: string, scope?: string): CacheHit | null {
    const identity = this.identify(namespace, key, scope);
    if (!identity) {
      return null;
    }

    const entries = this.index[namespace];
    const now = this.now();

    const exact = entries.get(identity.fingerprint);
    if (exact) {
      if (exact.expiresAt > now) {
        console.log(`[cache] hit (exact) ${namespace}/${identity.scope} "${preview(identity.keyText)}"`);
        return { entry: this.touch(exact, now), match: 'exact', score: 1 };
      }
      this.drop(exact);
    }

    const similar = this.findSimilar(namespace, identity, now);
    if (similar) {
      console.log(
        `[cache] hit (similar ${similar.score.toFixed(3)}) ${namespace}/${identity.scope} ` +
          `"${preview(similar.entry.key)}" for "${preview(identity.keyText)}"`,
      );
      return { entry: this.touch(similar.entry, now), match: 'similar', score: similar.score };
    }

    console.log(`[cache] miss ${namespace}/${identity.scope} "${preview(identity.keyText)}"`);
    return null;
  }

  admit(
    namespace: Namespace,
    key: string,
    payload: CachePayload,
    ttlSeconds: number,
    scope?: string,
  ): CacheEntry {
    const identity = this.identify(namespace, key, scope);
    if (!identity) {
      throw new Error(`cannot derive a cache key from "${key}"`);
    }

    const now = this.now();
    const entry: CacheEntry = {
      fingerprint: identity.fingerprint,
      namespace,
      scope: identity.scope,
      key: identity.keyText,
      signature: identity.signature,
      payload,
      searchId: namespace === 'query' ? ++this.searchCounter : null,
      createdAt: now,
      lastAccess: now,
      expiresAt: now + ttlSeconds * 1000,
      hits: 0,
      ttlSeconds,
    };

    this.index[namespace].set(entry.fingerprint, entry);
    this.persist((store) => store.save(toRow(entry)));
    console.log(
      `[cache] admit ${namespace}/${entry.scope} "${preview(entry.key)}"` +
        `${entry.searchId !== null ? ` as #${entry.searchId}` : ''} (ttl ${Math.round(ttlSeconds / 60)}min)`,
    );

    this.evictOverCapacity(namespace);
    return entry;
  }

  invalidate(namespace: Namespace, key: string, scope?: string): boolean {
    const identity = this.identify(namespace, key, scope);
    const entry = identity ? this.index[namespace].get(identity.fingerprint) : undefined;
    if (!entry) {
      return false;
    }
    this.drop(entry);
    return true;
  }

  /**
   * Get-or-populate with one producer per fingerprint. Concurrent callers
   * for the same key queue behind the first and read what it admitted.
   * A producer returning null admits nothing and yields null.
   */
  async resolve(
    namespace: Namespace,
    key: string,
    scope: string | undefined,
    ttlSeconds: number,
    producer: Producer,
  ): Promise<Resolution | null> {
    const early = this.lookup(namespace, key, scope);
    if (early) {
      return { entry: early.entry, cached: true };
    }

    const identity = this.identify(namespace, key, scope);
    if (!identity) {
      throw new Error(`cannot derive a cache key from "${key}"`);
    }

    return this.locks.run(`${namespace}:${identity.fingerprint}`, async () => {
      const settled = this.lookup(namespace, key, scope);
      if (settled) {
        return { entry: settled.entry, cached: true };
      }

      const payload = await producer();
      if (!payload) {
        return null;
      }
      return { entry: this.admit(namespace, key, payload, ttlSeconds, scope), cached: false };
    });
  }

  getBySearchId(searchId: number): CacheEntry | null {
    const now = this.now();
    for (const entry of this.index.query.values()) {
      if (entry.searchId !== searchId) continue;
      if (entry.expiresAt <= now) {
        this.drop(entry);
        return null;
      }
      console.log(`[cache] recall #${searchId}`);
      return this.touch(entry, now);
    }
    return null;
  }

  /** Most recently created live query entries. */
  recent(limit = 5): Array<CacheEntry> {
    const now = this.now();
    return [...this.index.query.values()]
      .filter((entry) => entry.expiresAt > now)
      .sort((a, b) => b.createdAt - a.createdAt)
      .slice(0, limit);
  }

  evictExpired(): number {
    const now = this.now();
    let evicted = 0;
    for (const entries of Object.values(this.index)) {
      for (const entry of [...entries.values()]) {
        if (entry.expiresAt <= now) {
          this.drop(entry);
          evicted++;
        }
      }
    }
    if (evicted > 0) {
      console.log(`[cache] evicted ${evicted} expired entries`);
    }
    return evicted;
  }

  async clear(): Promise<void> {
    const count = this.size();
    this.index.query.clear();
    this.index.url.clear();
    this.persist((store) => store.clear());
    await this.flush();
    console.log(`[cache] cleared ${count} entries`);
  }

  /** Resolves once every queued store write has settled. */
  async flush(): Promise<void> {
    let pending: Promise<void>;
    do {
      pending = this.writes;
      await pending;
    } while (pending !== this.writes);
  }

  async close(): Promise<void> {
    await this.flush();
  }

  private identify(namespace: Namespace, key: string, scope?: string): Identity | null {
    if (namespace === 'url') {
      const canonical = canonicalUrl(key);
      if (!canonical) {
        return null;
      }
      return {
        fingerprint: canonical,
        scope: new URL(canonical).hostname,
        keyText: canonical,
        signature: signatureOf(tokenize(urlKeyText(canonical)), false),
      };
    }

    const effectiveScope = scope ?? DEFAULT_SCOPE;
    return {
      fingerprint: queryFingerprint(effectiveScope, key),
      scope: effectiveScope,
      keyText: normalizeQuery(key),
      signature: signatureOf(tokenize(stripSiteOperators(key)), this.config.use_synonyms),
    };
  }

  private findSimilar(
    namespace: Namespace,
    identity: Identity,
    now: number,
  ): { entry: CacheEntry; score: number } | null {
    if (identity.signature.tokens.length === 0) {
      return null;
    }

    const threshold =
      namespace === 'url' ? this.config.url_similarity_threshold : this.config.similarity_threshold;
    let best: { entry: CacheEntry; score: number } | null = null;

    for (const entry of this.index[namespace].values()) {
      if (entry.scope !== identity.scope || entry.expiresAt <= now) continue;
      if (hammingDistance(entry.signature.simhash, identity.signature.simhash) > this.config.simhash_max_distance) {
        continue;
      }

      const score = similarityScore(identity.signature, entry.signature);
      if (score < threshold) continue;

      if (
        !best ||
        score > best.score ||
        (score === best.score && entry.lastAccess > best.entry.lastAccess)
      ) {
        best = { entry, score };
      }
    }

    return best;
  }

  private touch(entry: CacheEntry, now: number): CacheEntry {
    const touched: CacheEntry = {
      ...entry,
      lastAccess: now,
      hits: entry.hits + 1,
      expiresAt: this.config.refresh_ttl_on_hit ? now + entry.ttlSeconds * 1000 : entry.expiresAt,
    };
    this.index[entry.namespace].set(entry.fingerprint, touched);
    this.persist((store) => store.save(toRow(touched)));
    return touched;
  }

  private drop(entry: CacheEntry): void {
    this.index[entry.namespace].delete(entry.fingerprint);
    this.persist((store) => store.remove(entry.namespace, entry.fingerprint));
  }

  private evictOverCapacity(namespace: Namespace): void {
    const entries = this.index[namespace];
    let evicted = 0;

    while (entries.size > this.config.max_entries) {
      let oldest: CacheEntry | null = null;
      for (const entry of entries.values()) {
        if (!oldest || entry.lastAccess < oldest.lastAccess) {
          oldest = entry;
        }
      }
      if (!oldest) break;
      this.drop(oldest);
      evicted++;
    }

    if (evicted > 0) {
      console.log(`[cache] LRU evicted ${evicted} ${namespace} entries`);
    }
  }

  private persist(operation: (store: CacheStore) => Promise<void>): void {
    const store = this.store;
    if (!store) {
      return;
    }
    this.writes = this.writes
      .then(() => operation(store))
      .catch((error: unknown) => {
        console.error('[cache] store write failed:', error);
      });
  }
}

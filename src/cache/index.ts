// pattern: Functional Core

export type { CacheEntry, CacheHit, CachePayload, Namespace, Producer, Resolution } from './types.ts';
export type { CacheRow, CacheStore } from './store.ts';
export type { Signature } from './similarity.ts';
export { SimilarityCache } from './cache.ts';
export type { SimilarityCacheOptions } from './cache.ts';
export { KeyedLock } from './lock.ts';
export { createMemoryCacheStore } from './store.ts';
export { createPostgresCacheStore } from './postgres-store.ts';
export { canonicalUrl, queryFingerprint, urlHost } from './fingerprint.ts';
export { normalizeQuery } from './similarity.ts';

// pattern: Functional Core

import type { ToolKind } from '../web/types.ts';
import type { Signature } from './similarity.ts';

export type Namespace = 'query' | 'url';

export type CachePayload = {
  readonly content: string;
  readonly sourceUrl: string | null;
  readonly kind: ToolKind | null;
  readonly sources: ReadonlyArray<string>;
  readonly title?: string | null;
};

/**
 * One memoised result. `fingerprint` is unique within its namespace; an entry
 * past `expiresAt` is never returned as a hit. Times are epoch milliseconds.
 */
export type CacheEntry = {
  readonly fingerprint: string;
  readonly namespace: Namespace;
  readonly scope: string;
  readonly key: string;
  readonly signature: Signature;
  readonly payload: CachePayload;
  readonly searchId: number | null;
  readonly createdAt: number;
  readonly lastAccess: number;
  readonly expiresAt: number;
  readonly hits: number;
  readonly ttlSeconds: number;
};

export type CacheHit = {
  readonly entry: CacheEntry;
  readonly match: 'exact' | 'similar';
  readonly score: number;
};

export type Resolution = {
  readonly entry: CacheEntry;
  /** True when the entry existed (or was admitted by a concurrent caller) before this call. */
  readonly cached: boolean;
};

export type Producer = () => Promise<CachePayload | null>;

// pattern: Functional Core

/**
 * CacheStore port and the row codec shared by its implementations.
 * Rows travel as flat records with JSON-encoded payload and signature; the
 * cache validates every row it loads and discards the ones that fail.
 */

import { z } from 'zod';
import { TOOL_KINDS } from '../web/types.ts';
import type { CacheEntry, Namespace } from './types.ts';

export type CacheRow = {
  readonly namespace: Namespace;
  readonly fingerprint: string;
  readonly scope: string;
  readonly key_text: string;
  readonly payload: string;
  readonly signature: string;
  readonly search_id: number | null;
  readonly created_at: number;
  readonly last_access: number;
  readonly expires_at: number;
  readonly hits: number;
  readonly ttl_seconds: number;
};

export interface CacheStore {
  /** Raw rows; validation is the caller's job. */
  load(): Promise<Array<unknown>>;
  save(row: CacheRow): Promise<void>;
  remove(namespace: Namespace, fingerprint: string): Promise<void>;
  clear(): Promise<void>;
}

const NamespaceSchema = z.enum(['query', 'url']);

const SignatureSchema = z.object({
  tokens: z.array(z.string()),
  canonical: z.array(z.string()),
  vector: z.record(z.string(), z.number()),
  simhash: z.string().regex(/^[0-9a-f]{16}$/),
});

const PayloadSchema = z.object({
  content: z.string(),
  sourceUrl: z.string().nullable(),
  kind: z.enum(TOOL_KINDS).nullable(),
  sources: z.array(z.string()),
  title: z.string().nullable().optional(),
});

function jsonText<T extends z.ZodTypeAny>(schema: T) {
  return z
    .string()
    .transform((text, ctx): unknown => {
      try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'invalid JSON' });
        return z.NEVER;
      }
    })
    .pipe(schema);
}

const RowSchema = z.object({
  namespace: NamespaceSchema,
  fingerprint: z.string().min(1),
  scope: z.string(),
  key_text: z.string(),
  payload: jsonText(PayloadSchema),
  signature: jsonText(SignatureSchema),
  search_id: z.coerce.number().int().nullable(),
  created_at: z.coerce.number(),
  last_access: z.coerce.number(),
  expires_at: z.coerce.number(),
  hits: z.coerce.number().int().nonnegative(),
  ttl_seconds: z.coerce.number().positive(),
});

const RowKeySchema = z.object({
  namespace: NamespaceSchema,
  fingerprint: z.string().min(1),
});

export type ParsedRow =
  | { readonly ok: true; readonly entry: CacheEntry }
  | {
      readonly ok: false;
      readonly key: { readonly namespace: Namespace; readonly fingerprint: string } | null;
      readonly reason: string;
    };

export function toRow(entry: CacheEntry): CacheRow {
  return {
    namespace: entry.namespace,
    fingerprint: entry.fingerprint,
    scope: entry.scope,
    key_text: entry.key,
    payload: JSON.stringify(entry.payload),
    signature: JSON.stringify(entry.signature),
    search_id: entry.searchId,
    created_at: entry.createdAt,
    last_access: entry.lastAccess,
    expires_at: entry.expiresAt,
    hits: entry.hits,
    ttl_seconds: entry.ttlSeconds,
  };
}

export function parseRow(raw: unknown): ParsedRow {
  const parsed = RowSchema.safeParse(raw);
  if (!parsed.success) {
    const key = RowKeySchema.safeParse(raw);
    return {
      ok: false,
      key: key.success ? key.data : null,
      reason: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
    };
  }

  const row = parsed.data;
  return {
    ok: true,
    entry: {
      fingerprint: row.fingerprint,
      namespace: row.namespace,
      scope: row.scope,
      key: row.key_text,
      signature: row.signature,
      payload: row.payload,
      searchId: row.search_id,
      createdAt: row.created_at,
      lastAccess: row.last_access,
      expiresAt: row.expires_at,
      hits: row.hits,
      ttlSeconds: row.ttl_seconds,
    },
  };
}

function storeKey(namespace: string, fingerprint: string): string {
  return `${namespace}\u0000${fingerprint}`;
}

/**
 * Process-local store. Rows are kept in their serialised form so the load
 * path is the same one the database takes; `initial` may hold arbitrary
 * (including malformed) rows.
 */
export function createMemoryCacheStore(initial: ReadonlyArray<unknown> = []): CacheStore & {
  readonly rows: () => Array<unknown>;
} {
  const rows = new Map<string, unknown>();
  initial.forEach((raw, index) => {
    const key = RowKeySchema.safeParse(raw);
    rows.set(key.success ? storeKey(key.data.namespace, key.data.fingerprint) : `raw:${index}`, raw);
  });

  return {
    rows: () => [...rows.values()],

    async load() {
      return [...rows.values()];
    },

    async save(row) {
      rows.set(storeKey(row.namespace, row.fingerprint), { ...row });
    },

    async remove(namespace, fingerprint) {
      rows.delete(storeKey(namespace, fingerprint));
    },

    async clear() {
      rows.clear();
    },
  };
}

// pattern: Imperative Shell

/**
 * PostgreSQL implementation of the CacheStore port: one table per namespace,
 * keyed by fingerprint.
 */

import type { PersistenceProvider } from '../persistence/types.ts';
import type { CacheRow, CacheStore } from './store.ts';
import type { Namespace } from './types.ts';

const TABLES: Readonly<Record<Namespace, string>> = {
  query: 'query_cache',
  url: 'url_cache',
};

const COLUMNS =
  'fingerprint, scope, key_text, payload, signature, search_id, created_at, last_access, expires_at, hits, ttl_seconds';

export function createPostgresCacheStore(persistence: PersistenceProvider): CacheStore {
  async function loadTable(namespace: Namespace): Promise<Array<unknown>> {
    const rows = await persistence.query<Record<string, unknown>>(
      `SELECT ${COLUMNS} FROM ${TABLES[namespace]}`,
    );
    return rows.map((row) => ({ ...row, namespace }));
  }

  return {
    async load() {
      const [queries, urls] = await Promise.all([loadTable('query'), loadTable('url')]);
      return [...queries, ...urls];
    },

    async save(row: CacheRow) {
      await persistence.query(
        `INSERT INTO ${TABLES[row.namespace]} (${COLUMNS})
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
         ON CONFLICT (fingerprint) DO UPDATE SET
           scope = EXCLUDED.scope,
           key_text = EXCLUDED.key_text,
           payload = EXCLUDED.payload,
           signature = EXCLUDED.signature,
           search_id = EXCLUDED.search_id,
           created_at = EXCLUDED.created_at,
           last_access = EXCLUDED.last_access,
           expires_at = EXCLUDED.expires_at,
           hits = EXCLUDED.hits,
           ttl_seconds = EXCLUDED.ttl_seconds`,
        [
          row.fingerprint,
          row.scope,
          row.key_text,
          row.payload,
          row.signature,
          row.search_id,
          row.created_at,
          row.last_access,
          row.expires_at,
          row.hits,
          row.ttl_seconds,
        ],
      );
    },

    async remove(namespace, fingerprint) {
      await persistence.query(`DELETE FROM ${TABLES[namespace]} WHERE fingerprint = $1`, [fingerprint]);
    },

    async clear() {
      await persistence.withTransaction(async (query) => {
        await query('DELETE FROM query_cache');
        await query('DELETE FROM url_cache');
      });
    },
  };
}

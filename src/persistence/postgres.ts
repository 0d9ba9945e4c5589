// pattern: Imperative Shell

/**
 * Connection pool behind the Postgres cache store.
 */

import { Pool, type QueryResult } from "pg";
import type { DatabaseConfig } from "../config/schema.ts";
import { applyMigrations, loadMigrations } from "./migrations.ts";
import type { PersistenceProvider, QueryFunction } from "./types.ts";

function rowsOf(run: (sql: string, values: Array<unknown>) => Promise<QueryResult>): QueryFunction {
  return async (sql, params = []) => {
    const result = await run(sql, [...params]);
    return result.rows;
  };
}

export function createPostgresProvider(config: DatabaseConfig): PersistenceProvider {
  const pool = new Pool({
    connectionString: config.url,
    max: config.max_connections,
    application_name: "relay-agent",
  });

  pool.on("error", (error) => {
    console.error("[db] idle connection error:", error.message);
  });

  const query = rowsOf((sql, values) => pool.query(sql, values));

  async function withTransaction<T>(fn: (query: QueryFunction) => Promise<T>): Promise<T> {
    const client = await pool.connect();
    try {
      await client.query("BEGIN");
      const result = await fn(rowsOf((sql, values) => client.query(sql, values)));
      await client.query("COMMIT");
      return result;
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  return {
    async connect() {
      const client = await pool.connect();
      client.release();
    },

    async disconnect() {
      await pool.end();
    },

    async runMigrations() {
      const applied = await applyMigrations({ query, withTransaction }, loadMigrations());
      console.log(applied.length > 0 ? `[db] applied ${applied.join(", ")}` : "[db] schema up to date");
      return applied;
    },

    query,
    withTransaction,
  };
}

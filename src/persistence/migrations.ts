// pattern: Imperative Shell

/**
 * Schema migrations for the cache tables. Files are read from disk in name
 * order; each one runs in its own transaction under an advisory lock so two
 * processes starting together apply it once.
 */

import { createHash } from "node:crypto";
import { readFileSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { Migration, PersistenceProvider } from "./types.ts";

export const MIGRATIONS_DIR = fileURLToPath(new URL("./migrations/", import.meta.url));

/** Arbitrary key shared by every process migrating the same database. */
const MIGRATION_LOCK_KEY = 7_310_245;

type AppliedRow = {
  name: string;
  checksum: string;
};

export function checksumOf(sql: string): string {
  return createHash("sha256").update(sql).digest("hex").slice(0, 16);
}

export function loadMigrations(dir: string = MIGRATIONS_DIR): Array<Migration> {
  return readdirSync(dir)
    .filter((file) => file.endsWith(".sql"))
    .sort()
    .map((name) => {
      const sql = readFileSync(join(dir, name), "utf-8");
      return { name, sql, checksum: checksumOf(sql) };
    });
}

export async function applyMigrations(
  db: Pick<PersistenceProvider, "query" | "withTransaction">,
  migrations: ReadonlyArray<Migration>,
): Promise<Array<string>> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS cache_migrations (
      name TEXT PRIMARY KEY,
      checksum TEXT NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const rows = await db.query<AppliedRow>("SELECT name, checksum FROM cache_migrations ORDER BY name");
  const applied = new Map(rows.map((row) => [row.name, row.checksum]));
  const ran: Array<string> = [];

  for (const migration of migrations) {
    const recorded = applied.get(migration.name);
    if (recorded !== undefined) {
      if (recorded !== migration.checksum) {
        console.warn(`[db] ${migration.name} changed after it was applied; the database keeps the old schema`);
      }
      continue;
    }

    const didRun = await db.withTransaction(async (query) => {
      await query("SELECT pg_advisory_xact_lock($1)", [MIGRATION_LOCK_KEY]);
      const raced = await query("SELECT name FROM cache_migrations WHERE name = $1", [migration.name]);
      if (raced.length > 0) {
        return false;
      }
      console.log(`[db] applying migration ${migration.name}`);
      await query(migration.sql);
      await query("INSERT INTO cache_migrations (name, checksum) VALUES ($1, $2)", [
        migration.name,
        migration.checksum,
      ]);
      return true;
    });

    if (didRun) {
      ran.push(migration.name);
    }
  }

  return ran;
}

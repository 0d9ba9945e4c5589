// pattern: Imperative Shell

import { loadConfig } from "../config/config.ts";
import { createPostgresProvider } from "./postgres.ts";

async function main(): Promise<void> {
  const config = loadConfig();
  if (!config.database) {
    throw new Error("no [database] section or DATABASE_URL configured; nothing to migrate");
  }

  const db = createPostgresProvider(config.database);
  try {
    await db.connect();
    console.log("[db] connected");

    await db.runMigrations();
    console.log("[db] migrations complete");
  } finally {
    await db.disconnect();
  }
}

main().catch((error: unknown) => {
  console.error("[db] migration failed:", error);
  process.exit(1);
});

// pattern: Functional Core

/**
 * Database seam for the cache tables. The Postgres pool implements it; tests
 * hand the cache store an in-process fake.
 */

export type QueryFunction = <T extends Record<string, unknown>>(
  sql: string,
  params?: ReadonlyArray<unknown>,
) => Promise<Array<T>>;

/** One schema file under `migrations/`, applied once in name order. */
export type Migration = {
  readonly name: string;
  readonly sql: string;
  readonly checksum: string;
};

export type PersistenceProvider = {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  /** Applies pending migrations and returns their names. */
  runMigrations(): Promise<ReadonlyArray<string>>;
  query: QueryFunction;
  withTransaction<T>(fn: (query: QueryFunction) => Promise<T>): Promise<T>;
};

import { Pool, QueryResultRow } from "pg";

/** The slice of `pg.Pool` the managed index relies on. */
export interface SqlExecutor {
  query(text: string, values?: unknown[]): Promise<{ rows: QueryResultRow[] }>;
}

export function createPostgresPool(connectionString: string, timeoutMs: number): Pool {
  return new Pool({
    connectionString,
    max: 5,
    connectionTimeoutMillis: timeoutMs,
    query_timeout: timeoutMs,
    idleTimeoutMillis: 30_000,
  });
}

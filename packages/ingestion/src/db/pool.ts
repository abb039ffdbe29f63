import { Pool } from "pg";

/** The runner only loads and saves one cursor row, so a small pool is plenty. */
export function createPool(databaseUrl: string): Pool {
  return new Pool({
    connectionString: databaseUrl,
    application_name: "livechat-ingestion",
    max: 2,
    idleTimeoutMillis: 30_000
  });
}

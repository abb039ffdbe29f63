import { readdir, readFile } from "node:fs/promises";
import path from "node:path";

import type { QueryResult } from "pg";

export interface Migration {
  name: string;
  sql: string;
}

export interface MigrationRunner {
  query: (text: string, values?: unknown[]) => Promise<QueryResult<{ name: string }>>;
}

export interface MigrationClient extends MigrationRunner {
  release: () => void;
}

export interface MigrationPool {
  connect: () => Promise<MigrationClient>;
}

export interface RunMigrationsOptions {
  migrationsDir?: string;
  log?: (message: string) => void;
}

export const DEFAULT_MIGRATIONS_DIR = path.resolve(__dirname, "../../migrations");

const CREATE_MIGRATIONS_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS schema_migrations (
  name TEXT PRIMARY KEY,
  applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;

const SELECT_APPLIED_SQL = `
SELECT name
FROM schema_migrations;
`;

const INSERT_APPLIED_SQL = `
INSERT INTO schema_migrations (name)
VALUES ($1);
`;

/** Every `.sql` file in `migrationsDir`, in lexical (apply) order. */
export async function discoverMigrations(migrationsDir: string): Promise<Migration[]> {
  const files = await readdir(migrationsDir);
  const names = files.filter((name) => name.endsWith(".sql")).sort();

  return Promise.all(
    names.map(async (name) => ({
      name,
      sql: await readFile(path.join(migrationsDir, name), "utf8")
    }))
  );
}

export async function appliedMigrationNames(runner: MigrationRunner): Promise<Set<string>> {
  await runner.query(CREATE_MIGRATIONS_TABLE_SQL);
  const result = await runner.query(SELECT_APPLIED_SQL);
  return new Set(result.rows.map((row) => row.name));
}

export async function applyMigration(
  runner: MigrationRunner,
  migration: Migration
): Promise<void> {
  await runner.query("BEGIN");

  try {
    await runner.query(migration.sql);
    await runner.query(INSERT_APPLIED_SQL, [migration.name]);
    await runner.query("COMMIT");
  } catch (error) {
    await runner.query("ROLLBACK");
    throw error;
  }
}

/** Applies pending migrations on one connection and returns the names applied. */
export async function runMigrations(
  pool: MigrationPool,
  options: RunMigrationsOptions = {}
): Promise<string[]> {
  const migrations = await discoverMigrations(options.migrationsDir ?? DEFAULT_MIGRATIONS_DIR);
  const log = options.log ?? console.log;
  const client = await pool.connect();

  try {
    const applied = await appliedMigrationNames(client);
    const newlyApplied: string[] = [];

    for (const migration of migrations) {
      if (applied.has(migration.name)) {
        continue;
      }

      await applyMigration(client, migration);
      applied.add(migration.name);
      newlyApplied.push(migration.name);
      log(`migration applied (name=${migration.name})`);
    }

    return newlyApplied;
  } finally {
    client.release();
  }
}

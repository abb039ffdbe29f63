import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type { QueryResult } from "pg";
import { afterEach, describe, expect, it, vi } from "vitest";

import {
  DEFAULT_MIGRATIONS_DIR,
  applyMigration,
  discoverMigrations,
  runMigrations
} from "../src/db/migrations";
import { queryResult } from "./helpers";

async function createTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "livechat-migrations-"));
}

function createQuery(appliedNames: string[] = [], failOn?: string) {
  return vi.fn(async (text: string, _values?: unknown[]): Promise<QueryResult<{ name: string }>> => {
    if (failOn !== undefined && text === failOn) {
      throw new Error("syntax error");
    }
    if (text.includes("SELECT name")) {
      return queryResult(appliedNames.map((name) => ({ name })));
    }
    return queryResult([], "OK");
  });
}

const cleanupDirs: string[] = [];

afterEach(async () => {
  await Promise.all(cleanupDirs.map((dir) => rm(dir, { recursive: true, force: true })));
  cleanupDirs.length = 0;
});

describe("discoverMigrations", () => {
  it("loads SQL files in lexical order", async () => {
    const dir = await createTempDir();
    cleanupDirs.push(dir);

    await writeFile(path.join(dir, "0002_second.sql"), "SELECT 2;");
    await writeFile(path.join(dir, "0001_first.sql"), "SELECT 1;");
    await writeFile(path.join(dir, "notes.txt"), "ignore");

    const migrations = await discoverMigrations(dir);

    expect(migrations).toEqual([
      { name: "0001_first.sql", sql: "SELECT 1;" },
      { name: "0002_second.sql", sql: "SELECT 2;" }
    ]);
  });

  it("finds the bundled cursor table migration", async () => {
    const migrations = await discoverMigrations(DEFAULT_MIGRATIONS_DIR);

    expect(migrations.map((migration) => migration.name)).toContain("0001_live_chat_cursors.sql");
  });
});

describe("applyMigration", () => {
  it("wraps each migration in a transaction", async () => {
    const query = createQuery();

    await applyMigration({ query }, { name: "0001_init.sql", sql: "SELECT 1;" });

    expect(query.mock.calls.map(([text]) => text.trim().split("\n")[0])).toEqual([
      "BEGIN",
      "SELECT 1;",
      "INSERT INTO schema_migrations (name)",
      "COMMIT"
    ]);
    expect(query.mock.calls[2][1]).toEqual(["0001_init.sql"]);
  });

  it("rolls back a failing migration", async () => {
    const query = createQuery([], "BROKEN;");

    await expect(applyMigration({ query }, { name: "0002_bad.sql", sql: "BROKEN;" })).rejects.toThrow(
      "syntax error"
    );

    expect(query.mock.calls.map(([text]) => text)).toEqual(["BEGIN", "BROKEN;", "ROLLBACK"]);
  });
});

describe("runMigrations", () => {
  it("applies only pending migrations and releases the client", async () => {
    const dir = await createTempDir();
    cleanupDirs.push(dir);

    await writeFile(path.join(dir, "0001_init.sql"), "SELECT 1;");
    await writeFile(path.join(dir, "0002_add_index.sql"), "SELECT 2;");

    const query = createQuery(["0001_init.sql"]);
    const release = vi.fn();
    const logged: string[] = [];

    const applied = await runMigrations(
      { connect: async () => ({ query, release }) },
      { migrationsDir: dir, log: (message) => logged.push(message) }
    );

    expect(applied).toEqual(["0002_add_index.sql"]);
    expect(logged).toEqual(["migration applied (name=0002_add_index.sql)"]);
    expect(query).toHaveBeenCalledWith(expect.stringContaining("CREATE TABLE IF NOT EXISTS schema_migrations"));
    expect(query).not.toHaveBeenCalledWith("SELECT 1;");
    expect(query).toHaveBeenCalledWith("SELECT 2;");
    expect(release).toHaveBeenCalledOnce();
  });
});

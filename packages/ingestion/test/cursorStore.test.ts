import { describe, expect, it, vi } from "vitest";

import type { CursorQueryable } from "../src/db/cursorStore";
import { loadCursor, saveCursor } from "../src/db/cursorStore";
import { queryResult } from "./helpers";

type CursorRows = Awaited<ReturnType<CursorQueryable["query"]>>["rows"];

function createRunner(rows: CursorRows, command = "SELECT") {
  const query = vi.fn(async (_text: string, _values?: unknown[]) => queryResult(rows, command));
  return { query };
}

const UPDATED_AT = new Date("2026-03-01T12:00:00Z");

describe("loadCursor", () => {
  it("returns the stored cursor", async () => {
    const runner = createRunner([{ live_chat_id: "chat-1", cursor: "token-9", updated_at: UPDATED_AT }]);

    await expect(loadCursor(runner, "chat-1")).resolves.toBe("token-9");
    expect(runner.query.mock.calls[0][1]).toEqual(["chat-1"]);
  });

  it("returns null when nothing was stored", async () => {
    await expect(loadCursor(createRunner([]), "chat-1")).resolves.toBeNull();
  });
});

describe("saveCursor", () => {
  it("upserts the cursor", async () => {
    const runner = createRunner(
      [{ live_chat_id: "chat-1", cursor: "token-10", updated_at: UPDATED_AT }],
      "INSERT"
    );

    await saveCursor(runner, "chat-1", "token-10");

    expect(runner.query.mock.calls[0][0]).toContain("ON CONFLICT (live_chat_id)");
    expect(runner.query.mock.calls[0][1]).toEqual(["chat-1", "token-10"]);
  });

  it("throws when no row was written", async () => {
    await expect(saveCursor(createRunner([], "INSERT"), "chat-1", null)).rejects.toThrow(
      "failed to save cursor for live chat chat-1"
    );
  });
});

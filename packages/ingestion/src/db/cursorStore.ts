import type { QueryResult } from "pg";

type CursorRow = {
  live_chat_id: string;
  cursor: string | null;
  updated_at: Date;
};

export interface CursorQueryable {
  query: (text: string, values?: unknown[]) => Promise<QueryResult<CursorRow>>;
}

const SELECT_CURSOR_SQL = `
SELECT live_chat_id, cursor, updated_at
FROM live_chat_cursors
WHERE live_chat_id = $1;
`;

const UPSERT_CURSOR_SQL = `
INSERT INTO live_chat_cursors (live_chat_id, cursor, updated_at)
VALUES ($1, $2, NOW())
ON CONFLICT (live_chat_id)
DO UPDATE SET cursor = EXCLUDED.cursor, updated_at = NOW()
RETURNING live_chat_id, cursor, updated_at;
`;

/** The cursor exported for `liveChatId` by a previous run, if any. */
export async function loadCursor(
  runner: CursorQueryable,
  liveChatId: string
): Promise<string | null> {
  const result = await runner.query(SELECT_CURSOR_SQL, [liveChatId]);

  if (result.rows.length === 0) {
    return null;
  }

  return result.rows[0].cursor;
}

export async function saveCursor(
  runner: CursorQueryable,
  liveChatId: string,
  cursor: string | null
): Promise<void> {
  const result = await runner.query(UPSERT_CURSOR_SQL, [liveChatId, cursor]);

  if (result.rowCount !== 1) {
    throw new Error(`failed to save cursor for live chat ${liveChatId}`);
  }
}

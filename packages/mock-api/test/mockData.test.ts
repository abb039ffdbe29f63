import { describe, expect, it } from "vitest";

import {
  buildMockChatMessages,
  decodeCursor,
  encodeCursor,
  formatRetryLine,
  formatStreamFrame,
  paginateChatMessages
} from "../src/mockData";

const pageOptions = { limit: 2, pollingIntervalMillis: 1500, endWhenExhausted: false };

describe("buildMockChatMessages", () => {
  it("cycles through every message kind with stable ids", () => {
    const messages = buildMockChatMessages(11, "chat-1");

    expect(messages).toHaveLength(11);
    expect(messages[0].id).toBe("msg-0000000");
    expect(messages[0].snippet.type).toBe("textMessageEvent");
    expect(messages[7].snippet.type).toBe("messageDeletedEvent");
    expect(messages[9].snippet.type).toBe("pollEvent");
    expect(messages[10].snippet.type).toBe("textMessageEvent");
    expect(messages[3].snippet.liveChatId).toBe("chat-1");
    expect(messages[1].snippet.publishedAt).toBe("2024-01-01T00:00:01.000Z");
  });
});

describe("paginateChatMessages", () => {
  it("walks the history and keeps handing out the tail token", () => {
    const messages = buildMockChatMessages(3, "chat-1");

    const first = paginateChatMessages(messages, { ...pageOptions, cursor: null });
    const second = paginateChatMessages(messages, { ...pageOptions, cursor: first.nextPageToken });
    const caughtUp = paginateChatMessages(messages, { ...pageOptions, cursor: second.nextPageToken });

    expect(first.items.map((item) => item.id)).toEqual(["msg-0000000", "msg-0000001"]);
    expect(decodeCursor(first.nextPageToken)).toBe(2);
    expect(second.items.map((item) => item.id)).toEqual(["msg-0000002"]);
    expect(caughtUp.items).toEqual([]);
    expect(caughtUp.nextPageToken).toBe(second.nextPageToken);
    expect(caughtUp.offlineAt).toBeUndefined();
    expect(first.pollingIntervalMillis).toBe(1500);
  });

  it("reports the chat offline once exhausted when asked to", () => {
    const messages = buildMockChatMessages(1, "chat-1");

    const page = paginateChatMessages(messages, {
      ...pageOptions,
      endWhenExhausted: true,
      cursor: encodeCursor(1)
    });

    expect(page.offlineAt).toBe("2024-01-01T00:00:01.000Z");
  });

  it("rejects a cursor that does not decode to an offset", () => {
    expect(() => decodeCursor(Buffer.from("abc").toString("base64"))).toThrow("Invalid cursor");
  });
});

describe("stream formatting", () => {
  it("writes retry and data lines", () => {
    const page = paginateChatMessages([], { ...pageOptions, cursor: null });

    expect(formatRetryLine(2000)).toBe("retry: 2000\n");
    expect(formatStreamFrame(page)).toBe(`data: ${JSON.stringify(page)}\n\n`);
  });
});

import { describe, expect, it } from "vitest";

import { parseChatEvent } from "../src/api/responseParser";
import type { SemanticEmitter } from "../src/bot/classify";
import { classifyChatEvent, parsePublishedAt, toChatAuthor } from "../src/bot/classify";
import { bannedItem, deletedItem, superChatItem, textItem, unknownItem } from "./helpers";

function classify(item: unknown) {
  const emitted: Array<{ category: string; event: unknown }> = [];
  const emit: SemanticEmitter = (category, event) => {
    emitted.push({ category, event });
  };
  const handled = classifyChatEvent(parseChatEvent(item), emit);
  return { handled, emitted };
}

describe("classifyChatEvent", () => {
  it("turns a text item into a chat message", () => {
    const { handled, emitted } = classify(textItem("m-1", "hello"));

    expect(handled).toBe(true);
    expect(emitted).toHaveLength(1);
    expect(emitted[0].category).toBe("message");
    expect(emitted[0].event).toMatchObject({
      id: "m-1",
      message: "hello",
      publishedAt: new Date("2026-03-01T12:00:00Z"),
      author: {
        channelId: "UC-alice",
        displayName: "alice",
        isOwner: false,
        isModerator: false,
        isMember: true
      }
    });
  });

  it("renames super chat fields", () => {
    const { emitted } = classify(superChatItem("m-2", "5000000", "great stream"));

    expect(emitted[0].category).toBe("superChat");
    expect(emitted[0].event).toMatchObject({
      amountMicros: 5_000_000,
      currency: "USD",
      amountDisplay: "$5.00",
      comment: "great stream",
      tier: 2
    });
  });

  it("emits the deleted message id", () => {
    const { emitted } = classify(deletedItem("m-3", "m-1"));

    expect(emitted).toEqual([{ category: "messageDeleted", event: "m-1" }]);
  });

  it("converts ban durations to milliseconds", () => {
    const { emitted } = classify(bannedItem("m-4", "UC-troll", "300"));

    expect(emitted[0].category).toBe("userBanned");
    expect(emitted[0].event).toMatchObject({
      bannedUser: { channelId: "UC-troll", displayName: "troll" },
      banType: "temporary",
      durationMs: 300_000
    });
  });

  it("drops items no category covers", () => {
    expect(classify(unknownItem("m-5", "sponsorOnlyModeStartedEvent"))).toEqual({ handled: false, emitted: [] });
    expect(classify(unknownItem("m-6", "chatEndedEvent"))).toEqual({ handled: false, emitted: [] });
    expect(classify(unknownItem("m-7", "tombstone"))).toEqual({ handled: false, emitted: [] });
  });
});

describe("toChatAuthor", () => {
  it("falls back to the snippet channel id without author details", () => {
    const raw = parseChatEvent({
      id: "m-8",
      snippet: { type: "textMessageEvent", authorChannelId: "UC-anon", displayMessage: "yo" }
    });

    expect(toChatAuthor(raw)).toEqual({
      channelId: "UC-anon",
      channelUrl: "",
      displayName: "",
      profileImageUrl: "",
      isVerified: false,
      isOwner: false,
      isModerator: false,
      isMember: false
    });
  });
});

describe("parsePublishedAt", () => {
  it("returns null for missing or unparseable timestamps", () => {
    expect(parsePublishedAt(null)).toBeNull();
    expect(parsePublishedAt("yesterday-ish")).toBeNull();
    expect(parsePublishedAt("2026-03-01T12:00:00Z")?.toISOString()).toBe("2026-03-01T12:00:00.000Z");
  });
});

export interface MockAuthorDetails {
  channelId: string;
  channelUrl: string;
  displayName: string;
  profileImageUrl: string;
  isVerified: boolean;
  isChatOwner: boolean;
  isChatSponsor: boolean;
  isChatModerator: boolean;
}

export interface MockChatMessage {
  kind: "youtube#liveChatMessage";
  id: string;
  snippet: Record<string, unknown> & {
    type: string;
    liveChatId: string;
    authorChannelId: string;
    publishedAt: string;
    displayMessage: string;
  };
  authorDetails: MockAuthorDetails;
}

export interface MockChatPage {
  kind: "youtube#liveChatMessageListResponse";
  pollingIntervalMillis: number;
  nextPageToken: string;
  offlineAt?: string;
  pageInfo: { totalResults: number; resultsPerPage: number };
  items: MockChatMessage[];
}

export interface PaginateOptions {
  limit: number;
  cursor: string | null;
  pollingIntervalMillis: number;
  /** Report the chat as ended once a caller has read every message. */
  endWhenExhausted: boolean;
}

const BASE_TIME_MS = 1704067200000;

const MESSAGE_KINDS = [
  "textMessageEvent",
  "superChatEvent",
  "superStickerEvent",
  "newSponsorEvent",
  "memberMilestoneChatEvent",
  "membershipGiftingEvent",
  "giftMembershipReceivedEvent",
  "messageDeletedEvent",
  "userBannedEvent",
  "pollEvent"
] as const;

function messageId(index: number): string {
  return `msg-${index.toString().padStart(7, "0")}`;
}

function viewer(index: number): MockAuthorDetails {
  const channelId = `UC-viewer-${index % 25}`;
  return {
    channelId,
    channelUrl: `http://www.youtube.com/channel/${channelId}`,
    displayName: `viewer ${index % 25}`,
    profileImageUrl: `https://example.test/avatars/${index % 25}.png`,
    isVerified: index % 25 === 0,
    isChatOwner: false,
    isChatSponsor: index % 3 === 0,
    isChatModerator: index % 25 === 1
  };
}

function detailsFor(kind: (typeof MESSAGE_KINDS)[number], index: number): {
  displayMessage: string;
  details: Record<string, unknown>;
} {
  switch (kind) {
    case "textMessageEvent":
      return {
        displayMessage: `hello from viewer ${index % 25} (#${index})`,
        details: { textMessageDetails: { messageText: `hello from viewer ${index % 25} (#${index})` } }
      };
    case "superChatEvent":
      return {
        displayMessage: "$5.00 from a super chat",
        details: {
          superChatDetails: {
            amountMicros: "5000000",
            currency: "USD",
            amountDisplayString: "$5.00",
            userComment: "great stream",
            tier: 2
          }
        }
      };
    case "superStickerEvent":
      return {
        displayMessage: "sticker",
        details: {
          superStickerDetails: {
            superStickerMetadata: { stickerId: `sticker-${index % 4}`, altText: "party", language: "en" },
            amountMicros: "2000000",
            currency: "USD",
            amountDisplayString: "$2.00",
            tier: 1
          }
        }
      };
    case "newSponsorEvent":
      return {
        displayMessage: "welcome to the club",
        details: { newSponsorDetails: { memberLevelName: "member", isUpgrade: index % 20 === 3 } }
      };
    case "memberMilestoneChatEvent":
      return {
        displayMessage: "another month",
        details: {
          memberMilestoneChatDetails: {
            memberLevelName: "member",
            memberMonth: (index % 12) + 1,
            userComment: "still here"
          }
        }
      };
    case "membershipGiftingEvent":
      return {
        displayMessage: "gifted memberships",
        details: {
          membershipGiftingDetails: { giftMembershipsCount: 5, giftMembershipsLevelName: "member" }
        }
      };
    case "giftMembershipReceivedEvent":
      return {
        displayMessage: "received a gift membership",
        details: {
          giftMembershipReceivedDetails: {
            memberLevelName: "member",
            gifterChannelId: "UC-viewer-5",
            associatedMembershipGiftingMessageId: messageId(Math.max(0, index - 1))
          }
        }
      };
    case "messageDeletedEvent":
      return {
        displayMessage: "",
        details: { messageDeletedDetails: { deletedMessageId: messageId(Math.max(0, index - 7)) } }
      };
    case "userBannedEvent":
      return {
        displayMessage: "",
        details: {
          userBannedDetails: {
            bannedUserDetails: {
              channelId: `UC-viewer-${(index + 7) % 25}`,
              channelUrl: "",
              displayName: `viewer ${(index + 7) % 25}`,
              profileImageUrl: ""
            },
            banType: index % 2 === 0 ? "temporary" : "permanent",
            banDurationSeconds: index % 2 === 0 ? "300" : "0"
          }
        }
      };
    case "pollEvent":
      return {
        displayMessage: "poll",
        details: {
          pollDetails: {
            id: `poll-${index}`,
            status: "active",
            metadata: {
              questionText: "next game?",
              options: [
                { optionText: "chess", tally: "3" },
                { optionText: "go", tally: "4" }
              ]
            }
          }
        }
      };
  }
}

/** Deterministic chat history that walks through every message kind in turn. */
export function buildMockChatMessages(total: number, liveChatId: string): MockChatMessage[] {
  const messages: MockChatMessage[] = [];

  for (let index = 0; index < total; index += 1) {
    const kind = MESSAGE_KINDS[index % MESSAGE_KINDS.length];
    const author = viewer(index);
    const { displayMessage, details } = detailsFor(kind, index);

    messages.push({
      kind: "youtube#liveChatMessage",
      id: messageId(index),
      snippet: {
        type: kind,
        liveChatId,
        authorChannelId: author.channelId,
        publishedAt: new Date(BASE_TIME_MS + index * 1000).toISOString(),
        hasDisplayContent: displayMessage.length > 0,
        displayMessage,
        ...details
      },
      authorDetails: author
    });
  }

  return messages;
}

export function encodeCursor(value: number): string {
  return Buffer.from(String(value), "utf8").toString("base64");
}

export function decodeCursor(cursor: string): number {
  const decoded = Buffer.from(cursor, "base64").toString("utf8");
  const parsed = Number.parseInt(decoded, 10);

  if (Number.isNaN(parsed) || parsed < 0) {
    throw new Error(`Invalid cursor: ${cursor}`);
  }

  return parsed;
}

/**
 * One list response. The token always points just past the last item, so a
 * caller that has caught up keeps receiving empty pages until new messages
 * arrive (or the chat ends).
 */
export function paginateChatMessages(
  messages: MockChatMessage[],
  options: PaginateOptions
): MockChatPage {
  const startIndex = options.cursor ? decodeCursor(options.cursor) : 0;
  const endIndex = Math.min(startIndex + Math.max(options.limit, 1), messages.length);
  const items = messages.slice(Math.min(startIndex, messages.length), endIndex);
  const exhausted = startIndex >= messages.length;

  const page: MockChatPage = {
    kind: "youtube#liveChatMessageListResponse",
    pollingIntervalMillis: options.pollingIntervalMillis,
    nextPageToken: encodeCursor(Math.max(startIndex, endIndex)),
    pageInfo: { totalResults: messages.length, resultsPerPage: items.length },
    items
  };

  if (exhausted && options.endWhenExhausted) {
    page.offlineAt = new Date(BASE_TIME_MS + messages.length * 1000).toISOString();
  }

  return page;
}

export function formatRetryLine(delayMs: number): string {
  return `retry: ${delayMs}\n`;
}

export function formatStreamFrame(page: MockChatPage): string {
  return `data: ${JSON.stringify(page)}\n\n`;
}

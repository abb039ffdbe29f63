import type {
  AuthorDetails,
  BanType,
  ChatModerator,
  ChatPage,
  PollChoice,
  PollDetails,
  RawChatEvent,
  UserBannedDetails
} from "../types";
import { MESSAGE_TYPES } from "../types";
import { ResponseParseError } from "./errors";

export interface RecordLike {
  [key: string]: unknown;
}

export function isRecordLike(value: unknown): value is RecordLike {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(record: RecordLike, key: string): string {
  const value = record[key];
  return typeof value === "string" ? value : "";
}

function readOptionalString(record: RecordLike, key: string): string | null {
  const value = record[key];
  return typeof value === "string" && value.length > 0 ? value : null;
}

// The provider sends 64-bit counters (amountMicros, vote counts) as strings.
function readNumber(record: RecordLike, key: string): number {
  const value = record[key];

  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }

  if (typeof value === "string" && value.trim().length > 0) {
    const numeric = Number(value);
    if (Number.isFinite(numeric)) {
      return numeric;
    }
  }

  return 0;
}

function readBoolean(record: RecordLike, key: string): boolean {
  return record[key] === true;
}

function readRecord(record: RecordLike, key: string): RecordLike | null {
  const value = record[key];
  return isRecordLike(value) ? value : null;
}

function parseAuthor(value: RecordLike | null): AuthorDetails | null {
  if (!value) {
    return null;
  }

  return {
    channelId: readString(value, "channelId"),
    channelUrl: readString(value, "channelUrl"),
    displayName: readString(value, "displayName"),
    profileImageUrl: readString(value, "profileImageUrl"),
    isVerified: readBoolean(value, "isVerified"),
    isChatOwner: readBoolean(value, "isChatOwner"),
    isChatSponsor: readBoolean(value, "isChatSponsor"),
    isChatModerator: readBoolean(value, "isChatModerator")
  };
}

function parseBanType(value: string): BanType {
  return value === "temporary" ? "temporary" : "permanent";
}

function parseUserBanned(details: RecordLike): UserBannedDetails {
  const bannedUser = readRecord(details, "bannedUserDetails");

  return {
    bannedUserDetails: bannedUser
      ? {
          channelId: readString(bannedUser, "channelId"),
          channelUrl: readString(bannedUser, "channelUrl"),
          displayName: readString(bannedUser, "displayName"),
          profileImageUrl: readString(bannedUser, "profileImageUrl")
        }
      : null,
    banType: parseBanType(readString(details, "banType")),
    banDurationSeconds: readNumber(details, "banDurationSeconds")
  };
}

function parsePollStatus(value: string): PollDetails["status"] {
  if (value === "active" || value === "open") {
    return "open";
  }
  if (value === "closed") {
    return "closed";
  }
  return "unknown";
}

function parsePoll(details: RecordLike): PollDetails {
  const metadata = readRecord(details, "metadata") ?? details;
  const rawChoices = metadata.options ?? metadata.choices;
  const choices: PollChoice[] = Array.isArray(rawChoices)
    ? rawChoices.filter(isRecordLike).map((choice, index) => ({
        choiceId: readString(choice, "choiceId") || String(index),
        text: readString(choice, "optionText") || readString(choice, "text"),
        numVotes: readNumber(choice, "tally") || readNumber(choice, "numVotes")
      }))
    : [];

  return {
    pollId: readString(details, "id") || readString(metadata, "id"),
    question: readString(metadata, "questionText") || readString(metadata, "question"),
    choices,
    status: parsePollStatus(readString(details, "status") || readString(metadata, "status"))
  };
}

/** Parses one `liveChatMessage` resource. */
export function parseChatEvent(value: unknown): RawChatEvent {
  if (!isRecordLike(value)) {
    throw new ResponseParseError("Invalid chat message payload: item must be an object");
  }

  const id = value.id;
  if (typeof id !== "string" || id.length === 0) {
    throw new ResponseParseError("Invalid chat message payload: missing id");
  }

  const snippet = readRecord(value, "snippet") ?? {};
  const providerType = readString(snippet, "type");
  const displayMessage = readString(snippet, "displayMessage");
  const base = {
    id,
    liveChatId: readString(snippet, "liveChatId"),
    authorChannelId: readString(snippet, "authorChannelId"),
    publishedAt: readOptionalString(snippet, "publishedAt"),
    displayMessage,
    author: parseAuthor(readRecord(value, "authorDetails"))
  };
  const unknown: RawChatEvent = { ...base, type: "unknown", providerType, details: null };

  switch (providerType) {
    case MESSAGE_TYPES.text: {
      const details = readRecord(snippet, "textMessageDetails");
      return {
        ...base,
        type: MESSAGE_TYPES.text,
        details: { messageText: details ? readString(details, "messageText") : displayMessage }
      };
    }
    case MESSAGE_TYPES.superChat: {
      const details = readRecord(snippet, "superChatDetails");
      if (!details) {
        return unknown;
      }
      return {
        ...base,
        type: MESSAGE_TYPES.superChat,
        details: {
          amountMicros: readNumber(details, "amountMicros"),
          currency: readString(details, "currency"),
          amountDisplayString: readString(details, "amountDisplayString"),
          userComment: readString(details, "userComment"),
          tier: readNumber(details, "tier")
        }
      };
    }
    case MESSAGE_TYPES.superSticker: {
      const details = readRecord(snippet, "superStickerDetails");
      if (!details) {
        return unknown;
      }
      const sticker = readRecord(details, "superStickerMetadata") ?? {};
      return {
        ...base,
        type: MESSAGE_TYPES.superSticker,
        details: {
          superStickerId: readString(sticker, "stickerId"),
          altText: readString(sticker, "altText"),
          amountMicros: readNumber(details, "amountMicros"),
          currency: readString(details, "currency"),
          amountDisplayString: readString(details, "amountDisplayString"),
          tier: readNumber(details, "tier")
        }
      };
    }
    case MESSAGE_TYPES.newSponsor: {
      const details = readRecord(snippet, "newSponsorDetails");
      if (!details) {
        return unknown;
      }
      return {
        ...base,
        type: MESSAGE_TYPES.newSponsor,
        details: {
          memberLevelName: readString(details, "memberLevelName"),
          isUpgrade: readBoolean(details, "isUpgrade")
        }
      };
    }
    case MESSAGE_TYPES.memberMilestone: {
      const details = readRecord(snippet, "memberMilestoneChatDetails");
      if (!details) {
        return unknown;
      }
      return {
        ...base,
        type: MESSAGE_TYPES.memberMilestone,
        details: {
          memberLevelName: readString(details, "memberLevelName"),
          memberMonth: readNumber(details, "memberMonth"),
          userComment: readString(details, "userComment")
        }
      };
    }
    case MESSAGE_TYPES.membershipGifting: {
      const details = readRecord(snippet, "membershipGiftingDetails");
      if (!details) {
        return unknown;
      }
      return {
        ...base,
        type: MESSAGE_TYPES.membershipGifting,
        details: {
          giftMembershipsCount: readNumber(details, "giftMembershipsCount"),
          memberLevelName: readString(details, "giftMembershipsLevelName")
        }
      };
    }
    case MESSAGE_TYPES.giftMembershipReceived: {
      const details = readRecord(snippet, "giftMembershipReceivedDetails");
      if (!details) {
        return unknown;
      }
      return {
        ...base,
        type: MESSAGE_TYPES.giftMembershipReceived,
        details: {
          memberLevelName: readString(details, "memberLevelName"),
          gifterChannelId: readString(details, "gifterChannelId"),
          associatedMembershipGiftingMessageId: readString(
            details,
            "associatedMembershipGiftingMessageId"
          )
        }
      };
    }
    case MESSAGE_TYPES.messageDeleted: {
      const details = readRecord(snippet, "messageDeletedDetails");
      if (!details) {
        return unknown;
      }
      return {
        ...base,
        type: MESSAGE_TYPES.messageDeleted,
        details: { deletedMessageId: readString(details, "deletedMessageId") }
      };
    }
    case MESSAGE_TYPES.userBanned: {
      const details = readRecord(snippet, "userBannedDetails");
      if (!details) {
        return unknown;
      }
      return { ...base, type: MESSAGE_TYPES.userBanned, details: parseUserBanned(details) };
    }
    case MESSAGE_TYPES.poll: {
      const details = readRecord(snippet, "pollDetails");
      if (!details) {
        return unknown;
      }
      return { ...base, type: MESSAGE_TYPES.poll, details: parsePoll(details) };
    }
    case MESSAGE_TYPES.chatEnded:
      return { ...base, type: MESSAGE_TYPES.chatEnded, details: null };
    case MESSAGE_TYPES.tombstone:
      return { ...base, type: MESSAGE_TYPES.tombstone, details: null };
    default:
      return unknown;
  }
}

/** Parses a `liveChatMessages.list` response, or one stream frame carrying the same shape. */
export function parseChatPage(payload: unknown): ChatPage {
  if (!isRecordLike(payload)) {
    throw new ResponseParseError("Invalid live chat response: expected object");
  }

  const items = payload.items ?? [];
  if (!Array.isArray(items)) {
    throw new ResponseParseError("Invalid live chat response: items must be an array");
  }

  const nextPageToken = payload.nextPageToken ?? null;
  if (!(typeof nextPageToken === "string" || nextPageToken === null)) {
    throw new ResponseParseError("Invalid live chat response: nextPageToken must be string");
  }

  const pageInfo = readRecord(payload, "pageInfo");
  const totalResults = pageInfo && pageInfo.totalResults !== undefined
    ? readNumber(pageInfo, "totalResults")
    : null;

  return {
    items: items.map((item) => parseChatEvent(item)),
    nextCursor: nextPageToken && nextPageToken.length > 0 ? nextPageToken : null,
    pollingIntervalMillis: readNumber(payload, "pollingIntervalMillis"),
    offlineAt: readOptionalString(payload, "offlineAt"),
    totalResults
  };
}

/** Parses a `liveChatModerators.list` response, skipping entries without an id. */
export function parseModeratorList(payload: unknown): ChatModerator[] {
  if (!isRecordLike(payload) || !Array.isArray(payload.items)) {
    throw new ResponseParseError("Invalid liveChatModerator list response: items must be an array");
  }

  const moderators: ChatModerator[] = [];
  for (const item of payload.items) {
    if (!isRecordLike(item) || typeof item.id !== "string" || item.id.length === 0) {
      continue;
    }
    const details = readRecord(readRecord(item, "snippet") ?? {}, "moderatorDetails") ?? {};
    moderators.push({
      id: item.id,
      channelId: readString(details, "channelId"),
      displayName: readString(details, "displayName")
    });
  }

  return moderators;
}

/** Extracts the `id` of a resource returned by a moderation call. */
export function parseResourceId(payload: unknown, resource: string): string {
  if (!isRecordLike(payload) || typeof payload.id !== "string" || payload.id.length === 0) {
    throw new ResponseParseError(`Invalid ${resource} response: missing id`);
  }

  return payload.id;
}

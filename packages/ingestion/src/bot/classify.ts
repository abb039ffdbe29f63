import type { RawChatEvent, UserBannedDetails } from "../types";
import type { BanEvent, ChatAuthor, ChatBotEvents } from "./events";

export type SemanticEmitter = <K extends keyof ChatBotEvents>(
  category: K,
  event: ChatBotEvents[K]
) => void;

function assertNever(value: never): never {
  throw new Error(`Unhandled chat event variant: ${JSON.stringify(value)}`);
}

export function toChatAuthor(raw: RawChatEvent): ChatAuthor {
  const author = raw.author;
  if (!author) {
    return {
      channelId: raw.authorChannelId,
      channelUrl: "",
      displayName: "",
      profileImageUrl: "",
      isVerified: false,
      isOwner: false,
      isModerator: false,
      isMember: false
    };
  }

  return {
    channelId: author.channelId || raw.authorChannelId,
    channelUrl: author.channelUrl,
    displayName: author.displayName,
    profileImageUrl: author.profileImageUrl,
    isVerified: author.isVerified,
    isOwner: author.isChatOwner,
    isModerator: author.isChatModerator,
    isMember: author.isChatSponsor
  };
}

export function parsePublishedAt(value: string | null): Date | null {
  if (value === null) {
    return null;
  }
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? null : new Date(parsed);
}

export function toBanEvent(details: UserBannedDetails): BanEvent {
  return {
    bannedUser: details.bannedUserDetails ? { ...details.bannedUserDetails } : null,
    banType: details.banType,
    durationMs: details.banDurationSeconds * 1000,
    raw: details
  };
}

/**
 * Emits `raw` under its semantic category. Returns false for items no bot
 * category covers (chat ended markers, tombstones, unknown types), which are
 * dropped.
 */
export function classifyChatEvent(raw: RawChatEvent, emit: SemanticEmitter): boolean {
  const base = {
    id: raw.id,
    author: toChatAuthor(raw),
    publishedAt: parsePublishedAt(raw.publishedAt),
    raw
  };

  switch (raw.type) {
    case "textMessageEvent":
      emit("message", { ...base, message: raw.details.messageText });
      return true;
    case "superChatEvent":
      emit("superChat", {
        ...base,
        amountMicros: raw.details.amountMicros,
        currency: raw.details.currency,
        amountDisplay: raw.details.amountDisplayString,
        comment: raw.details.userComment,
        tier: raw.details.tier
      });
      return true;
    case "superStickerEvent":
      emit("superSticker", {
        ...base,
        stickerId: raw.details.superStickerId,
        altText: raw.details.altText,
        amountMicros: raw.details.amountMicros,
        currency: raw.details.currency,
        amountDisplay: raw.details.amountDisplayString,
        tier: raw.details.tier
      });
      return true;
    case "newSponsorEvent":
      emit("membership", {
        ...base,
        levelName: raw.details.memberLevelName,
        isUpgrade: raw.details.isUpgrade
      });
      return true;
    case "memberMilestoneChatEvent":
      emit("memberMilestone", {
        ...base,
        levelName: raw.details.memberLevelName,
        months: raw.details.memberMonth,
        comment: raw.details.userComment
      });
      return true;
    case "membershipGiftingEvent":
      emit("giftMembership", {
        ...base,
        count: raw.details.giftMembershipsCount,
        levelName: raw.details.memberLevelName
      });
      return true;
    case "giftMembershipReceivedEvent":
      emit("giftMembershipReceived", {
        ...base,
        levelName: raw.details.memberLevelName,
        gifterChannelId: raw.details.gifterChannelId,
        giftMessageId: raw.details.associatedMembershipGiftingMessageId
      });
      return true;
    case "messageDeletedEvent":
      emit("messageDeleted", raw.details.deletedMessageId);
      return true;
    case "userBannedEvent":
      emit("userBanned", toBanEvent(raw.details));
      return true;
    case "pollEvent":
      emit("poll", {
        ...base,
        pollId: raw.details.pollId,
        question: raw.details.question,
        status: raw.details.status,
        choices: raw.details.choices.map((choice) => ({ ...choice }))
      });
      return true;
    case "chatEndedEvent":
    case "tombstone":
    case "unknown":
      return false;
    default:
      return assertNever(raw);
  }
}

export type TransportMode = "poll" | "stream";

export interface LiveChatConfig {
  liveChatId: string;
  transport: TransportMode;
  apiBaseUrl: string;
  accessToken: string | null;
  apiKey: string | null;
  apiTimeoutMs: number;
  pageSize: number;
  profileImageSize: number;
  language: string | null;
  minPollIntervalMs: number;
  maxPollIntervalMs: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  backoffMultiplier: number;
  backoffJitter: number;
  streamReconnectDelayMs: number;
  streamMaxReconnectDelayMs: number;
  tokenRefreshIntervalMs: number;
  /** 0 turns the response cache off. */
  responseCacheTtlMs: number;
  dailyQuota: number;
  quotaTimeZone: string;
  databaseUrl: string;
  progressLogIntervalMs: number;
  logLevel: string;
}

export const MESSAGE_TYPES = {
  text: "textMessageEvent",
  superChat: "superChatEvent",
  superSticker: "superStickerEvent",
  newSponsor: "newSponsorEvent",
  memberMilestone: "memberMilestoneChatEvent",
  membershipGifting: "membershipGiftingEvent",
  giftMembershipReceived: "giftMembershipReceivedEvent",
  messageDeleted: "messageDeletedEvent",
  userBanned: "userBannedEvent",
  poll: "pollEvent",
  chatEnded: "chatEndedEvent",
  tombstone: "tombstone"
} as const;

export interface AuthorDetails {
  channelId: string;
  channelUrl: string;
  displayName: string;
  profileImageUrl: string;
  isVerified: boolean;
  isChatOwner: boolean;
  isChatSponsor: boolean;
  isChatModerator: boolean;
}

export interface TextMessageDetails {
  messageText: string;
}

export interface SuperChatDetails {
  amountMicros: number;
  currency: string;
  amountDisplayString: string;
  userComment: string;
  tier: number;
}

export interface SuperStickerDetails {
  superStickerId: string;
  altText: string;
  amountMicros: number;
  currency: string;
  amountDisplayString: string;
  tier: number;
}

export interface NewSponsorDetails {
  memberLevelName: string;
  isUpgrade: boolean;
}

export interface MemberMilestoneDetails {
  memberLevelName: string;
  memberMonth: number;
  userComment: string;
}

export interface MembershipGiftingDetails {
  giftMembershipsCount: number;
  memberLevelName: string;
}

export interface GiftMembershipReceivedDetails {
  memberLevelName: string;
  gifterChannelId: string;
  associatedMembershipGiftingMessageId: string;
}

export interface MessageDeletedDetails {
  deletedMessageId: string;
}

export interface BannedUserDetails {
  channelId: string;
  channelUrl: string;
  displayName: string;
  profileImageUrl: string;
}

export type BanType = "permanent" | "temporary";

export interface UserBannedDetails {
  bannedUserDetails: BannedUserDetails | null;
  banType: BanType;
  banDurationSeconds: number;
}

export interface PollChoice {
  choiceId: string;
  text: string;
  numVotes: number;
}

export interface PollDetails {
  pollId: string;
  question: string;
  choices: PollChoice[];
  status: "open" | "closed" | "unknown";
}

interface RawChatEventBase {
  id: string;
  liveChatId: string;
  authorChannelId: string;
  publishedAt: string | null;
  displayMessage: string;
  author: AuthorDetails | null;
}

/**
 * One ingested chat item. The `type` tag decides which `details` payload is
 * present; tags the parser does not know, or known tags whose payload is
 * missing, come through as `unknown`.
 */
export type RawChatEvent = RawChatEventBase &
  (
    | { type: "textMessageEvent"; details: TextMessageDetails }
    | { type: "superChatEvent"; details: SuperChatDetails }
    | { type: "superStickerEvent"; details: SuperStickerDetails }
    | { type: "newSponsorEvent"; details: NewSponsorDetails }
    | { type: "memberMilestoneChatEvent"; details: MemberMilestoneDetails }
    | { type: "membershipGiftingEvent"; details: MembershipGiftingDetails }
    | { type: "giftMembershipReceivedEvent"; details: GiftMembershipReceivedDetails }
    | { type: "messageDeletedEvent"; details: MessageDeletedDetails }
    | { type: "userBannedEvent"; details: UserBannedDetails }
    | { type: "pollEvent"; details: PollDetails }
    | { type: "chatEndedEvent"; details: null }
    | { type: "tombstone"; details: null }
    | { type: "unknown"; providerType: string; details: null }
  );

export interface ChatModerator {
  id: string;
  channelId: string;
  displayName: string;
}

export interface ChatPage {
  items: RawChatEvent[];
  nextCursor: string | null;
  pollingIntervalMillis: number;
  offlineAt: string | null;
  totalResults: number | null;
}

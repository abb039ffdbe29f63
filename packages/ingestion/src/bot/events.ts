import type { BanType, PollChoice, PollDetails, RawChatEvent, UserBannedDetails } from "../types";

export interface ChatAuthor {
  channelId: string;
  channelUrl: string;
  displayName: string;
  profileImageUrl: string;
  isVerified: boolean;
  isOwner: boolean;
  isModerator: boolean;
  /** Channel member (sponsor). */
  isMember: boolean;
}

interface AuthoredEvent {
  id: string;
  author: ChatAuthor;
  publishedAt: Date | null;
  raw: RawChatEvent;
}

export interface ChatMessage extends AuthoredEvent {
  message: string;
}

export interface SuperChatEvent extends AuthoredEvent {
  amountMicros: number;
  currency: string;
  amountDisplay: string;
  comment: string;
  tier: number;
}

export interface SuperStickerEvent extends AuthoredEvent {
  stickerId: string;
  altText: string;
  amountMicros: number;
  currency: string;
  amountDisplay: string;
  tier: number;
}

export interface MembershipEvent extends AuthoredEvent {
  levelName: string;
  isUpgrade: boolean;
}

export interface MemberMilestoneEvent extends AuthoredEvent {
  levelName: string;
  months: number;
  comment: string;
}

export interface GiftMembershipEvent extends AuthoredEvent {
  count: number;
  levelName: string;
}

export interface GiftMembershipReceivedEvent extends AuthoredEvent {
  levelName: string;
  gifterChannelId: string;
  giftMessageId: string;
}

export interface PollEvent extends AuthoredEvent {
  pollId: string;
  question: string;
  status: PollDetails["status"];
  choices: PollChoice[];
}

export interface BannedUser {
  channelId: string;
  channelUrl: string;
  displayName: string;
  profileImageUrl: string;
}

export interface BanEvent {
  bannedUser: BannedUser | null;
  banType: BanType;
  /** Zero for permanent bans. */
  durationMs: number;
  raw: UserBannedDetails;
}

/** Bot handler categories and the payload each receives. */
export type ChatBotEvents = {
  message: ChatMessage;
  superChat: SuperChatEvent;
  superSticker: SuperStickerEvent;
  membership: MembershipEvent;
  memberMilestone: MemberMilestoneEvent;
  giftMembership: GiftMembershipEvent;
  giftMembershipReceived: GiftMembershipReceivedEvent;
  /** Id of the removed message. */
  messageDeleted: string;
  userBanned: BanEvent;
  poll: PollEvent;
  connect: undefined;
  disconnect: undefined;
};

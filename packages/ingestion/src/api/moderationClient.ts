import type { ChatModerator } from "../types";
import type { HttpExecutor } from "./httpExecutor";
import { parseModeratorList, parseResourceId } from "./responseParser";

export interface ModerationClient {
  /** Posts a text message to the chat and returns the new message id. */
  sendMessage(text: string, signal?: AbortSignal): Promise<string>;
  deleteMessage(messageId: string, signal?: AbortSignal): Promise<void>;
  /** Returns the ban id, which unbanUser takes. */
  banUser(channelId: string, signal?: AbortSignal): Promise<string>;
  timeoutUser(channelId: string, durationSeconds: number, signal?: AbortSignal): Promise<string>;
  unbanUser(banId: string, signal?: AbortSignal): Promise<void>;
  /** Returns the moderator id, which removeModerator takes. */
  addModerator(channelId: string, signal?: AbortSignal): Promise<string>;
  removeModerator(moderatorId: string, signal?: AbortSignal): Promise<void>;
  /** Cached by the executor until a moderator is added or removed. */
  listModerators(signal?: AbortSignal): Promise<ChatModerator[]>;
}

export function createModerationClient(
  executor: HttpExecutor,
  liveChatId: string
): ModerationClient {
  const insertBan = async (
    channelId: string,
    ban: { type: "permanent" } | { type: "temporary"; banDurationSeconds: number },
    signal?: AbortSignal
  ): Promise<string> => {
    const payload = await executor.execute(
      {
        method: "POST",
        path: "liveChat/bans",
        operation: "liveChatBans.insert",
        query: { part: "snippet" },
        body: {
          snippet: {
            liveChatId,
            ...ban,
            bannedUserDetails: { channelId }
          }
        }
      },
      signal
    );

    return parseResourceId(payload, "liveChatBan");
  };

  return {
    async sendMessage(text, signal) {
      const payload = await executor.execute(
        {
          method: "POST",
          path: "liveChat/messages",
          operation: "liveChatMessages.insert",
          query: { part: "snippet" },
          body: {
            snippet: {
              liveChatId,
              type: "textMessageEvent",
              textMessageDetails: { messageText: text }
            }
          }
        },
        signal
      );

      return parseResourceId(payload, "liveChatMessage");
    },

    async deleteMessage(messageId, signal) {
      await executor.execute(
        {
          method: "DELETE",
          path: "liveChat/messages",
          operation: "liveChatMessages.delete",
          query: { id: messageId }
        },
        signal
      );
    },

    banUser: (channelId, signal) => insertBan(channelId, { type: "permanent" }, signal),

    timeoutUser: (channelId, durationSeconds, signal) =>
      insertBan(channelId, { type: "temporary", banDurationSeconds: durationSeconds }, signal),

    async unbanUser(banId, signal) {
      await executor.execute(
        {
          method: "DELETE",
          path: "liveChat/bans",
          operation: "liveChatBans.delete",
          query: { id: banId }
        },
        signal
      );
    },

    async addModerator(channelId, signal) {
      const payload = await executor.execute(
        {
          method: "POST",
          path: "liveChat/moderators",
          operation: "liveChatModerators.insert",
          query: { part: "snippet" },
          body: {
            snippet: {
              liveChatId,
              moderatorDetails: { channelDetails: { channelId } }
            }
          }
        },
        signal
      );

      return parseResourceId(payload, "liveChatModerator");
    },

    async removeModerator(moderatorId, signal) {
      await executor.execute(
        {
          method: "DELETE",
          path: "liveChat/moderators",
          operation: "liveChatModerators.delete",
          query: { id: moderatorId }
        },
        signal
      );
    },

    async listModerators(signal) {
      const payload = await executor.execute(
        {
          method: "GET",
          path: "liveChat/moderators",
          operation: "liveChatModerators.list",
          query: { liveChatId, part: "snippet", maxResults: 50 },
          cacheable: true
        },
        signal
      );

      return parseModeratorList(payload);
    }
  };
}

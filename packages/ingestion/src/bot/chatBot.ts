import { AlreadyRunningError, NotRunningError } from "../api/errors";
import type { HttpExecutor } from "../api/httpExecutor";
import type { ModerationClient } from "../api/moderationClient";
import type { DispatcherOptions, ErrorHandler, Handler, Unsubscribe } from "../core/dispatcher";
import { createDispatcher } from "../core/dispatcher";
import type { SleepLike } from "../core/sleep";
import type { ChatModerator } from "../types";
import type { ChatIngestionLoop } from "../ingestion/chatLoop";
import type { SemanticEmitter } from "./classify";
import { classifyChatEvent, toBanEvent } from "./classify";
import type { ChatBotEvents } from "./events";
import type { TokenProvider, TokenRefresher } from "./tokenRefresher";
import { DEFAULT_TOKEN_REFRESH_INTERVAL_MS, createTokenRefresher } from "./tokenRefresher";

export interface ChatBotOptions {
  /** 0 turns periodic refresh off. */
  tokenRefreshIntervalMs?: number;
}

export interface ChatBotDependencies {
  loop: ChatIngestionLoop;
  executor: Pick<HttpExecutor, "setAccessToken">;
  moderation: ModerationClient;
  tokenProvider?: TokenProvider | null;
  sleep?: SleepLike;
  dispatcher?: DispatcherOptions;
}

export interface ChatBot {
  /** Fetches a token (when a provider is set), then starts ingestion. */
  connect(signal?: AbortSignal): Promise<void>;
  close(): Promise<void>;
  isConnected(): boolean;
  liveChatId(): string;
  on<K extends keyof ChatBotEvents>(category: K, handler: Handler<ChatBotEvents[K]>): Unsubscribe;
  onError(handler: ErrorHandler): Unsubscribe;

  say(text: string): Promise<string>;
  deleteMessage(messageId: string): Promise<void>;
  ban(channelId: string): Promise<string>;
  timeout(channelId: string, durationSeconds: number): Promise<string>;
  unban(banId: string): Promise<void>;
  addModerator(channelId: string): Promise<string>;
  removeModerator(moderatorId: string): Promise<void>;
  moderators(): Promise<ChatModerator[]>;
}

function requireText(value: string, name: string): void {
  if (value.trim().length === 0) {
    throw new Error(`${name} must not be empty`);
  }
}

export function createChatBot(
  options: ChatBotOptions,
  dependencies: ChatBotDependencies
): ChatBot {
  const { loop, executor, moderation } = dependencies;
  const tokenProvider = dependencies.tokenProvider ?? null;
  const refreshIntervalMs = options.tokenRefreshIntervalMs ?? DEFAULT_TOKEN_REFRESH_INTERVAL_MS;
  const dispatcher = createDispatcher<ChatBotEvents>(dependencies.dispatcher);
  const emit: SemanticEmitter = (category, event) => dispatcher.dispatch(category, event);

  const refresher: TokenRefresher | null =
    tokenProvider && refreshIntervalMs > 0
      ? createTokenRefresher({
          intervalMs: refreshIntervalMs,
          provider: tokenProvider,
          onToken: (token) => executor.setAccessToken(token),
          onError: (error) => dispatcher.dispatchError(error),
          sleep: dependencies.sleep
        })
      : null;

  let subscriptions: Unsubscribe[] = [];
  let connecting = false;

  const detach = (): void => {
    for (const unsubscribe of subscriptions) {
      unsubscribe();
    }
    subscriptions = [];
  };

  const attach = (): void => {
    subscriptions = [
      loop.on("message", (raw) => {
        classifyChatEvent(raw, emit);
      }),
      loop.on("delete", (messageId) => dispatcher.dispatch("messageDeleted", messageId)),
      loop.on("ban", (details) => dispatcher.dispatch("userBanned", toBanEvent(details))),
      loop.on("connect", () => dispatcher.dispatch("connect", undefined)),
      loop.on("disconnect", () => {
        dispatcher.dispatch("disconnect", undefined);
        // Also reached when the chat ends without close().
        return refresher?.stop();
      }),
      loop.onError((error) => dispatcher.dispatchError(error))
    ];
  };

  const requireConnected = (): void => {
    if (!loop.isRunning()) {
      throw new NotRunningError();
    }
  };

  return {
    async connect(signal?: AbortSignal): Promise<void> {
      if (connecting || loop.state() !== "stopped") {
        throw new AlreadyRunningError("live chat bot");
      }

      connecting = true;
      try {
        if (tokenProvider) {
          executor.setAccessToken(await tokenProvider.accessToken(signal));
        }

        // A reconnect must not leave the previous session's forwarding in place.
        detach();
        await refresher?.stop();
        attach();
        refresher?.start(signal);

        try {
          loop.start(signal);
        } catch (error) {
          await refresher?.stop();
          detach();
          throw error;
        }
      } finally {
        connecting = false;
      }
    },

    async close(): Promise<void> {
      await refresher?.stop();
      await loop.stop();
      detach();
    },

    isConnected: () => loop.isRunning(),

    liveChatId: () => loop.liveChatId(),

    on<K extends keyof ChatBotEvents>(category: K, handler: Handler<ChatBotEvents[K]>): Unsubscribe {
      return dispatcher.subscribe(category, handler);
    },

    onError: (handler) => dispatcher.onError(handler),

    async say(text: string): Promise<string> {
      requireConnected();
      requireText(text, "message text");
      return moderation.sendMessage(text);
    },

    async deleteMessage(messageId: string): Promise<void> {
      requireConnected();
      requireText(messageId, "messageId");
      await moderation.deleteMessage(messageId);
    },

    async ban(channelId: string): Promise<string> {
      requireConnected();
      requireText(channelId, "channelId");
      return moderation.banUser(channelId);
    },

    async timeout(channelId: string, durationSeconds: number): Promise<string> {
      requireConnected();
      requireText(channelId, "channelId");
      if (!Number.isInteger(durationSeconds) || durationSeconds <= 0) {
        throw new Error(`durationSeconds must be a positive integer, got ${durationSeconds}`);
      }
      return moderation.timeoutUser(channelId, durationSeconds);
    },

    async unban(banId: string): Promise<void> {
      requireConnected();
      requireText(banId, "banId");
      await moderation.unbanUser(banId);
    },

    async addModerator(channelId: string): Promise<string> {
      requireConnected();
      requireText(channelId, "channelId");
      return moderation.addModerator(channelId);
    },

    async removeModerator(moderatorId: string): Promise<void> {
      requireConnected();
      requireText(moderatorId, "moderatorId");
      await moderation.removeModerator(moderatorId);
    },

    async moderators(): Promise<ChatModerator[]> {
      requireConnected();
      return moderation.listModerators();
    }
  };
}

import type { LiveChatConfig } from "./types";
import type { FetchLike, HttpExecutor } from "./api/httpExecutor";
import { createHttpExecutor } from "./api/httpExecutor";
import type { ModerationClient } from "./api/moderationClient";
import { createModerationClient } from "./api/moderationClient";
import type { BackoffConfig } from "./api/retryPolicy";
import type { ChatBot } from "./bot/chatBot";
import { createChatBot } from "./bot/chatBot";
import type { TokenProvider } from "./bot/tokenRefresher";
import { createStaticTokenProvider } from "./bot/tokenRefresher";
import type { DispatcherOptions } from "./core/dispatcher";
import type { QuotaLedger } from "./core/quotaLedger";
import { createQuotaLedger } from "./core/quotaLedger";
import { createResponseCache } from "./core/responseCache";
import type { SleepLike } from "./core/sleep";
import type { ChatIngestionLoop, ChatLoopDependencies } from "./ingestion/chatLoop";
import { createChatPoller } from "./ingestion/pollingLoop";
import { createChatStream } from "./ingestion/streamLoop";

export interface LiveChat {
  bot: ChatBot;
  loop: ChatIngestionLoop;
  executor: HttpExecutor;
  moderation: ModerationClient;
  quotaLedger: QuotaLedger;
}

export interface LiveChatDependencies {
  fetchImpl?: FetchLike;
  now?: () => number;
  random?: () => number;
  sleep?: SleepLike;
  /** Defaults to the configured access token, if there is one. */
  tokenProvider?: TokenProvider | null;
  initialCursor?: string | null;
  onUnhandledFault?: (fault: unknown) => void;
}

/** Wires the executor, quota ledger, ingestion loop for the configured transport, and bot. */
export function createLiveChat(
  config: LiveChatConfig,
  dependencies: LiveChatDependencies = {}
): LiveChat {
  const quotaLedger = createQuotaLedger({
    limit: config.dailyQuota,
    timeZone: config.quotaTimeZone,
    now: dependencies.now
  });
  const cache =
    config.responseCacheTtlMs > 0
      ? createResponseCache<unknown>({ defaultTtlMs: config.responseCacheTtlMs, now: dependencies.now })
      : null;
  const executor = createHttpExecutor(config, {
    fetchImpl: dependencies.fetchImpl,
    now: dependencies.now,
    quotaLedger,
    cache,
    cacheTtlMs: config.responseCacheTtlMs
  });
  const dispatcher: DispatcherOptions = {
    onUnhandledFault:
      dependencies.onUnhandledFault ??
      ((fault) => console.error("live chat error handler failed", fault))
  };

  const backoff: Partial<BackoffConfig> = {
    baseDelayMs: config.backoffBaseMs,
    maxDelayMs: config.backoffMaxMs,
    multiplier: config.backoffMultiplier,
    jitter: config.backoffJitter
  };
  if (dependencies.random) {
    backoff.random = dependencies.random;
  }

  const loopOptions = {
    liveChatId: config.liveChatId,
    pageSize: config.pageSize,
    profileImageSize: config.profileImageSize,
    language: config.language,
    initialCursor: dependencies.initialCursor ?? null,
    backoff
  };
  const loopDependencies: ChatLoopDependencies = {
    executor,
    quotaLedger,
    sleep: dependencies.sleep,
    dispatcher
  };

  const loop: ChatIngestionLoop =
    config.transport === "stream"
      ? createChatStream(
          {
            ...loopOptions,
            reconnectDelayMs: config.streamReconnectDelayMs,
            maxReconnectDelayMs: config.streamMaxReconnectDelayMs
          },
          loopDependencies
        )
      : createChatPoller(
          {
            ...loopOptions,
            minPollIntervalMs: config.minPollIntervalMs,
            maxPollIntervalMs: config.maxPollIntervalMs
          },
          loopDependencies
        );

  const moderation = createModerationClient(executor, config.liveChatId);
  const tokenProvider =
    dependencies.tokenProvider !== undefined
      ? dependencies.tokenProvider
      : config.accessToken
        ? createStaticTokenProvider(config.accessToken)
        : null;

  const bot = createChatBot(
    { tokenRefreshIntervalMs: config.tokenRefreshIntervalMs },
    {
      loop,
      executor,
      moderation,
      tokenProvider,
      sleep: dependencies.sleep,
      dispatcher
    }
  );

  return { bot, loop, executor, moderation, quotaLedger };
}

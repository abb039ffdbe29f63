import type { ChatPage } from "../types";
import { AlreadyRunningError, ChatEndedError, classifyFailure, toError } from "../api/errors";
import type { ApiRequest } from "../api/httpExecutor";
import { parseChatPage } from "../api/responseParser";
import { createBackoffConfig } from "../api/retryPolicy";
import type { Handler, Unsubscribe } from "../core/dispatcher";
import { createDispatcher } from "../core/dispatcher";
import { createLifecycle } from "../core/lifecycle";
import { sleepFor } from "../core/sleep";
import type { ChatIngestionLoop, ChatLoopDependencies, ChatLoopOptions, IngestionEvents } from "./chatLoop";
import {
  CHAT_MESSAGE_PARTS,
  DEFAULT_PAGE_SIZE,
  DEFAULT_PROFILE_IMAGE_SIZE,
  dispatchBatch,
  ensureQuotaAvailable,
  requireLiveChatId,
  retryDelayMs
} from "./chatLoop";

export const DEFAULT_MIN_POLL_INTERVAL_MS = 1000;
export const DEFAULT_MAX_POLL_INTERVAL_MS = 30_000;

export interface ChatPollerOptions extends ChatLoopOptions {
  minPollIntervalMs?: number;
  maxPollIntervalMs?: number;
}

export interface ChatPoller extends ChatIngestionLoop {
  /** Wait before the next poll, as last suggested by the provider. */
  pollIntervalMs(): number;
}

export function clampPollInterval(suggestedMs: number, minMs: number, maxMs: number): number {
  return Math.min(maxMs, Math.max(minMs, suggestedMs));
}

export function createChatPoller(
  options: ChatPollerOptions,
  dependencies: ChatLoopDependencies
): ChatPoller {
  const liveChatId = options.liveChatId;
  const minIntervalMs = options.minPollIntervalMs ?? DEFAULT_MIN_POLL_INTERVAL_MS;
  const maxIntervalMs = Math.max(
    minIntervalMs,
    options.maxPollIntervalMs ?? DEFAULT_MAX_POLL_INTERVAL_MS
  );
  const backoff = createBackoffConfig(options.backoff);
  const executor = dependencies.executor;
  const quotaLedger = dependencies.quotaLedger ?? null;
  const sleep = dependencies.sleep ?? sleepFor;
  const dispatcher = createDispatcher<IngestionEvents>(dependencies.dispatcher);
  const lifecycle = createLifecycle({
    name: "live chat poller",
    onFault: (fault) => dispatcher.dispatchError(toError(fault))
  });

  let cursor = options.initialCursor ?? null;
  let intervalMs = minIntervalMs;

  const buildRequest = (): ApiRequest => ({
    method: "GET",
    path: "liveChat/messages",
    operation: "liveChatMessages.list",
    query: {
      liveChatId,
      part: CHAT_MESSAGE_PARTS,
      profileImageSize: options.profileImageSize ?? DEFAULT_PROFILE_IMAGE_SIZE,
      maxResults: options.pageSize ?? DEFAULT_PAGE_SIZE,
      hl: options.language ?? undefined,
      pageToken: cursor ?? undefined
    }
  });

  const fetchPage = async (signal: AbortSignal): Promise<ChatPage> => {
    ensureQuotaAvailable(quotaLedger);
    const payload = await executor.execute(buildRequest(), signal);
    const page = parseChatPage(payload);

    if (page.offlineAt !== null) {
      throw new ChatEndedError(liveChatId);
    }

    return page;
  };

  const run = async (signal: AbortSignal): Promise<void> => {
    dispatcher.dispatch("connect", undefined);
    let attempt = 0;

    try {
      while (!signal.aborted) {
        let page: ChatPage;

        try {
          page = await fetchPage(signal);
        } catch (error) {
          const kind = classifyFailure(error, signal);
          if (kind === "cancelled") {
            return;
          }

          dispatcher.dispatchError(toError(error));

          if (kind === "ended") {
            return;
          }

          if (kind === "quota") {
            await sleep(intervalMs, signal);
            continue;
          }

          const delayMs = retryDelayMs(error, attempt, backoff);
          attempt += 1;
          await sleep(delayMs, signal);
          continue;
        }

        cursor = page.nextCursor ?? cursor;
        intervalMs = clampPollInterval(page.pollingIntervalMillis, minIntervalMs, maxIntervalMs);
        dispatchBatch(dispatcher, page.items);
        dispatcher.dispatch("pollComplete", { count: page.items.length, nextIntervalMs: intervalMs });
        attempt = 0;

        await sleep(intervalMs, signal);
      }
    } finally {
      dispatcher.dispatch("disconnect", undefined);
    }
  };

  return {
    transport: "poll",

    liveChatId: () => liveChatId,

    start(signal?: AbortSignal): void {
      requireLiveChatId(liveChatId);
      lifecycle.start(run, signal);
    },

    stop: () => lifecycle.stop(),

    isRunning: () => lifecycle.isRunning(),

    state: () => lifecycle.state(),

    cursor: () => cursor,

    setCursor(next: string | null): void {
      cursor = next;
    },

    resetCursor(): void {
      cursor = null;
    },

    reset(): void {
      if (lifecycle.state() !== "stopped") {
        throw new AlreadyRunningError("live chat poller");
      }
      cursor = null;
      intervalMs = minIntervalMs;
    },

    pollIntervalMs: () => intervalMs,

    on<K extends keyof IngestionEvents>(
      category: K,
      handler: Handler<IngestionEvents[K]>
    ): Unsubscribe {
      return dispatcher.subscribe(category, handler);
    },

    onError: (handler) => dispatcher.onError(handler)
  };
}

import {
  AlreadyRunningError,
  ChatEndedError,
  ResponseParseError,
  classifyFailure,
  toError
} from "../api/errors";
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
import { createFrameParser, readLines } from "./frameParser";

export const DEFAULT_RECONNECT_DELAY_MS = 1000;
export const DEFAULT_MAX_RECONNECT_DELAY_MS = 30_000;
export const MIN_STREAM_PAGE_SIZE = 200;
export const MAX_STREAM_PAGE_SIZE = 2000;

export interface ChatStreamOptions extends ChatLoopOptions {
  reconnectDelayMs?: number;
  maxReconnectDelayMs?: number;
}

export interface ChatStream extends ChatIngestionLoop {
  /** Wait before reopening after the server closes the stream, as last hinted by `retry:`. */
  reconnectDelayMs(): number;
}

/** The stream endpoint accepts 200..2000 results; anything else falls back to the default. */
export function streamPageSize(requested: number | undefined): number {
  if (
    requested === undefined ||
    requested < MIN_STREAM_PAGE_SIZE ||
    requested > MAX_STREAM_PAGE_SIZE
  ) {
    return DEFAULT_PAGE_SIZE;
  }
  return requested;
}

export function createChatStream(
  options: ChatStreamOptions,
  dependencies: ChatLoopDependencies
): ChatStream {
  const liveChatId = options.liveChatId;
  const initialReconnectDelayMs = options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS;
  const backoff = createBackoffConfig(options.backoff);
  const maxReconnectDelayMs = Math.max(
    options.maxReconnectDelayMs ?? DEFAULT_MAX_RECONNECT_DELAY_MS,
    backoff.maxDelayMs
  );
  const executor = dependencies.executor;
  const quotaLedger = dependencies.quotaLedger ?? null;
  const sleep = dependencies.sleep ?? sleepFor;
  const dispatcher = createDispatcher<IngestionEvents>(dependencies.dispatcher);
  const lifecycle = createLifecycle({
    name: "live chat stream",
    onFault: (fault) => dispatcher.dispatchError(toError(fault))
  });

  let cursor = options.initialCursor ?? null;
  let reconnectDelayMs = initialReconnectDelayMs;

  const buildRequest = (): ApiRequest => ({
    method: "GET",
    path: "liveChat/messages/stream",
    operation: "liveChatMessages.streamList",
    query: {
      liveChatId,
      part: CHAT_MESSAGE_PARTS,
      profileImageSize: options.profileImageSize ?? DEFAULT_PROFILE_IMAGE_SIZE,
      maxResults: streamPageSize(options.pageSize),
      hl: options.language ?? undefined,
      pageToken: cursor ?? undefined
    }
  });

  const handleFrame = (data: string): void => {
    let payload: unknown;
    try {
      payload = JSON.parse(data);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new ResponseParseError(`Invalid stream frame: ${detail}`);
    }

    const page = parseChatPage(payload);
    if (page.nextCursor !== null) {
      cursor = page.nextCursor;
    }

    if (page.offlineAt !== null) {
      throw new ChatEndedError(liveChatId);
    }

    dispatcher.dispatch("response", page);
    dispatchBatch(dispatcher, page.items);
  };

  /** Reads one connection until the server closes it. */
  const consume = async (signal: AbortSignal, onFrame: () => void): Promise<void> => {
    ensureQuotaAvailable(quotaLedger);
    const body = await executor.openStream(buildRequest(), signal);
    const parser = createFrameParser();

    for await (const line of readLines(body)) {
      const frame = parser.pushLine(line);
      if (frame === null) {
        continue;
      }

      if (frame.kind === "retry") {
        reconnectDelayMs = frame.delayMs;
        continue;
      }

      handleFrame(frame.data);
      onFrame();
    }
  };

  const run = async (signal: AbortSignal): Promise<void> => {
    dispatcher.dispatch("connect", undefined);
    let attempt = 0;

    try {
      while (!signal.aborted) {
        try {
          await consume(signal, () => {
            attempt = 0;
          });
        } catch (error) {
          const kind = classifyFailure(error, signal);
          if (kind === "cancelled") {
            return;
          }

          dispatcher.dispatchError(toError(error));

          if (kind === "ended") {
            return;
          }

          const delayMs =
            kind === "quota"
              ? reconnectDelayMs
              : retryDelayMs(error, attempt, backoff);
          if (kind !== "quota") {
            attempt += 1;
          }
          await sleep(Math.min(delayMs, maxReconnectDelayMs), signal);
          continue;
        }

        attempt = 0;
        await sleep(Math.min(reconnectDelayMs, maxReconnectDelayMs), signal);
      }
    } finally {
      dispatcher.dispatch("disconnect", undefined);
    }
  };

  return {
    transport: "stream",

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
        throw new AlreadyRunningError("live chat stream");
      }
      cursor = null;
      reconnectDelayMs = initialReconnectDelayMs;
    },

    reconnectDelayMs: () => reconnectDelayMs,

    on<K extends keyof IngestionEvents>(
      category: K,
      handler: Handler<IngestionEvents[K]>
    ): Unsubscribe {
      return dispatcher.subscribe(category, handler);
    },

    onError: (handler) => dispatcher.onError(handler)
  };
}

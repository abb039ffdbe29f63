import type { QueryResult, QueryResultRow } from "pg";

import type { ApiRequest, HttpExecutor } from "../src/api/httpExecutor";
import type { SleepLike } from "../src/core/sleep";

export function queryResult<R extends QueryResultRow>(rows: R[], command = "SELECT"): QueryResult<R> {
  return { command, rowCount: rows.length, oid: 0, fields: [], rows };
}

/** Records requested delays and yields one macrotask instead of waiting. */
export function createSleepRecorder(): { delays: number[]; sleep: SleepLike } {
  const delays: number[] = [];
  const sleep: SleepLike = async (ms) => {
    delays.push(ms);
    await new Promise<void>((resolve) => setImmediate(resolve));
  };
  return { delays, sleep };
}

export function abortError(): Error {
  const error = new Error("This operation was aborted");
  error.name = "AbortError";
  return error;
}

/** Pending until `signal` aborts, then rejects the way fetch does. */
export function hangUntilAborted(signal?: AbortSignal): Promise<never> {
  return new Promise<never>((_resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError());
      return;
    }
    signal?.addEventListener("abort", () => reject(abortError()), { once: true });
  });
}

export function streamOf(...chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    }
  });
}

export function jsonResponse(payload: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { "content-type": "application/json", ...headers }
  });
}

export function apiErrorResponse(
  status: number,
  reason: string,
  message: string,
  headers: Record<string, string> = {}
): Response {
  return jsonResponse({ error: { code: status, message, errors: [{ reason, message }] } }, status, headers);
}

const PUBLISHED_AT = "2026-03-01T12:00:00Z";

function author(channelId: string, displayName: string) {
  return {
    channelId,
    channelUrl: `http://www.youtube.com/channel/${channelId}`,
    displayName,
    profileImageUrl: `https://example.test/${channelId}.png`,
    isVerified: false,
    isChatOwner: false,
    isChatSponsor: true,
    isChatModerator: false
  };
}

export function textItem(id: string, text: string, channelId = "UC-alice") {
  return {
    kind: "youtube#liveChatMessage",
    id,
    snippet: {
      type: "textMessageEvent",
      liveChatId: "chat-1",
      authorChannelId: channelId,
      publishedAt: PUBLISHED_AT,
      displayMessage: text,
      textMessageDetails: { messageText: text }
    },
    authorDetails: author(channelId, "alice")
  };
}

export function superChatItem(id: string, amountMicros: string, comment: string) {
  return {
    id,
    snippet: {
      type: "superChatEvent",
      liveChatId: "chat-1",
      authorChannelId: "UC-bob",
      publishedAt: PUBLISHED_AT,
      displayMessage: comment,
      superChatDetails: {
        amountMicros,
        currency: "USD",
        amountDisplayString: "$5.00",
        userComment: comment,
        tier: 2
      }
    },
    authorDetails: author("UC-bob", "bob")
  };
}

export function deletedItem(id: string, deletedMessageId: string) {
  return {
    id,
    snippet: {
      type: "messageDeletedEvent",
      liveChatId: "chat-1",
      authorChannelId: "UC-mod",
      publishedAt: PUBLISHED_AT,
      displayMessage: "",
      messageDeletedDetails: { deletedMessageId }
    }
  };
}

export function bannedItem(id: string, bannedChannelId: string, banDurationSeconds = "300") {
  return {
    id,
    snippet: {
      type: "userBannedEvent",
      liveChatId: "chat-1",
      authorChannelId: "UC-mod",
      publishedAt: PUBLISHED_AT,
      displayMessage: "",
      userBannedDetails: {
        bannedUserDetails: {
          channelId: bannedChannelId,
          channelUrl: "",
          displayName: "troll",
          profileImageUrl: ""
        },
        banType: "temporary",
        banDurationSeconds
      }
    }
  };
}

export function unknownItem(id: string, type: string) {
  return {
    id,
    snippet: {
      type,
      liveChatId: "chat-1",
      authorChannelId: "UC-owner",
      publishedAt: PUBLISHED_AT,
      displayMessage: ""
    }
  };
}

export interface PagePayloadOptions {
  nextPageToken?: string;
  pollingIntervalMillis?: number;
  offlineAt?: string;
}

export function pagePayload(items: unknown[], options: PagePayloadOptions = {}) {
  return {
    kind: "youtube#liveChatMessageListResponse",
    pollingIntervalMillis: options.pollingIntervalMillis ?? 2000,
    nextPageToken: options.nextPageToken,
    offlineAt: options.offlineAt,
    pageInfo: { totalResults: items.length, resultsPerPage: items.length },
    items
  };
}

export function dataFrame(payload: unknown): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

export interface RecordedRequest {
  url: URL;
  method: string;
  headers: Headers;
  body: string | null;
  signal: AbortSignal | null;
}

export type FetchStep = (request: RecordedRequest) => Response | Promise<Response>;

/**
 * Replays `steps` in order: a Response is returned, an Error is thrown, a
 * function decides. Once the steps run out every request hangs until its
 * signal aborts.
 */
export function createFetchStub(steps: Array<Response | Error | FetchStep>) {
  const requests: RecordedRequest[] = [];
  const remaining = [...steps];

  const fetchImpl = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const request: RecordedRequest = {
      url: new URL(input instanceof Request ? input.url : String(input)),
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? init.body : null,
      signal: init?.signal ?? null
    };
    requests.push(request);

    const step = remaining.shift();
    if (step === undefined) {
      return hangUntilAborted(request.signal ?? undefined);
    }
    if (step instanceof Error) {
      throw step;
    }
    if (step instanceof Response) {
      return step;
    }
    return step(request);
  };

  return { fetchImpl, requests };
}

/**
 * Executor fake for the ingestion loops. `execute` replays payloads in order,
 * throwing the ones that are Errors; `openStream` does the same with bodies.
 * An exhausted script hangs until the caller aborts.
 */
export function createScriptedExecutor(
  executeSteps: unknown[] = [],
  streamSteps: Array<ReadableStream<Uint8Array> | Error> = []
) {
  const requests: ApiRequest[] = [];
  const pendingExecute = [...executeSteps];
  const pendingStreams = [...streamSteps];

  const executor: Pick<HttpExecutor, "execute" | "openStream"> = {
    async execute(request, signal) {
      requests.push(request);
      if (pendingExecute.length === 0) {
        return hangUntilAborted(signal);
      }
      const step = pendingExecute.shift();
      if (step instanceof Error) {
        throw step;
      }
      return step;
    },

    async openStream(request, signal) {
      requests.push(request);
      const step = pendingStreams.shift();
      if (step === undefined) {
        return hangUntilAborted(signal);
      }
      if (step instanceof Error) {
        throw step;
      }
      return step;
    }
  };

  return { executor, requests };
}

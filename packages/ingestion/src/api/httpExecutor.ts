import type { LiveChatConfig } from "../types";
import type { QuotaLedger } from "../core/quotaLedger";
import { DEFAULT_CACHE_TTL_MS } from "../core/responseCache";
import type { ResponseCache } from "../core/responseCache";
import {
  ApiError,
  ChatEndedError,
  QuotaExceededError,
  RateLimitError,
  RequestTimeoutError,
  ResponseParseError
} from "./errors";
import { isRecordLike } from "./responseParser";
import { parseRetryAfterMs } from "./retryPolicy";

export type FetchLike = typeof fetch;
export type QueryValue = string | number | boolean | null | undefined;

export interface ApiRequest {
  method: "GET" | "POST" | "DELETE";
  /** Path under the API base URL, without a leading slash. */
  path: string;
  /** Quota operation name, e.g. `liveChatMessages.list`. */
  operation: string;
  query?: Record<string, QueryValue>;
  body?: unknown;
  /** Lets a GET be answered from the response cache, when the executor has one. */
  cacheable?: boolean;
}

export interface HttpExecutor {
  /** Sends the request and returns the decoded JSON body (undefined when empty). */
  execute(request: ApiRequest, signal?: AbortSignal): Promise<unknown>;
  /** Opens a long-lived event-stream response and hands back its body. */
  openStream(request: ApiRequest, signal?: AbortSignal): Promise<ReadableStream<Uint8Array>>;
  setAccessToken(token: string | null): void;
  accessToken(): string | null;
}

export interface HttpExecutorDependencies {
  fetchImpl?: FetchLike;
  now?: () => number;
  quotaLedger?: QuotaLedger | null;
  cache?: ResponseCache<unknown> | null;
  cacheTtlMs?: number;
}

export type HttpExecutorConfig = Pick<
  LiveChatConfig,
  "apiBaseUrl" | "accessToken" | "apiKey" | "apiTimeoutMs"
>;

export const DEFAULT_RETRY_AFTER_MS = 1000;

const QUOTA_REASONS = new Set(["quotaExceeded", "dailyLimitExceeded"]);
const RATE_LIMIT_REASONS = new Set(["rateLimitExceeded", "userRateLimitExceeded"]);
const CHAT_ENDED_REASONS = new Set(["liveChatEnded", "liveChatDisabled"]);

function normalizeBaseUrl(apiBaseUrl: string): string {
  return apiBaseUrl.endsWith("/") ? apiBaseUrl : `${apiBaseUrl}/`;
}

function setQuery(params: URLSearchParams, request: ApiRequest): void {
  for (const [key, value] of Object.entries(request.query ?? {})) {
    if (value === undefined || value === null || value === "") {
      continue;
    }
    params.set(key, String(value));
  }
}

export function buildRequestUrl(apiBaseUrl: string, request: ApiRequest): URL {
  const url = new URL(request.path, normalizeBaseUrl(apiBaseUrl));
  setQuery(url.searchParams, request);
  return url;
}

/** `METHOD:path?query`, without credentials. */
export function cacheKey(request: ApiRequest): string {
  const params = new URLSearchParams();
  setQuery(params, request);
  const query = params.toString();
  return query ? `${request.method}:${request.path}?${query}` : `${request.method}:${request.path}`;
}

interface ErrorEnvelope {
  reason: string | null;
  message: string;
}

/** Reads `{ error: { message, errors: [{ reason }] } }`, tolerating anything else. */
export function parseErrorEnvelope(body: string): ErrorEnvelope {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return { reason: null, message: body };
  }

  const error = isRecordLike(parsed) ? parsed.error : null;
  if (!isRecordLike(error)) {
    return { reason: null, message: body };
  }

  const details = Array.isArray(error.errors) ? error.errors : [];
  const first: unknown = details[0];
  const reason =
    isRecordLike(first) && typeof first.reason === "string" ? first.reason : null;
  const message = typeof error.message === "string" ? error.message : body;

  return { reason, message };
}

/** Runs the request and `read` under one timeout; `signal` cancels both. */
async function fetchWithTimeout<T>(
  fetchImpl: FetchLike,
  requestUrl: URL,
  requestInit: RequestInit,
  timeoutMs: number,
  signal: AbortSignal | undefined,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const abortFromCaller = (): void => controller.abort(signal?.reason);
  let timedOut = false;

  if (signal?.aborted) {
    controller.abort(signal.reason);
  } else {
    signal?.addEventListener("abort", abortFromCaller, { once: true });
  }

  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  try {
    const response = await fetchImpl(requestUrl, {
      ...requestInit,
      signal: controller.signal
    });
    return await read(response);
  } catch (error) {
    if (timedOut && !signal?.aborted) {
      throw new RequestTimeoutError(timeoutMs);
    }

    throw error;
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener("abort", abortFromCaller);
  }
}

export function createHttpExecutor(
  config: HttpExecutorConfig,
  dependencies: HttpExecutorDependencies = {}
): HttpExecutor {
  const fetchImpl = dependencies.fetchImpl ?? fetch;
  const now = dependencies.now ?? Date.now;
  const quotaLedger = dependencies.quotaLedger ?? null;
  const cache = dependencies.cache ?? null;
  const cacheTtlMs = dependencies.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS;
  let accessToken = config.accessToken;

  const prepare = (
    request: ApiRequest,
    baseHeaders: Record<string, string>
  ): { url: URL; init: RequestInit } => {
    const url = buildRequestUrl(config.apiBaseUrl, request);
    const headers: Record<string, string> = { ...baseHeaders };

    if (accessToken) {
      headers.Authorization = `Bearer ${accessToken}`;
    } else if (config.apiKey) {
      url.searchParams.set("key", config.apiKey);
    }

    const init: RequestInit = { method: request.method, headers };
    if (request.body !== undefined) {
      headers["Content-Type"] = "application/json";
      init.body = JSON.stringify(request.body);
    }

    return { url, init };
  };

  const toResponseError = async (response: Response, request: ApiRequest): Promise<Error> => {
    const body = await response.text();
    const envelope = parseErrorEnvelope(body);

    if (envelope.reason !== null && QUOTA_REASONS.has(envelope.reason)) {
      const resetAt = quotaLedger?.resetAt() ?? new Date(now() + 24 * 60 * 60 * 1000);
      return new QuotaExceededError(
        quotaLedger?.used() ?? 0,
        quotaLedger?.limit() ?? 0,
        resetAt
      );
    }

    if (
      response.status === 429 ||
      (envelope.reason !== null && RATE_LIMIT_REASONS.has(envelope.reason))
    ) {
      const retryAfterMs =
        parseRetryAfterMs(response.headers.get("Retry-After"), now()) ??
        DEFAULT_RETRY_AFTER_MS;
      return new RateLimitError(retryAfterMs, envelope.message);
    }

    if (envelope.reason !== null && CHAT_ENDED_REASONS.has(envelope.reason)) {
      const liveChatId = request.query?.liveChatId;
      return new ChatEndedError(typeof liveChatId === "string" ? liveChatId : "");
    }

    return new ApiError(response.status, envelope.reason, envelope.message, body);
  };

  const send = async (request: ApiRequest, signal?: AbortSignal): Promise<unknown> => {
    const { url, init } = prepare(request, { Accept: "application/json" });

    return fetchWithTimeout<unknown>(fetchImpl, url, init, config.apiTimeoutMs, signal, async (response) => {
      quotaLedger?.add(request.operation);

      if (!response.ok) {
        throw await toResponseError(response, request);
      }

      const text = await response.text();
      if (text.trim().length === 0) {
        return undefined;
      }

      try {
        return JSON.parse(text);
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        throw new ResponseParseError(`Invalid JSON from ${request.operation}: ${detail}`);
      }
    });
  };

  // A write to a resource makes every cached read of it stale.
  const invalidate = (path: string): void => {
    if (!cache) {
      return;
    }
    for (const key of cache.keys()) {
      if (key === `GET:${path}` || key.startsWith(`GET:${path}?`)) {
        cache.delete(key);
      }
    }
  };

  return {
    async execute(request: ApiRequest, signal?: AbortSignal): Promise<unknown> {
      if (request.method !== "GET") {
        const payload = await send(request, signal);
        invalidate(request.path);
        return payload;
      }

      if (cache && request.cacheable) {
        return cache.getOrSetWithTtl(cacheKey(request), cacheTtlMs, () => send(request, signal));
      }

      return send(request, signal);
    },

    async openStream(
      request: ApiRequest,
      signal?: AbortSignal
    ): Promise<ReadableStream<Uint8Array>> {
      const { url, init } = prepare(request, {
        Accept: "text/event-stream",
        "Cache-Control": "no-cache"
      });

      // No timeout: the body stays open for as long as the caller's signal allows.
      const response = await fetchImpl(url, { ...init, signal });
      quotaLedger?.add(request.operation);

      if (!response.ok) {
        throw await toResponseError(response, request);
      }

      if (!response.body) {
        throw new ResponseParseError(`Empty stream body from ${request.operation}`);
      }

      return response.body;
    },

    setAccessToken(token: string | null): void {
      accessToken = token;
    },

    accessToken: () => accessToken
  };
}

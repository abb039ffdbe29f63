export class AlreadyRunningError extends Error {
  constructor(component = "live chat ingestion") {
    super(`${component} is already running`);
    this.name = "AlreadyRunningError";
  }
}

export class NotRunningError extends Error {
  constructor(component = "live chat bot") {
    super(`${component} is not running`);
    this.name = "NotRunningError";
  }
}

export class ApiError extends Error {
  readonly status: number;
  readonly reason: string | null;
  readonly body: string;

  constructor(status: number, reason: string | null, message: string, body = "") {
    super(
      reason
        ? `Live chat API request failed with status ${status} (${reason}): ${message}`
        : `Live chat API request failed with status ${status}${message ? `: ${message}` : ""}`
    );
    this.name = "ApiError";
    this.status = status;
    this.reason = reason;
    this.body = body;
  }
}

export class RateLimitError extends Error {
  readonly retryAfterMs: number;

  constructor(retryAfterMs: number, detail = "") {
    super(
      `Live chat API rate limited, retry after ${retryAfterMs}ms${detail ? `: ${detail}` : ""}`
    );
    this.name = "RateLimitError";
    this.retryAfterMs = retryAfterMs;
  }
}

export class QuotaExceededError extends Error {
  readonly used: number;
  readonly limit: number;
  readonly resetAt: Date;

  constructor(used: number, limit: number, resetAt: Date) {
    super(
      `Live chat API quota exceeded (${used}/${limit}), resets at ${resetAt.toISOString()}`
    );
    this.name = "QuotaExceededError";
    this.used = used;
    this.limit = limit;
    this.resetAt = resetAt;
  }
}

export class ChatEndedError extends Error {
  readonly liveChatId: string;

  constructor(liveChatId: string) {
    super(`Live chat ended: ${liveChatId}`);
    this.name = "ChatEndedError";
    this.liveChatId = liveChatId;
  }
}

export class ResponseParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResponseParseError";
  }
}

export class RequestTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Live chat API request timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}

export class HandlerError extends Error {
  readonly category: string;

  constructor(category: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${category} handler failed: ${detail}`, { cause });
    this.name = "HandlerError";
    this.category = category;
  }
}

export class TokenRefreshError extends Error {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`token refresh failed: ${detail}`, { cause });
    this.name = "TokenRefreshError";
  }
}

export type FailureKind = "ended" | "cancelled" | "quota" | "rate-limited" | "transient";

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

/**
 * Decides how an ingestion loop reacts to a failed attempt. An aborted
 * signal wins over whatever the failure looked like, since aborting the
 * in-flight request is how cancellation reaches fetch.
 */
export function classifyFailure(error: unknown, signal?: AbortSignal): FailureKind {
  if (signal?.aborted || isAbortError(error)) {
    return "cancelled";
  }

  if (error instanceof ChatEndedError) {
    return "ended";
  }

  if (error instanceof QuotaExceededError) {
    return "quota";
  }

  if (error instanceof RateLimitError) {
    return "rate-limited";
  }

  return "transient";
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

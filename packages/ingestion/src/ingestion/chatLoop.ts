import type { ChatPage, RawChatEvent, TransportMode, UserBannedDetails } from "../types";
import { MESSAGE_TYPES } from "../types";
import { QuotaExceededError, RateLimitError } from "../api/errors";
import type { HttpExecutor } from "../api/httpExecutor";
import type { BackoffConfig } from "../api/retryPolicy";
import { computeBackoffDelayMs } from "../api/retryPolicy";
import type { Dispatcher, DispatcherOptions, ErrorHandler, Handler, Unsubscribe } from "../core/dispatcher";
import type { LifecycleState } from "../core/lifecycle";
import type { QuotaLedger } from "../core/quotaLedger";
import type { SleepLike } from "../core/sleep";

export interface PollCompletion {
  count: number;
  nextIntervalMs: number;
}

/** Handler categories an ingestion loop dispatches to, with their payloads. */
export type IngestionEvents = {
  message: RawChatEvent;
  /** Id of the message that was removed. */
  delete: string;
  ban: UserBannedDetails;
  connect: undefined;
  disconnect: undefined;
  pollComplete: PollCompletion;
  response: ChatPage;
};

export interface ChatIngestionLoop {
  readonly transport: TransportMode;
  liveChatId(): string;
  start(signal?: AbortSignal): void;
  stop(): Promise<void>;
  isRunning(): boolean;
  state(): LifecycleState;
  cursor(): string | null;
  setCursor(cursor: string | null): void;
  resetCursor(): void;
  /** Clears the cursor and timing hints. Throws AlreadyRunningError while running. */
  reset(): void;
  on<K extends keyof IngestionEvents>(category: K, handler: Handler<IngestionEvents[K]>): Unsubscribe;
  onError(handler: ErrorHandler): Unsubscribe;
}

export interface ChatLoopOptions {
  liveChatId: string;
  pageSize?: number;
  profileImageSize?: number;
  language?: string | null;
  initialCursor?: string | null;
  backoff?: Partial<BackoffConfig>;
}

export interface ChatLoopDependencies {
  executor: Pick<HttpExecutor, "execute" | "openStream">;
  quotaLedger?: QuotaLedger | null;
  sleep?: SleepLike;
  dispatcher?: DispatcherOptions;
}

export const DEFAULT_PAGE_SIZE = 500;
export const DEFAULT_PROFILE_IMAGE_SIZE = 88;
export const CHAT_MESSAGE_PARTS = "id,snippet,authorDetails";

export function requireLiveChatId(liveChatId: string): void {
  if (liveChatId.trim().length === 0) {
    throw new Error("liveChatId is required to start live chat ingestion");
  }
}

/** Fails fast instead of spending a request the ledger already knows is over budget. */
export function ensureQuotaAvailable(quotaLedger: QuotaLedger | null): void {
  if (quotaLedger && quotaLedger.isExhausted()) {
    throw new QuotaExceededError(
      quotaLedger.used(),
      quotaLedger.limit(),
      quotaLedger.resetAt()
    );
  }
}

/** Backoff for `attempt`, stretched to the provider's Retry-After when rate limited. */
export function retryDelayMs(error: unknown, attempt: number, backoff: BackoffConfig): number {
  const delayMs = computeBackoffDelayMs(attempt, backoff);
  return error instanceof RateLimitError ? Math.max(delayMs, error.retryAfterMs) : delayMs;
}

/**
 * Hands each item to its category in arrival order. Deletions and bans go to
 * their own categories and never reach `message`.
 */
export function dispatchBatch(
  dispatcher: Dispatcher<IngestionEvents>,
  items: readonly RawChatEvent[]
): void {
  for (const item of items) {
    if (item.type === MESSAGE_TYPES.messageDeleted) {
      dispatcher.dispatch("delete", item.details.deletedMessageId);
    } else if (item.type === MESSAGE_TYPES.userBanned) {
      dispatcher.dispatch("ban", item.details);
    } else {
      dispatcher.dispatch("message", item);
    }
  }
}

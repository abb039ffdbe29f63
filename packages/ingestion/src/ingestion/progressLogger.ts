export interface ProgressLoggerOptions {
  intervalMs: number;
  transport: string;
  now?: () => number;
  log?: (message: string) => void;
}

export interface ProgressLogger {
  /** One fetched page (poll) or frame (stream) carrying `itemCount` chat items. */
  onBatch: (itemCount: number, cursor: string | null) => void;
  onError: () => void;
  onQuota: (used: number, limit: number) => void;
  flush: () => void;
}

export function createProgressLogger(options: ProgressLoggerOptions): ProgressLogger {
  const now = options.now ?? Date.now;
  const log = options.log ?? console.log;
  const intervalMs = Math.max(1, options.intervalMs);

  const startedAtMs = now();
  let lastLoggedAtMs = startedAtMs;
  let batches = 0;
  let messages = 0;
  let errors = 0;
  let quotaUsed = 0;
  let quotaLimit = 0;
  let latestCursor: string | null = null;

  const maybeLog = (force: boolean): void => {
    const currentMs = now();

    if (!force && currentMs - lastLoggedAtMs < intervalMs) {
      return;
    }

    const elapsedSeconds = Math.max(0.001, (currentMs - startedAtMs) / 1000);
    const messagesPerSecond = messages / elapsedSeconds;

    log(
      `live chat progress (transport=${options.transport}, batches=${batches}, messages=${messages}, mps=${messagesPerSecond.toFixed(1)}, errors=${errors}, quota=${quotaUsed}/${quotaLimit}, cursor=${latestCursor ?? "null"})`
    );

    lastLoggedAtMs = currentMs;
  };

  return {
    onBatch(itemCount: number, cursor: string | null): void {
      batches += 1;
      messages += itemCount;
      latestCursor = cursor;
      maybeLog(false);
    },
    onError(): void {
      errors += 1;
      maybeLog(false);
    },
    onQuota(used: number, limit: number): void {
      quotaUsed = used;
      quotaLimit = limit;
    },
    flush(): void {
      maybeLog(true);
    }
  };
}

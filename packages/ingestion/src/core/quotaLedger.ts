export const DEFAULT_DAILY_QUOTA = 10_000;
export const DEFAULT_QUOTA_TIME_ZONE = "America/Los_Angeles";

/** Units charged per call, keyed by the operation name the executor reports. */
export const QUOTA_COSTS: Readonly<Record<string, number>> = {
  "liveChatMessages.list": 5,
  "liveChatMessages.insert": 50,
  "liveChatMessages.delete": 50,
  "liveChatMessages.streamList": 1,
  "liveChatBans.insert": 50,
  "liveChatBans.delete": 50,
  "liveChatModerators.insert": 50,
  "liveChatModerators.delete": 50,
  "liveChatModerators.list": 50,
  "videos.list": 1,
  "channels.list": 1,
  "search.list": 100,
  "liveBroadcasts.list": 1
};

export const UNKNOWN_OPERATION_COST = 1;

export function operationCost(operation: string): number {
  return QUOTA_COSTS[operation] ?? UNKNOWN_OPERATION_COST;
}

/** Units a batch of calls would cost, given a count per operation. Charges nothing. */
export function estimateCost(callCounts: Readonly<Record<string, number>>): number {
  let total = 0;
  for (const [operation, count] of Object.entries(callCounts)) {
    total += operationCost(operation) * count;
  }
  return total;
}

export type UsageListener = (used: number, limit: number) => void;

export interface QuotaLedger {
  /** Charges one call of `operation` and returns the running total. */
  add(operation: string): number;
  addCost(units: number): number;
  used(): number;
  limit(): number;
  remaining(): number;
  isExhausted(): boolean;
  resetAt(): Date;
  reset(): void;
  onUsageChange(listener: UsageListener): () => void;
}

export interface QuotaLedgerOptions {
  limit?: number;
  timeZone?: string;
  now?: () => number;
}

interface ZonedFields {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function createZonedFormatter(timeZone: string): Intl.DateTimeFormat {
  return new Intl.DateTimeFormat("en-US", {
    timeZone,
    hourCycle: "h23",
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit"
  });
}

function readZonedFields(formatter: Intl.DateTimeFormat, epochMs: number): ZonedFields {
  const fields: ZonedFields = { year: 0, month: 0, day: 0, hour: 0, minute: 0, second: 0 };

  for (const part of formatter.formatToParts(new Date(epochMs))) {
    switch (part.type) {
      case "year":
      case "month":
      case "day":
      case "hour":
      case "minute":
      case "second":
        fields[part.type] = Number.parseInt(part.value, 10);
        break;
      default:
        break;
    }
  }

  return fields;
}

function zoneOffsetMs(formatter: Intl.DateTimeFormat, epochMs: number): number {
  const wholeSecondMs = Math.floor(epochMs / 1000) * 1000;
  const fields = readZonedFields(formatter, wholeSecondMs);
  const wallClockAsUtc = Date.UTC(
    fields.year,
    fields.month - 1,
    fields.day,
    fields.hour,
    fields.minute,
    fields.second
  );

  return wallClockAsUtc - wholeSecondMs;
}

/** The first instant after `nowMs` at which the wall clock in `timeZone` reads 00:00. */
export function nextMidnightInTimeZone(nowMs: number, timeZone: string): Date {
  const formatter = createZonedFormatter(timeZone);
  const today = readZonedFields(formatter, nowMs);
  const midnightAsUtc = Date.UTC(today.year, today.month - 1, today.day + 1);

  // Second pass picks up an offset change (DST) between now and midnight.
  const firstGuess = midnightAsUtc - zoneOffsetMs(formatter, nowMs);
  return new Date(midnightAsUtc - zoneOffsetMs(formatter, firstGuess));
}

export function createQuotaLedger(options: QuotaLedgerOptions = {}): QuotaLedger {
  const limit = options.limit ?? DEFAULT_DAILY_QUOTA;
  const timeZone = options.timeZone ?? DEFAULT_QUOTA_TIME_ZONE;
  const now = options.now ?? Date.now;
  const listeners = new Map<number, UsageListener>();
  let nextListenerId = 0;

  let used = 0;
  let resetAt = nextMidnightInTimeZone(now(), timeZone);

  const rollOver = (): void => {
    const currentMs = now();
    if (currentMs > resetAt.getTime()) {
      used = 0;
      resetAt = nextMidnightInTimeZone(currentMs, timeZone);
    }
  };

  const notify = (): void => {
    for (const listener of Array.from(listeners.values())) {
      listener(used, limit);
    }
  };

  const addCost = (units: number): number => {
    rollOver();
    used += units;
    const total = used;
    notify();
    return total;
  };

  return {
    add: (operation) => addCost(operationCost(operation)),

    addCost,

    used() {
      rollOver();
      return used;
    },

    limit: () => limit,

    remaining() {
      rollOver();
      return Math.max(0, limit - used);
    },

    isExhausted() {
      rollOver();
      return used >= limit;
    },

    resetAt() {
      rollOver();
      return new Date(resetAt.getTime());
    },

    reset() {
      used = 0;
      resetAt = nextMidnightInTimeZone(now(), timeZone);
      notify();
    },

    onUsageChange(listener) {
      const id = nextListenerId;
      nextListenerId += 1;
      listeners.set(id, listener);

      return () => {
        listeners.delete(id);
      };
    }
  };
}

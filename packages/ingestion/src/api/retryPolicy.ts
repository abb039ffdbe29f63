export interface BackoffConfig {
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  /** Fraction of the capped delay added or removed at random, 0..1. */
  jitter: number;
  /** Uniform source on [0, 1). */
  random: () => number;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  multiplier: 2,
  jitter: 0.2,
  random: Math.random
};

export function createBackoffConfig(
  overrides: Partial<BackoffConfig> = {}
): BackoffConfig {
  return { ...DEFAULT_BACKOFF, ...overrides };
}

/**
 * Delay before retry number `attempt` (0-indexed): base * multiplier^attempt,
 * capped at maxDelayMs, then moved by up to ±jitter of the capped value.
 */
export function computeBackoffDelayMs(
  attempt: number,
  config: BackoffConfig
): number {
  const exponential =
    config.baseDelayMs * config.multiplier ** Math.max(0, attempt);
  const capped = Math.min(config.maxDelayMs, exponential);
  const jitterRange = capped * config.jitter;
  const jitter = (config.random() * 2 - 1) * jitterRange;

  return Math.max(0, Math.round(capped + jitter));
}

export function parseRetryAfterMs(
  retryAfterHeader: string | null,
  nowMs: number
): number | null {
  if (!retryAfterHeader) {
    return null;
  }

  const trimmed = retryAfterHeader.trim();

  if (trimmed.length === 0) {
    return null;
  }

  if (/^\d+$/.test(trimmed)) {
    const seconds = Number.parseInt(trimmed, 10);
    return Math.max(0, seconds * 1000);
  }

  const retryDateMs = Date.parse(trimmed);
  if (Number.isNaN(retryDateMs)) {
    return null;
  }

  return Math.max(0, retryDateMs - nowMs);
}

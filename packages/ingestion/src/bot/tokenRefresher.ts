import { TokenRefreshError, isAbortError } from "../api/errors";
import { createLifecycle } from "../core/lifecycle";
import type { LifecycleState } from "../core/lifecycle";
import type { SleepLike } from "../core/sleep";
import { sleepFor } from "../core/sleep";

export const DEFAULT_TOKEN_REFRESH_INTERVAL_MS = 45 * 60 * 1000;

export interface TokenProvider {
  accessToken(signal?: AbortSignal): Promise<string>;
}

/** Hands out one configured token; acquiring credentials happens elsewhere. */
export function createStaticTokenProvider(token: string): TokenProvider {
  return {
    accessToken: async () => token
  };
}

export interface TokenRefresherOptions {
  intervalMs: number;
  provider: TokenProvider;
  onToken: (token: string) => void;
  onError: (error: TokenRefreshError) => void;
  sleep?: SleepLike;
}

export interface TokenRefresher {
  start(signal?: AbortSignal): void;
  stop(): Promise<void>;
  state(): LifecycleState;
}

export function createTokenRefresher(options: TokenRefresherOptions): TokenRefresher {
  const sleep = options.sleep ?? sleepFor;
  const lifecycle = createLifecycle({
    name: "token refresher",
    onFault: (fault) => options.onError(new TokenRefreshError(fault))
  });

  const run = async (signal: AbortSignal): Promise<void> => {
    while (!signal.aborted) {
      await sleep(options.intervalMs, signal);
      if (signal.aborted) {
        return;
      }

      try {
        options.onToken(await options.provider.accessToken(signal));
      } catch (error) {
        if (signal.aborted || isAbortError(error)) {
          return;
        }
        options.onError(new TokenRefreshError(error));
      }
    }
  };

  return {
    start(signal?: AbortSignal): void {
      lifecycle.start(run, signal);
    },
    stop: () => lifecycle.stop(),
    state: () => lifecycle.state()
  };
}

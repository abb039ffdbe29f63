import { AlreadyRunningError } from "../api/errors";

export type LifecycleState = "stopped" | "starting" | "running" | "stopping";

export interface Lifecycle {
  state(): LifecycleState;
  isRunning(): boolean;
  /**
   * Launches `run` on a fresh abort signal. Throws AlreadyRunningError unless
   * stopped. Aborting `parentSignal` has the same effect as calling stop().
   */
  start(run: (signal: AbortSignal) => Promise<void>, parentSignal?: AbortSignal): void;
  /** Aborts the current run and resolves once it has returned. */
  stop(): Promise<void>;
}

export interface LifecycleOptions {
  name: string;
  /** Receives a rejection escaping `run`. */
  onFault?: (fault: unknown) => void;
}

interface Session {
  controller: AbortController;
  done: Promise<void>;
}

export function createLifecycle(options: LifecycleOptions): Lifecycle {
  const onFault =
    options.onFault ??
    ((fault: unknown) => {
      console.error(`${options.name} exited with an error`, fault);
    });

  let currentState: LifecycleState = "stopped";
  let current: Session | null = null;

  return {
    state: () => currentState,

    isRunning: () => currentState === "running",

    start(run: (signal: AbortSignal) => Promise<void>, parentSignal?: AbortSignal): void {
      if (currentState !== "stopped") {
        throw new AlreadyRunningError(options.name);
      }

      currentState = "starting";
      const controller = new AbortController();
      const abortFromParent = (): void => controller.abort();

      if (parentSignal?.aborted) {
        controller.abort();
      } else {
        parentSignal?.addEventListener("abort", abortFromParent, { once: true });
      }

      const session: Session = {
        controller,
        done: Promise.resolve()
      };

      // Deferred so that the run observes the running state from its first step.
      session.done = Promise.resolve()
        .then(() => run(controller.signal))
        .then(undefined, onFault)
        .finally(() => {
          parentSignal?.removeEventListener("abort", abortFromParent);
          if (current === session) {
            current = null;
            currentState = "stopped";
          }
        });

      current = session;
      currentState = "running";
    },

    async stop(): Promise<void> {
      const session = current;
      if (!session) {
        return;
      }

      if (currentState === "running") {
        currentState = "stopping";
        session.controller.abort();
      }

      await session.done;
    }
  };
}

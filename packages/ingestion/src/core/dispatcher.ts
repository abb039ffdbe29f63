import { HandlerError } from "../api/errors";

export type Handler<Payload> = (payload: Payload) => unknown;
export type ErrorHandler = (error: Error) => unknown;
export type Unsubscribe = () => void;

/**
 * Fan-out of typed payloads to registered handlers, one registry per
 * category. Events maps each category name to the payload its handlers take;
 * the `error` category is built in and receives handler faults.
 */
export interface Dispatcher<Events extends object> {
  subscribe<K extends keyof Events>(category: K, handler: Handler<Events[K]>): Unsubscribe;
  onError(handler: ErrorHandler): Unsubscribe;
  dispatch<K extends keyof Events>(category: K, payload: Events[K]): void;
  dispatchError(error: Error): void;
  handlerCount(category: keyof Events | "error"): number;
  clear(): void;
}

export interface DispatcherOptions {
  /** Receives faults raised by error handlers themselves, which are not re-dispatched. */
  onUnhandledFault?: (fault: unknown) => void;
}

type Registry<Events> = {
  [K in keyof Events]?: Map<number, Handler<Events[K]>>;
};

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

export function createDispatcher<Events extends object>(
  options: DispatcherOptions = {}
): Dispatcher<Events> {
  const onUnhandledFault = options.onUnhandledFault ?? (() => undefined);
  let registry: Registry<Events> = {};
  const errorHandlers = new Map<number, ErrorHandler>();
  let nextId = 0;

  const runGuarded = (invoke: () => unknown, onFault: (fault: unknown) => void): void => {
    try {
      const result = invoke();
      if (isPromiseLike(result)) {
        result.then(undefined, onFault);
      }
    } catch (fault) {
      onFault(fault);
    }
  };

  const dispatchError = (error: Error): void => {
    for (const handler of Array.from(errorHandlers.values())) {
      runGuarded(() => handler(error), onUnhandledFault);
    }
  };

  return {
    subscribe<K extends keyof Events>(category: K, handler: Handler<Events[K]>): Unsubscribe {
      let handlers: Map<number, Handler<Events[K]>> | undefined = registry[category];
      if (!handlers) {
        handlers = new Map<number, Handler<Events[K]>>();
        registry[category] = handlers;
      }

      const id = nextId;
      nextId += 1;
      handlers.set(id, handler);

      const owner = handlers;
      return () => {
        owner.delete(id);
      };
    },

    onError(handler: ErrorHandler): Unsubscribe {
      const id = nextId;
      nextId += 1;
      errorHandlers.set(id, handler);

      return () => {
        errorHandlers.delete(id);
      };
    },

    dispatch<K extends keyof Events>(category: K, payload: Events[K]): void {
      const handlers = registry[category];
      if (!handlers || handlers.size === 0) {
        return;
      }

      // Handlers added or removed while this dispatch runs take effect next time.
      const snapshot = Array.from(handlers.values());
      for (const handler of snapshot) {
        runGuarded(
          () => handler(payload),
          (fault) => dispatchError(new HandlerError(String(category), fault))
        );
      }
    },

    dispatchError,

    handlerCount(category: keyof Events | "error"): number {
      if (category === "error") {
        return errorHandlers.size;
      }

      return registry[category]?.size ?? 0;
    },

    clear(): void {
      registry = {};
      errorHandlers.clear();
    }
  };
}

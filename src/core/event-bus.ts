/**
 * Typed event emitter. Each Interpreter owns one, so listeners only ever see
 * the runs of the interpreter they subscribed to.
 */

import type { IRunEventMap, RunEventName } from "../types/run.js";
import { logger } from "../utils/logger.js";

type EventHandler<T> = (data: T) => void;

type ListenerMap = {
  [K in RunEventName]?: Set<EventHandler<IRunEventMap[K]>>;
};

export class EventBus {
  private listeners: ListenerMap = {};

  on<K extends RunEventName>(event: K, handler: EventHandler<IRunEventMap[K]>): () => void {
    const handlers: Set<EventHandler<IRunEventMap[K]>> = this.listeners[event] ?? new Set();
    handlers.add(handler);
    const listeners: { [P in K]?: Set<EventHandler<IRunEventMap[P]>> } = this.listeners;
    listeners[event] = handlers;

    // Return unsubscribe function
    return () => {
      handlers.delete(handler);
    };
  }

  once<K extends RunEventName>(event: K, handler: EventHandler<IRunEventMap[K]>): () => void {
    const unsubscribe = this.on(event, (data) => {
      unsubscribe();
      handler(data);
    });
    return unsubscribe;
  }

  emit<K extends RunEventName>(event: K, data: IRunEventMap[K]): void {
    const handlers = this.listeners[event];
    if (!handlers) {
      return;
    }
    for (const handler of [...handlers]) {
      try {
        handler(data);
      } catch (error: unknown) {
        // A failing listener must not break the run
        logger.warn(
          { event, error: error instanceof Error ? error.message : String(error) },
          "Event listener threw",
        );
      }
    }
  }

  removeAllListeners(event?: RunEventName): void {
    if (event) {
      delete this.listeners[event];
    } else {
      this.listeners = {};
    }
  }

  listenerCount(event: RunEventName): number {
    return this.listeners[event]?.size ?? 0;
  }
}

/**
 * Typed event emitter shared by the runtime components.
 * One instance per runtime, created by the composition root.
 */

import { logger } from "../utils/logger.js";

type EventHandler<T = unknown> = (data: T) => void;

interface IEventMap {
  "skill:registered": { skillId: string; triggers: readonly string[]; replaced: boolean };
  "skill:unregistered": { skillId: string };
  "skill:routed": { skillId: string; ok: boolean; durationMs: number };
  "definitions:loaded": { version: string | undefined; skillIds: readonly string[] };
  "hub:idle": { idle: boolean };
  "hub:connection": { key: string; connected: boolean };
  "session:created": { skillId: string };
  "session:evicted": { skillId: string };
  "update:applied": { version: string; skillIds: readonly string[] };
  "update:rejected": { reason: string };
}

type EventName = keyof IEventMap;

export class EventBus {
  private readonly listeners = new Map<EventName, Set<EventHandler<never>>>();

  on<K extends EventName>(event: K, handler: EventHandler<IEventMap[K]>): () => void {
    const handlers = this.listeners.get(event) ?? new Set();
    handlers.add(handler);
    this.listeners.set(event, handlers);

    return () => {
      handlers.delete(handler);
      if (handlers.size === 0) {
        this.listeners.delete(event);
      }
    };
  }

  once<K extends EventName>(event: K, handler: EventHandler<IEventMap[K]>): () => void {
    const wrappedHandler: EventHandler<IEventMap[K]> = (data) => {
      unsubscribe();
      handler(data);
    };
    const unsubscribe = this.on(event, wrappedHandler);
    return unsubscribe;
  }

  emit<K extends EventName>(event: K, data: IEventMap[K]): void {
    const handlers = this.listeners.get(event);
    if (!handlers) {
      return;
    }
    for (const handler of handlers) {
      try {
        (handler as EventHandler<IEventMap[K]>)(data);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error({ event, error: message }, "Event handler failed");
      }
    }
  }

  removeAllListeners(event?: EventName): void {
    if (event) {
      this.listeners.delete(event);
    } else {
      this.listeners.clear();
    }
  }

  listenerCount(event: EventName): number {
    return this.listeners.get(event)?.size ?? 0;
  }
}

export type { IEventMap, EventName };

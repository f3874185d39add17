/**
 * @fileoverview Typed EventEmitter used by the reconciliation services.
 *
 * Event names and payload tuples come from an event map interface, so
 * `emit('changed', snapshot)` and `on('changed', (snapshot) => ...)` are
 * checked at compile time. Listener exceptions are caught and logged so one
 * faulty observer cannot break notification delivery to the others.
 *
 * Usage:
 *   interface ProviderEvents extends Record<string, unknown[]> {
 *     changed: [StatusSnapshot];
 *   }
 *   class Provider extends EventEmitter<ProviderEvents> {}
 */

export type DefaultEventMap = Record<string, unknown[]>;

export type EventListener<TEventMap extends Record<string, unknown[]>, TEventName extends keyof TEventMap> = (
  ...args: TEventMap[TEventName]
) => void;

type ListenerTable<TEventMap extends Record<string, unknown[]>> = {
  [TEventName in keyof TEventMap]?: Array<EventListener<TEventMap, TEventName>>;
};

export class EventEmitter<TEventMap extends Record<string, unknown[]> = DefaultEventMap> {
  private listeners: ListenerTable<TEventMap> = {};

  on<TEventName extends keyof TEventMap>(
    event: TEventName,
    listener: EventListener<TEventMap, TEventName>
  ): this {
    const existing = this.listeners[event];
    if (existing) {
      existing.push(listener);
    } else {
      this.listeners[event] = [listener];
    }
    return this;
  }

  once<TEventName extends keyof TEventMap>(
    event: TEventName,
    listener: EventListener<TEventMap, TEventName>
  ): this {
    const onceWrapper: EventListener<TEventMap, TEventName> = (...args) => {
      this.off(event, onceWrapper);
      listener(...args);
    };
    return this.on(event, onceWrapper);
  }

  off<TEventName extends keyof TEventMap>(
    event: TEventName,
    listener: EventListener<TEventMap, TEventName>
  ): this {
    const existing = this.listeners[event];
    if (!existing) {
      return this;
    }
    const index = existing.indexOf(listener);
    if (index !== -1) {
      existing.splice(index, 1);
    }
    if (existing.length === 0) {
      delete this.listeners[event];
    }
    return this;
  }

  emit<TEventName extends keyof TEventMap>(event: TEventName, ...args: TEventMap[TEventName]): boolean {
    const existing = this.listeners[event];
    if (!existing || existing.length === 0) {
      return false;
    }
    // Copy so listeners may unsubscribe while being notified
    for (const listener of [...existing]) {
      try {
        listener(...args);
      } catch (error) {
        console.error(`Error in event listener for "${String(event)}":`, error);
      }
    }
    return true;
  }

  removeAllListeners<TEventName extends keyof TEventMap>(event?: TEventName): this {
    if (event !== undefined) {
      delete this.listeners[event];
    } else {
      this.listeners = {};
    }
    return this;
  }

  listenerCount<TEventName extends keyof TEventMap>(event: TEventName): number {
    return this.listeners[event]?.length ?? 0;
  }
}

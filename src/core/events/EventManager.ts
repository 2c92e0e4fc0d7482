import type { Event } from './Event';
import type { Logs } from '../logging/types';

export type EventCallback = (event: Event) => unknown;

export type ListenerOptions = { priority?: number };

export type ListenerDefinition = EventCallback | { callable: EventCallback; priority?: number };

/** Objects that subscribe a set of callbacks at once. */
export interface EventListener {
  implementedEvents(): Record<string, ListenerDefinition>;
}

type Registration = { callback: EventCallback; priority: number; order: number };

export const DEFAULT_PRIORITY = 10;

export const isEventListener = (value: unknown): value is EventListener =>
  typeof value === 'object' && value !== null && 'implementedEvents' in value && typeof value.implementedEvents === 'function';

export class EventManager {
  private handlers = new Map<string, Registration[]>();
  private registered = 0;

  constructor(private logger?: Logs) {}

  /** Register a callback for one event, or every callback of a listener object. */
  on(listener: EventListener): this;
  on(name: string, callback: EventCallback, options?: ListenerOptions): this;
  on(nameOrListener: string | EventListener, callback?: EventCallback, options: ListenerOptions = {}): this {
    if (isEventListener(nameOrListener)) {
      for (const [name, definition] of Object.entries(nameOrListener.implementedEvents())) {
        if (typeof definition === 'function') this.attach(name, definition, DEFAULT_PRIORITY);
        else this.attach(name, definition.callable, definition.priority ?? DEFAULT_PRIORITY);
      }
      return this;
    }

    if (callback) this.attach(nameOrListener, callback, options.priority ?? DEFAULT_PRIORITY);
    return this;
  }

  off(name: string, callback?: EventCallback): this {
    if (!callback) {
      this.handlers.delete(name);
      return this;
    }

    const remaining = (this.handlers.get(name) ?? []).filter((r) => r.callback !== callback);
    if (remaining.length > 0) this.handlers.set(name, remaining);
    else this.handlers.delete(name);

    return this;
  }

  listeners(name: string): EventCallback[] {
    return (this.handlers.get(name) ?? []).map((r) => r.callback);
  }

  listenerCount(name: string): number {
    return this.handlers.get(name)?.length ?? 0;
  }

  /**
   * Runs listeners in ascending priority (registration order within a
   * priority). A listener returning `false` stops propagation.
   */
  dispatch<E extends Event>(event: E): E {
    const registrations = this.handlers.get(event.name) ?? [];

    this.logger?.debug('events', { event: event.name, listeners: registrations.length }, 'Dispatching event');

    for (const { callback } of registrations) {
      if (event.isStopped()) break;

      const result = callback(event);

      if (result === false) event.stopPropagation();
      if (result !== undefined) event.result = result;
    }

    return event;
  }

  private attach(name: string, callback: EventCallback, priority: number): void {
    const list = this.handlers.get(name) ?? [];
    list.push({ callback, priority, order: this.registered++ });
    list.sort((a, b) => a.priority - b.priority || a.order - b.order);
    this.handlers.set(name, list);
  }
}

import { Event } from '../core/events/Event';
import { EventManager } from '../core/events/EventManager';

import type { EventData } from '../core/events/Event';
import type { Logs } from '../core/logging/types';
import type { DispatcherFilter } from './DispatcherFilter';

/**
 * Carries the dispatcher filter chain and the event manager the dispatch
 * events run through. Filters are only subscribed by whoever runs a dispatch.
 */
export class Dispatcher {
  readonly events: EventManager;
  private chain: DispatcherFilter[] = [];

  constructor(logger?: Logs) {
    this.events = new EventManager(logger);
  }

  addFilter(filter: DispatcherFilter): this {
    this.chain.push(filter);
    return this;
  }

  filters(): DispatcherFilter[] {
    return [...this.chain];
  }

  dispatchEvent(name: string, data: EventData = {}): Event<Dispatcher> {
    return this.events.dispatch(new Event(name, this, data));
  }
}

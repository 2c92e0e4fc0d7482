import { EVENTS } from '../constants';
import { DEFAULT_PRIORITY } from '../core/events/EventManager';
import { ServerRequest } from '../core/http/ServerRequest';
import { ServerResponse } from '../core/http/ServerResponse';

import type { Event } from '../core/events/Event';
import type { EventListener, ListenerDefinition } from '../core/events/EventManager';

export type DispatchData = { request: ServerRequest; response: ServerResponse };

export type DispatcherFilterOptions = {
  priority?: number;
  /** Only run for request paths starting with this prefix. */
  for?: string;
  when?: (data: DispatchData) => boolean;
};

type Phase = 'beforeDispatch' | 'afterDispatch';

/**
 * Hooks into `Dispatcher.beforeDispatch` / `Dispatcher.afterDispatch`. A hook
 * returning a `ServerResponse` replaces the response carried by the event.
 */
export abstract class DispatcherFilter implements EventListener {
  readonly priority: number;

  constructor(protected readonly options: DispatcherFilterOptions = {}) {
    this.priority = options.priority ?? DEFAULT_PRIORITY;
  }

  beforeDispatch?(data: DispatchData, event: Event): ServerResponse | void;
  afterDispatch?(data: DispatchData, event: Event): ServerResponse | void;

  implementedEvents(): Record<string, ListenerDefinition> {
    return {
      [EVENTS.beforeDispatch]: { callable: (event) => this.handle('beforeDispatch', event), priority: this.priority },
      [EVENTS.afterDispatch]: { callable: (event) => this.handle('afterDispatch', event), priority: this.priority },
    };
  }

  matches({ request, response }: DispatchData): boolean {
    if (this.options.for !== undefined && !request.path.startsWith(this.options.for)) return false;
    return this.options.when ? this.options.when({ request, response }) : true;
  }

  private handle(phase: Phase, event: Event): ServerResponse | undefined {
    const { request, response } = event.data;
    if (!(request instanceof ServerRequest) || !(response instanceof ServerResponse)) return undefined;

    const data = { request, response };
    if (!this.matches(data)) return undefined;

    const result = phase === 'beforeDispatch' ? this.beforeDispatch?.(data, event) : this.afterDispatch?.(data, event);
    if (!(result instanceof ServerResponse)) return undefined;

    event.data.response = result;
    return result;
  }
}

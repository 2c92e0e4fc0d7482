import { EVENTS } from '../constants';

import type { Event } from '../core/events/Event';
import type { EventListener, ListenerDefinition } from '../core/events/EventManager';
import type { Controller } from './Controller';

export type ComponentConstructor = new (controller: Controller, config?: Record<string, unknown>) => Component;

/**
 * Reusable controller behaviour. Each lifecycle hook a subclass defines is
 * subscribed to the matching controller event when the component is loaded.
 */
export abstract class Component implements EventListener {
  constructor(
    protected readonly controller: Controller,
    readonly config: Record<string, unknown> = {},
  ) {}

  beforeFilter?(event: Event): unknown;
  startup?(event: Event): unknown;
  beforeRender?(event: Event): unknown;
  shutdown?(event: Event): unknown;

  implementedEvents(): Record<string, ListenerDefinition> {
    const events: Record<string, ListenerDefinition> = {};

    if (this.beforeFilter) events[EVENTS.controllerInitialize] = (event) => this.beforeFilter?.(event);
    if (this.startup) events[EVENTS.controllerStartup] = (event) => this.startup?.(event);
    if (this.beforeRender) events[EVENTS.controllerBeforeRender] = (event) => this.beforeRender?.(event);
    if (this.shutdown) events[EVENTS.controllerShutdown] = (event) => this.shutdown?.(event);

    return events;
  }
}

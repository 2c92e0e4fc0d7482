import { EVENTS } from '../constants';
import { MissingComponentError } from '../core/errors/AppError';
import { Event } from '../core/events/Event';
import { EventManager } from '../core/events/EventManager';
import { ServerRequest } from '../core/http/ServerRequest';
import { ServerResponse } from '../core/http/ServerResponse';
import { pluginSplit } from '../utils/Inflector';
import { ViewBuilder } from '../view/ViewBuilder';

import type { Framework } from '../core/config/types';
import type { EventData } from '../core/events/Event';
import type { EventListener, ListenerDefinition } from '../core/events/EventManager';
import type { Logs } from '../core/logging/types';
import type { View } from '../view/View';
import type { Component } from './Component';

export type ControllerInit = {
  framework: Framework;
  request?: ServerRequest;
  response?: ServerResponse;
  events?: EventManager;
};

export type ControllerConstructor = new (init: ControllerInit) => Controller;

/**
 * Owns the request/response pair for one request and renders views for it.
 *
 * The controller subscribes itself to its own lifecycle events:
 * `Controller.initialize` runs `beforeFilter`, `Controller.beforeRender` runs
 * `beforeRender` and `Controller.shutdown` runs `afterFilter`. Components
 * loaded in `initialize()` subscribe their hooks after it.
 */
export class Controller implements EventListener {
  readonly name: string;
  request: ServerRequest;
  response: ServerResponse;
  readonly events: EventManager;
  helpers: string[] = [];
  viewVars: Record<string, unknown> = {};

  protected readonly framework: Framework;
  protected readonly logger: Logs;
  private builder?: ViewBuilder;
  private plugin?: string;
  private components = new Map<string, Component>();

  constructor({ framework, request, response, events }: ControllerInit) {
    this.framework = framework;
    this.logger = framework.logger;
    this.name = new.target.name.replace(/Controller$/, '');
    this.request = request ?? new ServerRequest();
    this.response = response ?? new ServerResponse();
    this.events = events ?? new EventManager(framework.logger);
    this.plugin = this.request.getParam('plugin');

    this.events.on(this);
    this.initialize();
  }

  /** Hook for loading components; runs at the end of construction. */
  initialize(): void {}

  beforeFilter(_event: Event): ServerResponse | void {}

  beforeRender(_event: Event): ServerResponse | void {}

  afterFilter(_event: Event): ServerResponse | void {}

  implementedEvents(): Record<string, ListenerDefinition> {
    return {
      [EVENTS.controllerInitialize]: (event) => this.beforeFilter(event),
      [EVENTS.controllerBeforeRender]: (event) => this.beforeRender(event),
      [EVENTS.controllerShutdown]: (event) => this.afterFilter(event),
    };
  }

  loadComponent(name: string, config: Record<string, unknown> = {}): Component {
    const ComponentClass = this.framework.classes.components.resolve(name, 'Component');
    if (!ComponentClass) throw new MissingComponentError({ component: name });

    const component = new ComponentClass(this, config);
    const [, alias] = pluginSplit(name);

    this.components.set(alias, component);
    this.events.on(component);
    this.logger.debug('controller', { controller: this.name, component: alias }, 'Component loaded');

    return component;
  }

  component(name: string): Component | undefined {
    return this.components.get(name);
  }

  set(name: string, value: unknown): this;
  set(vars: Record<string, unknown>): this;
  set(nameOrVars: string | Record<string, unknown>, value?: unknown): this {
    if (typeof nameOrVars === 'string') this.viewVars[nameOrVars] = value;
    else Object.assign(this.viewVars, nameOrVars);

    return this;
  }

  viewBuilder(): ViewBuilder {
    this.builder ??= new ViewBuilder(this.framework);
    return this.builder;
  }

  getPlugin(): string | undefined {
    return this.plugin;
  }

  setPlugin(name?: string): this {
    this.plugin = name;
    this.viewBuilder().withPlugin(name);
    return this;
  }

  dispatchEvent(name: string, data: EventData = {}, subject: unknown = this): Event {
    return this.events.dispatch(new Event(name, subject, data));
  }

  /** Runs `Controller.initialize` then `Controller.startup`; a response returned by a listener short-circuits. */
  startupProcess(): ServerResponse | undefined {
    for (const name of [EVENTS.controllerInitialize, EVENTS.controllerStartup]) {
      const event = this.dispatchEvent(name);
      if (event.result instanceof ServerResponse) return event.result;
    }

    return undefined;
  }

  shutdownProcess(): ServerResponse | undefined {
    const event = this.dispatchEvent(EVENTS.controllerShutdown);
    return event.result instanceof ServerResponse ? event.result : undefined;
  }

  /**
   * Builds a view from the controller's builder. `viewClass` replaces the
   * builder's class name; controller helpers are merged into the builder's.
   */
  createView(viewClass?: string): View {
    const builder = this.viewBuilder();

    if (viewClass) builder.withClassName(viewClass);
    builder.withHelpers(this.helpers);
    if (builder.plugin === undefined) builder.withPlugin(this.plugin);
    if (builder.name === undefined) builder.withName(this.name);

    return builder.build(this.viewVars, { request: this.request, response: this.response, events: this.events });
  }

  render(template?: string, layout?: string | false): ServerResponse {
    const builder = this.viewBuilder();
    if (builder.templatePath === undefined) builder.withTemplatePath(this.name);

    const event = this.dispatchEvent(EVENTS.controllerBeforeRender);
    if (event.result instanceof ServerResponse) return event.result;
    if (event.isStopped()) return this.response;

    const view = this.createView();
    const body = view.render(template, layout);

    this.response = this.response.withType(view.contentType).withStringBody(body);
    return this.response;
  }
}

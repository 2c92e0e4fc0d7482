import Handlebars from 'handlebars';

import { EVENTS, MESSAGES, REGEX, SAFE_HELPERS, TEMPLATE } from '../constants';
import { Controller } from '../controller/Controller';
import { RequestHandlerComponent } from '../controller/component/RequestHandlerComponent';
import {
  AppError,
  DatabaseError,
  HttpError,
  MissingControllerError,
  MissingPluginError,
  MissingTemplateError,
  WrappedError,
  normaliseError,
  toReason,
} from '../core/errors/AppError';
import { Event } from '../core/events/Event';
import { ServerRequest } from '../core/http/ServerRequest';
import { ServerResponse } from '../core/http/ServerResponse';
import { isErrorStatus } from '../core/http/status';
import { underscore, variable } from '../utils/Inflector';
import { errorLocation, formatTrace } from './ErrorTrace';

import type { ErrorHandler, Framework } from '../core/config/types';
import type { Logs } from '../core/logging/types';

export type ExceptionRendererOptions = {
  framework: Framework;
  /** Merged over the framework's registered handlers. */
  handlers?: Record<string, ErrorHandler>;
  logger?: Logs;
};

const DEFAULT_CODE = 500;

const numericCode = (error: Error): unknown => ('code' in error ? error.code : undefined);

/**
 * Turns one error into an error page.
 *
 * The status comes from the error's numeric `code` when it lies in
 * [400, 506), else 500. The handler name is the error's class name without a
 * trailing `Exception`/`Error`, lower-camel-cased (`error500` when empty). A
 * handler registered under that name takes over in debug mode and for HTTP
 * errors; otherwise the controller renders a template, degrading to
 * `error500` and finally to a minimal view with only the baseline helpers.
 */
export class ExceptionRenderer {
  readonly error: Error;
  readonly request?: ServerRequest;
  readonly controller: Controller;
  method = '';
  template = '';

  protected readonly framework: Framework;
  protected readonly logger: Logs;
  private readonly handlers: Map<string, ErrorHandler>;

  constructor(exception: unknown, request: ServerRequest | undefined, { framework, handlers, logger }: ExceptionRendererOptions) {
    this.error = toReason(exception);
    this.request = request;
    this.framework = framework;
    this.logger = (logger ?? framework.logger).child({ component: 'exception-renderer' });
    this.handlers = new Map(Object.entries({ ...framework.errorHandlers, ...handlers }));
    this.controller = this.getController();
  }

  protected get debug(): boolean {
    return this.framework.config.debug;
  }

  render(): ServerResponse {
    const code = this.resolveCode(this.error);
    const method = this.resolveMethod(this.error);
    const template = this.resolveTemplate(this.error, method, code);
    const unwrapped = this.unwrap(this.error);

    this.logger.debug('errors', { code, method, template, error: unwrapped.name }, 'Rendering error');

    const handler = this.handlers.get(method);
    if ((this.debug || unwrapped instanceof HttpError) && handler) return this.customMethod(handler, unwrapped);

    const message = this.resolveMessage(this.error, code);
    const url = this.controller.request.getRequestTarget();
    let response = this.controller.response;

    if (unwrapped instanceof AppError) {
      for (const [name, value] of Object.entries(unwrapped.responseHeaders)) response = response.withHeader(name, value);
    }
    response = response.withStatus(code);

    const serialize = ['message', 'url', 'code'];
    const viewVars: Record<string, unknown> = {
      message,
      url: Handlebars.escapeExpression(url),
      error: unwrapped,
      code,
      _serialize: serialize,
    };

    if (this.debug) {
      const { file, line } = errorLocation(unwrapped);
      viewVars.trace = formatTrace(unwrapped);
      viewVars.file = file ?? 'null';
      viewVars.line = line ?? 'null';
      serialize.push('file', 'line');
    }

    this.controller.set(viewVars);
    if (this.debug && unwrapped instanceof AppError) this.controller.set({ ...unwrapped.attributes });
    this.controller.response = response;

    return this.outputMessage(template);
  }

  /**
   * The `Error` controller, started. When startup fails only the
   * `RequestHandler` startup is retried; a bare controller is used when none
   * could be constructed.
   */
  protected getController(): Controller {
    const request = this.request ?? this.framework.currentRequest ?? ServerRequest.fromGlobals();
    const response = new ServerResponse();
    let controller: Controller | undefined;
    let started = false;

    try {
      const ErrorControllerClass = this.framework.classes.controllers.resolve('Error', 'Controller');
      if (!ErrorControllerClass) throw new MissingControllerError({ controller: 'Error' });

      controller = new ErrorControllerClass({ framework: this.framework, request, response });
      controller.startupProcess();
      started = true;
    } catch (e) {
      this.logger.debug('errors', { error: normaliseError(e) }, 'Error controller startup failed');
    }

    if (!started && controller) {
      const requestHandler = controller.component('RequestHandler');

      if (requestHandler instanceof RequestHandlerComponent) {
        try {
          requestHandler.startup(new Event(EVENTS.controllerStartup, controller));
        } catch (e) {
          this.logger.warn({ error: normaliseError(e) }, 'RequestHandler startup failed while rendering an error');
        }
      }
    }

    return controller ?? new Controller({ framework: this.framework, request, response });
  }

  protected unwrap(error: Error): Error {
    return error instanceof WrappedError ? error.unwrap() : error;
  }

  protected resolveCode(error: Error): number {
    const code = numericCode(this.unwrap(error));
    return isErrorStatus(code) ? code : DEFAULT_CODE;
  }

  protected resolveMethod(error: Error): string {
    const baseName = this.unwrap(error).name.replace(REGEX.ERROR_SUFFIX, '');
    this.method = variable(baseName) || TEMPLATE.error500;

    return this.method;
  }

  protected resolveTemplate(error: Error, method: string, code: number): string {
    const unwrapped = this.unwrap(error);

    if (unwrapped instanceof DatabaseError) this.template = TEMPLATE.database;
    else if (!this.debug || unwrapped instanceof HttpError) this.template = code < 500 ? TEMPLATE.error400 : TEMPLATE.error500;
    else this.template = underscore(method) || TEMPLATE.error500;

    return this.template;
  }

  protected resolveMessage(error: Error, code: number): string {
    const unwrapped = this.unwrap(error);

    if (!this.debug && !(unwrapped instanceof HttpError)) return code < 500 ? MESSAGES.notFound : MESSAGES.internal;

    return unwrapped.message;
  }

  protected customMethod(handler: ErrorHandler, error: Error): ServerResponse {
    const result = handler(error, this);
    this.controller.response = typeof result === 'string' ? this.controller.response.withStringBody(result) : result;

    return this.shutdown();
  }

  protected outputMessage(template: string): ServerResponse {
    try {
      this.controller.render(template);
      return this.shutdown();
    } catch (e) {
      if (e instanceof MissingTemplateError) {
        if (e.file.includes(TEMPLATE.error500) || template === TEMPLATE.error500) {
          this.logger.debug('errors', { file: e.file }, 'Error template missing');
          return this.outputMessageSafe(TEMPLATE.error500);
        }

        this.logger.debug('errors', { file: e.file, template }, 'Template missing, retrying with error500');
        return this.outputMessage(TEMPLATE.error500);
      }

      if (e instanceof MissingPluginError && e.plugin === this.controller.getPlugin()) this.controller.setPlugin(undefined);

      this.logger.debug('errors', { error: normaliseError(e), template }, 'Error page render failed');
      return this.outputMessageSafe(TEMPLATE.error500);
    }
  }

  /** Renders with the baseline helpers only, no layout path and no controller callbacks. */
  protected outputMessageSafe(template: string): ServerResponse {
    this.logger.warn({ template, error: this.error.name }, 'Rendering error page in safe mode');

    const helpers = [...SAFE_HELPERS];
    this.controller.helpers = helpers;
    this.controller.viewBuilder().withHelpers(helpers, false).withLayoutPath(undefined).withTemplatePath(TEMPLATE.errorPath);

    const view = this.controller.createView('View');
    this.controller.response = this.controller.response.withType('html').withStringBody(view.render(template, TEMPLATE.errorLayout));

    return this.controller.response;
  }

  /** `Controller.shutdown`, then `Dispatcher.afterDispatch` through a fresh dispatcher and its filters. */
  protected shutdown(): ServerResponse {
    this.controller.dispatchEvent(EVENTS.controllerShutdown);

    const dispatcher = this.framework.dispatchers.create();
    for (const filter of dispatcher.filters()) dispatcher.events.on(filter);

    const event = dispatcher.dispatchEvent(EVENTS.afterDispatch, {
      request: this.controller.request,
      response: this.controller.response,
    });

    const { response } = event.data;
    return response instanceof ServerResponse ? response : this.controller.response;
  }
}

import type { ComponentConstructor } from '../../controller/Component';
import type { ControllerConstructor } from '../../controller/Controller';
import type { ExceptionRenderer } from '../../error/ExceptionRenderer';
import type { DebugInput } from '../../logging/Parser';
import type { DispatcherFactory } from '../../routing/DispatcherFactory';
import type { DispatcherFilter } from '../../routing/DispatcherFilter';
import type { HelperConstructor } from '../../view/Helper';
import type { ViewConstructor } from '../../view/View';
import type { ServerRequest } from '../http/ServerRequest';
import type { ServerResponse } from '../http/ServerResponse';
import type { BaseLogger, LogLevel, Logs } from '../logging/types';
import type { PluginConfig, PluginRegistry } from '../plugin/PluginRegistry';
import type { ClassRegistry } from '../registry/ClassRegistry';

/**
 * Custom rendering for one kind of error, keyed by handler name
 * (`missingWidget` for `MissingWidgetError`). Only consulted in debug mode or
 * for HTTP-level errors.
 */
export type ErrorHandler = (error: Error, renderer: ExceptionRenderer) => ServerResponse | string;

export type LogConfig = {
  debug?: DebugInput;
  minLevel?: LogLevel;
  custom?: BaseLogger;
  singleLine?: boolean;
};

export type KeelConfig = {
  /** Defaults to `NODE_ENV === 'development'`. */
  debug?: boolean;
  log?: LogConfig;
  /** Replaces the built-in logger entirely; `log` is then ignored. */
  logger?: Logs;
  paths?: {
    /** Application template roots, searched in order. */
    templates?: string[];
  };
  plugins?: Record<string, PluginConfig>;
  /** Classes registered on top of the built-ins, keyed by full class name (`PostView`, `Blog.PostView`). */
  classes?: {
    views?: Record<string, ViewConstructor>;
    controllers?: Record<string, ControllerConstructor>;
    helpers?: Record<string, HelperConstructor>;
    components?: Record<string, ComponentConstructor>;
  };
  dispatcher?: {
    filters?: DispatcherFilter[];
  };
  errors?: {
    handlers?: Record<string, ErrorHandler>;
  };
};

export type ResolvedConfig = {
  debug: boolean;
  paths: {
    templates: string[];
    core: string;
  };
};

export type Framework = {
  config: ResolvedConfig;
  classes: ClassRegistry;
  plugins: PluginRegistry;
  dispatchers: DispatcherFactory;
  errorHandlers: Record<string, ErrorHandler>;
  logger: Logs;
  /** Request being handled, when errors are rendered outside a request handler. */
  currentRequest?: ServerRequest;
};

export { defineConfig, resolveConfig } from './core/config/Config';
export { createClassRegistry, createFramework } from './core/config/Setup';
export { errorPages, toRenderable } from './ErrorPages';

export { ViewBuilder } from './view/ViewBuilder';
export { View, clearTemplateCache } from './view/View';
export { JsonView } from './view/JsonView';
export { Helper } from './view/Helper';
export { HtmlHelper } from './view/helper/HtmlHelper';
export { FormHelper } from './view/helper/FormHelper';

export { Controller } from './controller/Controller';
export { ErrorController } from './controller/ErrorController';
export { Component } from './controller/Component';
export { RequestHandlerComponent } from './controller/component/RequestHandlerComponent';

export { Dispatcher } from './routing/Dispatcher';
export { DispatcherFactory } from './routing/DispatcherFactory';
export { DispatcherFilter } from './routing/DispatcherFilter';
export { TraceIdFilter } from './routing/filters/TraceIdFilter';

export { ExceptionRenderer } from './error/ExceptionRenderer';
export { errorLocation, formatTrace } from './error/ErrorTrace';

export * from './core/errors/AppError';
export { ServerRequest } from './core/http/ServerRequest';
export { ServerResponse } from './core/http/ServerResponse';
export { statusText, toHttp } from './core/http/status';
export { Event } from './core/events/Event';
export { EventManager } from './core/events/EventManager';
export { ClassRegistry, NameRegistry } from './core/registry/ClassRegistry';
export { PluginRegistry } from './core/plugin/PluginRegistry';
export { TRACE_HEADER, requestLogger, resolveTraceId } from './core/telemetry/Telemetry';
export { Logger, createLogger } from './logging/Logger';
export { EVENTS, TEMPLATE } from './constants';

export type { ErrorHandler, Framework, KeelConfig, LogConfig, ResolvedConfig } from './core/config/types';
export type { ErrorPagesOptions } from './ErrorPages';
export type { BuildContext, ViewConfig } from './view/ViewBuilder';
export type { ViewConstructor, ViewInit, ViewParams } from './view/View';
export type { HelperConstructor } from './view/Helper';
export type { ControllerConstructor, ControllerInit } from './controller/Controller';
export type { ComponentConstructor } from './controller/Component';
export type { DispatchData, DispatcherFilterOptions } from './routing/DispatcherFilter';
export type { ExceptionRendererOptions } from './error/ExceptionRenderer';
export type { TraceFrame } from './error/ErrorTrace';
export type { EventListener, ListenerDefinition } from './core/events/EventManager';
export type { PluginConfig } from './core/plugin/PluginRegistry';
export type { ResponseType } from './core/http/ServerResponse';
export type { BaseLogger, DebugCategory, LogLevel, Logs } from './core/logging/types';
export type { LoggerConfig } from './logging/Logger';

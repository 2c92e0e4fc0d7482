import { Controller } from '../../controller/Controller';
import { ErrorController } from '../../controller/ErrorController';
import { RequestHandlerComponent } from '../../controller/component/RequestHandlerComponent';
import { createLogger } from '../../logging/Logger';
import { DispatcherFactory } from '../../routing/DispatcherFactory';
import { FormHelper } from '../../view/helper/FormHelper';
import { HtmlHelper } from '../../view/helper/HtmlHelper';
import { JsonView } from '../../view/JsonView';
import { View } from '../../view/View';
import { PluginRegistry } from '../plugin/PluginRegistry';
import { ClassRegistry } from '../registry/ClassRegistry';
import { resolveConfig } from './Config';

import type { NameRegistry } from '../registry/ClassRegistry';
import type { Framework, KeelConfig } from './types';

const registerAll = <T>(registry: NameRegistry<T>, entries: Record<string, T> = {}): void => {
  for (const [name, value] of Object.entries(entries)) registry.register(name, value);
};

export function createClassRegistry(classes: KeelConfig['classes'] = {}): ClassRegistry {
  const registry = new ClassRegistry();

  registry.views.register('View', View).register('JsonView', JsonView);
  registry.controllers.register('Controller', Controller).register('ErrorController', ErrorController);
  registry.helpers.register('HtmlHelper', HtmlHelper).register('FormHelper', FormHelper);
  registry.components.register('RequestHandlerComponent', RequestHandlerComponent);

  registerAll(registry.views, classes.views);
  registerAll(registry.controllers, classes.controllers);
  registerAll(registry.helpers, classes.helpers);
  registerAll(registry.components, classes.components);

  return registry;
}

export function createFramework(config: KeelConfig = {}): Framework {
  const resolved = resolveConfig(config);
  const logger = config.logger ?? createLogger(config.log);

  const dispatchers = new DispatcherFactory(logger);
  for (const filter of config.dispatcher?.filters ?? []) dispatchers.add(filter);

  logger.debug('dispatch', { debug: resolved.debug, filters: dispatchers.filters().length }, 'Framework created');

  return {
    config: resolved,
    classes: createClassRegistry(config.classes),
    plugins: new PluginRegistry(config.plugins),
    dispatchers,
    errorHandlers: { ...config.errors?.handlers },
    logger,
  };
}

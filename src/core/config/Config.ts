import { resolve } from 'node:path';

import { AppError } from '../errors/AppError';
import { CORE_TEMPLATES, isDevelopment } from '../system/System';

import type { KeelConfig, ResolvedConfig } from './types';

export function defineConfig<const C extends KeelConfig>(config: C): C {
  for (const [name, plugin] of Object.entries(config.plugins ?? {})) {
    if (!plugin.path) throw new AppError(`Plugin "${name}" must declare a path`, 'validation', { details: { plugin: name } });
  }

  for (const name of Object.keys(config.errors?.handlers ?? {})) {
    if (!/^[a-z][A-Za-z0-9]*$/.test(name)) throw new AppError(`Error handler "${name}" must be a lower camel case name`, 'validation', { details: { handler: name } });
  }

  return config;
}

export function resolveConfig(config: KeelConfig = {}): ResolvedConfig {
  return {
    debug: config.debug ?? isDevelopment,
    paths: {
      templates: (config.paths?.templates ?? []).map((path) => resolve(path)),
      core: CORE_TEMPLATES,
    },
  };
}

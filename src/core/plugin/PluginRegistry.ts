import { join, resolve } from 'node:path';

import { MissingPluginError } from '../errors/AppError';

export type PluginConfig = {
  /** Root directory of the plugin; its templates live in `<path>/templates`. */
  path: string;
};

export class PluginRegistry {
  private plugins = new Map<string, string>();

  constructor(plugins: Record<string, PluginConfig> = {}) {
    for (const [name, config] of Object.entries(plugins)) this.load(name, config);
  }

  load(name: string, config: PluginConfig): this {
    this.plugins.set(name, resolve(config.path));
    return this;
  }

  unload(name: string): this {
    this.plugins.delete(name);
    return this;
  }

  isLoaded(name: string): boolean {
    return this.plugins.has(name);
  }

  loaded(): string[] {
    return [...this.plugins.keys()];
  }

  path(name: string): string {
    const path = this.plugins.get(name);
    if (path === undefined) throw new MissingPluginError({ plugin: name });

    return path;
  }

  templatePath(name: string): string {
    return join(this.path(name), 'templates');
  }
}

import { pluginSplit } from '../../utils/Inflector';

import type { ComponentConstructor } from '../../controller/Component';
import type { ControllerConstructor } from '../../controller/Controller';
import type { HelperConstructor } from '../../view/Helper';
import type { ViewConstructor } from '../../view/View';

/**
 * Short-name lookup for one kind of class. Names are stored with their type
 * suffix (`JsonView`), optionally prefixed by the owning plugin (`Blog.PostView`).
 */
export class NameRegistry<T> {
  private entries = new Map<string, T>();

  constructor(readonly type: string) {}

  register(name: string, value: T): this {
    this.entries.set(name, value);
    return this;
  }

  /**
   * `resolve('Json', 'View')` finds `JsonView`; `resolve('Blog.Post', 'View')`
   * finds `Blog.PostView`.
   */
  resolve(name: string, suffix = ''): T | undefined {
    const [plugin, short] = pluginSplit(name);
    const key = plugin ? `${plugin}.${short}${suffix}` : `${short}${suffix}`;

    return this.entries.get(key);
  }

  has(name: string, suffix = ''): boolean {
    return this.resolve(name, suffix) !== undefined;
  }

  names(): string[] {
    return [...this.entries.keys()];
  }
}

export class ClassRegistry {
  readonly views = new NameRegistry<ViewConstructor>('View');
  readonly controllers = new NameRegistry<ControllerConstructor>('Controller');
  readonly helpers = new NameRegistry<HelperConstructor>('Helper');
  readonly components = new NameRegistry<ComponentConstructor>('Component');
}

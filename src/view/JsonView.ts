import { View } from './View';

import type { ResponseType } from '../core/http/ServerResponse';

/**
 * Serialises the view variables named by `_serialize`:
 * `true` takes every variable not starting with `_`, a string takes that single
 * variable's value, a list builds an object of those keys. Without
 * `_serialize` the template is rendered as usual.
 */
export class JsonView extends View {
  readonly contentType: ResponseType | string = 'json';

  render(template?: string, layout?: string | false): string {
    const serialize = this.viewVars._serialize;
    if (serialize === undefined || serialize === false) return super.render(template, layout);

    return JSON.stringify(this.dataToSerialize(serialize) ?? null);
  }

  protected dataToSerialize(serialize: unknown): unknown {
    if (serialize === true) {
      return Object.fromEntries(Object.entries(this.viewVars).filter(([key]) => !key.startsWith('_')));
    }

    if (typeof serialize === 'string') return this.viewVars[serialize];

    if (Array.isArray(serialize)) {
      const keys = serialize.filter((key): key is string => typeof key === 'string');
      return Object.fromEntries(keys.map((key) => [key, this.viewVars[key]]));
    }

    return null;
  }
}

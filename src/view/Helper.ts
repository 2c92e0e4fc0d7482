import Handlebars from 'handlebars';

import type { HelperDelegate, HelperOptions } from 'handlebars';
import type { View } from './View';

export type HelperConstructor = new (view: View) => Helper;

/** A named bundle of Handlebars helpers, loaded into a view by name (`Html` -> `HtmlHelper`). */
export abstract class Helper {
  constructor(protected readonly view: View) {}

  abstract helpers(): Record<string, HelperDelegate>;

  protected escape(value: unknown): string {
    return Handlebars.escapeExpression(value === undefined || value === null ? '' : String(value));
  }

  /** ` key="value"` pairs from a helper's hash arguments, values escaped. */
  protected attributes(options?: HelperOptions, omit: readonly string[] = []): string {
    const hash: Record<string, unknown> = options?.hash ?? {};

    return Object.entries(hash)
      .filter(([key, value]) => !omit.includes(key) && value !== undefined && value !== null && value !== false)
      .map(([key, value]) => (value === true ? ` ${key}` : ` ${key}="${this.escape(value)}"`))
      .join('');
  }

  protected safe(html: string): Handlebars.SafeString {
    return new Handlebars.SafeString(html);
  }
}

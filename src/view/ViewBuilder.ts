import { MissingViewError } from '../core/errors/AppError';

import type { Framework } from '../core/config/types';
import type { EventManager } from '../core/events/EventManager';
import type { ServerRequest } from '../core/http/ServerRequest';
import type { ServerResponse } from '../core/http/ServerResponse';
import type { View, ViewParams } from './View';

export type ViewConfig = {
  name?: string;
  templatePath?: string;
  template?: string;
  plugin?: string;
  theme?: string;
  /** `false` disables the layout for this view. */
  layout?: string | false;
  layoutPath?: string;
  autoLayout: boolean;
  className?: string;
  helpers: string[];
  options: Record<string, unknown>;
};

export type BuildContext = {
  request?: ServerRequest;
  response?: ServerResponse;
  events?: EventManager;
};

const BASE_VIEW = 'View';

/**
 * Accumulates view configuration through chained `with*` calls and turns it
 * into a view instance on `build()`.
 *
 * ```ts
 * const view = new ViewBuilder(framework)
 *   .withTemplatePath('Error')
 *   .withHelpers(['Html'])
 *   .withClassName('Json')
 *   .build({ message: 'Not Found' });
 * ```
 */
export class ViewBuilder {
  private config: ViewConfig = { autoLayout: true, helpers: [], options: {} };

  constructor(private framework: Framework) {}

  withTemplatePath(path?: string): this {
    this.config.templatePath = path;
    return this;
  }

  withLayoutPath(path?: string): this {
    this.config.layoutPath = path;
    return this;
  }

  withAutoLayout(enabled: boolean): this {
    this.config.autoLayout = enabled;
    return this;
  }

  withPlugin(name?: string): this {
    this.config.plugin = name;
    return this;
  }

  withTheme(name?: string): this {
    this.config.theme = name;
    return this;
  }

  withTemplate(name?: string): this {
    this.config.template = name;
    return this;
  }

  withLayout(name?: string | false): this {
    this.config.layout = name;
    return this;
  }

  withName(name?: string): this {
    this.config.name = name;
    return this;
  }

  /** A bare name (`Json`), a plugin name (`Blog.Post`) or `View` for the base view. */
  withClassName(name?: string): this {
    this.config.className = name;
    return this;
  }

  /** Merging keeps existing helpers first and appends unseen ones in order. */
  withHelpers(helpers: readonly string[], merge = true): this {
    this.config.helpers = merge ? [...new Set([...this.config.helpers, ...helpers])] : [...helpers];
    return this;
  }

  /** Merging lets the new options win on key collision. */
  withOptions(options: Record<string, unknown>, merge = true): this {
    this.config.options = merge ? { ...this.config.options, ...options } : { ...options };
    return this;
  }

  get name(): string | undefined {
    return this.config.name;
  }

  get templatePath(): string | undefined {
    return this.config.templatePath;
  }

  get template(): string | undefined {
    return this.config.template;
  }

  get plugin(): string | undefined {
    return this.config.plugin;
  }

  get theme(): string | undefined {
    return this.config.theme;
  }

  get layout(): string | false | undefined {
    return this.config.layout;
  }

  get layoutPath(): string | undefined {
    return this.config.layoutPath;
  }

  get autoLayout(): boolean {
    return this.config.autoLayout;
  }

  get className(): string | undefined {
    return this.config.className;
  }

  get helpers(): string[] {
    return [...this.config.helpers];
  }

  get options(): Record<string, unknown> {
    return { ...this.config.options };
  }

  toConfig(): ViewConfig {
    return { ...this.config, helpers: this.helpers, options: this.options };
  }

  /**
   * Resolves the configured view class and constructs it. Throws
   * `MissingViewError` before anything is constructed when the class is unknown.
   */
  build(vars: Record<string, unknown> = {}, context: BuildContext = {}): View {
    const className = this.config.className ?? BASE_VIEW;
    const ViewClass =
      className === BASE_VIEW
        ? this.framework.classes.views.resolve(BASE_VIEW)
        : this.framework.classes.views.resolve(className, BASE_VIEW);

    if (!ViewClass) throw new MissingViewError({ className });

    const params: ViewParams = {
      ...this.config.options,
      name: this.config.name,
      templatePath: this.config.templatePath,
      template: this.config.template,
      plugin: this.config.plugin,
      theme: this.config.theme,
      layout: this.config.layout,
      autoLayout: this.config.autoLayout,
      layoutPath: this.config.layoutPath,
      helpers: this.helpers,
      viewVars: vars,
    };

    this.framework.logger.debug('view', { className, template: params.template, templatePath: params.templatePath }, 'Building view');

    return new ViewClass({ framework: this.framework, params, ...context });
  }
}

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

import Handlebars from 'handlebars';

import { EVENTS, TEMPLATE } from '../constants';
import { MissingHelperError, MissingLayoutError, MissingTemplateError } from '../core/errors/AppError';
import { Event } from '../core/events/Event';
import { EventManager } from '../core/events/EventManager';
import { pluginSplit, underscore } from '../utils/Inflector';

import type { Framework } from '../core/config/types';
import type { EventData } from '../core/events/Event';
import type { ServerRequest } from '../core/http/ServerRequest';
import type { ResponseType, ServerResponse } from '../core/http/ServerResponse';
import type { Logs } from '../core/logging/types';
import type { BuildContext } from './ViewBuilder';

export type ViewParams = {
  name?: string;
  templatePath?: string;
  template?: string;
  plugin?: string;
  theme?: string;
  layout?: string | false;
  autoLayout?: boolean;
  layoutPath?: string;
  helpers?: string[];
  viewVars?: Record<string, unknown>;
  [option: string]: unknown;
};

export type ViewInit = BuildContext & {
  framework: Framework;
  params?: ViewParams;
};

export type ViewConstructor = new (init: ViewInit) => View;

type MissingFile = (file: string, paths: string[]) => Error;

const sources = new Map<string, string>();

export const clearTemplateCache = (): void => sources.clear();

/**
 * Renders Handlebars templates found under the template roots, optionally
 * wrapped in a layout that receives the rendered output as `content`.
 *
 * Roots are searched in order: theme plugin, app overrides under
 * `plugin/<Plugin>`, the plugin's own templates, application roots, then the
 * bundled core templates.
 */
export class View {
  readonly name?: string;
  templatePath?: string;
  template?: string;
  plugin?: string;
  theme?: string;
  layout?: string | false;
  layoutPath?: string;
  autoLayout: boolean;
  readonly helpers: string[];
  readonly options: Readonly<Record<string, unknown>>;
  viewVars: Record<string, unknown>;
  readonly request?: ServerRequest;
  readonly response?: ServerResponse;
  readonly events: EventManager;
  readonly contentType: ResponseType | string = 'html';

  protected framework: Framework;
  protected logger: Logs;
  private engine?: typeof Handlebars;

  constructor({ framework, request, response, events, params = {} }: ViewInit) {
    const { name, templatePath, template, plugin, theme, layout, autoLayout, layoutPath, helpers, viewVars, ...options } = params;

    this.framework = framework;
    this.logger = framework.logger;
    this.request = request;
    this.response = response;
    this.events = events ?? new EventManager(framework.logger);

    this.name = name;
    this.templatePath = templatePath;
    this.template = template;
    this.plugin = plugin;
    this.theme = theme;
    this.layout = layout ?? TEMPLATE.defaultLayout;
    this.autoLayout = autoLayout ?? true;
    this.layoutPath = layoutPath;
    this.helpers = [...(helpers ?? [])];
    this.viewVars = { ...viewVars };
    this.options = options;
  }

  get(name: string): unknown {
    return this.viewVars[name];
  }

  set(name: string, value: unknown): this {
    this.viewVars[name] = value;
    return this;
  }

  /**
   * `layout` overrides the configured layout for this call; `false` renders
   * the template alone.
   */
  render(template?: string, layout?: string | false): string {
    const name = template ?? this.template;
    if (!name) throw new MissingTemplateError({ file: this.templatePath ?? '', paths: this.paths() });

    const file = this.templateFile(name);

    this.dispatch(EVENTS.viewBeforeRender, { file });
    let output = this.evaluate(file, this.viewVars);
    this.dispatch(EVENTS.viewAfterRender, { file });

    const layoutName = layout === undefined ? this.layout : layout;
    if (this.autoLayout && layoutName) output = this.renderLayout(output, layoutName);

    return output;
  }

  renderLayout(content: string, layout: string): string {
    const file = this.layoutFile(layout);

    this.dispatch(EVENTS.viewBeforeLayout, { file });
    const output = this.evaluate(file, { ...this.viewVars, content });
    this.dispatch(EVENTS.viewAfterLayout, { file });

    return output;
  }

  /** Template roots for `plugin` (defaults to the view's plugin), highest precedence first. */
  paths(plugin = this.plugin): string[] {
    const { templates, core } = this.framework.config.paths;
    const paths: string[] = [];

    if (this.theme) paths.push(this.framework.plugins.templatePath(this.theme));

    if (plugin) {
      const pluginTemplates = this.framework.plugins.templatePath(plugin);
      paths.push(...templates.map((root) => join(root, 'plugin', plugin)), pluginTemplates);
    }

    paths.push(...templates, core);

    return [...new Set(paths)];
  }

  protected templateFile(name: string): string {
    const [plugin, short] = pluginSplit(name);
    const relative = join(this.templatePath ?? '', `${underscore(short)}${TEMPLATE.extension}`);

    return this.locate(relative, plugin ?? this.plugin, (file, paths) => new MissingTemplateError({ file, paths }));
  }

  protected layoutFile(name: string): string {
    const [plugin, short] = pluginSplit(name);
    const relative = join(TEMPLATE.layoutPath, this.layoutPath ?? '', `${underscore(short)}${TEMPLATE.extension}`);

    return this.locate(relative, plugin ?? this.plugin, (file, paths) => new MissingLayoutError({ file, paths }));
  }

  protected evaluate(file: string, vars: Record<string, unknown>): string {
    let source = sources.get(file);
    if (source === undefined) {
      source = readFileSync(file, 'utf8');
      sources.set(file, source);
    }

    return this.handlebars().compile(source)(vars);
  }

  private locate(relative: string, plugin: string | undefined, missing: MissingFile): string {
    const paths = this.paths(plugin);

    for (const root of paths) {
      const file = join(root, relative);
      if (existsSync(file)) return file;
    }

    this.logger.debug('view', { file: relative, paths }, 'Template not found');
    throw missing(relative, paths);
  }

  private handlebars(): typeof Handlebars {
    if (this.engine) return this.engine;

    const engine = Handlebars.create();

    for (const name of this.helpers) {
      const HelperClass = this.framework.classes.helpers.resolve(name, 'Helper');
      if (!HelperClass) throw new MissingHelperError({ helper: name });

      for (const [helperName, delegate] of Object.entries(new HelperClass(this).helpers())) {
        engine.registerHelper(helperName, delegate);
      }
    }

    this.engine = engine;
    return engine;
  }

  private dispatch(name: string, data: EventData): void {
    this.events.dispatch(new Event(name, this, data));
  }
}

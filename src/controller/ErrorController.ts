import { TEMPLATE } from '../constants';
import { Controller } from './Controller';

import type { Event } from '../core/events/Event';
import type { ServerResponse } from '../core/http/ServerResponse';

/** Renders error pages from the `Error` template directory. */
export class ErrorController extends Controller {
  initialize(): void {
    this.loadComponent('RequestHandler');
  }

  beforeRender(_event: Event): ServerResponse | void {
    this.viewBuilder().withTemplatePath(TEMPLATE.errorPath);
  }
}

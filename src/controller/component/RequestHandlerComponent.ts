import { Component } from '../Component';

import type { Event } from '../../core/events/Event';
import type { ServerRequest } from '../../core/http/ServerRequest';

const JSON_TYPE = 'application/json';

/** Switches the controller to `JsonView` when the request asks for JSON. */
export class RequestHandlerComponent extends Component {
  startup(_event: Event): void {
    if (!this.prefersJson(this.controller.request)) return;

    this.controller.viewBuilder().withClassName('Json');
    this.controller.response = this.controller.response.withType('json');
  }

  /** A `.json` extension, or `application/json` as the first accepted type. */
  prefersJson(request: ServerRequest): boolean {
    if (request.path.endsWith('.json')) return true;

    const [preferred] = request.acceptedTypes();
    return preferred === JSON_TYPE;
  }
}

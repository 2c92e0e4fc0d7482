import { Dispatcher } from './Dispatcher';

import type { Logs } from '../core/logging/types';
import type { DispatcherFilter } from './DispatcherFilter';

export class DispatcherFactory {
  private stack: DispatcherFilter[] = [];

  constructor(private logger?: Logs) {}

  add(filter: DispatcherFilter): DispatcherFilter {
    this.stack.push(filter);
    return filter;
  }

  /** A fresh dispatcher holding every filter added so far. */
  create(): Dispatcher {
    const dispatcher = new Dispatcher(this.logger);
    for (const filter of this.stack) dispatcher.addFilter(filter);

    this.logger?.debug('dispatch', { filters: this.stack.length }, 'Dispatcher created');
    return dispatcher;
  }

  filters(): DispatcherFilter[] {
    return [...this.stack];
  }

  clear(): void {
    this.stack = [];
  }
}

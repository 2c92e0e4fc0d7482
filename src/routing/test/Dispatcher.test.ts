// @vitest-environment node
import { describe, it, expect } from 'vitest';

import { ServerRequest } from '../../core/http/ServerRequest';
import { ServerResponse } from '../../core/http/ServerResponse';
import { DispatcherFactory } from '../DispatcherFactory';
import { DispatcherFilter } from '../DispatcherFilter';
import { TraceIdFilter } from '../filters/TraceIdFilter';

import type { DispatchData, DispatcherFilterOptions } from '../DispatcherFilter';

class HeaderFilter extends DispatcherFilter {
  constructor(
    private header: string,
    options: DispatcherFilterOptions = {},
  ) {
    super(options);
  }

  afterDispatch({ response }: DispatchData): ServerResponse {
    const seen = response.getHeaderLine('x-order');
    return response.withHeader('x-order', seen ? `${seen},${this.header}` : this.header);
  }
}

const afterDispatch = (factory: DispatcherFactory, request = new ServerRequest({ url: '/posts' })) => {
  const dispatcher = factory.create();
  for (const filter of dispatcher.filters()) dispatcher.events.on(filter);

  return dispatcher.dispatchEvent('Dispatcher.afterDispatch', { request, response: new ServerResponse() });
};

describe('DispatcherFactory', () => {
  it('creates dispatchers carrying every added filter', () => {
    const factory = new DispatcherFactory();
    const a = factory.add(new HeaderFilter('a'));
    const b = factory.add(new HeaderFilter('b'));

    expect(factory.create().filters()).toEqual([a, b]);
  });

  it('does not subscribe filters on its own', () => {
    const factory = new DispatcherFactory();
    factory.add(new HeaderFilter('a'));

    expect(factory.create().events.listenerCount('Dispatcher.afterDispatch')).toBe(0);
  });

  it('clear() drops all filters', () => {
    const factory = new DispatcherFactory();
    factory.add(new HeaderFilter('a'));
    factory.clear();

    expect(factory.filters()).toEqual([]);
  });
});

describe('DispatcherFilter', () => {
  it('replaces the event response with the one a hook returns', () => {
    const factory = new DispatcherFactory();
    factory.add(new HeaderFilter('a'));

    const event = afterDispatch(factory);
    const { response } = event.data;

    expect(response).toBeInstanceOf(ServerResponse);
    expect(response instanceof ServerResponse && response.getHeaderLine('x-order')).toBe('a');
  });

  it('runs filters by ascending priority', () => {
    const factory = new DispatcherFactory();
    factory.add(new HeaderFilter('late', { priority: 20 }));
    factory.add(new HeaderFilter('early', { priority: 1 }));
    factory.add(new HeaderFilter('default'));

    const { response } = afterDispatch(factory).data;

    expect(response instanceof ServerResponse && response.getHeaderLine('x-order')).toBe('early,default,late');
  });

  it('honours the path prefix and the when predicate', () => {
    const factory = new DispatcherFactory();
    factory.add(new HeaderFilter('admin', { for: '/admin' }));
    factory.add(new HeaderFilter('posts', { when: ({ request }) => request.method === 'GET' }));

    const { response } = afterDispatch(factory, new ServerRequest({ url: '/posts/1' })).data;

    expect(response instanceof ServerResponse && response.getHeaderLine('x-order')).toBe('posts');
  });

  it('ignores events without request and response', () => {
    const factory = new DispatcherFactory();
    factory.add(new HeaderFilter('a'));

    const dispatcher = factory.create();
    for (const filter of dispatcher.filters()) dispatcher.events.on(filter);

    expect(dispatcher.dispatchEvent('Dispatcher.afterDispatch', { response: 'not a response' }).data.response).toBe('not a response');
  });
});

describe('TraceIdFilter', () => {
  it('echoes a safe inbound trace id', () => {
    const factory = new DispatcherFactory();
    factory.add(new TraceIdFilter());

    const { response } = afterDispatch(factory, new ServerRequest({ headers: { 'x-trace-id': 'trace-123' } })).data;

    expect(response instanceof ServerResponse && response.getHeaderLine('x-trace-id')).toBe('trace-123');
  });

  it('uses the request id when no header was sent', () => {
    const factory = new DispatcherFactory();
    factory.add(new TraceIdFilter());

    const { response } = afterDispatch(factory, new ServerRequest({ id: 'req-42' })).data;

    expect(response instanceof ServerResponse && response.getHeaderLine('x-trace-id')).toBe('req-42');
  });

  it('keeps a trace id already on the response', () => {
    const filter = new TraceIdFilter();
    const response = new ServerResponse({ headers: { 'x-trace-id': 'kept' } });

    expect(filter.afterDispatch({ request: new ServerRequest({ id: 'req-1' }), response })).toBeUndefined();
  });
});

import { describe, it, expect, vi } from 'vitest';

import { ServerRequest } from '../../http/ServerRequest';
import { requestLogger, resolveTraceId } from '../Telemetry';

describe('resolveTraceId', () => {
  it('echoes a safe inbound x-trace-id', () => {
    const request = new ServerRequest({ headers: { 'X-Trace-Id': 'abc-123' }, id: 'req-1' });

    expect(resolveTraceId(request)).toBe('abc-123');
  });

  it('ignores an unsafe header and falls back to the request id', () => {
    const request = new ServerRequest({ headers: { 'x-trace-id': 'bad value!' }, id: 'req-1' });

    expect(resolveTraceId(request)).toBe('req-1');
  });

  it('generates a uuid when nothing else is available', () => {
    expect(resolveTraceId(new ServerRequest())).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe('requestLogger', () => {
  it('binds trace id, url and method into a child logger', () => {
    const child = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), child: vi.fn() };
    const base = { ...child, child: vi.fn(() => child) };
    const request = new ServerRequest({ method: 'post', url: '/posts?x=1', id: 'req-9' });

    expect(requestLogger(request, base)).toBe(child);
    expect(base.child).toHaveBeenCalledWith({ traceId: 'req-9', url: '/posts?x=1', method: 'POST' });
  });
});

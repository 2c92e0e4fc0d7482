import crypto from 'node:crypto';

import { REGEX } from '../../constants';

import type { ServerRequest } from '../http/ServerRequest';
import type { Logs } from '../logging/types';

export const TRACE_HEADER = 'x-trace-id';

/** Inbound `x-trace-id` when it is safe to echo, else the request id, else a fresh UUID. */
export function resolveTraceId(request: ServerRequest): string {
  const raw = request.getHeaderLine(TRACE_HEADER);
  if (raw && REGEX.SAFE_TRACE.test(raw)) return raw;

  return request.id ?? crypto.randomUUID();
}

export function requestLogger<L extends Logs>(request: ServerRequest, baseLogger: L): Logs {
  return baseLogger.child({ traceId: resolveTraceId(request), url: request.url, method: request.method });
}

import { TRACE_HEADER, resolveTraceId } from '../../core/telemetry/Telemetry';
import { DispatcherFilter } from '../DispatcherFilter';

import type { ServerResponse } from '../../core/http/ServerResponse';
import type { DispatchData } from '../DispatcherFilter';

/** Echoes a safe inbound `x-trace-id` on the response, or assigns one. */
export class TraceIdFilter extends DispatcherFilter {
  afterDispatch({ request, response }: DispatchData): ServerResponse | void {
    if (response.hasHeader(TRACE_HEADER)) return;

    return response.withHeader(TRACE_HEADER, resolveTraceId(request));
  }
}

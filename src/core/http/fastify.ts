import { ServerRequest } from './ServerRequest';

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ServerResponse } from './ServerResponse';

export function toServerRequest(req: FastifyRequest): ServerRequest {
  const params: Record<string, string> = {};
  if (typeof req.params === 'object' && req.params !== null) {
    for (const [key, value] of Object.entries(req.params)) {
      if (typeof value === 'string') params[key] = value;
    }
  }

  return new ServerRequest({
    method: req.method,
    url: req.url,
    headers: req.headers,
    params,
    id: req.id,
  });
}

export function sendResponse(reply: FastifyReply, response: ServerResponse): FastifyReply {
  reply.status(response.status);

  for (const [name, value] of Object.entries(response.headers)) reply.header(name, value);

  return reply.send(response.body);
}

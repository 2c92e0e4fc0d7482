import fp from 'fastify-plugin';

import { AppError, HttpError, normaliseError } from './core/errors/AppError';
import { sendResponse, toServerRequest } from './core/http/fastify';
import { isErrorStatus, toHttp } from './core/http/status';
import { requestLogger } from './core/telemetry/Telemetry';
import { ExceptionRenderer } from './error/ExceptionRenderer';

import type { FastifyInstance, FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import type { Framework } from './core/config/types';

export type ErrorPagesOptions = {
  framework: Framework;
};

const statusCodeOf = (error: unknown): number | undefined =>
  typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : undefined;

/**
 * Errors carrying a `statusCode` keep it: 4xx (bad JSON, payload too large, ...)
 * render as HTTP errors, 5xx as infra errors whose message stays hidden.
 */
export function toRenderable(error: unknown): unknown {
  if (error instanceof AppError) return error;

  const status = statusCodeOf(error);
  if (status === undefined || !isErrorStatus(status)) return error;

  const message = error instanceof Error ? error.message : String(error);
  if (status >= 500) return new AppError(message, 'infra', { code: status, cause: error });

  return HttpError.fromStatus(status, message, { cause: error });
}

async function renderError(framework: Framework, error: unknown, req: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  const request = toServerRequest(req);
  const logger = requestLogger(request, framework.logger);
  const exception = toRenderable(error);
  const status = statusCodeOf(error) ?? (exception instanceof AppError ? exception.code : 500);

  if (status >= 500) logger.error({ error: normaliseError(error) }, 'Unhandled error');
  else logger.debug('http', { error: normaliseError(error), status }, 'Client error');

  try {
    const renderer = new ExceptionRenderer(exception, request, { framework, logger });
    return sendResponse(reply, renderer.render());
  } catch (renderFailure) {
    logger.error({ error: normaliseError(renderFailure), original: normaliseError(error) }, 'Error page rendering failed');

    if (reply.raw.headersSent) {
      reply.raw.end();
      return reply;
    }

    const { status: fallbackStatus, body } = toHttp(exception);
    return reply.status(fallbackStatus).send(body);
  }
}

/**
 * Renders every unhandled error and unmatched route through
 * `ExceptionRenderer`.
 *
 * ```ts
 * const framework = createFramework({ paths: { templates: ['./templates'] } });
 * await app.register(errorPages, { framework });
 * ```
 */
export const errorPages: FastifyPluginAsync<ErrorPagesOptions> = fp(
  async (app: FastifyInstance, opts: ErrorPagesOptions) => {
    const { framework } = opts;

    app.setErrorHandler(async (error, req, reply) => renderError(framework, error, req, reply));

    app.setNotFoundHandler(async (req, reply) => renderError(framework, AppError.notFound(), req, reply));
  },
  { name: 'keel-error-pages' },
);

import { AppError } from '../errors/AppError';

export const MIN_ERROR_STATUS = 400;
export const MAX_ERROR_STATUS = 506;

export const isErrorStatus = (code: unknown): code is number =>
  typeof code === 'number' && Number.isInteger(code) && code >= MIN_ERROR_STATUS && code < MAX_ERROR_STATUS;

const STATUS_TEXT: Readonly<Record<number, string>> = {
  400: 'Bad Request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  405: 'Method Not Allowed',
  408: 'Request Timeout',
  409: 'Conflict',
  422: 'Unprocessable Entity',
  429: 'Too Many Requests',
  500: 'Internal Server Error',
  501: 'Not Implemented',
  502: 'Bad Gateway',
  503: 'Service Unavailable',
  504: 'Gateway Timeout',
  505: 'HTTP Version Not Supported',
};

export const statusText = (status: number): string => STATUS_TEXT[status] ?? 'Error';

/** Last-resort JSON body for when no error page could be rendered at all. */
export const toHttp = (err: unknown): { status: number; body: Record<string, unknown> } => {
  const app = AppError.from(err);
  const status = isErrorStatus(app.code) ? app.code : 500;

  return {
    status,
    body: {
      error: app.safeMessage,
      statusText: statusText(status),
    },
  };
};

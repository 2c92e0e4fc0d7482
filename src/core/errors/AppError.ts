export type ErrorKind = 'infra' | 'upstream' | 'domain' | 'validation' | 'auth' | 'http' | 'view' | 'database' | 'fatal';

const DEFAULT_CODE: Record<ErrorKind, number> = {
  infra: 500,
  upstream: 502,
  domain: 404,
  validation: 400,
  auth: 403,
  http: 500,
  view: 500,
  database: 500,
  fatal: 500,
} as const;

export type AppErrorOptions = {
  code?: number;
  details?: unknown;
  cause?: unknown;
  safeMessage?: string;
  attributes?: Record<string, unknown>;
  headers?: Record<string, string>;
};

/**
 * Base class for every error the framework raises.
 *
 * `code` is the numeric error code the exception renderer turns into a response
 * status. `attributes` are exposed to error templates in debug mode and
 * `responseHeaders` are copied onto the error response.
 */
export class AppError extends Error {
  readonly kind: ErrorKind;
  readonly code: number;
  readonly details?: unknown;
  readonly safeMessage: string;
  readonly attributes: Readonly<Record<string, unknown>>;
  private headers: Record<string, string>;

  constructor(message: string, kind: ErrorKind, options: AppErrorOptions = {}) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);

    if (options.cause !== undefined) {
      Object.defineProperty(this, 'cause', {
        value: options.cause,
        enumerable: false,
        writable: false,
        configurable: true,
      });
    }

    this.kind = kind;
    this.code = options.code ?? DEFAULT_CODE[kind];
    this.details = options.details;
    this.safeMessage = options.safeMessage ?? AppError.safeMessageFor(kind, message);
    this.attributes = { ...options.attributes };
    this.headers = { ...options.headers };

    Error.captureStackTrace?.(this, new.target);
  }

  private static safeMessageFor(kind: ErrorKind, message: string): string {
    return kind === 'domain' || kind === 'validation' || kind === 'auth' || kind === 'http' ? message : 'Internal Server Error';
  }

  get responseHeaders(): Readonly<Record<string, string>> {
    return { ...this.headers };
  }

  withResponseHeader(name: string, value: string): this {
    this.headers[name] = value;
    return this;
  }

  private serialiseValue(value: unknown, seen = new WeakSet<object>()): unknown {
    if (value === null || value === undefined) return value;
    if (typeof value !== 'object') return value;
    if (seen.has(value)) return '[circular]';
    seen.add(value);

    if (value instanceof Error) {
      return {
        name: value.name,
        message: value.message,
        stack: value.stack,
        ...(value instanceof AppError && { kind: value.kind, code: value.code }),
      };
    }

    if (Array.isArray(value)) return value.map((item) => this.serialiseValue(item, seen));

    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      result[key] = this.serialiseValue(val, seen);
    }

    return result;
  }

  toJSON() {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      safeMessage: this.safeMessage,
      code: this.code,
      ...(Object.keys(this.attributes).length > 0 && { attributes: this.serialiseValue(this.attributes) }),
      details: this.serialiseValue(this.details),
      stack: this.stack,
      ...(this.cause !== undefined && { cause: this.serialiseValue(this.cause) }),
    };
  }

  static notFound(message = 'Not Found', details?: unknown): HttpError {
    return new NotFoundError(message, { details });
  }

  static badRequest(message = 'Bad Request', details?: unknown): HttpError {
    return new BadRequestError(message, { details });
  }

  static unauthorized(message = 'Unauthorized', details?: unknown): HttpError {
    return new UnauthorizedError(message, { details });
  }

  static forbidden(message = 'Forbidden', details?: unknown): HttpError {
    return new ForbiddenError(message, { details });
  }

  static methodNotAllowed(message = 'Method Not Allowed', details?: unknown): HttpError {
    return new MethodNotAllowedError(message, { details });
  }

  static internal(message: string, cause?: unknown, details?: unknown): AppError {
    return new AppError(message, 'infra', { cause, details });
  }

  static serviceUnavailable(message = 'Service Unavailable', cause?: unknown): HttpError {
    return new ServiceUnavailableError(message, { cause });
  }

  static from(err: unknown, fallback = 'Internal error'): AppError {
    if (err instanceof AppError) return err;
    if (err instanceof Error) return AppError.internal(err.message || fallback, err);

    return AppError.internal(normaliseError(err).message || fallback, err);
  }
}

/** An error that maps directly onto an HTTP status; rendered verbatim in every mode. */
export class HttpError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, 'http', options);
  }

  static fromStatus(status: number, message: string, options: Omit<AppErrorOptions, 'code'> = {}): HttpError {
    switch (status) {
      case 400:
        return new BadRequestError(message, options);
      case 401:
        return new UnauthorizedError(message, options);
      case 403:
        return new ForbiddenError(message, options);
      case 404:
        return new NotFoundError(message, options);
      case 405:
        return new MethodNotAllowedError(message, options);
      case 503:
        return new ServiceUnavailableError(message, options);
      default:
        return new HttpError(message, { ...options, code: status });
    }
  }
}

export class BadRequestError extends HttpError {
  constructor(message = 'Bad Request', options: Omit<AppErrorOptions, 'code'> = {}) {
    super(message, { ...options, code: 400 });
  }
}

export class UnauthorizedError extends HttpError {
  constructor(message = 'Unauthorized', options: Omit<AppErrorOptions, 'code'> = {}) {
    super(message, { ...options, code: 401 });
  }
}

export class ForbiddenError extends HttpError {
  constructor(message = 'Forbidden', options: Omit<AppErrorOptions, 'code'> = {}) {
    super(message, { ...options, code: 403 });
  }
}

export class NotFoundError extends HttpError {
  constructor(message = 'Not Found', options: Omit<AppErrorOptions, 'code'> = {}) {
    super(message, { ...options, code: 404 });
  }
}

export class MethodNotAllowedError extends HttpError {
  constructor(message = 'Method Not Allowed', options: Omit<AppErrorOptions, 'code'> = {}) {
    super(message, { ...options, code: 405 });
  }
}

export class InternalServerError extends HttpError {
  constructor(message = 'Internal Server Error', options: Omit<AppErrorOptions, 'code'> = {}) {
    super(message, { ...options, code: 500 });
  }
}

export class ServiceUnavailableError extends HttpError {
  constructor(message = 'Service Unavailable', options: Omit<AppErrorOptions, 'code'> = {}) {
    super(message, { ...options, code: 503 });
  }
}

export class MissingViewError extends AppError {
  constructor(attributes: { className: string }, options: Omit<AppErrorOptions, 'attributes'> = {}) {
    super(`View class "${attributes.className}" is missing.`, 'view', { ...options, attributes });
  }
}

export class MissingTemplateError extends AppError {
  constructor(attributes: { file: string; paths?: string[] }, options: Omit<AppErrorOptions, 'attributes'> = {}) {
    super(`Template file "${attributes.file}" is missing.`, 'view', { ...options, attributes });
  }

  get file(): string {
    const file = this.attributes.file;
    return typeof file === 'string' ? file : '';
  }
}

export class MissingLayoutError extends MissingTemplateError {
  constructor(attributes: { file: string; paths?: string[] }, options: Omit<AppErrorOptions, 'attributes'> = {}) {
    super(attributes, options);
    this.message = `Layout file "${attributes.file}" is missing.`;
  }
}

export class MissingPluginError extends AppError {
  constructor(attributes: { plugin: string }, options: Omit<AppErrorOptions, 'attributes'> = {}) {
    super(`Plugin "${attributes.plugin}" could not be found.`, 'view', { ...options, attributes });
  }

  get plugin(): string {
    const plugin = this.attributes.plugin;
    return typeof plugin === 'string' ? plugin : '';
  }
}

export class MissingHelperError extends AppError {
  constructor(attributes: { helper: string }, options: Omit<AppErrorOptions, 'attributes'> = {}) {
    super(`Helper class "${attributes.helper}Helper" could not be found.`, 'view', { ...options, attributes });
  }
}

export class MissingControllerError extends AppError {
  constructor(attributes: { controller: string }, options: Omit<AppErrorOptions, 'attributes'> = {}) {
    super(`Controller class "${attributes.controller}Controller" could not be found.`, 'infra', { ...options, attributes });
  }
}

export class MissingComponentError extends AppError {
  constructor(attributes: { component: string }, options: Omit<AppErrorOptions, 'attributes'> = {}) {
    super(`Component class "${attributes.component}Component" could not be found.`, 'infra', { ...options, attributes });
  }
}

/** Raised by the persistence layer; rendered with the dedicated `pdo_error` template. */
export class DatabaseError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, 'database', options);
  }
}

/**
 * Carries a fatal error (an uncaught rejection, a non-Error thrown value) into
 * the exception renderer. The renderer reports the wrapped error itself.
 */
export class WrappedError extends AppError {
  readonly error: Error;

  constructor(error: Error) {
    super(error.message, 'fatal', { cause: error });
    this.error = error;
  }

  unwrap(): Error {
    return this.error;
  }
}

type ErrorShape = { name: string; message: string; stack?: string };

const messageOf = (value: unknown): string | undefined => {
  if (typeof value !== 'object' || value === null || !('message' in value)) return undefined;
  return value.message === undefined ? undefined : String(value.message);
};

export function normaliseError(e: unknown): ErrorShape {
  if (e instanceof Error) return { name: e.name, message: e.message, stack: e.stack };

  return { name: 'Error', message: messageOf(e) ?? String(e) };
}

export function toReason(e: unknown): Error {
  if (e instanceof Error) return e;

  if (e === null) return new Error('null');
  if (typeof e === 'undefined') return new Error('Unknown render error');

  const maybeMsg = messageOf(e);
  if (maybeMsg !== undefined) return new Error(maybeMsg);

  return new Error(String(e));
}

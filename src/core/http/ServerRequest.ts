export type RequestParams = Record<string, string | undefined> & { plugin?: string };

export type ServerRequestInit = {
  method?: string;
  url?: string;
  headers?: Record<string, string | string[] | undefined>;
  params?: RequestParams;
  id?: string;
};

const normaliseHeaders = (headers: ServerRequestInit['headers'] = {}): Record<string, string> =>
  Object.fromEntries(
    Object.entries(headers).map(([headerName, headerValue]) => {
      const normalisedValue = Array.isArray(headerValue) ? headerValue.join(',') : (headerValue ?? '');

      return [headerName.toLowerCase(), normalisedValue];
    }),
  );

/**
 * Immutable view of the inbound request, as far as controllers and the
 * exception renderer need one.
 */
export class ServerRequest {
  readonly method: string;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly params: Readonly<RequestParams>;
  readonly id?: string;

  constructor(init: ServerRequestInit = {}) {
    this.method = (init.method ?? 'GET').toUpperCase();
    this.url = init.url ?? '/';
    this.headers = normaliseHeaders(init.headers);
    this.params = { ...init.params };
    this.id = init.id;
  }

  /**
   * Builds a request from CGI-style process environment variables. Used when
   * an error has to be rendered outside of any request handling.
   */
  static fromGlobals(env: NodeJS.ProcessEnv = process.env): ServerRequest {
    return new ServerRequest({
      method: env.REQUEST_METHOD,
      url: env.REQUEST_URI,
      headers: {
        ...(env.HTTP_HOST && { host: env.HTTP_HOST }),
        ...(env.HTTP_ACCEPT && { accept: env.HTTP_ACCEPT }),
      },
    });
  }

  getRequestTarget(): string {
    return this.url;
  }

  get path(): string {
    const q = this.url.indexOf('?');
    return q === -1 ? this.url : this.url.slice(0, q);
  }

  get query(): URLSearchParams {
    const q = this.url.indexOf('?');
    return new URLSearchParams(q === -1 ? '' : this.url.slice(q + 1));
  }

  getHeaderLine(name: string): string {
    return this.headers[name.toLowerCase()] ?? '';
  }

  getParam(name: string): string | undefined {
    return this.params[name];
  }

  withParam(name: string, value: string | undefined): ServerRequest {
    return new ServerRequest({ ...this.toInit(), params: { ...this.params, [name]: value } });
  }

  /**
   * Mime types from the Accept header, highest quality first. Ties keep
   * header order.
   */
  acceptedTypes(): string[] {
    const header = this.getHeaderLine('accept');
    if (!header) return [];

    return header
      .split(',')
      .map((part, index) => {
        const [type = '', ...rest] = part.split(';').map((s) => s.trim());
        const qParam = rest.find((p) => p.startsWith('q='));
        const q = qParam ? Number.parseFloat(qParam.slice(2)) : 1;

        return { type: type.toLowerCase(), q: Number.isNaN(q) ? 0 : q, index };
      })
      .filter((entry) => entry.type.length > 0 && entry.q > 0)
      .sort((a, b) => b.q - a.q || a.index - b.index)
      .map((entry) => entry.type);
  }

  accepts(mime: string): boolean {
    return this.acceptedTypes().includes(mime.toLowerCase());
  }

  private toInit(): ServerRequestInit {
    return { method: this.method, url: this.url, headers: { ...this.headers }, params: { ...this.params }, id: this.id };
  }
}

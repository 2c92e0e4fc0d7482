const MIME_TYPES = {
  html: 'text/html',
  json: 'application/json',
  text: 'text/plain',
  xml: 'application/xml',
} as const;

export type ResponseType = keyof typeof MIME_TYPES;

export type ServerResponseInit = {
  status?: number;
  headers?: Record<string, string>;
  body?: string;
  charset?: string;
};

const isResponseType = (type: string): type is ResponseType => type in MIME_TYPES;

/**
 * Immutable HTTP response value. Every `with*` call returns a new instance;
 * header names are stored lower-cased.
 */
export class ServerResponse {
  readonly status: number;
  readonly body: string;
  readonly charset: string;
  private readonly headerMap: Readonly<Record<string, string>>;

  constructor(init: ServerResponseInit = {}) {
    this.status = init.status ?? 200;
    this.body = init.body ?? '';
    this.charset = init.charset ?? 'UTF-8';
    this.headerMap = Object.fromEntries(Object.entries(init.headers ?? {}).map(([k, v]) => [k.toLowerCase(), v]));
  }

  get headers(): Readonly<Record<string, string>> {
    return { ...this.headerMap };
  }

  hasHeader(name: string): boolean {
    return name.toLowerCase() in this.headerMap;
  }

  getHeaderLine(name: string): string {
    return this.headerMap[name.toLowerCase()] ?? '';
  }

  withStatus(status: number): ServerResponse {
    return this.clone({ status });
  }

  withHeader(name: string, value: string): ServerResponse {
    return this.clone({ headers: { ...this.headerMap, [name.toLowerCase()]: value } });
  }

  withoutHeader(name: string): ServerResponse {
    const { [name.toLowerCase()]: _removed, ...rest } = this.headerMap;
    return this.clone({ headers: rest });
  }

  /** Accepts a short alias (`html`, `json`, `text`, `xml`) or a full mime type. */
  withType(type: ResponseType | string): ServerResponse {
    const mime = isResponseType(type) ? MIME_TYPES[type] : type;
    const value = mime.startsWith('text/') || mime === MIME_TYPES.json ? `${mime}; charset=${this.charset}` : mime;

    return this.withHeader('content-type', value);
  }

  getType(): string {
    const [mime = ''] = this.getHeaderLine('content-type').split(';');
    return mime.trim();
  }

  withStringBody(body: string): ServerResponse {
    return this.clone({ body });
  }

  private clone(changes: ServerResponseInit): ServerResponse {
    return new ServerResponse({
      status: this.status,
      headers: { ...this.headerMap },
      body: this.body,
      charset: this.charset,
      ...changes,
    });
  }
}

import { ServiceRequestError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { RawResponse, RequestOptions, Service } from '../types.js';

export interface HttpServiceConfig {
  /** Service root, e.g. `https://example.test/odata/Catalog.svc`. */
  serviceUrl: string;
  /** Registry name. Defaults to the service URL. */
  name?: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

const DEFAULT_HEADERS: Record<string, string> = {
  accept: 'application/atom+xml, application/xml;q=0.9, text/plain;q=0.8',
};

const ABSOLUTE_URL = /^https?:\/\//i;

/** Read-only HTTP transport for query paths relative to a service root. */
export class HttpService implements Service {
  readonly name: string;
  readonly serviceUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(config: HttpServiceConfig) {
    this.serviceUrl = config.serviceUrl.replace(/\/+$/, '');
    this.name = config.name ?? this.serviceUrl;
    this.headers = { ...DEFAULT_HEADERS, ...config.headers };
    this.timeoutMs = config.timeoutMs ?? 30_000;
    this.fetchImpl = config.fetch ?? fetch;
    this.logger = config.logger ?? createLogger();
  }

  /**
   * Builds the request URL. Paths from the query builder are URI-encoded;
   * raw paths (continuation links) arrive encoded already.
   */
  resolveUrl(path: string, isRawUrl = false): string {
    const target = isRawUrl ? path : encodeURI(path);
    if (ABSOLUTE_URL.test(target)) return target;
    return `${this.serviceUrl}/${target.replace(/^\/+/, '')}`;
  }

  async execute(path: string, options: RequestOptions = {}, isRawUrl = false): Promise<RawResponse> {
    const url = this.resolveUrl(path, isRawUrl);
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    this.logger.debug({ url, timeoutMs }, 'GET');

    let status: number;
    let ok: boolean;
    let body: string;
    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: { ...this.headers, ...options.headers },
        signal: AbortSignal.timeout(timeoutMs),
      });
      status = response.status;
      ok = response.ok;
      body = await response.text();
    } catch (err) {
      this.logger.warn({ url, err }, 'request failed');
      throw new ServiceRequestError(`Request to ${url} failed: ${String(err)}`, { url, cause: err });
    }

    if (!ok) {
      this.logger.warn({ url, status }, 'request returned an error status');
      throw new ServiceRequestError(`Request to ${url} returned status ${status}`, { url, status, body });
    }
    return { status, url, body };
  }
}

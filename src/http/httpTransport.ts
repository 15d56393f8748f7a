import type { HttpMethod, Transport } from './transport.js';
import type { Logger } from '../logging/logger.js';
import { createLogger } from '../logging/logger.js';
import { NotFoundError, RequestError, InvalidResponseError } from '../errors/request.js';

export interface HttpTransportOptions {
  baseUrl: string;
  apiToken?: string;
  userAgent: string;
  logger?: Logger;
}

export class HttpTransport implements Transport {
  private readonly baseUrl: string;
  private readonly apiToken: string | undefined;
  private readonly userAgent: string;
  private readonly logger: Logger;

  constructor(options: HttpTransportOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiToken = options.apiToken;
    this.userAgent = options.userAgent;
    this.logger = options.logger ?? createLogger('warn');
  }

  resolveUrl(pathOrUrl: string): string {
    if (/^https?:\/\//i.test(pathOrUrl)) return pathOrUrl;
    const path = pathOrUrl.startsWith('/') ? pathOrUrl : `/${pathOrUrl}`;
    return `${this.baseUrl}${path}`;
  }

  async request(method: HttpMethod, pathOrUrl: string, body?: unknown): Promise<unknown> {
    const url = this.resolveUrl(pathOrUrl);

    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      Accept: 'application/json',
    };
    if (this.apiToken) {
      headers['Authorization'] = `Bearer ${this.apiToken}`;
    }
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    let res: Response;
    try {
      res = await fetch(url, {
        method,
        headers,
        ...(body !== undefined && { body: JSON.stringify(body) }),
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new RequestError(`${method} ${url} failed: ${reason}`, undefined, undefined, err);
    }

    this.logger.debug(`${method} ${url} -> ${res.status}`);

    const text = await res.text();

    if (res.status === 404) {
      throw new NotFoundError(`${method} ${url} failed: 404 ${res.statusText}`, text);
    }
    if (!res.ok) {
      throw new RequestError(
        `${method} ${url} failed: ${res.status} ${res.statusText}`,
        res.status,
        text,
      );
    }

    if (text.trim() === '') return null;

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (err) {
      throw new InvalidResponseError(`${method} ${url} returned a non-JSON body`, err);
    }
  }
}

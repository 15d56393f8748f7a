export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface Transport {
  /**
   * Sends a request and resolves with the parsed JSON body (`null` for an empty one).
   * `pathOrUrl` is either an API path such as `/v1/models` or an absolute URL
   * handed out by the server, e.g. a page's `next` link.
   */
  request(method: HttpMethod, pathOrUrl: string, body?: unknown): Promise<unknown>;
}

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { HttpTransport } from '../../../src/http/httpTransport.js';
import { createLogger } from '../../../src/logging/logger.js';
import { NotFoundError, RequestError, InvalidResponseError } from '../../../src/errors/request.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('HttpTransport', () => {
  let transport: HttpTransport;
  let fetchMock: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    transport = new HttpTransport({
      baseUrl: 'https://api.test/',
      apiToken: 'test-token',
      userAgent: 'infersync-test',
    });
    fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('resolveUrl()', () => {
    it('joins paths to the base URL', () => {
      expect(transport.resolveUrl('/v1/models')).toBe('https://api.test/v1/models');
      expect(transport.resolveUrl('v1/models')).toBe('https://api.test/v1/models');
    });

    it('uses absolute URLs verbatim', () => {
      expect(transport.resolveUrl('https://other.test/v1/models?cursor=abc')).toBe(
        'https://other.test/v1/models?cursor=abc',
      );
    });
  });

  describe('request()', () => {
    it('sends GET with auth and user agent and returns the parsed body', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ id: 'pred-1' }));

      const body = await transport.request('GET', '/v1/predictions/pred-1');

      expect(body).toEqual({ id: 'pred-1' });
      expect(fetchMock).toHaveBeenCalledWith('https://api.test/v1/predictions/pred-1', {
        method: 'GET',
        headers: {
          'User-Agent': 'infersync-test',
          Accept: 'application/json',
          Authorization: 'Bearer test-token',
        },
      });
    });

    it('sends a JSON body with a content type', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ ok: true }, 201));

      await transport.request('POST', '/v1/predictions', { version: 'ver-1', input: {} });

      const init = fetchMock.mock.calls[0]?.[1] as RequestInit;
      expect(init.method).toBe('POST');
      expect(init.body).toBe('{"version":"ver-1","input":{}}');
      expect(init.headers).toMatchObject({ 'Content-Type': 'application/json' });
    });

    it('omits Authorization without a token', async () => {
      const anonymous = new HttpTransport({ baseUrl: 'https://api.test', userAgent: 'ua' });
      fetchMock.mockResolvedValueOnce(jsonResponse({}));

      await anonymous.request('GET', '/v1/models');

      const init = fetchMock.mock.calls[0]?.[1] as RequestInit;
      expect(init.headers).toEqual({ 'User-Agent': 'ua', Accept: 'application/json' });
    });

    it('returns null for an empty body', async () => {
      fetchMock.mockResolvedValueOnce(new Response('', { status: 200 }));

      await expect(transport.request('POST', '/v1/predictions/pred-1/cancel')).resolves.toBeNull();
    });

    it('throws NotFoundError on 404 with the response body', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ detail: 'Not found.' }, 404));

      const err: unknown = await transport.request('GET', '/v1/models/acme/missing').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(NotFoundError);
      expect(err).toBeInstanceOf(RequestError);
      expect(err).toMatchObject({ status: 404, body: '{"detail":"Not found."}', code: 'NOT_FOUND' });
    });

    it('throws RequestError with status and body on other failures', async () => {
      fetchMock.mockResolvedValueOnce(new Response('rate limited', { status: 429 }));

      const err: unknown = await transport.request('GET', '/v1/models').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(RequestError);
      expect(err).not.toBeInstanceOf(NotFoundError);
      expect(err).toMatchObject({ status: 429, body: 'rate limited', code: 'REQUEST_ERROR' });
    });

    it('wraps network failures in RequestError', async () => {
      const cause = new Error('ECONNREFUSED');
      fetchMock.mockRejectedValueOnce(cause);

      const err: unknown = await transport.request('GET', '/v1/models').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(RequestError);
      expect(err).toMatchObject({
        message: 'GET https://api.test/v1/models failed: ECONNREFUSED',
        status: undefined,
        cause,
      });
    });

    it('throws InvalidResponseError on a non-JSON success body', async () => {
      fetchMock.mockResolvedValueOnce(new Response('<html>', { status: 200 }));

      await expect(transport.request('GET', '/v1/models')).rejects.toThrow(InvalidResponseError);
    });

    it('logs each request at debug level', async () => {
      const lines: string[] = [];
      const traced = new HttpTransport({
        baseUrl: 'https://api.test',
        userAgent: 'ua',
        logger: createLogger('debug', line => lines.push(line)),
      });
      fetchMock.mockResolvedValueOnce(jsonResponse({}));

      await traced.request('GET', '/v1/models');

      expect(lines).toEqual(['[infersync] DEBUG GET https://api.test/v1/models -> 200\n']);
    });
  });
});

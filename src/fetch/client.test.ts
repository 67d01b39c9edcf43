import { afterEach, beforeEach, describe, expect, it, type MockedFunction, vi } from 'vitest';
import { HTTPError } from '../error/httpError.js';
import type { ApiRequest } from '../types/request.js';
import { FetchClient } from './client.js';

function readRequest(overrides: Partial<ApiRequest> = {}): ApiRequest {
  return {
    url: 'http://cms.example.com/-/item/v1/home',
    method: 'GET',
    headers: new Headers({ Connection: 'close' }),
    ...overrides,
  };
}

describe('FetchClient', () => {
  let mockedFetch: MockedFunction<typeof fetch>;

  beforeEach(() => {
    mockedFetch = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', mockedFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  describe('send', () => {
    it('sends method, url and headers of the request', async () => {
      const ok = new Response('{"statusCode":200}', { status: 200 });
      mockedFetch.mockResolvedValueOnce(ok);

      const client = new FetchClient();
      const [err, response] = await client.send(readRequest());

      expect(err).toBeNull();
      expect(response).toBe(ok);
      expect(mockedFetch).toHaveBeenCalledOnce();
      expect(mockedFetch).toHaveBeenCalledWith('http://cms.example.com/-/item/v1/home', {
        method: 'GET',
        headers: expect.any(Headers),
        body: undefined,
      });

      const headers = mockedFetch.mock.calls[0]?.[1]?.headers;
      expect(headers).toBeInstanceOf(Headers);
      expect(headers instanceof Headers && headers.get('connection')).toBe('close');
    });

    it('merges default headers under the request headers', async () => {
      mockedFetch.mockResolvedValueOnce(new Response(null, { status: 200 }));

      const client = new FetchClient({ headers: { 'User-Agent': 'contentwire-test', Connection: 'keep-alive' } });
      await client.send(readRequest());

      const headers = mockedFetch.mock.calls[0]?.[1]?.headers;
      expect(headers instanceof Headers && headers.get('user-agent')).toBe('contentwire-test');
      expect(headers instanceof Headers && headers.get('connection')).toBe('close');
    });

    it('passes the body bytes through', async () => {
      mockedFetch.mockResolvedValueOnce(new Response(null, { status: 201 }));

      const body = new TextEncoder().encode('__Display name=Home');
      const client = new FetchClient();
      await client.send(readRequest({ method: 'POST', body }));

      expect(mockedFetch.mock.calls[0]?.[1]?.body).toBe(body);
      expect(mockedFetch.mock.calls[0]?.[1]?.method).toBe('POST');
    });
  });

  describe('ERROR', () => {
    it('returns an HTTPError for non-2xx responses', async () => {
      mockedFetch.mockResolvedValueOnce(new Response('{"error":"denied"}', { status: 401, statusText: 'Unauthorized' }));

      const client = new FetchClient();
      const [err, response] = await client.send(readRequest({ method: 'PUT' }));

      expect(response).toBeNull();
      expect(err).toBeInstanceOf(HTTPError);
      expect(err?.message).toBe('error in PUT request in fetchClient');
      expect(err instanceof HTTPError && err.status).toBe(401);
      expect(err instanceof HTTPError && err.response.bodyUsed).toBe(false);
    });

    it('wraps fetch rejections', async () => {
      const fetchError = new TypeError('fetch failed');
      mockedFetch.mockRejectedValueOnce(fetchError);

      const client = new FetchClient();
      const [err, response] = await client.send(readRequest());

      expect(response).toBeNull();
      expect(err).toStrictEqual(new Error('error sending GET request in fetchClient', { cause: fetchError }));
    });
  });
});

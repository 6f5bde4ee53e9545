import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { AbortError } from '../error/abortError.js';
import { getHttpError, HTTPError } from '../error/httpError.js';
import { unwrapErrorType } from '../error/unwrapErrorType.js';
import { FetchClient } from './client.js';

describe('FetchClient', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  /** Headers passed to the nth fetch call. */
  function sentHeaders(call = 0): Headers {
    const init = fetchMock.mock.calls[call]?.[1];
    return new Headers(init?.headers);
  }

  test('joins the base URL and the endpoint', async () => {
    fetchMock.mockResolvedValue(new Response('{}'));
    const client = new FetchClient('https://api.example.com');

    await client.get('/player/2PPQ', {});
    await client.get('version', {});

    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.example.com/player/2PPQ');
    expect(fetchMock.mock.calls[1]?.[0]).toBe('https://api.example.com/version');
  });

  test('sends a GET with the default headers merged with the per-call ones', async () => {
    fetchMock.mockResolvedValue(new Response('{}'));
    const client = new FetchClient('https://api.example.com/', {
      headers: { auth: 'test-secret', Accept: 'application/json' },
    });

    await client.get('version', { headers: { 'x-trace': '1', Accept: 'text/plain' } });

    expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('GET');
    expect(sentHeaders().get('auth')).toBe('test-secret');
    expect(sentHeaders().get('x-trace')).toBe('1');
    expect(sentHeaders().get('accept')).toBe('text/plain');
  });

  test('passes the signal only when given', async () => {
    fetchMock.mockResolvedValue(new Response('{}'));
    const client = new FetchClient('https://api.example.com/');
    const controller = new AbortController();

    await client.get('version', {});
    await client.get('version', { signal: controller.signal });

    expect(fetchMock.mock.calls[0]?.[1]).not.toHaveProperty('signal');
    expect(fetchMock.mock.calls[1]?.[1]?.signal).toBe(controller.signal);
  });

  test('returns the response when it is ok', async () => {
    const response = new Response('6.1.0', { status: 200 });
    fetchMock.mockResolvedValue(response);

    const [err, res] = await new FetchClient('https://api.example.com/').get('version', {});

    expect(err).toBeNull();
    expect(res).toBe(response);
  });

  test('returns an HTTPError on a non-2xx status', async () => {
    const response = new Response('not found', { status: 404 });
    fetchMock.mockResolvedValue(response);

    const [err, res] = await new FetchClient('https://api.example.com/').get('player/NOPE', {});

    expect(res).toBeNull();
    expect(err).toBeInstanceOf(HTTPError);
    expect(err?.message).toBe('HTTP Error: 404');
    expect(getHttpError(err)?.response).toBe(response);
  });

  test('wraps a rejected fetch', async () => {
    const cause = new AbortError('aborted');
    fetchMock.mockRejectedValue(cause);

    const [err, res] = await new FetchClient('https://api.example.com/').get('version', {});

    expect(res).toBeNull();
    expect(err?.message).toBe('error wrapping GET request in fetchClient');
    expect(unwrapErrorType(AbortError, err)).toBe(cause);
  });
});

import { describe, expect, it, vi } from 'vitest';
import { AbortError } from '../error/abortError.js';
import { HTTPError } from '../error/httpError.js';
import { TimeoutError } from '../error/timeoutError.js';
import { TransportError } from '../error/transportError.js';
import type { FetchFunction } from '../types/request.js';
import { FetchClient } from './client.js';

function okFetch() {
  return vi.fn<FetchFunction>(async () => new Response('{"success":true}', { status: 200 }));
}

describe('FetchClient', () => {
  it('joins the base url and endpoint without doubling slashes', async () => {
    const fetch = okFetch();
    const client = new FetchClient('https://api.test/api/v1', { fetch });

    await client.get('/users?limit=1', {});
    await client.get('users/abc', {});

    expect(fetch.mock.calls[0]?.[0]).toBe('https://api.test/api/v1/users?limit=1');
    expect(fetch.mock.calls[1]?.[0]).toBe('https://api.test/api/v1/users/abc');
  });

  it('sends the verb, body and merged headers', async () => {
    const fetch = okFetch();
    const client = new FetchClient('https://api.test/', { fetch, headers: { Accept: 'application/json' } });

    const [err, res] = await client.post('bonuses', { body: '{"reason":"+1"}', headers: { 'X-Extra': 'yes' } });

    expect(err).toBeNull();
    expect(res?.status).toBe(200);
    const init = fetch.mock.calls[0]?.[1];
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"reason":"+1"}');
    const headers = new Headers(init?.headers);
    expect(headers.get('accept')).toBe('application/json');
    expect(headers.get('x-extra')).toBe('yes');
  });

  it('never sends a body with GET or DELETE', async () => {
    const fetch = okFetch();
    const client = new FetchClient('https://api.test/', { fetch });

    await client.delete('webhooks/1', {});

    expect(fetch.mock.calls[0]?.[1].method).toBe('DELETE');
    expect(fetch.mock.calls[0]?.[1].body).toBeUndefined();
  });

  it('returns an HTTPError for non-2xx responses', async () => {
    const fetch = vi.fn<FetchFunction>(async () => new Response('{"success":false}', { status: 404 }));
    const client = new FetchClient('https://api.test/', { fetch });

    const [err, res] = await client.get('users/missing', {});

    expect(res).toBeNull();
    expect(err).toBeInstanceOf(HTTPError);
    expect(err instanceof HTTPError && err.status).toBe(404);
  });

  it('classifies network failures as TransportError', async () => {
    const cause = new TypeError('fetch failed');
    const fetch = vi.fn<FetchFunction>(async () => {
      throw cause;
    });
    const client = new FetchClient('https://api.test/', { fetch });

    const [err] = await client.put('webhooks/1', { body: '{}' });

    expect(err).toBeInstanceOf(TransportError);
    expect(err?.message).toBe('error sending PUT request');
    expect(err?.cause).toBe(cause);
  });

  it('passes a classified abort reason through', async () => {
    const controller = new AbortController();
    const reason = new TimeoutError('error request timed out after 10ms');
    const fetch = vi.fn<FetchFunction>(async () => {
      controller.abort(reason);
      throw new DOMException('aborted', 'AbortError');
    });
    const client = new FetchClient('https://api.test/', { fetch });

    const [err] = await client.get('users', { signal: controller.signal });

    expect(err).toBe(reason);
  });

  it('wraps an unclassified abort into an AbortError', async () => {
    const controller = new AbortController();
    const fetch = vi.fn<FetchFunction>(async () => {
      controller.abort('caller gave up');
      throw new DOMException('aborted', 'AbortError');
    });
    const client = new FetchClient('https://api.test/', { fetch });

    const [err] = await client.get('users', { signal: controller.signal });

    expect(err).toBeInstanceOf(AbortError);
    expect(err?.message).toBe('error GET request aborted');
    expect(err?.cause).toBe('caller gave up');
  });
});

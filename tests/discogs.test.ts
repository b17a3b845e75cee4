import { describe, expect, it, vi } from 'vitest';
import { DiscogsClient, DiscogsHttpError, DiscogsTransportError } from '../src/utils/discogs.js';

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init
  });
}

// A body that sends half a JSON object and then breaks off.
function brokenBody(): ReadableStream<Uint8Array> {
  return new ReadableStream({
    start(controller) {
      controller.enqueue(new TextEncoder().encode('{"id":'));
      controller.error(new TypeError('terminated'));
    }
  });
}

// A body that sends half a JSON object and never closes.
function stalledBody(): ReadableStream<Uint8Array> {
  return new ReadableStream({
    start(controller) {
      controller.enqueue(new TextEncoder().encode('{"id":'));
    }
  });
}

function createClient(fetchMock: typeof fetch, timeoutMs?: number) {
  const sleep = vi.fn(async (_ms: number) => undefined);
  const client = new DiscogsClient({
    token: 'test-token',
    userAgent: 'CollectionEtl/1.0',
    fetch: fetchMock,
    sleep,
    timeoutMs
  });
  return { client, sleep };
}

describe('DiscogsClient', () => {
  it('authenticates and identifies every request', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ id: 0, name: 'All', count: 2 }));
    const { client } = createClient(fetchMock);

    const folder = await client.getFolder('test user', 0);

    expect(folder).toEqual({ id: 0, name: 'All', count: 2 });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.discogs.com/users/test%20user/collection/folders/0');
    expect(init?.headers).toEqual({
      Authorization: 'Discogs token=test-token',
      'User-Agent': 'CollectionEtl/1.0',
      Accept: 'application/vnd.discogs.v2.discogs+json'
    });
  });

  it('walks every page of a folder in order', async () => {
    const pages = [
      { pagination: { page: 1, pages: 2 }, releases: [{ id: 1 }, { id: 2 }] },
      { pagination: { page: 2, pages: 2 }, releases: [{ id: 3 }] }
    ];
    const fetchMock = vi.fn<typeof fetch>(async (input) => {
      const page = Number(new URL(String(input)).searchParams.get('page'));
      return jsonResponse(pages[page - 1]);
    });
    const { client } = createClient(fetchMock);

    const items: unknown[] = [];
    for await (const item of client.collectionItems('alice', 0, 2)) {
      items.push(item);
    }

    expect(items).toEqual([{ id: 1 }, { id: 2 }, { id: 3 }]);
    expect(fetchMock.mock.calls.map(([input]) => String(input))).toEqual([
      'https://api.discogs.com/users/alice/collection/folders/0/releases?page=1&per_page=2',
      'https://api.discogs.com/users/alice/collection/folders/0/releases?page=2&per_page=2'
    ]);
  });

  it('fails on a malformed collection page', async () => {
    const { client } = createClient(vi.fn<typeof fetch>(async () => jsonResponse({ pagination: { pages: 1 } })));

    const iterate = async () => {
      const items: unknown[] = [];
      for await (const item of client.collectionItems('alice', 0)) items.push(item);
      return items;
    };

    await expect(iterate()).rejects.toThrow('Discogs collection page 1 for alice has an unexpected shape.');
  });

  it('raises an HTTP error for non-success responses', async () => {
    const { client } = createClient(vi.fn<typeof fetch>(async () => new Response('Not Found', { status: 404 })));

    const error = await client.getRelease(9).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DiscogsHttpError);
    expect(error).toBeInstanceOf(DiscogsTransportError);
    expect(error).toMatchObject({
      status: 404,
      body: 'Not Found',
      url: 'https://api.discogs.com/releases/9',
      message: 'Discogs API error 404: Not Found'
    });
  });

  it('wraps network failures in a transport error', async () => {
    const { client } = createClient(
      vi.fn<typeof fetch>(async () => {
        throw new TypeError('fetch failed');
      })
    );

    const error = await client.getRelease(9).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DiscogsTransportError);
    expect(error).not.toBeInstanceOf(DiscogsHttpError);
    expect(error).toMatchObject({ message: 'Request to https://api.discogs.com/releases/9 failed: fetch failed' });
  });

  it('reports a timeout as a transport error', async () => {
    const fetchMock = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            const aborted = new Error('This operation was aborted');
            aborted.name = 'AbortError';
            reject(aborted);
          });
        })
    );
    const { client } = createClient(fetchMock, 5);

    await expect(client.getRelease(9)).rejects.toThrow('Request to https://api.discogs.com/releases/9 timed out after 5ms');
  });

  it('reports a body that breaks off as a transport error', async () => {
    const { client } = createClient(vi.fn<typeof fetch>(async () => new Response(brokenBody(), { status: 200 })));

    const error = await client.getRelease(1).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DiscogsTransportError);
    expect(error).not.toBeInstanceOf(DiscogsHttpError);
    expect(error).toMatchObject({ url: 'https://api.discogs.com/releases/1' });
    expect(String(error)).toContain('Request to https://api.discogs.com/releases/1 failed');
  });

  it('times out a body that never finishes', async () => {
    const { client } = createClient(
      vi.fn<typeof fetch>(async () => new Response(stalledBody(), { status: 200 })),
      20
    );

    await expect(client.getRelease(1)).rejects.toThrow('Request to https://api.discogs.com/releases/1 timed out after 20ms');
  });

  it('reports a truncated JSON body as a transport error', async () => {
    const { client } = createClient(vi.fn<typeof fetch>(async () => new Response('{"id":', { status: 200 })));

    await expect(client.getRelease(1)).rejects.toThrow('Response from https://api.discogs.com/releases/1 is not valid JSON');
  });

  it('waits out rate limiting before retrying', async () => {
    const limited = new Response('slow down', { status: 429, headers: { 'Retry-After': '2' } });
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(limited)
      .mockResolvedValueOnce(jsonResponse({ id: 9, title: 'Retried' }));
    const { client, sleep } = createClient(fetchMock);

    await expect(client.getRelease(9)).resolves.toEqual({ id: 9, title: 'Retried' });
    expect(sleep).toHaveBeenCalledWith(2000);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(limited.bodyUsed).toBe(true);
  });

  it('gives up after three rate-limited retries', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response('slow down', { status: 429 }));
    const { client, sleep } = createClient(fetchMock);

    await expect(client.getRelease(9)).rejects.toThrow('Discogs API error 429: slow down');
    expect(fetchMock).toHaveBeenCalledTimes(4);
    expect(sleep).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledWith(60_000);
  });
});
